import { OrchestrationEvent } from "../../domain/orchestration/entities/event";
import { decodeEvent } from "../../domain/orchestration/services/event-decoder";
import {
  EventLogPort,
  LogRef,
  validateSessionId,
} from "../../ports/outbound/event-log.port";

function cloneEvent(event: OrchestrationEvent): OrchestrationEvent {
  return decodeEvent(JSON.parse(JSON.stringify(event)));
}

export class InMemoryEventLogAdapter implements EventLogPort {
  private readonly sessions = new Map<string, OrchestrationEvent[]>();

  async append(sessionId: string, event: OrchestrationEvent): Promise<LogRef> {
    validateSessionId(sessionId);
    const events = this.sessions.get(sessionId) ?? [];
    events.push(cloneEvent(event));
    this.sessions.set(sessionId, events);
    return { sessionId, sequence: events.length - 1 };
  }

  async read(sessionId: string): Promise<OrchestrationEvent[]> {
    validateSessionId(sessionId);
    return (this.sessions.get(sessionId) ?? []).map(cloneEvent);
  }

  async listSessions(): Promise<string[]> {
    return Array.from(this.sessions.keys());
  }

  async deleteSession(sessionId: string): Promise<void> {
    validateSessionId(sessionId);
    this.sessions.delete(sessionId);
  }
}
