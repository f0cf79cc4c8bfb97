import { OrchestrationEvent } from "../../domain/orchestration/entities/event";

export interface LogRef {
  sessionId: string;
  /** Zero-based position of the event in the session's log. */
  sequence: number;
}

export const SESSION_ID_PATTERN = /^[A-Za-z0-9._:-]+$/;
export const SESSION_ID_MAX_LENGTH = 256;

export function isValidSessionId(sessionId: string): boolean {
  return (
    typeof sessionId === "string" &&
    sessionId.length > 0 &&
    sessionId.length <= SESSION_ID_MAX_LENGTH &&
    SESSION_ID_PATTERN.test(sessionId)
  );
}

export function validateSessionId(sessionId: string): void {
  if (!isValidSessionId(sessionId)) {
    throw new Error(`Invalid session id: ${sessionId}`);
  }
}

/** Append-only, ordered storage of one event log per session. */
export interface EventLogPort {
  append(sessionId: string, event: OrchestrationEvent): Promise<LogRef>;
  read(sessionId: string): Promise<OrchestrationEvent[]>;
  listSessions(): Promise<string[]>;
  deleteSession(sessionId: string): Promise<void>;
}
