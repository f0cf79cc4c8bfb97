import { randomUUID } from "crypto";
import {
  errorObservation,
  isFinishAction,
  OrchestrationEvent,
  StepResult,
  taskIntake,
} from "../../domain/orchestration/entities/event";
import { RoleName } from "../../domain/orchestration/entities/role";
import { Task } from "../../domain/orchestration/entities/task";
import { decodeDelegationResult } from "../../domain/orchestration/services/event-decoder";
import { EventLogPort, LogRef } from "../../ports/outbound/event-log.port";
import { StepDelegationUseCase, StepInspection } from "./step-delegation.usecase";

export class SessionNotFoundError extends Error {
  constructor(readonly sessionId: string) {
    super(`Session not found: ${sessionId}`);
    this.name = "SessionNotFoundError";
  }
}

export class PendingDelegationError extends Error {
  constructor(
    readonly sessionId: string,
    readonly role: RoleName,
  ) {
    super(
      `Session ${sessionId} is waiting for the ${role} observation; append it before stepping again`,
    );
    this.name = "PendingDelegationError";
  }
}

export class NoPendingDelegationError extends Error {
  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} has no outstanding delegation to observe`);
    this.name = "NoPendingDelegationError";
  }
}

export type ObservationInput =
  | { kind: "result"; status: "success" | "failure"; outputs: unknown }
  | { kind: "error"; message: string; recoverable: boolean };

/**
 * Manual session operations for callers that execute delegations themselves
 * (CLI subcommands and the RPC server).
 *
 * Writes to one session run one at a time, so each sees the previous one's
 * append before checking for an outstanding delegation.
 */
export class ManageSessionUseCase {
  private readonly sessionQueues = new Map<string, Promise<void>>();

  constructor(
    private readonly eventLog: EventLogPort,
    private readonly controller: StepDelegationUseCase,
    private readonly createSessionId: () => string = () =>
      `session-${randomUUID()}`,
  ) {}

  async start(task: Task, sessionId?: string): Promise<LogRef> {
    const targetSessionId = sessionId ?? this.createSessionId();
    return this.exclusive(targetSessionId, async () => {
      const existing = await this.eventLog.read(targetSessionId);
      if (existing.length > 0) {
        throw new Error(`Session already started: ${targetSessionId}`);
      }
      return this.eventLog.append(
        targetSessionId,
        taskIntake(task, this.controller.maxIterations),
      );
    });
  }

  /** Asks the controller for the next action and appends it. */
  advance(sessionId: string): Promise<StepResult> {
    return this.exclusive(sessionId, () => this.appendNextAction(sessionId));
  }

  /** Appends the observation answering the outstanding delegation. */
  observe(sessionId: string, input: ObservationInput): Promise<LogRef> {
    return this.exclusive(sessionId, () =>
      this.appendObservation(sessionId, input),
    );
  }

  async inspect(sessionId: string): Promise<StepInspection> {
    return this.controller.inspect(await this.readExisting(sessionId));
  }

  async events(sessionId: string): Promise<OrchestrationEvent[]> {
    return this.readExisting(sessionId);
  }

  discard(sessionId: string): Promise<void> {
    return this.exclusive(sessionId, async () => {
      await this.readExisting(sessionId);
      await this.eventLog.deleteSession(sessionId);
    });
  }

  private exclusive<T>(
    sessionId: string,
    operation: () => Promise<T>,
  ): Promise<T> {
    const previous = this.sessionQueues.get(sessionId) ?? Promise.resolve();
    const result = previous.then(operation);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.sessionQueues.set(sessionId, tail);
    void tail.then(() => {
      if (this.sessionQueues.get(sessionId) === tail) {
        this.sessionQueues.delete(sessionId);
      }
    });
    return result;
  }

  private async appendNextAction(sessionId: string): Promise<StepResult> {
    const log = await this.readExisting(sessionId);
    const last = log[log.length - 1];
    if (isFinishAction(last)) {
      return last;
    }
    const pending = this.controller.pendingDelegation(log);
    if (pending) {
      throw new PendingDelegationError(sessionId, pending.role);
    }
    const next = this.controller.step(log);
    await this.eventLog.append(sessionId, next);
    return next;
  }

  private async appendObservation(
    sessionId: string,
    input: ObservationInput,
  ): Promise<LogRef> {
    const log = await this.readExisting(sessionId);
    const pending = this.controller.pendingDelegation(log);
    if (!pending) {
      throw new NoPendingDelegationError(sessionId);
    }
    const observation =
      input.kind === "error"
        ? errorObservation(input.message, input.recoverable)
        : decodeDelegationResult({
            kind: "delegate_observation",
            role: pending.role,
            status: input.status,
            outputs: input.outputs,
          });
    return this.eventLog.append(sessionId, observation);
  }

  private async readExisting(sessionId: string): Promise<OrchestrationEvent[]> {
    const log = await this.eventLog.read(sessionId);
    if (log.length === 0) {
      throw new SessionNotFoundError(sessionId);
    }
    return log;
  }
}
