import {
  DelegateAction,
  DelegationResult,
  errorObservation,
  FinishAction,
  isFinishAction,
  OrchestrationEvent,
  taskIntake,
} from "../../domain/orchestration/entities/event";
import { RoleName } from "../../domain/orchestration/entities/role";
import { Task } from "../../domain/orchestration/entities/task";
import { EventLogPort, LogRef } from "../../ports/outbound/event-log.port";
import { RoleAgentPort } from "../../ports/outbound/role-agent.port";
import { DelegationLoopEvent } from "../../shared/types/events";
import { logger } from "../../utils/logger";
import { SessionNotFoundError } from "./manage-session.usecase";
import { StepDelegationUseCase } from "./step-delegation.usecase";

export class StepLimitExceededError extends Error {
  constructor(
    readonly sessionId: string,
    readonly maxSteps: number,
  ) {
    super(`Step limit exceeded: session=${sessionId}, maxSteps=${maxSteps}`);
    this.name = "StepLimitExceededError";
  }
}

class DelegationTimeoutError extends Error {
  constructor(
    readonly role: RoleName,
    readonly timeoutMs: number,
  ) {
    super(`${role} delegation timed out after ${timeoutMs}ms`);
    this.name = "DelegationTimeoutError";
  }
}

export interface RunDelegationLoopOptions {
  maxSteps?: number;
  delegationTimeoutMs?: number;
}

export type RunDelegationLoopResult =
  | {
      status: "finished";
      sessionId: string;
      finish: FinishAction;
      events: OrchestrationEvent[];
    }
  | {
      status: "cancelled";
      sessionId: string;
      pendingRole?: RoleName;
      events: OrchestrationEvent[];
    };

interface RecordContext {
  pendingRole?: RoleName;
  durationMs?: number;
}

/**
 * Drives a session to completion: asks the controller for the next action,
 * executes delegations through the role agent, and appends every event to
 * the log before acting on it.
 */
export class RunDelegationLoopUseCase {
  constructor(
    private readonly eventLog: EventLogPort,
    private readonly roleAgent: RoleAgentPort,
    private readonly controller: StepDelegationUseCase,
    private readonly onEvent?: (
      event: DelegationLoopEvent,
    ) => void | Promise<void>,
    private readonly options: RunDelegationLoopOptions = {},
    private readonly now: () => number = () => Date.now(),
  ) {}

  async start(
    sessionId: string,
    task: Task,
    signal?: AbortSignal,
  ): Promise<RunDelegationLoopResult> {
    const existing = await this.eventLog.read(sessionId);
    if (existing.length > 0) {
      throw new Error(`Session already started: ${sessionId}`);
    }
    await this.record(
      sessionId,
      [],
      taskIntake(task, this.controller.maxIterations),
    );
    return this.resume(sessionId, signal);
  }

  async resume(
    sessionId: string,
    signal?: AbortSignal,
  ): Promise<RunDelegationLoopResult> {
    const maxSteps = Math.max(1, this.options.maxSteps ?? 64);
    let log = await this.eventLog.read(sessionId);
    if (log.length === 0) {
      throw new SessionNotFoundError(sessionId);
    }

    for (let steps = 0; steps < maxSteps; steps += 1) {
      const last = log[log.length - 1];
      if (isFinishAction(last)) {
        return { status: "finished", sessionId, finish: last, events: log };
      }
      if (signal?.aborted) {
        return this.cancelled(sessionId, log);
      }

      let action: DelegateAction | undefined =
        this.controller.pendingDelegation(log);
      if (action) {
        await logger.info(
          `Resuming outstanding ${action.role} delegation: session=${sessionId}`,
        );
      } else {
        const next = this.controller.step(log);
        log = await this.record(sessionId, log, next);
        if (next.kind === "finish") {
          return { status: "finished", sessionId, finish: next, events: log };
        }
        action = next;
      }

      const startedAt = this.now();
      const result = await this.delegate(action, signal);
      if (!result) {
        return this.cancelled(sessionId, log, action.role);
      }
      // Replies that arrive after an abort are still recorded.
      log = await this.record(sessionId, log, result, {
        pendingRole: action.role,
        durationMs: this.now() - startedAt,
      });
    }

    throw new StepLimitExceededError(sessionId, maxSteps);
  }

  private cancelled(
    sessionId: string,
    log: OrchestrationEvent[],
    pendingRole?: RoleName,
  ): RunDelegationLoopResult {
    return { status: "cancelled", sessionId, pendingRole, events: log };
  }

  private async delegate(
    action: DelegateAction,
    signal?: AbortSignal,
  ): Promise<DelegationResult | undefined> {
    const abortController = new AbortController();
    const forwardAbort = () => abortController.abort();
    signal?.addEventListener("abort", forwardAbort, { once: true });
    const timeoutMs = this.options.delegationTimeoutMs;
    let timer: NodeJS.Timeout | undefined;

    try {
      const running = this.roleAgent.run(action, abortController.signal);
      if (!timeoutMs || timeoutMs <= 0) {
        return await running;
      }
      const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          // Settle the race before the agent sees the abort.
          reject(new DelegationTimeoutError(action.role, timeoutMs));
          abortController.abort();
        }, timeoutMs);
      });
      return await Promise.race([running, timeout]);
    } catch (error) {
      if (signal?.aborted) {
        return undefined;
      }
      const message = error instanceof Error ? error.message : String(error);
      await logger.warn(`${action.role} delegation failed: ${message}`);
      return errorObservation(message, true);
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
      signal?.removeEventListener("abort", forwardAbort);
    }
  }

  private async record(
    sessionId: string,
    log: OrchestrationEvent[],
    event: OrchestrationEvent,
    context: RecordContext = {},
  ): Promise<OrchestrationEvent[]> {
    const ref = await this.eventLog.append(sessionId, event);
    const next = [...log, event];
    await this.pushEvent(this.buildEvent(ref, next, event, context));
    return next;
  }

  private async pushEvent(event: DelegationLoopEvent): Promise<void> {
    if (!this.onEvent) {
      return;
    }
    try {
      await this.onEvent(event);
    } catch (error) {
      // Keep event callback failures visible without breaking orchestration.
      await logger
        .error("Delegation loop event propagation failed:", error)
        .catch(() => undefined);
    }
  }

  private buildEvent(
    ref: LogRef,
    log: OrchestrationEvent[],
    event: OrchestrationEvent,
    context: RecordContext,
  ): DelegationLoopEvent {
    const inspection = this.controller.inspect(log);
    const base = {
      session_id: ref.sessionId,
      sequence: ref.sequence,
      recorded_at: new Date(this.now()).toISOString(),
      iteration: inspection.ok ? inspection.state.iteration : undefined,
    };

    switch (event.kind) {
      case "task":
        return { ...base, event_type: "task_started", goal: event.task.goal };
      case "delegate_action":
        return {
          ...base,
          event_type: "delegation_requested",
          role: event.role,
          feedback:
            event.role === "verify" ? undefined : event.inputs.verifierFeedback,
        };
      case "delegate_observation":
        if (event.status === "success") {
          return {
            ...base,
            event_type: "delegation_succeeded",
            role: event.role,
            feedback:
              event.role === "verify" ? event.outputs.feedback : undefined,
            duration_ms: context.durationMs,
          };
        }
        return {
          ...base,
          event_type: "delegation_failed",
          role: event.role,
          error_message: event.outputs.reason,
          duration_ms: context.durationMs,
        };
      case "error_observation":
        return {
          ...base,
          event_type: "delegation_errored",
          role: context.pendingRole,
          error_message: event.message,
          recoverable: event.recoverable,
          duration_ms: context.durationMs,
        };
      case "finish":
        return {
          ...base,
          event_type: "task_finished",
          completed: event.completed,
          finish_reason: event.reason,
          summary: event.summary,
        };
    }
  }
}
