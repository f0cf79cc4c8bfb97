import {
  DelegateAction,
  FinishAction,
  OrchestrationEvent,
  StepResult,
} from "../../domain/orchestration/entities/event";
import {
  isOrchestrationError,
  OrchestrationErrorKind,
} from "../../domain/orchestration/errors";
import { decide } from "../../domain/orchestration/services/phase-policy";
import {
  DerivedState,
  normalizeMaxIterations,
  reconstructState,
} from "../../domain/orchestration/services/state-reconstructor";

export interface StepDelegationOptions {
  maxIterations?: number;
}

export type StepInspection =
  | { ok: true; state: DerivedState }
  | { ok: false; kind: OrchestrationErrorKind; message: string };

function describeError(error: unknown): {
  kind: OrchestrationErrorKind;
  message: string;
} {
  if (isOrchestrationError(error)) {
    return { kind: error.kind, message: error.message };
  }
  // Anything else means the log or the policy broke its own contract.
  const message = error instanceof Error ? error.message : String(error);
  return { kind: "malformed_inputs", message };
}

/**
 * The delegation controller. Every call rebuilds state from the log, so
 * two calls with the same log always return the same event.
 */
export class StepDelegationUseCase {
  readonly maxIterations: number;

  constructor(options: StepDelegationOptions = {}) {
    this.maxIterations = normalizeMaxIterations(options.maxIterations);
  }

  step(log: ReadonlyArray<OrchestrationEvent>): StepResult {
    try {
      const state = this.reconstruct(log);
      return decide(state.task, state);
    } catch (error) {
      return this.haltWith(error);
    }
  }

  inspect(log: ReadonlyArray<OrchestrationEvent>): StepInspection {
    try {
      return { ok: true, state: this.reconstruct(log) };
    } catch (error) {
      return { ok: false, ...describeError(error) };
    }
  }

  /** The delegation that still lacks an observation, if the log is well-formed. */
  pendingDelegation(
    log: ReadonlyArray<OrchestrationEvent>,
  ): DelegateAction | undefined {
    const inspection = this.inspect(log);
    return inspection.ok ? inspection.state.pendingAction : undefined;
  }

  private reconstruct(log: ReadonlyArray<OrchestrationEvent>): DerivedState {
    return reconstructState(log, { maxIterations: this.maxIterations });
  }

  private haltWith(error: unknown): FinishAction {
    const { kind, message } = describeError(error);
    return {
      kind: "finish",
      summary: `Orchestration halted (${kind}): ${message}`,
      completed: false,
      reason: kind,
      fatal: true,
    };
  }
}

