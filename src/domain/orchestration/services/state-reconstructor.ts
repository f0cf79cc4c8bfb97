import {
  DelegateAction,
  DelegateObservation,
  FinishAction,
  OrchestrationEvent,
} from "../entities/event";
import { RoleName } from "../entities/role";
import { Task } from "../entities/task";
import { InvalidPairingError, InvalidTaskIntakeError } from "../errors";
import {
  isCodeOutputs,
  isStudyOutputs,
  isVerifyOutputs,
} from "./event-decoder";

export const DEFAULT_MAX_ITERATIONS = 3;

export type Phase =
  | "awaiting_study"
  | "awaiting_code"
  | "awaiting_verify"
  | "done"
  | "exhausted"
  | "failed";

export type TerminalFailureReason = "study_failed" | "unrecoverable_error";

export interface DelegationFailureRecord {
  role: RoleName;
  message: string;
}

export interface DerivedState {
  task: Task;
  phase: Phase;
  /** Completed Code→Verify cycles that ended without approval. */
  iteration: number;
  maxIterations: number;
  studySummary: string;
  verifierFeedback: string;
  codeAttempted: boolean;
  pendingAction?: DelegateAction;
  approvalNote?: string;
  lastFailure?: DelegationFailureRecord;
  failureReason?: TerminalFailureReason;
  finish?: FinishAction;
}

export interface ReconstructOptions {
  /** Used only when the task intake does not record its own budget. */
  maxIterations?: number;
}

export function normalizeMaxIterations(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) {
    return DEFAULT_MAX_ITERATIONS;
  }
  return Math.max(1, Math.floor(value));
}

function roleOf(event: OrchestrationEvent): RoleName | undefined {
  return event.kind === "delegate_action" ||
    event.kind === "delegate_observation"
    ? event.role
    : undefined;
}

function firstNonEmpty(...values: Array<string | undefined>): string | undefined {
  return values.find((value) => value !== undefined && value.trim() !== "");
}

function failCycle(
  state: DerivedState,
  role: RoleName,
  message: string,
  restudy: boolean,
): DerivedState {
  const iteration = Math.min(state.iteration + 1, state.maxIterations);
  const phase: Phase =
    iteration >= state.maxIterations
      ? "exhausted"
      : restudy
        ? "awaiting_study"
        : "awaiting_code";
  return {
    ...state,
    phase,
    iteration,
    verifierFeedback: message,
    codeAttempted: false,
    lastFailure: { role, message },
  };
}

function failTerminally(
  state: DerivedState,
  role: RoleName,
  message: string,
  reason: TerminalFailureReason,
): DerivedState {
  return {
    ...state,
    phase: "failed",
    lastFailure: { role, message },
    failureReason: reason,
  };
}

function applyObservation(
  state: DerivedState,
  observation: DelegateObservation,
): DerivedState {
  switch (observation.role) {
    case "study":
      if (observation.status === "failure") {
        return failTerminally(
          state,
          "study",
          firstNonEmpty(observation.outputs.reason) ?? "study delegation failed",
          "study_failed",
        );
      }
      if (!isStudyOutputs(observation.outputs)) {
        return failTerminally(
          state,
          "study",
          "malformed study outputs",
          "study_failed",
        );
      }
      return {
        ...state,
        phase: "awaiting_code",
        studySummary: observation.outputs.summary,
        codeAttempted: false,
      };
    case "code":
      if (observation.status === "failure") {
        return failCycle(
          state,
          "code",
          firstNonEmpty(observation.outputs.reason) ?? "code delegation failed",
          false,
        );
      }
      if (!isCodeOutputs(observation.outputs)) {
        return failCycle(state, "code", "malformed code outputs", false);
      }
      return { ...state, phase: "awaiting_verify", codeAttempted: true };
    case "verify":
      if (observation.status === "failure") {
        return failCycle(
          state,
          "verify",
          firstNonEmpty(
            observation.outputs.feedback,
            observation.outputs.reason,
          ) ?? "verify delegation failed",
          observation.outputs.restudy === true,
        );
      }
      if (!isVerifyOutputs(observation.outputs)) {
        return failCycle(state, "verify", "malformed verify outputs", false);
      }
      if (observation.outputs.approved) {
        return {
          ...state,
          phase: "done",
          approvalNote: observation.outputs.feedback,
        };
      }
      return failCycle(
        state,
        "verify",
        firstNonEmpty(observation.outputs.feedback) ??
          "verification rejected without feedback",
        observation.outputs.restudy === true,
      );
  }
}

function noPendingDelegation(
  position: number,
  observedRole: RoleName | undefined,
  kind: string,
): InvalidPairingError {
  return new InvalidPairingError(
    position,
    undefined,
    observedRole,
    `${kind} has no outstanding delegation`,
  );
}

/**
 * Checks action/observation pairing over the whole log. Runs before the
 * intake check, so a log broken both ways reports the pairing violation.
 */
function assertRolePairing(log: ReadonlyArray<OrchestrationEvent>): void {
  let pending: RoleName | undefined;
  let finished = false;

  log.forEach((event, position) => {
    if (finished) {
      throw new InvalidPairingError(
        position,
        undefined,
        roleOf(event),
        `${event.kind} appended after the task finished`,
      );
    }
    switch (event.kind) {
      case "task":
        return;
      case "delegate_action":
        if (pending) {
          throw new InvalidPairingError(
            position,
            pending,
            event.role,
            `${event.role} delegation issued while ${pending} delegation is outstanding`,
          );
        }
        pending = event.role;
        return;
      case "delegate_observation":
        if (!pending) {
          throw noPendingDelegation(position, event.role, "observation");
        }
        if (pending !== event.role) {
          throw new InvalidPairingError(
            position,
            pending,
            event.role,
            `${event.role} observation does not match outstanding ${pending} delegation`,
          );
        }
        pending = undefined;
        return;
      case "error_observation":
        if (!pending) {
          throw noPendingDelegation(position, undefined, "error observation");
        }
        pending = undefined;
        return;
      case "finish":
        if (pending) {
          throw new InvalidPairingError(
            position,
            pending,
            undefined,
            `finish appended while ${pending} delegation is outstanding`,
          );
        }
        finished = true;
    }
  });
}

function applyEvent(
  state: DerivedState,
  event: OrchestrationEvent,
  position: number,
): DerivedState {
  switch (event.kind) {
    case "task":
      throw new InvalidTaskIntakeError(
        position,
        "task intake appears more than once",
      );
    case "delegate_action":
      return { ...state, pendingAction: event };
    case "delegate_observation":
      return applyObservation({ ...state, pendingAction: undefined }, event);
    case "error_observation": {
      const pending = state.pendingAction;
      if (!pending) {
        throw noPendingDelegation(position, undefined, "error observation");
      }
      const cleared: DerivedState = { ...state, pendingAction: undefined };
      if (!event.recoverable) {
        return failTerminally(
          cleared,
          pending.role,
          event.message,
          "unrecoverable_error",
        );
      }
      if (pending.role === "study") {
        return failTerminally(cleared, "study", event.message, "study_failed");
      }
      return failCycle(cleared, pending.role, event.message, false);
    }
    case "finish":
      return { ...state, finish: event };
  }
}

/**
 * Folds the event log into the current orchestration state.
 *
 * The log must start with exactly one task intake. Pairing violations throw
 * InvalidPairingError and take precedence; intake violations throw
 * InvalidTaskIntakeError.
 */
export function reconstructState(
  log: ReadonlyArray<OrchestrationEvent>,
  options: ReconstructOptions = {},
): DerivedState {
  assertRolePairing(log);

  const [first, ...rest] = log;
  if (!first) {
    throw new InvalidTaskIntakeError(undefined, "event log is empty");
  }
  if (first.kind !== "task") {
    throw new InvalidTaskIntakeError(
      0,
      `event log must start with a task intake, found ${first.kind}`,
    );
  }

  const initial: DerivedState = {
    task: first.task,
    phase: "awaiting_study",
    iteration: 0,
    maxIterations: normalizeMaxIterations(
      first.maxIterations ?? options.maxIterations,
    ),
    studySummary: "",
    verifierFeedback: "",
    codeAttempted: false,
  };

  return rest.reduce<DerivedState>(
    (state, event, index) => applyEvent(state, event, index + 1),
    initial,
  );
}
