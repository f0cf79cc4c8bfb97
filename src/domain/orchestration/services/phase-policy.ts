import {
  DelegateActionFor,
  FinishAction,
  RoleInputs,
  StepResult,
} from "../entities/event";
import { RoleName } from "../entities/role";
import { Task } from "../entities/task";
import { InvalidPairingError, MalformedInputsError } from "../errors";
import { DerivedState } from "./state-reconstructor";

function missingInputFields(
  role: RoleName,
  inputs: RoleInputs[RoleName],
): string[] {
  const missing: string[] = [];
  if (typeof inputs.task?.goal !== "string" || !inputs.task.goal.trim()) {
    missing.push("task.goal");
  }
  if (role !== "study") {
    const studySummary =
      "studySummary" in inputs ? inputs.studySummary : undefined;
    if (typeof studySummary !== "string" || !studySummary.trim()) {
      missing.push("studySummary");
    }
  }
  return missing;
}

/**
 * Builds a delegation and checks the role's required inputs.
 * Throws MalformedInputsError when a required field is missing or blank.
 */
export function buildDelegateAction<R extends RoleName>(
  role: R,
  inputs: RoleInputs[R],
): DelegateActionFor<R> {
  const missing = missingInputFields(role, inputs);
  if (missing.length > 0) {
    throw new MalformedInputsError(role, missing);
  }
  return { kind: "delegate_action", role, inputs };
}

function withFeedback(task: Task, verifierFeedback: string) {
  return verifierFeedback ? { task, verifierFeedback } : { task };
}

function finishApproved(state: DerivedState): FinishAction {
  return {
    kind: "finish",
    summary: state.approvalNote?.trim() || "Verification approved.",
    completed: true,
    reason: "approved",
    fatal: false,
  };
}

function finishExhausted(state: DerivedState): FinishAction {
  const lastFeedback = state.verifierFeedback
    ? ` Last feedback: ${state.verifierFeedback}`
    : "";
  return {
    kind: "finish",
    summary: `Stopped after ${state.iteration} of ${state.maxIterations} iterations without approval.${lastFeedback}`,
    completed: false,
    reason: "budget_exhausted",
    fatal: false,
  };
}

function finishFailed(state: DerivedState): FinishAction {
  const reason = state.failureReason ?? "unrecoverable_error";
  const detail = state.lastFailure
    ? `${state.lastFailure.role} delegation failed: ${state.lastFailure.message}`
    : "delegation failed";
  return {
    kind: "finish",
    summary: detail,
    completed: false,
    reason,
    fatal: true,
  };
}

/**
 * Chooses the next action from the reconstructed state.
 * The phase already reflects the most recent event, so no older event is
 * consulted here.
 */
export function decide(task: Task, state: DerivedState): StepResult {
  if (state.finish) {
    return state.finish;
  }
  if (state.pendingAction) {
    throw new InvalidPairingError(
      undefined,
      state.pendingAction.role,
      undefined,
      `${state.pendingAction.role} delegation is still awaiting its observation`,
    );
  }

  switch (state.phase) {
    case "awaiting_study":
      return buildDelegateAction(
        "study",
        withFeedback(task, state.verifierFeedback),
      );
    case "awaiting_code":
      return buildDelegateAction(
        "code",
        state.verifierFeedback
          ? {
              task,
              studySummary: state.studySummary,
              verifierFeedback: state.verifierFeedback,
            }
          : { task, studySummary: state.studySummary },
      );
    case "awaiting_verify":
      return buildDelegateAction("verify", {
        task,
        studySummary: state.studySummary,
      });
    case "done":
      return finishApproved(state);
    case "exhausted":
      return finishExhausted(state);
    case "failed":
      return finishFailed(state);
  }
}
