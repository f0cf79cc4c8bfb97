import { OrchestrationErrorKind } from "../errors";
import { RoleName } from "./role";
import { Task } from "./task";

export interface StudyInputs {
  task: Task;
  verifierFeedback?: string;
}

export interface CodeInputs {
  task: Task;
  studySummary: string;
  verifierFeedback?: string;
}

export interface VerifyInputs {
  task: Task;
  studySummary: string;
}

export interface RoleInputs {
  study: StudyInputs;
  code: CodeInputs;
  verify: VerifyInputs;
}

export interface StudyOutputs {
  summary: string;
}

export interface CodeOutputs {
  diffOrFiles: string;
}

export interface VerifyOutputs {
  approved: boolean;
  feedback: string;
  restudy?: boolean;
}

export interface RoleOutputs {
  study: StudyOutputs;
  code: CodeOutputs;
  verify: VerifyOutputs;
}

export type FailureOutputs<R extends RoleName> = Partial<RoleOutputs[R]> & {
  reason?: string;
};

export interface TaskIntakeEvent {
  readonly kind: "task";
  readonly task: Task;
  /** Budget fixed when the session started; later config changes do not apply. */
  readonly maxIterations?: number;
}

export interface DelegateActionFor<R extends RoleName> {
  readonly kind: "delegate_action";
  readonly role: R;
  readonly inputs: RoleInputs[R];
}

export type DelegateAction = {
  [R in RoleName]: DelegateActionFor<R>;
}[RoleName];

export interface SuccessObservation<R extends RoleName> {
  readonly kind: "delegate_observation";
  readonly role: R;
  readonly status: "success";
  readonly outputs: RoleOutputs[R];
}

export interface FailureObservation<R extends RoleName> {
  readonly kind: "delegate_observation";
  readonly role: R;
  readonly status: "failure";
  readonly outputs: FailureOutputs<R>;
}

export type DelegateObservation = {
  [R in RoleName]: SuccessObservation<R> | FailureObservation<R>;
}[RoleName];

export interface ErrorObservation {
  readonly kind: "error_observation";
  readonly message: string;
  readonly recoverable: boolean;
}

export type FinishReason =
  | "approved"
  | "budget_exhausted"
  | "study_failed"
  | "unrecoverable_error"
  | OrchestrationErrorKind;

export interface FinishAction {
  readonly kind: "finish";
  readonly summary: string;
  readonly completed: boolean;
  readonly reason: FinishReason;
  readonly fatal: boolean;
}

export type OrchestrationEvent =
  | TaskIntakeEvent
  | DelegateAction
  | DelegateObservation
  | ErrorObservation
  | FinishAction;

/** What the controller hands back to its caller on every step. */
export type StepResult = DelegateAction | FinishAction;

/** What a role agent hands back for one delegation. */
export type DelegationResult = DelegateObservation | ErrorObservation;

export function taskIntake(
  task: Task,
  maxIterations?: number,
): TaskIntakeEvent {
  return maxIterations === undefined
    ? { kind: "task", task }
    : { kind: "task", task, maxIterations };
}

export function succeeded<R extends RoleName>(
  role: R,
  outputs: RoleOutputs[R],
): SuccessObservation<R> {
  return { kind: "delegate_observation", role, status: "success", outputs };
}

export function failed<R extends RoleName>(
  role: R,
  outputs: FailureOutputs<R> = {},
): FailureObservation<R> {
  return { kind: "delegate_observation", role, status: "failure", outputs };
}

export function errorObservation(
  message: string,
  recoverable = true,
): ErrorObservation {
  return { kind: "error_observation", message, recoverable };
}

export function isFinishAction(
  event: OrchestrationEvent | undefined,
): event is FinishAction {
  return event?.kind === "finish";
}
