import { EventDecodeError } from "../errors";
import {
  CodeOutputs,
  DelegateAction,
  DelegateObservation,
  DelegationResult,
  failed,
  FinishAction,
  FinishReason,
  OrchestrationEvent,
  StudyOutputs,
  succeeded,
  taskIntake,
  VerifyOutputs,
} from "../entities/event";
import { isRoleName, RoleName } from "../entities/role";
import { Task } from "../entities/task";

type UnknownRecord = Record<string, unknown>;

const FINISH_REASONS: ReadonlyArray<FinishReason> = [
  "approved",
  "budget_exhausted",
  "study_failed",
  "unrecoverable_error",
  "invalid_pairing",
  "malformed_inputs",
  "invalid_task_intake",
];

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireRecord(value: unknown, path: string): UnknownRecord {
  if (!isRecord(value)) {
    throw new EventDecodeError(path, "expected an object");
  }
  return value;
}

function requireString(record: UnknownRecord, key: string, path: string): string {
  const value = record[key];
  if (typeof value !== "string") {
    throw new EventDecodeError(`${path}.${key}`, "expected a string");
  }
  return value;
}

function optionalString(
  record: UnknownRecord,
  key: string,
  path: string,
): string | undefined {
  const value = record[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new EventDecodeError(`${path}.${key}`, "expected a string");
  }
  return value;
}

function requireBoolean(
  record: UnknownRecord,
  key: string,
  path: string,
): boolean {
  const value = record[key];
  if (typeof value !== "boolean") {
    throw new EventDecodeError(`${path}.${key}`, "expected a boolean");
  }
  return value;
}

function optionalBoolean(
  record: UnknownRecord,
  key: string,
  path: string,
): boolean | undefined {
  const value = record[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "boolean") {
    throw new EventDecodeError(`${path}.${key}`, "expected a boolean");
  }
  return value;
}

function optionalPositiveInteger(
  record: UnknownRecord,
  key: string,
  path: string,
): number | undefined {
  const value = record[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw new EventDecodeError(`${path}.${key}`, "expected a positive integer");
  }
  return value;
}

function requireRole(record: UnknownRecord, path: string): RoleName {
  const value = record.role;
  if (!isRoleName(value)) {
    throw new EventDecodeError(
      `${path}.role`,
      `expected one of study, code, verify (got ${JSON.stringify(value)})`,
    );
  }
  return value;
}

function isFinishReason(value: unknown): value is FinishReason {
  return FINISH_REASONS.some((reason) => reason === value);
}

export function isStudyOutputs(value: unknown): value is StudyOutputs {
  return isRecord(value) && typeof value.summary === "string";
}

export function isCodeOutputs(value: unknown): value is CodeOutputs {
  return isRecord(value) && typeof value.diffOrFiles === "string";
}

export function isVerifyOutputs(value: unknown): value is VerifyOutputs {
  return (
    isRecord(value) &&
    typeof value.approved === "boolean" &&
    typeof value.feedback === "string" &&
    (value.restudy === undefined || typeof value.restudy === "boolean")
  );
}

export function decodeTask(value: unknown, path = "task"): Task {
  const record = requireRecord(value, path);
  const goal = requireString(record, "goal", path);
  if (!goal.trim()) {
    throw new EventDecodeError(`${path}.goal`, "must not be empty");
  }
  const context = record.context;
  if (context === undefined) {
    return { goal };
  }
  if (typeof context === "string" || isRecord(context)) {
    return { goal, context };
  }
  throw new EventDecodeError(`${path}.context`, "expected a string or an object");
}

function decodeDelegateAction(
  record: UnknownRecord,
  path: string,
): DelegateAction {
  const role = requireRole(record, path);
  const inputsPath = `${path}.inputs`;
  const inputs = requireRecord(record.inputs, inputsPath);
  const task = decodeTask(inputs.task, `${inputsPath}.task`);
  const verifierFeedback = optionalString(
    inputs,
    "verifierFeedback",
    inputsPath,
  );

  switch (role) {
    case "study":
      return {
        kind: "delegate_action",
        role,
        inputs: verifierFeedback === undefined ? { task } : { task, verifierFeedback },
      };
    case "code": {
      const studySummary = requireString(inputs, "studySummary", inputsPath);
      return {
        kind: "delegate_action",
        role,
        inputs:
          verifierFeedback === undefined
            ? { task, studySummary }
            : { task, studySummary, verifierFeedback },
      };
    }
    case "verify":
      return {
        kind: "delegate_action",
        role,
        inputs: {
          task,
          studySummary: requireString(inputs, "studySummary", inputsPath),
        },
      };
  }
}

function decodeSuccess(
  role: RoleName,
  outputs: UnknownRecord,
  path: string,
): DelegateObservation {
  switch (role) {
    case "study":
      return succeeded("study", {
        summary: requireString(outputs, "summary", path),
      });
    case "code":
      return succeeded("code", {
        diffOrFiles: requireString(outputs, "diffOrFiles", path),
      });
    case "verify": {
      const verdict: VerifyOutputs = {
        approved: requireBoolean(outputs, "approved", path),
        feedback: requireString(outputs, "feedback", path),
      };
      const restudy = optionalBoolean(outputs, "restudy", path);
      return succeeded(
        "verify",
        restudy === undefined ? verdict : { ...verdict, restudy },
      );
    }
  }
}

function decodeFailure(
  role: RoleName,
  outputs: UnknownRecord,
  path: string,
): DelegateObservation {
  const reason = optionalString(outputs, "reason", path);
  switch (role) {
    case "study":
      return failed("study", {
        summary: optionalString(outputs, "summary", path),
        reason,
      });
    case "code":
      return failed("code", {
        diffOrFiles: optionalString(outputs, "diffOrFiles", path),
        reason,
      });
    case "verify":
      return failed("verify", {
        approved: optionalBoolean(outputs, "approved", path),
        feedback: optionalString(outputs, "feedback", path),
        restudy: optionalBoolean(outputs, "restudy", path),
        reason,
      });
  }
}

function decodeObservation(
  record: UnknownRecord,
  path: string,
): DelegateObservation {
  const role = requireRole(record, path);
  const status = record.status;
  const outputs = requireRecord(record.outputs ?? {}, `${path}.outputs`);
  if (status === "success") {
    return decodeSuccess(role, outputs, `${path}.outputs`);
  }
  if (status === "failure") {
    return decodeFailure(role, outputs, `${path}.outputs`);
  }
  throw new EventDecodeError(`${path}.status`, "expected success or failure");
}

function decodeFinish(record: UnknownRecord, path: string): FinishAction {
  const reason = record.reason;
  if (!isFinishReason(reason)) {
    throw new EventDecodeError(`${path}.reason`, "unknown finish reason");
  }
  return {
    kind: "finish",
    summary: requireString(record, "summary", path),
    completed: requireBoolean(record, "completed", path),
    reason,
    fatal: requireBoolean(record, "fatal", path),
  };
}

export function decodeEvent(value: unknown, path = "event"): OrchestrationEvent {
  const record = requireRecord(value, path);
  switch (record.kind) {
    case "task":
      return taskIntake(
        decodeTask(record.task, `${path}.task`),
        optionalPositiveInteger(record, "maxIterations", path),
      );
    case "delegate_action":
      return decodeDelegateAction(record, path);
    case "delegate_observation":
      return decodeObservation(record, path);
    case "error_observation":
      return {
        kind: "error_observation",
        message: requireString(record, "message", path),
        recoverable: requireBoolean(record, "recoverable", path),
      };
    case "finish":
      return decodeFinish(record, path);
    default:
      throw new EventDecodeError(
        `${path}.kind`,
        `unknown event kind ${JSON.stringify(record.kind)}`,
      );
  }
}

export function decodeEventLog(
  value: unknown,
  path = "events",
): OrchestrationEvent[] {
  if (!Array.isArray(value)) {
    throw new EventDecodeError(path, "expected an array");
  }
  return value.map((item, index) => decodeEvent(item, `${path}[${index}]`));
}

/** Decodes an observation supplied by an outside caller (CLI or RPC). */
export function decodeDelegationResult(
  value: unknown,
  path = "observation",
): DelegationResult {
  const event = decodeEvent(value, path);
  if (
    event.kind !== "delegate_observation" &&
    event.kind !== "error_observation"
  ) {
    throw new EventDecodeError(`${path}.kind`, "expected an observation");
  }
  return event;
}
