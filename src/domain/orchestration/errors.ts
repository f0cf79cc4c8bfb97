import { RoleName } from "./entities/role";

export type OrchestrationErrorKind =
  | "invalid_pairing"
  | "malformed_inputs"
  | "invalid_task_intake";

export abstract class OrchestrationError extends Error {
  abstract readonly kind: OrchestrationErrorKind;
  readonly fatal = true;
}

export class InvalidPairingError extends OrchestrationError {
  readonly kind = "invalid_pairing";

  constructor(
    readonly position: number | undefined,
    readonly pendingRole: RoleName | undefined,
    readonly observedRole: RoleName | undefined,
    detail: string,
  ) {
    super(
      position === undefined
        ? `Invalid pairing: ${detail}`
        : `Invalid pairing at event #${position}: ${detail}`,
    );
    this.name = "InvalidPairingError";
  }
}

export class MalformedInputsError extends OrchestrationError {
  readonly kind = "malformed_inputs";

  constructor(
    readonly role: RoleName,
    readonly missingFields: string[],
  ) {
    super(
      `Malformed inputs for ${role} delegation: missing ${missingFields.join(", ")}`,
    );
    this.name = "MalformedInputsError";
  }
}

export class InvalidTaskIntakeError extends OrchestrationError {
  readonly kind = "invalid_task_intake";

  constructor(
    readonly position: number | undefined,
    detail: string,
  ) {
    super(`Invalid task intake: ${detail}`);
    this.name = "InvalidTaskIntakeError";
  }
}

export class EventDecodeError extends Error {
  constructor(
    readonly path: string,
    detail: string,
  ) {
    super(`Invalid event at ${path}: ${detail}`);
    this.name = "EventDecodeError";
  }
}

export function isOrchestrationError(
  error: unknown,
): error is OrchestrationError {
  return error instanceof OrchestrationError;
}
