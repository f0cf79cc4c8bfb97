import {
  DelegateAction,
  DelegationResult,
} from "../../domain/orchestration/entities/event";

/**
 * Runs one delegation and reports exactly one observation for it.
 * Implementations may throw; the delegation loop records a thrown error as a
 * recoverable error observation.
 */
export interface RoleAgentPort {
  run(action: DelegateAction, signal?: AbortSignal): Promise<DelegationResult>;
}
