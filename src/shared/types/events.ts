import { FinishReason } from "../../domain/orchestration/entities/event";
import { RoleName } from "../../domain/orchestration/entities/role";

export type DelegationLoopEventType =
  | "task_started"
  | "delegation_requested"
  | "delegation_succeeded"
  | "delegation_failed"
  | "delegation_errored"
  | "task_finished";

export interface DelegationLoopEvent {
  event_type: DelegationLoopEventType;
  session_id: string;
  sequence: number;
  recorded_at: string;
  role?: RoleName;
  iteration?: number;
  goal?: string;
  feedback?: string;
  error_message?: string;
  recoverable?: boolean;
  completed?: boolean;
  finish_reason?: FinishReason;
  summary?: string;
  duration_ms?: number;
}
