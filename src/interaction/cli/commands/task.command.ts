import {
  RunDelegationLoopResult,
  RunDelegationLoopUseCase,
} from "../../../application/orchestration/run-delegation-loop.usecase";
import { StepDelegationUseCase } from "../../../application/orchestration/step-delegation.usecase";
import { createTask } from "../../../domain/orchestration/entities/task";
import { LlmRoleAgentAdapter } from "../../../adapters/role-agent/llm-role-agent.adapter";
import {
  OrchestrationEventLogger,
  writeOrchestrationEventLog,
} from "../../../operations/logging/orchestration-event-logger";
import { ConfigPort } from "../../../ports/outbound/config.port";
import { EventLogPort } from "../../../ports/outbound/event-log.port";
import { LlmClientPort } from "../../../ports/outbound/llm-client.port";
import { RoleAgentPort } from "../../../ports/outbound/role-agent.port";
import { DelegationLoopEvent } from "../../../shared/types/events";
import { OrchestrationPresenter } from "../../presenter/orchestration-presenter";

export interface RunTaskCommandInput {
  sessionId: string;
  /** Present for a new session; absent when resuming. */
  goal?: string;
  context?: string;
  model?: string;
  maxIterations?: number;
  timeoutMs?: number;
  enableEventLog?: boolean;
}

export interface RunTaskCommandDeps {
  eventLog: EventLogPort;
  config: ConfigPort;
  llmClient: LlmClientPort;
  createRoleAgent?: (model: string) => RoleAgentPort;
  logEvent?: OrchestrationEventLogger;
  signal?: AbortSignal;
}

export async function runTaskCommand(
  input: RunTaskCommandInput,
  deps: RunTaskCommandDeps,
): Promise<RunDelegationLoopResult> {
  const presenter = new OrchestrationPresenter();
  const model = input.model ?? (await deps.config.getDefaultModel());
  const maxIterations =
    input.maxIterations ?? (await deps.config.getMaxIterations());
  const logEvent: OrchestrationEventLogger = input.enableEventLog
    ? (deps.logEvent ?? writeOrchestrationEventLog)
    : async () => {};
  const roleAgent =
    deps.createRoleAgent?.(model) ??
    new LlmRoleAgentAdapter(deps.llmClient, model);

  const onEvent = async (event: DelegationLoopEvent): Promise<void> => {
    const line = presenter.progress(event);
    if (line) {
      console.log(line);
    }
    try {
      await logEvent(event);
    } catch {
      // Logging must never break orchestration.
    }
  };

  const loop = new RunDelegationLoopUseCase(
    deps.eventLog,
    roleAgent,
    new StepDelegationUseCase({ maxIterations }),
    onEvent,
    { delegationTimeoutMs: input.timeoutMs },
  );

  // A resumed session keeps the budget recorded in its task intake.
  console.log(
    input.goal === undefined
      ? `session=${input.sessionId}, model=${model} (再開)`
      : `session=${input.sessionId}, model=${model}, max_iterations=${maxIterations}`,
  );
  const result =
    input.goal === undefined
      ? await loop.resume(input.sessionId, deps.signal)
      : await loop.start(
          input.sessionId,
          createTask(input.goal, input.context),
          deps.signal,
        );

  if (result.status === "cancelled") {
    console.log(
      `中断しました (pending=${result.pendingRole ?? "(none)"})。\`task resume ${input.sessionId}\` で再開できます。`,
    );
    process.exitCode = 130;
    return result;
  }

  console.log(presenter.finish(result.finish));
  if (!result.finish.completed) {
    process.exitCode = 1;
  }
  return result;
}
