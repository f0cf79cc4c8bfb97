import { Command } from "commander";
import { randomUUID } from "crypto";
import { FileConfigAdapter } from "./adapters/config/file-config.adapter";
import { FileEventLogAdapter } from "./adapters/event-log/file-event-log.adapter";
import { InMemoryEventLogAdapter } from "./adapters/event-log/in-memory-event-log.adapter";
import { OllamaClientAdapter } from "./adapters/ollama/ollama-client.adapter";
import {
  ManageSessionUseCase,
  ObservationInput,
} from "./application/orchestration/manage-session.usecase";
import { StepDelegationUseCase } from "./application/orchestration/step-delegation.usecase";
import { createTask } from "./domain/orchestration/entities/task";
import { runTaskCommand } from "./interaction/cli/commands/task.command";
import { OrchestrationPresenter } from "./interaction/presenter/orchestration-presenter";
import { OrchestrationRpcServer } from "./interaction/rpc/orchestration-rpc.server";
import { OrchestrationEventLogger } from "./operations/logging/orchestration-event-logger";
import { ConfigPort } from "./ports/outbound/config.port";
import { EventLogPort } from "./ports/outbound/event-log.port";
import { LlmClientPort } from "./ports/outbound/llm-client.port";
import { RoleAgentPort } from "./ports/outbound/role-agent.port";

function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`正の整数を指定してください: ${value}`);
  }
  return parsed;
}

function parseNonNegativeInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`非負の整数を指定してください: ${value}`);
  }
  return Math.floor(parsed);
}

function parseOutputs(raw: string | undefined): unknown {
  if (raw === undefined) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    throw new Error(`--outputs はJSONで指定してください: ${raw}`);
  }
}

function toMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

interface ObserveOptions {
  success?: boolean;
  failure?: boolean;
  outputs?: string;
  error?: string;
  fatal?: boolean;
}

function toObservationInput(options: ObserveOptions): ObservationInput {
  const selected = [
    options.success,
    options.failure,
    options.error !== undefined,
  ].filter(Boolean).length;
  if (selected !== 1) {
    throw new Error(
      "--success, --failure, --error のいずれか1つを指定してください。",
    );
  }
  if (options.error !== undefined) {
    return {
      kind: "error",
      message: options.error,
      recoverable: !options.fatal,
    };
  }
  return {
    kind: "result",
    status: options.success ? "success" : "failure",
    outputs: parseOutputs(options.outputs),
  };
}

interface RunOptions {
  model?: string;
  maxIterations?: number;
  sessionId?: string;
  timeout?: number;
  logEvents?: boolean;
}

export interface ProgramDeps {
  eventLog?: EventLogPort;
  llmClient?: LlmClientPort;
  config?: ConfigPort;
  createRoleAgent?: (model: string) => RoleAgentPort;
  logEvent?: OrchestrationEventLogger;
}

export function createProgram(deps?: ProgramDeps): Command {
  const config = deps?.config ?? new FileConfigAdapter();
  const llmClient = deps?.llmClient ?? new OllamaClientAdapter();
  const eventLog =
    deps?.eventLog ??
    (process.env.NODE_ENV === "test"
      ? new InMemoryEventLogAdapter()
      : new FileEventLogAdapter());
  const presenter = new OrchestrationPresenter();
  // The configured budget only seeds new sessions; existing ones read theirs from the log.
  const createSessions = async (
    maxIterations?: number,
  ): Promise<ManageSessionUseCase> =>
    new ManageSessionUseCase(
      eventLog,
      new StepDelegationUseCase({
        maxIterations: maxIterations ?? (await config.getMaxIterations()),
      }),
    );

  const runLoop = async (
    input: { sessionId: string; goal?: string; context?: string },
    options: RunOptions,
  ): Promise<void> => {
    const abortController = new AbortController();
    const onSigint = () => abortController.abort();
    process.once("SIGINT", onSigint);
    try {
      await runTaskCommand(
        {
          ...input,
          model: options.model,
          maxIterations: options.maxIterations,
          timeoutMs: options.timeout,
          enableEventLog: Boolean(options.logEvents),
        },
        {
          eventLog,
          config,
          llmClient,
          createRoleAgent: deps?.createRoleAgent,
          logEvent: deps?.logEvent,
          signal: abortController.signal,
        },
      );
    } finally {
      process.removeListener("SIGINT", onSigint);
    }
  };

  const program = new Command();

  program
    .name("task-orchestrator")
    .description("Delegates a task to Study, Code and Verify agents")
    .version("1.0.0");

  const taskCommand = program
    .command("task")
    .description("Task session operations.");

  taskCommand
    .command("start <goal>")
    .description("Record a task intake without running any delegation.")
    .option("-c, --context <text>", "Additional task context")
    .option("-s, --session-id <session_id>", "Session id to use")
    .option(
      "--max-iterations <n>",
      "Code/Verify cycles before giving up (recorded in the session)",
      parsePositiveInteger,
    )
    .action(
      async (
        goal: string,
        options: { context?: string; sessionId?: string; maxIterations?: number },
      ) => {
        try {
          const sessions = await createSessions(options.maxIterations);
          const ref = await sessions.start(
            createTask(goal, options.context),
            options.sessionId,
          );
          console.log(`session開始: ${ref.sessionId}`);
        } catch (error) {
          console.error(`タスク開始に失敗しました: ${toMessage(error)}`);
          process.exitCode = 1;
        }
      },
    );

  taskCommand
    .command("step <session_id>")
    .description("Append and print the next controller action.")
    .action(async (sessionId: string) => {
      try {
        const sessions = await createSessions();
        const next = await sessions.advance(sessionId);
        console.log(JSON.stringify(next, null, 2));
      } catch (error) {
        console.error(`ステップ実行に失敗しました: ${toMessage(error)}`);
        process.exitCode = 1;
      }
    });

  taskCommand
    .command("observe <session_id>")
    .description("Append the observation for the outstanding delegation.")
    .option("--success", "The delegation succeeded")
    .option("--failure", "The delegation reported a failure")
    .option("--outputs <json>", "Role outputs as JSON")
    .option("--error <message>", "The delegation could not run")
    .option("--fatal", "Mark the error as unrecoverable")
    .action(async (sessionId: string, options: ObserveOptions) => {
      try {
        const sessions = await createSessions();
        const ref = await sessions.observe(
          sessionId,
          toObservationInput(options),
        );
        console.log(`観測を記録しました: sequence=${ref.sequence}`);
      } catch (error) {
        console.error(`観測の記録に失敗しました: ${toMessage(error)}`);
        process.exitCode = 1;
      }
    });

  taskCommand
    .command("show <session_id>")
    .description("Print the state derived from the session's event log.")
    .action(async (sessionId: string) => {
      try {
        const sessions = await createSessions();
        const inspection = await sessions.inspect(sessionId);
        if (!inspection.ok) {
          console.error(
            `イベントログが不正です [${inspection.kind}]: ${inspection.message}`,
          );
          process.exitCode = 1;
          return;
        }
        console.log(presenter.state(sessionId, inspection.state));
      } catch (error) {
        console.error(`状態の取得に失敗しました: ${toMessage(error)}`);
        process.exitCode = 1;
      }
    });

  taskCommand
    .command("list")
    .description("List stored sessions.")
    .action(async () => {
      try {
        const sessionIds = await eventLog.listSessions();
        if (sessionIds.length === 0) {
          console.log("セッションがありません。");
          return;
        }
        sessionIds.forEach((id) => console.log(`  - ${id}`));
      } catch (error) {
        console.error(`セッション一覧の取得に失敗しました: ${toMessage(error)}`);
        process.exitCode = 1;
      }
    });

  const addRunOptions = (command: Command): Command =>
    command
      .option("-m, --model <model_name>", "Model name to use")
      .option(
        "--timeout <ms>",
        "Per-delegation timeout in milliseconds (0: none)",
        parseNonNegativeInteger,
      )
      .option(
        "--log-events",
        "Enable local orchestration event logging (masked + rotated)",
      );

  addRunOptions(
    taskCommand
      .command("run <goal>")
      .description("Run a task to completion with LLM-backed agents.")
      .option(
        "--max-iterations <n>",
        "Code/Verify cycles before giving up (recorded in the session)",
        parsePositiveInteger,
      )
      .option("-c, --context <text>", "Additional task context")
      .option(
        "-s, --session-id <session_id>",
        "Session id (omitted: a new session)",
      ),
  ).action(
    async (goal: string, options: RunOptions & { context?: string }) => {
      try {
        await runLoop(
          {
            sessionId: options.sessionId ?? `session-${randomUUID()}`,
            goal,
            context: options.context,
          },
          options,
        );
      } catch (error) {
        console.error(`タスク実行中にエラーが発生しました: ${toMessage(error)}`);
        process.exitCode = 1;
      }
    },
  );

  addRunOptions(
    taskCommand
      .command("resume <session_id>")
      .description("Continue a stored session, including an outstanding delegation."),
  ).action(async (sessionId: string, options: RunOptions) => {
    try {
      await runLoop({ sessionId }, options);
    } catch (error) {
      console.error(`タスク再開中にエラーが発生しました: ${toMessage(error)}`);
      process.exitCode = 1;
    }
  });

  taskCommand
    .command("discard <session_id>")
    .description("Delete a session's event log.")
    .action(async (sessionId: string) => {
      try {
        const sessions = await createSessions();
        await sessions.discard(sessionId);
        console.log(`session破棄完了: ${sessionId}`);
      } catch (error) {
        console.error(`セッション破棄に失敗しました: ${toMessage(error)}`);
        process.exitCode = 1;
      }
    });

  const modelCommand = program
    .command("model")
    .description("Model operations.");

  modelCommand
    .command("list")
    .description("List available models from Ollama.")
    .action(async () => {
      try {
        const models = await llmClient.listModels();
        if (models.length === 0) {
          console.log("利用可能なモデルがありません。");
          return;
        }
        console.log("利用可能なモデル:");
        models.forEach((m) => console.log(`  - ${m.name}`));
      } catch (error) {
        console.error(`モデル一覧の取得に失敗しました: ${toMessage(error)}`);
        process.exitCode = 1;
      }
    });

  modelCommand
    .command("use <model_name>")
    .description("Set default model.")
    .action(async (modelName: string) => {
      try {
        const models = await llmClient.listModels();
        if (!models.some((m) => m.name === modelName)) {
          console.error(`エラー: モデル '${modelName}' は存在しません。`);
          process.exitCode = 1;
          return;
        }
        await config.setDefaultModel(modelName);
        console.log(`デフォルトモデルを '${modelName}' に設定しました。`);
      } catch (error) {
        console.error(`モデル設定に失敗しました: ${toMessage(error)}`);
        process.exitCode = 1;
      }
    });

  const configCommand = program
    .command("config")
    .description("Configuration operations.");

  configCommand
    .command("show")
    .description("Print the effective configuration.")
    .action(async () => {
      try {
        console.log(`default_model=${await config.getDefaultModel()}`);
        console.log(`max_iterations=${await config.getMaxIterations()}`);
      } catch (error) {
        console.error(`設定の取得に失敗しました: ${toMessage(error)}`);
        process.exitCode = 1;
      }
    });

  configCommand
    .command("set-max-iterations <n>")
    .description("Set the default Code/Verify cycle budget.")
    .action(async (value: string) => {
      try {
        const maxIterations = parsePositiveInteger(value);
        await config.setMaxIterations(maxIterations);
        console.log(`max_iterations を ${maxIterations} に設定しました。`);
      } catch (error) {
        console.error(`設定の更新に失敗しました: ${toMessage(error)}`);
        process.exitCode = 1;
      }
    });

  program
    .command("serve")
    .description("Serve task sessions over JSON-RPC 2.0 on WebSocket.")
    .option("-p, --port <n>", "Port to listen on", parseNonNegativeInteger, 8080)
    .option("--host <host>", "Host to bind", "127.0.0.1")
    .action(async (options: { port: number; host: string }) => {
      try {
        const server = await OrchestrationRpcServer.listen(
          await createSessions(),
          { port: options.port, host: options.host },
        );
        console.log(
          `JSON-RPCサーバーを起動しました: ws://${options.host}:${server.port}`,
        );
      } catch (error) {
        console.error(`サーバー起動に失敗しました: ${toMessage(error)}`);
        process.exitCode = 1;
      }
    });

  return program;
}

export async function runCli(argv: string[]): Promise<void> {
  const program = createProgram();
  await program.parseAsync(argv);
}
