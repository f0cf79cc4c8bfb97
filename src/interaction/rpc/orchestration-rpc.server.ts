import { WebSocket, WebSocketServer } from "ws";
import {
  ManageSessionUseCase,
  NoPendingDelegationError,
  ObservationInput,
  PendingDelegationError,
  SessionNotFoundError,
} from "../../application/orchestration/manage-session.usecase";
import { decodeTask } from "../../domain/orchestration/services/event-decoder";
import { EventDecodeError } from "../../domain/orchestration/errors";
import { logger } from "../../utils/logger";

type JsonRpcId = string | number | null;

interface JsonRpcResponse {
  jsonrpc: "2.0";
  id: JsonRpcId;
  result?: unknown;
  error?: {
    code: number;
    message: string;
  };
}

const PARSE_ERROR = -32700;
const INVALID_REQUEST = -32600;
const METHOD_NOT_FOUND = -32601;
const INVALID_PARAMS = -32602;
const SESSION_ERROR = -32000;

class InvalidParamsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidParamsError";
  }
}

type Params = Record<string, unknown>;

function isRecord(value: unknown): value is Params {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireStringParam(params: Params, key: string): string {
  const value = params[key];
  if (typeof value !== "string" || !value.trim()) {
    throw new InvalidParamsError(`params.${key} must be a non-empty string`);
  }
  return value;
}

function optionalStringParam(params: Params, key: string): string | undefined {
  return params[key] === undefined ? undefined : requireStringParam(params, key);
}

function toObservationInput(params: Params): ObservationInput {
  if (params.error !== undefined) {
    return {
      kind: "error",
      message: requireStringParam(params, "error"),
      recoverable: params.recoverable !== false,
    };
  }
  const status = params.status;
  if (status !== "success" && status !== "failure") {
    throw new InvalidParamsError("params.status must be success or failure");
  }
  return { kind: "result", status, outputs: params.outputs ?? {} };
}

function toErrorCode(error: unknown): number {
  if (error instanceof InvalidParamsError || error instanceof EventDecodeError) {
    return INVALID_PARAMS;
  }
  if (
    error instanceof SessionNotFoundError ||
    error instanceof PendingDelegationError ||
    error instanceof NoPendingDelegationError
  ) {
    return SESSION_ERROR;
  }
  return SESSION_ERROR - 1;
}

export interface OrchestrationRpcServerOptions {
  port?: number;
  host?: string;
}

/**
 * JSON-RPC 2.0 over WebSocket for callers that run delegations themselves:
 * task.start, task.step, task.observe, task.state, task.events.
 */
export class OrchestrationRpcServer {
  private constructor(
    private readonly wss: WebSocketServer,
    private readonly sessions: ManageSessionUseCase,
  ) {
    this.wss.on("error", (error) => {
      void logger.error("RPC server error:", error);
    });

    this.wss.on("connection", (ws) => {
      void logger.info("RPC client connected");

      ws.on("message", (message) => {
        void this.handleMessage(ws, message.toString());
      });

      ws.on("error", (error) => {
        void logger.error("WebSocket error:", error);
      });
    });
  }

  static listen(
    sessions: ManageSessionUseCase,
    options: OrchestrationRpcServerOptions = {},
  ): Promise<OrchestrationRpcServer> {
    return new Promise((resolve, reject) => {
      const wss = new WebSocketServer({
        port: options.port ?? 8080,
        host: options.host ?? "127.0.0.1",
      });
      wss.once("error", reject);
      wss.once("listening", () => {
        wss.off("error", reject);
        resolve(new OrchestrationRpcServer(wss, sessions));
      });
    });
  }

  get port(): number {
    const address = this.wss.address();
    return typeof address === "object" && address !== null
      ? address.port
      : Number.NaN;
  }

  close(): Promise<void> {
    for (const client of this.wss.clients) {
      client.terminate();
    }
    return new Promise((resolve, reject) => {
      this.wss.close((error) => (error ? reject(error) : resolve()));
    });
  }

  async dispatch(method: string, params: Params): Promise<unknown> {
    switch (method) {
      case "task.start": {
        const task = decodeTask(
          { goal: params.goal, context: params.context },
          "params",
        );
        const ref = await this.sessions.start(
          task,
          optionalStringParam(params, "sessionId"),
        );
        return { sessionId: ref.sessionId };
      }
      case "task.step":
        return this.sessions.advance(requireStringParam(params, "sessionId"));
      case "task.observe": {
        const ref = await this.sessions.observe(
          requireStringParam(params, "sessionId"),
          toObservationInput(params),
        );
        return { sequence: ref.sequence };
      }
      case "task.state":
        return this.sessions.inspect(requireStringParam(params, "sessionId"));
      case "task.events":
        return this.sessions.events(requireStringParam(params, "sessionId"));
      default:
        return undefined;
    }
  }

  private async handleMessage(ws: WebSocket, message: string): Promise<void> {
    let request: unknown;
    try {
      request = JSON.parse(message);
    } catch {
      this.send(ws, { jsonrpc: "2.0", id: null, error: { code: PARSE_ERROR, message: "Parse error" } });
      return;
    }

    if (
      !isRecord(request) ||
      request.jsonrpc !== "2.0" ||
      typeof request.method !== "string"
    ) {
      this.send(ws, {
        jsonrpc: "2.0",
        id: null,
        error: { code: INVALID_REQUEST, message: "Invalid Request" },
      });
      return;
    }

    const id: JsonRpcId =
      typeof request.id === "string" || typeof request.id === "number"
        ? request.id
        : null;
    const params = isRecord(request.params) ? request.params : {};

    try {
      const result = await this.dispatch(request.method, params);
      if (result === undefined) {
        this.send(ws, {
          jsonrpc: "2.0",
          id,
          error: {
            code: METHOD_NOT_FOUND,
            message: `Method not found: ${request.method}`,
          },
        });
        return;
      }
      this.send(ws, { jsonrpc: "2.0", id, result });
    } catch (error) {
      const messageText = error instanceof Error ? error.message : String(error);
      await logger.warn(`RPC ${request.method} failed: ${messageText}`);
      this.send(ws, {
        jsonrpc: "2.0",
        id,
        error: { code: toErrorCode(error), message: messageText },
      });
    }
  }

  private send(ws: WebSocket, response: JsonRpcResponse): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(response));
    }
  }
}
