import { WebSocket } from "ws";
import { InMemoryEventLogAdapter } from "../../../adapters/event-log/in-memory-event-log.adapter";
import { ManageSessionUseCase } from "../../../application/orchestration/manage-session.usecase";
import { StepDelegationUseCase } from "../../../application/orchestration/step-delegation.usecase";
import { OrchestrationRpcServer } from "../../../interaction/rpc/orchestration-rpc.server";
import { logger } from "../../../utils/logger";

function connect(port: number): Promise<WebSocket> {
  return new Promise((resolve, reject) => {
    const ws = new WebSocket(`ws://127.0.0.1:${port}`);
    ws.once("open", () => resolve(ws));
    ws.once("error", reject);
  });
}

function send(ws: WebSocket, payload: unknown): Promise<unknown> {
  return new Promise((resolve) => {
    ws.once("message", (data) => resolve(JSON.parse(data.toString())));
    ws.send(typeof payload === "string" ? payload : JSON.stringify(payload));
  });
}

describe("OrchestrationRpcServer", () => {
  let server: OrchestrationRpcServer;
  let ws: WebSocket;
  let nextId = 0;

  function call(method: string, params: Record<string, unknown>): Promise<unknown> {
    nextId += 1;
    return send(ws, { jsonrpc: "2.0", id: nextId, method, params });
  }

  beforeEach(async () => {
    const sessions = new ManageSessionUseCase(
      new InMemoryEventLogAdapter(),
      new StepDelegationUseCase({ maxIterations: 2 }),
      () => "session-rpc",
    );
    server = await OrchestrationRpcServer.listen(sessions, { port: 0 });
    ws = await connect(server.port);
    nextId = 0;
  });

  afterEach(async () => {
    ws.close();
    await server.close();
  });

  it("starts a session and returns the first delegation", async () => {
    await expect(call("task.start", { goal: "add endpoint" })).resolves.toEqual({
      jsonrpc: "2.0",
      id: 1,
      result: { sessionId: "session-rpc" },
    });
    await expect(call("task.step", { sessionId: "session-rpc" })).resolves.toEqual({
      jsonrpc: "2.0",
      id: 2,
      result: {
        kind: "delegate_action",
        role: "study",
        inputs: { task: { goal: "add endpoint" } },
      },
    });
  });

  it("records observations and exposes state and events", async () => {
    await call("task.start", { goal: "add endpoint", sessionId: "s-1" });
    await call("task.step", { sessionId: "s-1" });

    await expect(
      call("task.observe", {
        sessionId: "s-1",
        status: "success",
        outputs: { summary: "S" },
      }),
    ).resolves.toMatchObject({ result: { sequence: 2 } });

    const state = await call("task.state", { sessionId: "s-1" });
    expect(state).toMatchObject({
      result: { ok: true, state: { phase: "awaiting_code", studySummary: "S" } },
    });

    const events = await call("task.events", { sessionId: "s-1" });
    expect(events).toMatchObject({
      result: [{ kind: "task" }, { kind: "delegate_action" }, { kind: "delegate_observation" }],
    });
  });

  it("records an error observation", async () => {
    await call("task.start", { goal: "add endpoint", sessionId: "s-1" });
    await call("task.step", { sessionId: "s-1" });

    await call("task.observe", { sessionId: "s-1", error: "agent crashed", recoverable: false });

    await expect(call("task.step", { sessionId: "s-1" })).resolves.toMatchObject({
      result: {
        kind: "finish",
        reason: "unrecoverable_error",
        summary: "study delegation failed: agent crashed",
      },
    });
  });

  it("maps protocol errors to JSON-RPC codes", async () => {
    await expect(send(ws, "{not json")).resolves.toEqual({
      jsonrpc: "2.0",
      id: null,
      error: { code: -32700, message: "Parse error" },
    });
    await expect(send(ws, { id: 9, method: "task.step" })).resolves.toEqual({
      jsonrpc: "2.0",
      id: null,
      error: { code: -32600, message: "Invalid Request" },
    });
    await expect(call("task.unknown", {})).resolves.toEqual({
      jsonrpc: "2.0",
      id: 1,
      error: { code: -32601, message: "Method not found: task.unknown" },
    });
  });

  it("reports invalid params and session errors", async () => {
    await expect(call("task.start", { goal: "" })).resolves.toEqual({
      jsonrpc: "2.0",
      id: 1,
      error: { code: -32602, message: "Invalid event at params.goal: must not be empty" },
    });
    await expect(call("task.step", { sessionId: "missing" })).resolves.toEqual({
      jsonrpc: "2.0",
      id: 2,
      error: { code: -32000, message: "Session not found: missing" },
    });
    await call("task.start", { goal: "g", sessionId: "s-1" });
    await expect(
      call("task.observe", { sessionId: "s-1", status: "done" }),
    ).resolves.toMatchObject({
      error: { code: -32602, message: "params.status must be success or failure" },
    });
  });

  it("logs server errors raised after it started listening", () => {
    const logError = jest.spyOn(logger, "error").mockResolvedValue(undefined);
    const failure = new Error("accept failed");

    expect(() => server["wss"].emit("error", failure)).not.toThrow();
    expect(logError).toHaveBeenCalledWith("RPC server error:", failure);

    logError.mockRestore();
  });
});
