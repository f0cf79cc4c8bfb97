import { InMemoryEventLogAdapter } from "../../../adapters/event-log/in-memory-event-log.adapter";
import {
  RunDelegationLoopUseCase,
  StepLimitExceededError,
} from "../../../application/orchestration/run-delegation-loop.usecase";
import { SessionNotFoundError } from "../../../application/orchestration/manage-session.usecase";
import { StepDelegationUseCase } from "../../../application/orchestration/step-delegation.usecase";
import {
  DelegateAction,
  DelegationResult,
  succeeded,
  taskIntake,
} from "../../../domain/orchestration/entities/event";
import { Task } from "../../../domain/orchestration/entities/task";
import { RoleAgentPort } from "../../../ports/outbound/role-agent.port";
import { DelegationLoopEvent } from "../../../shared/types/events";

const task: Task = { goal: "add endpoint" };

function scriptedAgent(verdicts: boolean[]) {
  const queue = [...verdicts];
  const run = jest.fn(
    async (
      action: DelegateAction,
      _signal?: AbortSignal,
    ): Promise<DelegationResult> => {
      switch (action.role) {
        case "study":
          return succeeded("study", { summary: "S" });
        case "code":
          return succeeded("code", { diffOrFiles: "diff" });
        case "verify": {
          const approved = queue.shift() ?? false;
          return succeeded("verify", {
            approved,
            feedback: approved ? "LGTM" : "missing tests",
          });
        }
      }
    },
  );
  return { run };
}

function createLoop(
  roleAgent: RoleAgentPort,
  options: {
    maxIterations?: number;
    maxSteps?: number;
    delegationTimeoutMs?: number;
    onEvent?: (event: DelegationLoopEvent) => void | Promise<void>;
  } = {},
) {
  const eventLog = new InMemoryEventLogAdapter();
  const loop = new RunDelegationLoopUseCase(
    eventLog,
    roleAgent,
    new StepDelegationUseCase({ maxIterations: options.maxIterations ?? 3 }),
    options.onEvent,
    { maxSteps: options.maxSteps, delegationTimeoutMs: options.delegationTimeoutMs },
    () => Date.parse("2026-03-01T00:00:00.000Z"),
  );
  return { eventLog, loop };
}

describe("RunDelegationLoopUseCase", () => {
  it("runs study, code and verify until approval", async () => {
    const agent = scriptedAgent([true]);
    const { eventLog, loop } = createLoop(agent);

    const result = await loop.start("s-1", task);

    expect(result.status).toBe("finished");
    expect(result.status === "finished" && result.finish).toEqual({
      kind: "finish",
      summary: "LGTM",
      completed: true,
      reason: "approved",
      fatal: false,
    });
    expect(agent.run.mock.calls.map((call) => call[0].role)).toEqual([
      "study",
      "code",
      "verify",
    ]);
    expect((await eventLog.read("s-1")).map((event) => event.kind)).toEqual([
      "task",
      "delegate_action",
      "delegate_observation",
      "delegate_action",
      "delegate_observation",
      "delegate_action",
      "delegate_observation",
      "finish",
    ]);
  });

  it("passes verifier feedback into the retried code delegation", async () => {
    const agent = scriptedAgent([false, true]);
    const { loop } = createLoop(agent);

    await loop.start("s-1", task);

    expect(agent.run.mock.calls[3][0]).toEqual({
      kind: "delegate_action",
      role: "code",
      inputs: { task, studySummary: "S", verifierFeedback: "missing tests" },
    });
  });

  it("stops with budget_exhausted after maxIterations rejections", async () => {
    const agent = scriptedAgent([]);
    const { loop } = createLoop(agent, { maxIterations: 2 });

    const result = await loop.start("s-1", task);

    expect(result.status === "finished" && result.finish.reason).toBe(
      "budget_exhausted",
    );
    expect(agent.run).toHaveBeenCalledTimes(5);
  });

  it("records a thrown agent error as a recoverable error observation", async () => {
    const agent = scriptedAgent([true]);
    agent.run.mockRejectedValueOnce(new Error("connection refused"));
    const { eventLog, loop } = createLoop(agent);

    const result = await loop.start("s-1", task);

    expect(result.status === "finished" && result.finish).toMatchObject({
      reason: "study_failed",
      summary: "study delegation failed: connection refused",
    });
    expect((await eventLog.read("s-1"))[2]).toEqual({
      kind: "error_observation",
      message: "connection refused",
      recoverable: true,
    });
  });

  it("turns a slow delegation into a timeout error observation", async () => {
    const agent = scriptedAgent([true]);
    agent.run.mockImplementationOnce(
      (_action, signal) =>
        new Promise((_, reject) => {
          signal?.addEventListener("abort", () => reject(new Error("aborted")));
        }),
    );
    const { eventLog, loop } = createLoop(agent, { delegationTimeoutMs: 10 });

    await loop.start("s-1", task);

    expect((await eventLog.read("s-1"))[2]).toEqual({
      kind: "error_observation",
      message: "study delegation timed out after 10ms",
      recoverable: true,
    });
  });

  it("returns cancelled without recording an observation when aborted", async () => {
    const controller = new AbortController();
    const agent = scriptedAgent([true]);
    agent.run.mockImplementationOnce(async () => {
      controller.abort();
      throw new Error("aborted");
    });
    const { eventLog, loop } = createLoop(agent);

    const result = await loop.start("s-1", task, controller.signal);

    expect(result).toMatchObject({ status: "cancelled", pendingRole: "study" });
    expect((await eventLog.read("s-1")).map((event) => event.kind)).toEqual([
      "task",
      "delegate_action",
    ]);
  });

  it("records a reply that arrives after the abort before stopping", async () => {
    const controller = new AbortController();
    const agent = scriptedAgent([true]);
    agent.run.mockImplementationOnce(async () => {
      controller.abort();
      return succeeded("study", { summary: "S" });
    });
    const { eventLog, loop } = createLoop(agent);

    const result = await loop.start("s-1", task, controller.signal);

    expect(result).toMatchObject({ status: "cancelled", pendingRole: undefined });
    expect((await eventLog.read("s-1")).map((event) => event.kind)).toEqual([
      "task",
      "delegate_action",
      "delegate_observation",
    ]);
    expect(agent.run).toHaveBeenCalledTimes(1);
  });

  it("records the iteration budget in the task intake", async () => {
    const { eventLog, loop } = createLoop(scriptedAgent([true]), { maxIterations: 4 });

    await loop.start("s-1", task);

    expect((await eventLog.read("s-1"))[0]).toEqual({ kind: "task", task, maxIterations: 4 });
  });

  it("resumes against the budget recorded when the session started", async () => {
    const agent = scriptedAgent([false, false, false, true]);
    const { eventLog, loop } = createLoop(agent, { maxIterations: 3 });
    await eventLog.append("s-1", taskIntake(task, 5));

    const result = await loop.resume("s-1");

    expect(result.status === "finished" && result.finish).toMatchObject({
      reason: "approved",
      completed: true,
    });
    expect(
      agent.run.mock.calls.filter((call) => call[0].role === "verify"),
    ).toHaveLength(4);
  });

  it("resumes an outstanding delegation without issuing a new action", async () => {
    const agent = scriptedAgent([true]);
    const { eventLog, loop } = createLoop(agent);
    await eventLog.append("s-1", taskIntake(task));
    await eventLog.append("s-1", {
      kind: "delegate_action",
      role: "study",
      inputs: { task },
    });

    const result = await loop.resume("s-1");

    expect(result.status).toBe("finished");
    const log = await eventLog.read("s-1");
    expect(log.filter((event) => event.kind === "delegate_action")).toHaveLength(3);
    expect(log[2]).toEqual(succeeded("study", { summary: "S" }));
  });

  it("returns a recorded finish without calling the agent", async () => {
    const agent = scriptedAgent([true]);
    const { loop } = createLoop(agent);
    await loop.start("s-1", task);
    agent.run.mockClear();

    const result = await loop.resume("s-1");

    expect(result.status).toBe("finished");
    expect(agent.run).not.toHaveBeenCalled();
  });

  it("rejects resuming an unknown session and starting twice", async () => {
    const { loop } = createLoop(scriptedAgent([true]));

    await expect(loop.resume("missing")).rejects.toThrow(SessionNotFoundError);
    await loop.start("s-1", task);
    await expect(loop.start("s-1", task)).rejects.toThrow(
      "Session already started: s-1",
    );
  });

  it("throws when the step ceiling is reached", async () => {
    const { loop } = createLoop(scriptedAgent([true]), { maxSteps: 2 });

    await expect(loop.start("s-1", task)).rejects.toThrow(
      new StepLimitExceededError("s-1", 2),
    );
  });

  it("emits one progress event per appended event", async () => {
    const events: DelegationLoopEvent[] = [];
    const { loop } = createLoop(scriptedAgent([true]), {
      onEvent: (event) => {
        events.push(event);
      },
    });

    await loop.start("s-1", task);

    expect(events.map((event) => event.event_type)).toEqual([
      "task_started",
      "delegation_requested",
      "delegation_succeeded",
      "delegation_requested",
      "delegation_succeeded",
      "delegation_requested",
      "delegation_succeeded",
      "task_finished",
    ]);
    expect(events[0]).toEqual({
      event_type: "task_started",
      session_id: "s-1",
      sequence: 0,
      recorded_at: "2026-03-01T00:00:00.000Z",
      iteration: 0,
      goal: "add endpoint",
    });
    expect(events[7]).toMatchObject({
      sequence: 7,
      completed: true,
      finish_reason: "approved",
      summary: "LGTM",
    });
  });

  it("keeps running when the event callback throws", async () => {
    const { loop } = createLoop(scriptedAgent([true]), {
      onEvent: () => {
        throw new Error("sink down");
      },
    });
    jest.spyOn(console, "error").mockImplementation(() => {});

    const result = await loop.start("s-1", task);

    expect(result.status).toBe("finished");
    jest.restoreAllMocks();
  });
});
