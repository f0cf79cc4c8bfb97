import { promises as fsp } from "fs";
import * as os from "os";
import * as path from "path";
import { FileEventLogAdapter } from "../../../adapters/event-log/file-event-log.adapter";
import { succeeded, taskIntake } from "../../../domain/orchestration/entities/event";

describe("FileEventLogAdapter", () => {
  let baseDir: string;

  beforeEach(async () => {
    baseDir = await fsp.mkdtemp(path.join(os.tmpdir(), "task-orchestrator-log-"));
  });

  afterEach(async () => {
    await fsp.rm(baseDir, { recursive: true, force: true });
  });

  it("persists events across adapter instances", async () => {
    const writer = new FileEventLogAdapter({ baseDir });
    await writer.append("s-1", taskIntake({ goal: "add endpoint" }));
    await writer.append("s-1", {
      kind: "delegate_action",
      role: "study",
      inputs: { task: { goal: "add endpoint" } },
    });
    await expect(
      writer.append("s-1", succeeded("study", { summary: "S" })),
    ).resolves.toEqual({ sessionId: "s-1", sequence: 2 });

    const reader = new FileEventLogAdapter({ baseDir });

    expect(await reader.read("s-1")).toEqual([
      { kind: "task", task: { goal: "add endpoint" } },
      {
        kind: "delegate_action",
        role: "study",
        inputs: { task: { goal: "add endpoint" } },
      },
      {
        kind: "delegate_observation",
        role: "study",
        status: "success",
        outputs: { summary: "S" },
      },
    ]);
    expect(await reader.listSessions()).toEqual(["s-1"]);
  });

  it("writes the log with owner-only permissions", async () => {
    const eventLog = new FileEventLogAdapter({ baseDir });
    await eventLog.append("s-1", taskIntake({ goal: "g" }));

    const stat = await fsp.stat(eventLog.path);

    expect(stat.mode & 0o777).toBe(0o600);
  });

  it("deletes a session", async () => {
    const eventLog = new FileEventLogAdapter({ baseDir });
    await eventLog.append("a", taskIntake({ goal: "g" }));
    await eventLog.append("b", taskIntake({ goal: "g" }));

    await eventLog.deleteSession("a");

    expect(await eventLog.read("a")).toEqual([]);
    expect(await eventLog.listSessions()).toEqual(["b"]);
  });

  it("backs up an unreadable log file and starts empty", async () => {
    const eventLog = new FileEventLogAdapter({ baseDir });
    await fsp.writeFile(eventLog.path, "{oops", "utf-8");

    expect(await eventLog.read("s-1")).toEqual([]);

    const files = await fsp.readdir(baseDir);
    expect(files.some((file) => file.startsWith("event-log.json.corrupt-"))).toBe(true);
  });

  it("refuses to read a session whose stored events do not decode", async () => {
    const eventLog = new FileEventLogAdapter({ baseDir });
    await fsp.writeFile(
      eventLog.path,
      JSON.stringify({
        sessions: {
          "s-1": {
            createdAt: "2026-03-01T00:00:00.000Z",
            updatedAt: "2026-03-01T00:00:00.000Z",
            events: [{ kind: "task", task: { goal: "" } }],
          },
        },
      }),
      "utf-8",
    );

    await expect(eventLog.read("s-1")).rejects.toThrow(
      "Invalid event at sessions.s-1.events[0].task.goal: must not be empty",
    );
  });

  it("times out while another live process holds the lock", async () => {
    const eventLog = new FileEventLogAdapter({
      baseDir,
      lockTimeoutMs: 50,
      lockRetryDelayMs: 10,
    });
    await fsp.writeFile(
      path.join(baseDir, "event-log.lock"),
      JSON.stringify({ pid: process.pid, createdAt: Date.now() }),
      "utf-8",
    );

    await expect(
      eventLog.append("s-1", taskIntake({ goal: "g" })),
    ).rejects.toThrow("Timed out waiting for event log lock after 50ms. Please retry.");
  });

  it("recovers a stale lock without owner metadata", async () => {
    const eventLog = new FileEventLogAdapter({
      baseDir,
      lockTimeoutMs: 1000,
      lockRetryDelayMs: 10,
      lockStaleMs: 1000,
    });
    const lockFile = path.join(baseDir, "event-log.lock");
    await fsp.writeFile(lockFile, "garbage", "utf-8");
    const anHourAgo = new Date(Date.now() - 60 * 60 * 1000);
    await fsp.utimes(lockFile, anHourAgo, anHourAgo);

    await expect(
      eventLog.append("s-1", taskIntake({ goal: "g" })),
    ).resolves.toEqual({ sessionId: "s-1", sequence: 0 });
  });

  it("serializes concurrent appends", async () => {
    const eventLog = new FileEventLogAdapter({ baseDir, lockRetryDelayMs: 5 });
    await eventLog.append("s-1", taskIntake({ goal: "g" }));

    const refs = await Promise.all(
      ["a", "b", "c"].map((reason) =>
        eventLog.append("s-1", {
          kind: "error_observation",
          message: reason,
          recoverable: true,
        }),
      ),
    );

    expect(refs.map((ref) => ref.sequence).sort()).toEqual([1, 2, 3]);
    expect(await eventLog.read("s-1")).toHaveLength(4);
  });
});
