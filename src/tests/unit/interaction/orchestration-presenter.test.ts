import { succeeded, taskIntake } from "../../../domain/orchestration/entities/event";
import { reconstructState } from "../../../domain/orchestration/services/state-reconstructor";
import { OrchestrationPresenter } from "../../../interaction/presenter/orchestration-presenter";

describe("OrchestrationPresenter", () => {
  const presenter = new OrchestrationPresenter();
  const task = { goal: "add endpoint" };

  it("renders finishes by outcome", () => {
    expect(
      presenter.finish({
        kind: "finish",
        summary: "LGTM",
        completed: true,
        reason: "approved",
        fatal: false,
      }),
    ).toBe("結果: 完了 [approved]\nLGTM");
    expect(
      presenter.finish({
        kind: "finish",
        summary: "Stopped after 3 of 3 iterations without approval.",
        completed: false,
        reason: "budget_exhausted",
        fatal: false,
      }),
    ).toBe("結果: 未完了 [budget_exhausted]\nStopped after 3 of 3 iterations without approval.");
    expect(
      presenter.stepResult({
        kind: "finish",
        summary: "halted",
        completed: false,
        reason: "invalid_pairing",
        fatal: true,
      }),
    ).toBe("結果: 中断 (致命的エラー) [invalid_pairing]\nhalted");
  });

  it("renders the next delegation with its inputs", () => {
    expect(
      presenter.stepResult({ kind: "delegate_action", role: "study", inputs: { task } }),
    ).toBe(
      '次のアクション: study へ委譲\n{\n  "task": {\n    "goal": "add endpoint"\n  }\n}',
    );
  });

  it("summarizes derived state", () => {
    const state = reconstructState([
      taskIntake(task),
      { kind: "delegate_action", role: "study", inputs: { task } },
      succeeded("study", { summary: "S" }),
      {
        kind: "delegate_action",
        role: "code",
        inputs: { task, studySummary: "S" },
      },
    ]);

    expect(presenter.state("s-1", state)).toBe(
      [
        "session=s-1",
        "goal=add endpoint",
        "phase=awaiting_code",
        "iteration=0/3",
        "study_summary=present",
        "pending=code",
      ].join("\n"),
    );
  });

  it("renders progress lines for loop events", () => {
    const base = { session_id: "s-1", sequence: 1, recorded_at: "2026-03-01T00:00:00.000Z" };

    expect(
      presenter.progress({ ...base, event_type: "delegation_requested", role: "code", iteration: 1 }),
    ).toBe("[code] 委譲しました (iteration=1)");
    expect(
      presenter.progress({
        ...base,
        event_type: "delegation_failed",
        role: "code",
        error_message: "compile error",
      }),
    ).toBe("[code] 失敗しました: compile error");
    expect(presenter.progress({ ...base, event_type: "task_finished" })).toBeUndefined();
  });
});
