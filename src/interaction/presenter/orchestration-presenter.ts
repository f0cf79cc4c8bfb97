import { StepResult } from "../../domain/orchestration/entities/event";
import { DerivedState } from "../../domain/orchestration/services/state-reconstructor";
import { DelegationLoopEvent } from "../../shared/types/events";

export class OrchestrationPresenter {
  stepResult(result: StepResult): string {
    if (result.kind === "finish") {
      return this.finish(result);
    }
    return [
      `次のアクション: ${result.role} へ委譲`,
      JSON.stringify(result.inputs, null, 2),
    ].join("\n");
  }

  finish(result: Extract<StepResult, { kind: "finish" }>): string {
    const status = result.completed
      ? "完了"
      : result.fatal
        ? "中断 (致命的エラー)"
        : "未完了";
    return [`結果: ${status} [${result.reason}]`, result.summary].join("\n");
  }

  state(sessionId: string, state: DerivedState): string {
    const lines = [
      `session=${sessionId}`,
      `goal=${state.task.goal}`,
      `phase=${state.phase}`,
      `iteration=${state.iteration}/${state.maxIterations}`,
      `study_summary=${state.studySummary ? "present" : "none"}`,
      `pending=${state.pendingAction?.role ?? "(none)"}`,
    ];
    if (state.verifierFeedback) {
      lines.push(`feedback=${state.verifierFeedback}`);
    }
    if (state.finish) {
      lines.push(`finished=${state.finish.reason}`);
    }
    return lines.join("\n");
  }

  progress(event: DelegationLoopEvent): string | undefined {
    switch (event.event_type) {
      case "task_started":
        return `タスクを開始しました: ${event.goal ?? ""}`;
      case "delegation_requested":
        return `[${event.role}] 委譲しました (iteration=${event.iteration ?? 0})`;
      case "delegation_succeeded":
        return `[${event.role}] 成功しました${event.feedback ? `: ${event.feedback}` : ""}`;
      case "delegation_failed":
        return `[${event.role}] 失敗しました: ${event.error_message ?? "(理由なし)"}`;
      case "delegation_errored":
        return `[${event.role ?? "?"}] エラー: ${event.error_message ?? ""}`;
      case "task_finished":
        return undefined;
    }
  }
}
