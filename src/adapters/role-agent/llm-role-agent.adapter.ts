import {
  DelegateAction,
  DelegationResult,
  failed,
  succeeded,
  VerifyOutputs,
} from "../../domain/orchestration/entities/event";
import { getRoleDefinition } from "../../domain/orchestration/entities/role";
import { describeTaskContext } from "../../domain/orchestration/entities/task";
import { LlmClientPort } from "../../ports/outbound/llm-client.port";
import { RoleAgentPort } from "../../ports/outbound/role-agent.port";
import { ChatMessage } from "../../shared/types/chat";

const ROLE_INSTRUCTIONS: Record<DelegateAction["role"], string> = {
  study:
    "Reply with a concise summary of the relevant code, constraints and the changes required. Do not write code.",
  code:
    "Reply with the complete change as a unified diff or as full file contents, each file preceded by its path.",
  verify:
    'Reply with a single JSON object only: {"approved": boolean, "feedback": string, "restudy": boolean}. Set "restudy" to true only when the study summary itself is wrong.',
};

function section(title: string, body: string | undefined): string[] {
  return body && body.trim() ? [`## ${title}`, body.trim(), ""] : [];
}

export function buildRoleMessages(action: DelegateAction): ChatMessage[] {
  const definition = getRoleDefinition(action.role);
  const { task } = action.inputs;
  const lines = [
    ...section("Goal", task.goal),
    ...section("Context", describeTaskContext(task)),
  ];

  switch (action.role) {
    case "study":
      lines.push(...section("Reviewer feedback", action.inputs.verifierFeedback));
      break;
    case "code":
      lines.push(
        ...section("Study summary", action.inputs.studySummary),
        ...section("Reviewer feedback", action.inputs.verifierFeedback),
      );
      break;
    case "verify":
      lines.push(...section("Study summary", action.inputs.studySummary));
      break;
  }

  return [
    {
      role: "system",
      content: `You are the ${action.role} agent. ${definition.responsibility} ${ROLE_INSTRUCTIONS[action.role]}`,
    },
    { role: "user", content: lines.join("\n").trim() },
  ];
}

export function parseVerdict(reply: string): VerifyOutputs | undefined {
  const start = reply.indexOf("{");
  const end = reply.lastIndexOf("}");
  if (start < 0 || end <= start) {
    return undefined;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(reply.slice(start, end + 1));
  } catch {
    return undefined;
  }
  if (
    typeof parsed !== "object" ||
    parsed === null ||
    !("approved" in parsed) ||
    typeof parsed.approved !== "boolean"
  ) {
    return undefined;
  }
  const feedback =
    "feedback" in parsed && typeof parsed.feedback === "string"
      ? parsed.feedback
      : "";
  const verdict: VerifyOutputs = { approved: parsed.approved, feedback };
  return "restudy" in parsed && parsed.restudy === true
    ? { ...verdict, restudy: true }
    : verdict;
}

export function interpretReply(
  role: DelegateAction["role"],
  reply: string,
): DelegationResult {
  const text = reply.trim();
  switch (role) {
    case "study":
      return text
        ? succeeded("study", { summary: text })
        : failed("study", { reason: "study agent returned an empty summary" });
    case "code":
      return text
        ? succeeded("code", { diffOrFiles: text })
        : failed("code", { reason: "code agent returned no changes" });
    case "verify": {
      const verdict = parseVerdict(text);
      return verdict
        ? succeeded("verify", verdict)
        : failed("verify", {
            reason: "verify agent did not return a JSON verdict",
          });
    }
  }
}

/** Runs each role as a single chat completion against one model. */
export class LlmRoleAgentAdapter implements RoleAgentPort {
  constructor(
    private readonly llmClient: LlmClientPort,
    private readonly model: string,
  ) {}

  async run(
    action: DelegateAction,
    signal?: AbortSignal,
  ): Promise<DelegationResult> {
    const reply = await this.llmClient.chat(
      this.model,
      buildRoleMessages(action),
      signal,
    );
    return interpretReply(action.role, reply);
  }
}
