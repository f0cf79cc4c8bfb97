import { promises as fsp } from "fs";
import * as path from "path";
import { resolveConfigDir } from "../../config";
import { DelegationLoopEvent } from "../../shared/types/events";

const AUDIT_LOG_NAME = "orchestration-events.jsonl";
const AUDIT_LOG_MAX_BYTES = 1024 * 1024;

export type OrchestrationEventLogger = (
  entry: DelegationLoopEvent,
) => Promise<void>;

interface AuditLogTarget {
  file: string;
  maxBytes: number;
  /** Only the default directory is ours to restrict. */
  ownsDirectory: boolean;
}

function resolveAuditLogTarget(): AuditLogTarget {
  const maxBytes = Number(process.env.ORCHESTRATION_EVENT_LOG_MAX_BYTES);
  const limit =
    Number.isFinite(maxBytes) && maxBytes > 0 ? maxBytes : AUDIT_LOG_MAX_BYTES;

  const explicitFile = process.env.ORCHESTRATION_EVENT_LOG_FILE?.trim();
  if (explicitFile) {
    return { file: explicitFile, maxBytes: limit, ownsDirectory: false };
  }
  const dir =
    process.env.ORCHESTRATION_EVENT_LOG_DIR?.trim() ||
    path.join(resolveConfigDir(), "logs");
  return {
    file: path.join(dir, AUDIT_LOG_NAME),
    maxBytes: limit,
    ownsDirectory: true,
  };
}

// Role replies and model errors can echo credentials from prompts or headers.
const CREDENTIAL_PATTERNS: ReadonlyArray<[RegExp, string]> = [
  [/\bBearer\s+[A-Za-z0-9._~+/=-]+/g, "Bearer [REDACTED]"],
  [/\b(?:sk|pk)-[A-Za-z0-9_-]{16,}\b/g, "[REDACTED_KEY]"],
  [/\b(api[_-]?key|token|password)(\s*[=:]\s*)\S+/gi, "$1$2[REDACTED]"],
];

export function maskCredentials(text: string): string {
  return CREDENTIAL_PATTERNS.reduce(
    (masked, [pattern, replacement]) => masked.replace(pattern, replacement),
    text,
  );
}

const FREE_TEXT_FIELDS = ["goal", "feedback", "error_message", "summary"] as const;

export function sanitizeOrchestrationEvent(
  entry: DelegationLoopEvent,
): DelegationLoopEvent {
  const sanitized: DelegationLoopEvent = { ...entry };
  for (const field of FREE_TEXT_FIELDS) {
    const value = entry[field];
    if (value !== undefined) {
      sanitized[field] = maskCredentials(value);
    }
  }
  return sanitized;
}

async function restrictMode(target: string, mode: number): Promise<void> {
  await fsp.chmod(target, mode).catch(() => undefined);
}

/** Keeps a single previous generation as `<file>.1`. */
async function rotate(target: AuditLogTarget): Promise<void> {
  const size = await fsp
    .stat(target.file)
    .then((stat) => stat.size)
    .catch((error: NodeJS.ErrnoException) => {
      if (error.code === "ENOENT") {
        return 0;
      }
      throw error;
    });
  if (size >= target.maxBytes) {
    await fsp.rename(target.file, `${target.file}.1`);
  }
}

export const writeOrchestrationEventLog: OrchestrationEventLogger = async (
  entry,
) => {
  const target = resolveAuditLogTarget();
  const dir = path.dirname(target.file);

  await fsp.mkdir(dir, { recursive: true });
  if (target.ownsDirectory) {
    await restrictMode(dir, 0o700);
  }
  await rotate(target);
  await fsp.appendFile(
    target.file,
    `${JSON.stringify(sanitizeOrchestrationEvent(entry))}\n`,
    { encoding: "utf-8", mode: 0o600 },
  );
  await restrictMode(target.file, 0o600);
};
