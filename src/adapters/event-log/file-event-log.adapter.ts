import * as fs from "fs";
import { promises as fsp } from "fs";
import * as path from "path";
import { resolveConfigDir } from "../../config";
import { OrchestrationEvent } from "../../domain/orchestration/entities/event";
import {
  decodeEvent,
  decodeEventLog,
} from "../../domain/orchestration/services/event-decoder";
import {
  EventLogPort,
  LogRef,
  SESSION_ID_PATTERN,
  validateSessionId,
} from "../../ports/outbound/event-log.port";
import { logger } from "../../utils/logger";

interface StoredSession {
  createdAt: string;
  updatedAt: string;
  events: unknown[];
}

interface EventLogDocument {
  sessions: Record<string, StoredSession>;
}

export interface FileEventLogOptions {
  baseDir?: string;
  lockTimeoutMs?: number;
  lockRetryDelayMs?: number;
  lockStaleMs?: number;
}

interface LockMetadata {
  pid: number;
  createdAt: number;
}

const LOG_FILE_MODE = 0o600;
const LOG_DIR_MODE = 0o700;
const DEFAULT_LOCK_TIMEOUT_MS = 5000;
const DEFAULT_LOCK_RETRY_DELAY_MS = 50;
const DEFAULT_LOCK_STALE_MS = 60_000;

function parsePositiveIntegerEnv(
  value: string | undefined,
  fallback: number,
): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return Math.floor(parsed);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function normalizeSession(value: unknown): StoredSession | undefined {
  if (!isRecord(value) || !Array.isArray(value.events)) {
    return undefined;
  }
  const now = new Date().toISOString();
  return {
    createdAt: typeof value.createdAt === "string" ? value.createdAt : now,
    updatedAt: typeof value.updatedAt === "string" ? value.updatedAt : now,
    events: [...value.events],
  };
}

function normalizeDocument(value: unknown): EventLogDocument {
  const sessions = Object.create(null) as Record<string, StoredSession>;
  const source = isRecord(value) && isRecord(value.sessions) ? value.sessions : {};
  for (const [key, session] of Object.entries(source)) {
    const normalized = normalizeSession(session);
    if (!SESSION_ID_PATTERN.test(key) || !normalized) {
      continue;
    }
    sessions[key] = normalized;
  }
  return { sessions };
}

async function safeChmod(targetPath: string, mode: number): Promise<void> {
  try {
    await fsp.chmod(targetPath, mode);
  } catch {
    // Keep storage best-effort across OS/filesystem types.
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Stores every session's event log in one JSON document.
 * Writers serialize through a lock file; readers see whole documents only,
 * since each write lands through a rename.
 */
export class FileEventLogAdapter implements EventLogPort {
  private readonly baseDir: string;
  private readonly logFile: string;
  private readonly lockFile: string;
  private readonly lockTimeoutMs: number;
  private readonly lockRetryDelayMs: number;
  private readonly lockStaleMs: number;

  constructor(options: FileEventLogOptions = {}) {
    this.baseDir = options.baseDir ?? resolveConfigDir();
    this.logFile = path.join(this.baseDir, "event-log.json");
    this.lockFile = path.join(this.baseDir, "event-log.lock");
    this.lockTimeoutMs =
      options.lockTimeoutMs ??
      parsePositiveIntegerEnv(
        process.env.TASK_ORCHESTRATOR_LOCK_TIMEOUT_MS,
        DEFAULT_LOCK_TIMEOUT_MS,
      );
    this.lockRetryDelayMs =
      options.lockRetryDelayMs ??
      parsePositiveIntegerEnv(
        process.env.TASK_ORCHESTRATOR_LOCK_RETRY_DELAY_MS,
        DEFAULT_LOCK_RETRY_DELAY_MS,
      );
    this.lockStaleMs =
      options.lockStaleMs ??
      parsePositiveIntegerEnv(
        process.env.TASK_ORCHESTRATOR_LOCK_STALE_MS,
        DEFAULT_LOCK_STALE_MS,
      );
  }

  get path(): string {
    return this.logFile;
  }

  async append(sessionId: string, event: OrchestrationEvent): Promise<LogRef> {
    validateSessionId(sessionId);
    const encoded = decodeEvent(JSON.parse(JSON.stringify(event)));
    return this.withLock(async () => {
      const document = await this.readDocument();
      const now = new Date().toISOString();
      const session = document.sessions[sessionId] ?? {
        createdAt: now,
        updatedAt: now,
        events: [],
      };
      const events = [...session.events, encoded];
      document.sessions[sessionId] = { ...session, updatedAt: now, events };
      await this.writeDocument(document);
      return { sessionId, sequence: events.length - 1 };
    });
  }

  async read(sessionId: string): Promise<OrchestrationEvent[]> {
    validateSessionId(sessionId);
    const document = await this.readDocument();
    const session = document.sessions[sessionId];
    if (!session) {
      return [];
    }
    return decodeEventLog(session.events, `sessions.${sessionId}.events`);
  }

  async listSessions(): Promise<string[]> {
    const document = await this.readDocument();
    return Object.keys(document.sessions);
  }

  async deleteSession(sessionId: string): Promise<void> {
    validateSessionId(sessionId);
    await this.withLock(async () => {
      const document = await this.readDocument();
      delete document.sessions[sessionId];
      await this.writeDocument(document);
    });
  }

  private async withLock<T>(action: () => Promise<T>): Promise<T> {
    await fsp.mkdir(this.baseDir, { recursive: true });
    await safeChmod(this.baseDir, LOG_DIR_MODE);
    const startedAt = Date.now();
    let handle: fs.promises.FileHandle | undefined;

    while (!handle) {
      try {
        handle = await fsp.open(this.lockFile, "wx", LOG_FILE_MODE);
        await handle.writeFile(
          JSON.stringify({
            pid: process.pid,
            createdAt: Date.now(),
          } satisfies LockMetadata),
          "utf-8",
        );
        await handle.sync();
      } catch (error) {
        const code = (error as NodeJS.ErrnoException).code;
        if (code !== "EEXIST") {
          throw error;
        }

        const recovered = await this.tryRecoverStaleLock();
        if (recovered) {
          continue;
        }

        if (Date.now() - startedAt > this.lockTimeoutMs) {
          throw new Error(
            `Timed out waiting for event log lock after ${this.lockTimeoutMs}ms. Please retry.`,
          );
        }
        await sleep(this.lockRetryDelayMs);
      }
    }

    try {
      return await action();
    } finally {
      await handle.close();
      try {
        await fsp.unlink(this.lockFile);
      } catch {
        // Best effort unlock.
      }
    }
  }

  private async tryRecoverStaleLock(): Promise<boolean> {
    try {
      const raw = await fsp.readFile(this.lockFile, "utf-8");
      const metadata = this.parseLockMetadata(raw);
      const now = Date.now();

      let lockAgeMs: number;
      if (metadata) {
        lockAgeMs = now - metadata.createdAt;
      } else {
        const stat = await fsp.stat(this.lockFile);
        lockAgeMs = now - stat.mtimeMs;
      }

      if (lockAgeMs < this.lockStaleMs) {
        return false;
      }

      if (metadata && this.isProcessAlive(metadata.pid)) {
        return false;
      }

      await fsp.unlink(this.lockFile);
      await logger.warn(`Recovered stale event log lock: ${this.lockFile}`);
      return true;
    } catch (error) {
      const code = (error as NodeJS.ErrnoException).code;
      return code === "ENOENT";
    }
  }

  private parseLockMetadata(raw: string): LockMetadata | undefined {
    try {
      const parsed: unknown = JSON.parse(raw);
      if (
        isRecord(parsed) &&
        typeof parsed.pid === "number" &&
        Number.isInteger(parsed.pid) &&
        parsed.pid > 0 &&
        typeof parsed.createdAt === "number" &&
        Number.isFinite(parsed.createdAt) &&
        parsed.createdAt > 0
      ) {
        return { pid: parsed.pid, createdAt: parsed.createdAt };
      }
      return undefined;
    } catch {
      return undefined;
    }
  }

  private isProcessAlive(pid: number): boolean {
    try {
      process.kill(pid, 0);
      return true;
    } catch (error) {
      const code = (error as NodeJS.ErrnoException).code;
      if (code === "ESRCH") {
        return false;
      }
      // EPERM or unknown errors are treated as "alive" to avoid unsafe lock stealing.
      return true;
    }
  }

  private async writeDocument(document: EventLogDocument): Promise<void> {
    const tempFile = `${this.logFile}.tmp-${process.pid}-${Date.now()}`;
    await fsp.writeFile(tempFile, JSON.stringify(document, null, 2), {
      encoding: "utf-8",
      mode: LOG_FILE_MODE,
    });
    await safeChmod(tempFile, LOG_FILE_MODE);
    await fsp.rename(tempFile, this.logFile);
    await safeChmod(this.logFile, LOG_FILE_MODE);
  }

  private async readDocument(): Promise<EventLogDocument> {
    let raw: string;
    try {
      raw = await fsp.readFile(this.logFile, "utf-8");
    } catch (error) {
      const code = (error as NodeJS.ErrnoException).code;
      if (code === "ENOENT") {
        return normalizeDocument(undefined);
      }
      throw error;
    }

    try {
      const parsed: unknown = JSON.parse(raw);
      if (!isRecord(parsed)) {
        await this.backupCorruptFile();
        return normalizeDocument(undefined);
      }
      return normalizeDocument(parsed);
    } catch {
      await this.backupCorruptFile();
      return normalizeDocument(undefined);
    }
  }

  private async backupCorruptFile(): Promise<void> {
    if (!fs.existsSync(this.logFile)) {
      return;
    }

    const backupFile = `${this.logFile}.corrupt-${Date.now()}`;
    try {
      await fsp.rename(this.logFile, backupFile);
      await logger.warn(`Moved unreadable event log to ${backupFile}`);
    } catch (error) {
      await logger.error("Failed to back up unreadable event log:", error);
    }
  }
}
