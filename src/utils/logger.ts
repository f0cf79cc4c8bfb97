import * as fs from "fs";
import * as fsp from "fs/promises";
import * as os from "os";
import * as path from "path";
import { APP_DIR_NAME } from "../config";

enum LogLevel {
  DEBUG = "DEBUG",
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR",
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

function resolveLogDir(): string {
  const configured = process.env.TASK_ORCHESTRATOR_LOG_DIR?.trim();
  if (configured) {
    return configured;
  }
  return path.join(os.homedir(), APP_DIR_NAME, "logs");
}

function isLogLevel(value: string): value is LogLevel {
  return Object.values(LogLevel).some((level) => level === value);
}

function resolveThreshold(): LogLevel {
  const configured = process.env.TASK_ORCHESTRATOR_LOG_LEVEL?.trim().toUpperCase();
  if (configured && isLogLevel(configured)) {
    return configured;
  }
  return process.env.NODE_ENV === "test" ? LogLevel.ERROR : LogLevel.INFO;
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.stack ?? arg.message;
  }
  return typeof arg === "string" ? arg : JSON.stringify(arg);
}

async function log(level: LogLevel, message: string, ...args: unknown[]) {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[resolveThreshold()]) {
    return;
  }

  const logDir = resolveLogDir();
  if (!fs.existsSync(logDir)) {
    await fsp.mkdir(logDir, { recursive: true });
  }

  const timestamp = new Date().toISOString();
  const detail = args.length > 0 ? ` ${args.map(formatArg).join(" ")}` : "";
  const logMessage = `[${timestamp}] [${level}] ${message}`;
  await fsp.appendFile(path.join(logDir, "app.log"), `${logMessage}${detail}\n`);

  // Console mirrors the file; stderr keeps stdout free for command output.
  if (level === LogLevel.ERROR || process.env.NODE_ENV !== "production") {
    console.error(logMessage, ...args);
  }
}

export const logger = {
  debug: async (message: string, ...args: unknown[]) =>
    await log(LogLevel.DEBUG, message, ...args),
  info: async (message: string, ...args: unknown[]) =>
    await log(LogLevel.INFO, message, ...args),
  warn: async (message: string, ...args: unknown[]) =>
    await log(LogLevel.WARN, message, ...args),
  error: async (message: string, ...args: unknown[]) =>
    await log(LogLevel.ERROR, message, ...args),
};
