import { promises as fsp } from "fs";
import * as path from "path";
import { resolveConfigDir } from "../../config";
import { DEFAULT_MAX_ITERATIONS } from "../../domain/orchestration/services/state-reconstructor";
import { ConfigPort } from "../../ports/outbound/config.port";
import { logger } from "../../utils/logger";

interface StoredConfig {
  defaultModel?: string;
  maxIterations?: number;
}

export const DEFAULT_MODEL = "llama3";

function parsePositiveInteger(value: unknown): number | undefined {
  const parsed = typeof value === "string" ? Number(value) : value;
  if (typeof parsed !== "number" || !Number.isFinite(parsed) || parsed < 1) {
    return undefined;
  }
  return Math.floor(parsed);
}

export class FileConfigAdapter implements ConfigPort {
  private readonly configFile: string;

  constructor(
    private readonly configDir: string = resolveConfigDir(),
    private readonly fallbackModel: string = DEFAULT_MODEL,
  ) {
    this.configFile = path.join(configDir, "config.json");
  }

  async getDefaultModel(): Promise<string> {
    const envModel = process.env.TASK_ORCHESTRATOR_DEFAULT_MODEL?.trim();
    if (envModel) {
      return envModel;
    }

    const data = await this.readConfig();
    return data.defaultModel?.trim() || this.fallbackModel;
  }

  async setDefaultModel(model: string): Promise<void> {
    await this.writeConfig({ ...(await this.readConfig()), defaultModel: model });
  }

  async getMaxIterations(): Promise<number> {
    const fromEnv = parsePositiveInteger(
      process.env.TASK_ORCHESTRATOR_MAX_ITERATIONS,
    );
    if (fromEnv !== undefined) {
      return fromEnv;
    }

    const data = await this.readConfig();
    return parsePositiveInteger(data.maxIterations) ?? DEFAULT_MAX_ITERATIONS;
  }

  async setMaxIterations(maxIterations: number): Promise<void> {
    const value = parsePositiveInteger(maxIterations);
    if (value === undefined) {
      throw new Error(`maxIterations must be a positive integer: ${maxIterations}`);
    }
    await this.writeConfig({ ...(await this.readConfig()), maxIterations: value });
  }

  private async writeConfig(next: StoredConfig): Promise<void> {
    await fsp.mkdir(this.configDir, { recursive: true });
    await fsp.writeFile(this.configFile, JSON.stringify(next, null, 2), "utf-8");
  }

  private async readConfig(): Promise<StoredConfig> {
    try {
      const raw = await fsp.readFile(this.configFile, "utf-8");
      const parsed: unknown = JSON.parse(raw);
      if (typeof parsed !== "object" || parsed === null) {
        return {};
      }
      const config: StoredConfig = {};
      if ("defaultModel" in parsed && typeof parsed.defaultModel === "string") {
        config.defaultModel = parsed.defaultModel;
      }
      if ("maxIterations" in parsed) {
        config.maxIterations = parsePositiveInteger(parsed.maxIterations);
      }
      return config;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return {};
      }
      await logger.warn("Failed to read config file:", error);
      return {};
    }
  }
}
