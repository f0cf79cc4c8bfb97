import { promises as fsp } from "fs";
import * as os from "os";
import * as path from "path";
import { FileConfigAdapter } from "../../../adapters/config/file-config.adapter";

describe("FileConfigAdapter", () => {
  let configDir: string;

  beforeEach(async () => {
    configDir = await fsp.mkdtemp(path.join(os.tmpdir(), "task-orchestrator-config-"));
  });

  afterEach(async () => {
    delete process.env.TASK_ORCHESTRATOR_DEFAULT_MODEL;
    delete process.env.TASK_ORCHESTRATOR_MAX_ITERATIONS;
    await fsp.rm(configDir, { recursive: true, force: true });
  });

  it("falls back to defaults without a config file", async () => {
    const config = new FileConfigAdapter(configDir);

    await expect(config.getDefaultModel()).resolves.toBe("llama3");
    await expect(config.getMaxIterations()).resolves.toBe(3);
  });

  it("persists model and iteration settings together", async () => {
    const config = new FileConfigAdapter(configDir);

    await config.setDefaultModel("qwen2");
    await config.setMaxIterations(5);

    const raw = await fsp.readFile(path.join(configDir, "config.json"), "utf-8");
    expect(JSON.parse(raw)).toEqual({ defaultModel: "qwen2", maxIterations: 5 });
    await expect(new FileConfigAdapter(configDir).getMaxIterations()).resolves.toBe(5);
  });

  it("lets the environment override the file", async () => {
    const config = new FileConfigAdapter(configDir);
    await config.setDefaultModel("qwen2");
    await config.setMaxIterations(5);
    process.env.TASK_ORCHESTRATOR_DEFAULT_MODEL = "mistral";
    process.env.TASK_ORCHESTRATOR_MAX_ITERATIONS = "2";

    await expect(config.getDefaultModel()).resolves.toBe("mistral");
    await expect(config.getMaxIterations()).resolves.toBe(2);
  });

  it("ignores invalid stored values", async () => {
    await fsp.writeFile(
      path.join(configDir, "config.json"),
      JSON.stringify({ defaultModel: 42, maxIterations: -1 }),
      "utf-8",
    );
    const config = new FileConfigAdapter(configDir);

    await expect(config.getDefaultModel()).resolves.toBe("llama3");
    await expect(config.getMaxIterations()).resolves.toBe(3);
  });

  it("rejects a non-positive iteration budget", async () => {
    const config = new FileConfigAdapter(configDir);

    await expect(config.setMaxIterations(0)).rejects.toThrow(
      "maxIterations must be a positive integer: 0",
    );
  });
});
