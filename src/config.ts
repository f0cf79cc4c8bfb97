import * as os from "os";
import * as path from "path";

export const APP_DIR_NAME = ".task-orchestrator";

/** Directory holding config.json and the event log; env overrides home. */
export function resolveConfigDir(): string {
  const configured = process.env.TASK_ORCHESTRATOR_CONFIG_DIR?.trim();
  if (configured) {
    return configured;
  }
  return path.join(os.homedir(), APP_DIR_NAME);
}
