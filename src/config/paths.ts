import os from "node:os";
import path from "node:path";

export const STATE_DIR_ENV = "NEWSDESK_STATE_DIR";
export const CONFIG_PATH_ENV = "NEWSDESK_CONFIG_PATH";
export const CONFIG_FILENAME = "newsdesk.json";

export function resolveStateDir(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const override = env[STATE_DIR_ENV]?.trim();
  if (override) {
    return path.resolve(override);
  }
  return path.join(homedir(), ".newsdesk");
}

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env[CONFIG_PATH_ENV]?.trim();
  if (override) {
    return path.resolve(override);
  }
  return path.join(resolveStateDir(env), CONFIG_FILENAME);
}
