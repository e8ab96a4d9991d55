import os from "node:os";
import path from "node:path";

export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.INTAKE_STATE_DIR?.trim();
  if (override) {
    return path.resolve(override);
  }
  return path.join(os.homedir(), ".intake-guard");
}

export function resolveUploadsDir(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(resolveStateDir(env), "uploads");
}
