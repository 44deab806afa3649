export function getOptionalEnv(
  name: string,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  const v = env[name];
  if (typeof v !== "string") {
    return undefined;
  }
  const trimmed = v.trim();
  return trimmed.length ? trimmed : undefined;
}

export function getRequiredEnv(name: string, env: NodeJS.ProcessEnv = process.env): string {
  const v = getOptionalEnv(name, env);
  if (!v) {
    throw new Error(`Missing env: ${name}`);
  }
  return v;
}

export function parsePositiveInt(raw: string | undefined, fallback: number): number {
  if (!raw) {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return parsed;
}
