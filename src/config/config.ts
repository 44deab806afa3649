import fs from "node:fs";
import type { NewsdeskConfig } from "./types.newsdesk.js";
import type { PipelineProfile, PipelineProfileOverride } from "./types.pipeline.js";
import { getOptionalEnv, getRequiredEnv, parsePositiveInt } from "./env.js";
import { resolveConfigPath } from "./paths.js";
import { BUILTIN_PROFILES, DEFAULT_PROFILE_NAME } from "./profiles.js";
import { NewsdeskConfigSchema } from "./zod-schema.newsdesk.js";
import { PipelineProfileSchema } from "./zod-schema.pipeline.js";

export type { NewsdeskConfig } from "./types.newsdesk.js";

export type RunMode = "once" | "continuous";

export type RuntimeSettings = {
  openaiApiKey: string;
  supabaseUrl: string;
  supabaseKey: string;
  runMode: RunMode;
  profileName: string;
  telegramBotToken?: string;
};

export const REQUIRED_ENV = ["OPENAI_API_KEY", "SUPABASE_URL", "SUPABASE_KEY"] as const;

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string[] {
  return issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
}

export function parseConfig(raw: unknown): NewsdeskConfig {
  const parsed = NewsdeskConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError("Invalid config", formatIssues(parsed.error.issues));
  }
  return parsed.data;
}

export function loadConfig(params: { path?: string; env?: NodeJS.ProcessEnv } = {}): NewsdeskConfig {
  const filePath = params.path ?? resolveConfigPath(params.env);
  if (!fs.existsSync(filePath)) {
    if (params.path) {
      throw new ConfigError(`Config file not found: ${filePath}`);
    }
    return {};
  }
  const text = fs.readFileSync(filePath, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Config file is not valid JSON: ${filePath}`, [String(err)]);
  }
  return parseConfig(raw);
}

function mergeProfile(base: PipelineProfile, name: string, override: PipelineProfileOverride): PipelineProfile {
  const { extends: _extends, columns, retention, ...rest } = override;
  return {
    ...base,
    ...rest,
    name,
    columns: { ...base.columns, ...columns },
    retention: { ...base.retention, ...retention },
  };
}

function resolveBaseProfile(
  name: string,
  cfg: NewsdeskConfig,
  seen: Set<string>,
): PipelineProfile {
  if (seen.has(name)) {
    throw new ConfigError(`Profile inheritance cycle at "${name}"`);
  }
  seen.add(name);
  const override = cfg.profiles?.[name];
  const builtin = BUILTIN_PROFILES[name];
  if (!override) {
    if (!builtin) {
      throw new ConfigError(`Unknown profile "${name}"`);
    }
    return builtin;
  }
  const parentName = override.extends ?? (builtin ? undefined : DEFAULT_PROFILE_NAME);
  const base = parentName ? resolveBaseProfile(parentName, cfg, seen) : builtin;
  if (!base) {
    throw new ConfigError(`Unknown profile "${name}"`);
  }
  return mergeProfile(base, name, override);
}

/**
 * Resolves a named profile: built-in defaults, then config file overrides,
 * then BATCH_SIZE / RECENCY_HOURS / TABLE_CEILING from the environment.
 */
export function resolvePipelineProfile(params: {
  name?: string;
  cfg?: NewsdeskConfig;
  env?: NodeJS.ProcessEnv;
  batchSize?: number;
}): PipelineProfile {
  const env = params.env ?? process.env;
  const name = params.name ?? DEFAULT_PROFILE_NAME;
  const resolved = resolveBaseProfile(name, params.cfg ?? {}, new Set());
  const withEnv: PipelineProfile = {
    ...resolved,
    batchSize:
      params.batchSize ?? parsePositiveInt(getOptionalEnv("BATCH_SIZE", env), resolved.batchSize),
    recencyHours: parsePositiveInt(getOptionalEnv("RECENCY_HOURS", env), resolved.recencyHours),
    retention: {
      ...resolved.retention,
      ceiling: parsePositiveInt(getOptionalEnv("TABLE_CEILING", env), resolved.retention.ceiling),
    },
  };
  const checked = PipelineProfileSchema.safeParse(withEnv);
  if (!checked.success) {
    throw new ConfigError(`Invalid profile "${name}"`, formatIssues(checked.error.issues));
  }
  return checked.data;
}

export function resolveRunMode(raw: string | undefined): RunMode {
  const normalized = (raw ?? "continuous").trim().toLowerCase();
  if (normalized === "once" || normalized === "continuous") {
    return normalized;
  }
  throw new ConfigError(`Invalid run mode "${raw ?? ""}"`, ["expected once or continuous"]);
}

export function resolveRuntimeSettings(params: {
  env?: NodeJS.ProcessEnv;
  mode?: string;
  profile?: string;
} = {}): RuntimeSettings {
  const env = params.env ?? process.env;
  const missing = REQUIRED_ENV.filter((name) => !getOptionalEnv(name, env));
  if (missing.length > 0) {
    throw new ConfigError("Missing required environment variables", [...missing]);
  }
  return {
    openaiApiKey: getRequiredEnv("OPENAI_API_KEY", env),
    supabaseUrl: getRequiredEnv("SUPABASE_URL", env),
    supabaseKey: getRequiredEnv("SUPABASE_KEY", env),
    runMode: resolveRunMode(params.mode ?? getOptionalEnv("RUN_MODE", env)),
    profileName: params.profile ?? getOptionalEnv("NEWSDESK_PROFILE", env) ?? DEFAULT_PROFILE_NAME,
    telegramBotToken: getOptionalEnv("TELEGRAM_BOT_TOKEN", env),
  };
}
