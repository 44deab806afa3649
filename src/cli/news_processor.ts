import crypto from "node:crypto";
import { Command } from "commander";
import type { NewsdeskConfig } from "../config/types.newsdesk.js";
import type { PipelineProfile } from "../config/types.pipeline.js";
import {
  ConfigError,
  REQUIRED_ENV,
  loadConfig,
  resolvePipelineProfile,
  resolveRuntimeSettings,
  type RuntimeSettings,
} from "../config/config.js";
import { parsePositiveInt } from "../config/env.js";
import { createOpenAiCompletionClient } from "../llm/openai.js";
import { createSubsystemLogger, describeError } from "../logging/logger.js";
import { createNewsProcessor, type BatchSummary } from "../news/processor.js";
import { createSupabaseClient, createSupabaseNewsTables } from "../news/supabase-tables.js";
import { createOperatorNotifier, createTelegramSender, formatRunSummary } from "../ops/notify.js";
import { appendRunRecord, buildRunRecord, type RunRecord } from "../ops/runs.js";
import { runContinuous, runOnce } from "../scheduler/loop.js";

const log = createSubsystemLogger("cli");

const RUN_JOB = "news_processor";

export type CliOptions = {
  mode?: string;
  batchSize?: number;
  profile?: string;
  config?: string;
};

export function parseCliOptions(argv: string[]): CliOptions {
  const program = new Command();
  program
    .name("newsdesk-relay")
    .description("Classify, rewrite and store news rows with an LLM")
    .option("--mode <mode>", "Run mode: once or continuous")
    .option("--batch-size <count>", "Max candidates per batch")
    .option("--profile <name>", "Pipeline profile name")
    .option("--config <path>", "Path to the JSON config file")
    .parse(argv, { from: "user" });
  const opts = program.opts<{
    mode?: string;
    batchSize?: string;
    profile?: string;
    config?: string;
  }>();
  return {
    mode: opts.mode,
    batchSize: opts.batchSize ? parsePositiveInt(opts.batchSize, Number.NaN) : undefined,
    profile: opts.profile,
    config: opts.config,
  };
}

export type ResolvedCli = {
  settings: RuntimeSettings;
  cfg: NewsdeskConfig;
  profile: PipelineProfile;
};

export function resolveCli(options: CliOptions, env: NodeJS.ProcessEnv = process.env): ResolvedCli {
  if (options.batchSize !== undefined && !Number.isFinite(options.batchSize)) {
    throw new ConfigError("--batch-size must be a positive integer");
  }
  const settings = resolveRuntimeSettings({ env, mode: options.mode, profile: options.profile });
  const cfg = loadConfig({ path: options.config, env });
  const profile = resolvePipelineProfile({
    name: settings.profileName,
    cfg,
    env,
    batchSize: options.batchSize,
  });
  return { settings, cfg, profile };
}

function logConfigHelp(err: ConfigError): void {
  log.error(`configuration error: ${err.message}`);
  log.error(`required environment variables: ${REQUIRED_ENV.join(", ")}`);
  log.error("optional: RUN_MODE (once/continuous), BATCH_SIZE, RECENCY_HOURS, TABLE_CEILING, NEWSDESK_PROFILE");
}

export async function runNewsProcessorCli(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  let resolved: ResolvedCli;
  try {
    resolved = resolveCli(parseCliOptions(argv), env);
  } catch (err) {
    if (err instanceof ConfigError) {
      logConfigHelp(err);
      return 1;
    }
    throw err;
  }
  const { settings, cfg, profile } = resolved;
  log.info(`profile ${profile.name}: ${profile.sourceTable} -> ${profile.destinationTable}`);

  const tables = createSupabaseNewsTables({
    client: createSupabaseClient({ url: settings.supabaseUrl, key: settings.supabaseKey }),
    profile,
  });
  const llm = createOpenAiCompletionClient({
    apiKey: settings.openaiApiKey,
    defaultModel: cfg.llm?.model,
  });
  const processor = createNewsProcessor({
    tables,
    llm,
    profile,
    models: { evaluation: cfg.llm?.evaluationModel, transform: cfg.llm?.transformModel },
    itemDelayMs: cfg.loop?.itemDelayMs,
  });
  const notifier = createOperatorNotifier({
    config: cfg.notify,
    sender: settings.telegramBotToken ? createTelegramSender(settings.telegramBotToken) : undefined,
  });

  const writeRecord = async (record: RunRecord) => {
    try {
      await appendRunRecord(record, env);
    } catch (err) {
      log.warn(`run record not written: ${describeError(err)}`);
    }
  };

  const runCycle = async (): Promise<boolean> => {
    const startedAt = new Date().toISOString();
    let summary: BatchSummary;
    try {
      summary = await processor.runBatch();
    } catch (err) {
      await writeRecord(
        buildRunRecord({
          runId: `news-${crypto.randomUUID()}`,
          job: RUN_JOB,
          profile: profile.name,
          startedAt,
          finishedAt: new Date().toISOString(),
          ok: false,
          error: describeError(err),
        }),
      );
      throw err;
    }
    await writeRecord(
      buildRunRecord({
        runId: summary.runId,
        job: RUN_JOB,
        profile: profile.name,
        startedAt: summary.startedAt,
        finishedAt: summary.finishedAt,
        ok: true,
        counts: summary.counts,
        tokenUsage: summary.tokenUsage,
      }),
    );
    await notifier.runSummary(
      formatRunSummary({
        profile: profile.name,
        counts: summary.counts,
        tokens: summary.tokenUsage.total,
      }),
    );
    return true;
  };

  if (settings.runMode === "once") {
    log.info("running in once mode");
    return runOnce(runCycle);
  }

  log.info("running in continuous mode");
  const controller = new AbortController();
  const stop = () => controller.abort();
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);
  try {
    const result = await runContinuous({
      runCycle,
      intervalSeconds: cfg.loop?.intervalSeconds,
      maxConsecutiveFailures: cfg.loop?.maxConsecutiveFailures,
      signal: controller.signal,
      onFatal: (failures) =>
        notifier.fatal(
          `News processor (${profile.name}) exiting after ${failures} consecutive failures`,
        ),
    });
    return result.exitCode;
  } finally {
    process.off("SIGINT", stop);
    process.off("SIGTERM", stop);
  }
}
