import crypto from "node:crypto";
import { setTimeout as delay } from "node:timers/promises";
import type { PipelineProfile } from "../config/types.pipeline.js";
import type { CompletionClient } from "../llm/types.js";
import type { NewsTables } from "./tables.js";
import type { Candidate, TokenUsage } from "./types.js";
import { createSubsystemLogger, describeError, headlinePrefix } from "../logging/logger.js";
import { findDuplicate } from "./dedupe.js";
import { createEvaluator, type Evaluator } from "./evaluator.js";
import { fetchCandidates } from "./fetcher.js";
import { markCandidateProcessed, storeRecord } from "./store.js";
import { createTransformer, type Transformer } from "./transformer.js";

const log = createSubsystemLogger("news/processor");

export const DEFAULT_ITEM_DELAY_MS = 1_000;

export type CandidateOutcome =
  | "duplicate"
  | "blocked"
  | "evaluation_failed"
  | "transform_failed"
  | "stored"
  | "store_failed"
  | "error";

export type BatchCounts = {
  fetched: number;
  duplicates: number;
  evaluated: number;
  passed: number;
  blocked: number;
  evaluationFailed: number;
  transformFailed: number;
  stored: number;
  storeFailed: number;
  marked: number;
  errors: number;
};

export type BatchSummary = {
  runId: string;
  startedAt: string;
  finishedAt: string;
  counts: BatchCounts;
  tokenUsage: TokenUsage;
};

export type NewsProcessor = {
  profile: PipelineProfile;
  processCandidate: (candidate: Candidate) => Promise<CandidateOutcome>;
  runBatch: (params?: { limit?: number }) => Promise<BatchSummary>;
};

export type NewsProcessorParams = {
  tables: NewsTables;
  llm: CompletionClient;
  profile: PipelineProfile;
  models?: { evaluation?: string; transform?: string };
  itemDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  evaluator?: Evaluator;
  transformer?: Transformer;
};

function emptyCounts(): BatchCounts {
  return {
    fetched: 0,
    duplicates: 0,
    evaluated: 0,
    passed: 0,
    blocked: 0,
    evaluationFailed: 0,
    transformFailed: 0,
    stored: 0,
    storeFailed: 0,
    marked: 0,
    errors: 0,
  };
}

function shouldMark(policy: PipelineProfile["markProcessed"], outcome: CandidateOutcome): boolean {
  if (policy === "never") {
    return false;
  }
  if (outcome === "stored") {
    return true;
  }
  // Model failures stay unmarked so the next poll evaluates them again.
  return policy === "handled" && (outcome === "blocked" || outcome === "duplicate");
}

export function createNewsProcessor(params: NewsProcessorParams): NewsProcessor {
  const { tables, llm, profile } = params;
  const now = params.now ?? (() => new Date());
  const sleep = params.sleep ?? ((ms: number) => delay(ms));
  const itemDelayMs = params.itemDelayMs ?? DEFAULT_ITEM_DELAY_MS;
  const evaluate =
    params.evaluator ?? createEvaluator({ llm, profile, model: params.models?.evaluation });
  const transform =
    params.transformer ?? createTransformer({ llm, profile, model: params.models?.transform });

  let counts = emptyCounts();
  let usage: TokenUsage = { input: 0, output: 0, total: 0 };

  const addUsage = (next: TokenUsage) => {
    usage = {
      input: usage.input + next.input,
      output: usage.output + next.output,
      total: usage.total + next.total,
    };
  };

  const runStages = async (candidate: Candidate): Promise<CandidateOutcome> => {
    const duplicate = await findDuplicate({ candidate, tables, profile, now: now() });
    if (duplicate) {
      log.info(`skipped (already processed by ${duplicate}): ${headlinePrefix(candidate.headline)}`);
      counts.duplicates += 1;
      return "duplicate";
    }

    counts.evaluated += 1;
    const evaluation = await evaluate(candidate);
    addUsage(evaluation.usage);
    if (evaluation.failed) {
      counts.evaluationFailed += 1;
      return "evaluation_failed";
    }
    if (!evaluation.passed) {
      counts.blocked += 1;
      return "blocked";
    }
    counts.passed += 1;

    const transformed = await transform(candidate);
    addUsage(transformed.usage);
    if (!transformed.record) {
      counts.transformFailed += 1;
      return "transform_failed";
    }

    const stored = await storeRecord({
      tables,
      profile,
      candidate,
      evaluation: evaluation.result,
      transformed: transformed.record,
      now: now(),
    });
    if (!stored) {
      counts.storeFailed += 1;
      return "store_failed";
    }
    counts.stored += 1;
    return "stored";
  };

  const processCandidate = async (candidate: Candidate): Promise<CandidateOutcome> => {
    let outcome: CandidateOutcome;
    try {
      outcome = await runStages(candidate);
    } catch (err) {
      log.error(`processing "${headlinePrefix(candidate.headline)}" failed: ${describeError(err)}`);
      counts.errors += 1;
      return "error";
    }
    if (shouldMark(profile.markProcessed, outcome)) {
      if (await markCandidateProcessed({ tables, candidate })) {
        counts.marked += 1;
      }
    }
    return outcome;
  };

  const runBatch = async (batchParams: { limit?: number } = {}): Promise<BatchSummary> => {
    counts = emptyCounts();
    usage = { input: 0, output: 0, total: 0 };
    const runId = `news-${crypto.randomUUID()}`;
    const startedAt = now().toISOString();
    log.info(`starting batch ${runId} (profile ${profile.name})`);

    const candidates = await fetchCandidates({
      tables,
      profile,
      limit: batchParams.limit,
      now: now(),
    });
    counts.fetched = candidates.length;

    let previousReachedModel = false;
    for (const [idx, candidate] of candidates.entries()) {
      if (previousReachedModel && itemDelayMs > 0) {
        await sleep(itemDelayMs);
      }
      log.info(`candidate ${idx + 1}/${candidates.length}: ${headlinePrefix(candidate.headline, 80)}`);
      const outcome = await processCandidate(candidate);
      previousReachedModel = outcome !== "duplicate";
    }

    const summary: BatchSummary = {
      runId,
      startedAt,
      finishedAt: now().toISOString(),
      counts: { ...counts },
      tokenUsage: { ...usage },
    };
    log.info(
      `batch complete: fetched ${counts.fetched}, duplicates ${counts.duplicates}, passed ${counts.passed}, blocked ${counts.blocked}, stored ${counts.stored}`,
    );
    return summary;
  };

  return { profile, processCandidate, runBatch };
}
