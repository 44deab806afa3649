import type { PipelineProfile } from "../config/types.pipeline.js";
import type { NewsTables } from "./tables.js";
import type { Candidate, EvaluationResult, StoredRecordRow, TransformedRecord } from "./types.js";
import { createSubsystemLogger, describeError, headlinePrefix } from "../logging/logger.js";
import { MAX_TICKERS } from "./transformer.js";
import { truncate } from "./text.js";

const log = createSubsystemLogger("news/store");

export const MAX_HEADLINE_CHARS = 120;
export const MAX_DESCRIPTION_CHARS = 180;
export const MAX_IMPACT_CHARS = 200;

const DEFAULT_RELEVANCE_SCORE = 0.5;

export function buildStoredRecord(params: {
  candidate: Candidate;
  evaluation: EvaluationResult;
  transformed: TransformedRecord;
  profile: PipelineProfile;
  now?: Date;
}): StoredRecordRow {
  const { candidate, evaluation, transformed } = params;
  return {
    original_id: candidate.id || candidate.link,
    original_headline: candidate.headline,
    original_description: candidate.description,
    original_link: candidate.link,
    original_published_at: candidate.publishedAt,
    original_source_name: candidate.sourceName,
    processed_headline: truncate(transformed.processedHeadline, MAX_HEADLINE_CHARS),
    processed_description: truncate(transformed.processedDescription, MAX_DESCRIPTION_CHARS),
    tickers: transformed.tickers.slice(0, MAX_TICKERS),
    sentiment: transformed.sentiment,
    market_impact: truncate(transformed.marketImpact, MAX_IMPACT_CHARS),
    relevance_score: evaluation.relevanceScore ?? DEFAULT_RELEVANCE_SCORE,
    evaluation_reason: evaluation.reason,
    categories: evaluation.categories,
    importance_level: evaluation.importance ?? "MEDIUM",
    blockchain_mentioned: evaluation.mentionedBlockchains,
    defi_protocol: [],
    price_mentioned: transformed.priceMentioned,
    price_change_percent: transformed.priceChangePercent,
    volume_mentioned: transformed.volumeMentioned,
    market_cap_mentioned: transformed.marketCapMentioned,
    processed_at: (params.now ?? new Date()).toISOString(),
    processing_version: params.profile.processingVersion,
  };
}

/**
 * Prunes the destination table before an insert: at `count >= ceiling`,
 * the oldest `count - (ceiling - 1)` rows are deleted one call per row.
 * Returns the number of rows deleted; failures are logged and stop pruning.
 */
export async function enforceRetention(params: {
  tables: NewsTables;
  profile: PipelineProfile;
}): Promise<number> {
  const { tables, profile } = params;
  const { ceiling, orderBy } = profile.retention;
  let deleted = 0;
  try {
    const count = await tables.countStored();
    log.debug(`${profile.destinationTable} holds ${count} rows`);
    if (count < ceiling) {
      return 0;
    }
    const excess = count - (ceiling - 1);
    const ids = await tables.listOldestStoredIds({ limit: excess, orderBy });
    for (const id of ids) {
      await tables.deleteStored(id);
      deleted += 1;
    }
    if (deleted > 0) {
      log.info(`removed ${deleted} oldest rows from ${profile.destinationTable}`);
    }
    return deleted;
  } catch (err) {
    log.error(`retention on ${profile.destinationTable} failed: ${describeError(err)}`);
    return deleted;
  }
}

export async function storeRecord(params: {
  tables: NewsTables;
  profile: PipelineProfile;
  candidate: Candidate;
  evaluation: EvaluationResult;
  transformed: TransformedRecord;
  now?: Date;
}): Promise<boolean> {
  await enforceRetention({ tables: params.tables, profile: params.profile });
  const row = buildStoredRecord(params);
  try {
    await params.tables.insertStored(row);
    log.info(`stored: ${headlinePrefix(row.processed_headline, 60)}`);
    return true;
  } catch (err) {
    log.error(
      `store failed for "${headlinePrefix(params.candidate.headline)}": ${describeError(err)}`,
    );
    return false;
  }
}

/** Best effort; a failure leaves the candidate eligible for the next fetch. */
export async function markCandidateProcessed(params: {
  tables: NewsTables;
  candidate: Candidate;
}): Promise<boolean> {
  if (!params.candidate.id) {
    return false;
  }
  try {
    await params.tables.markProcessed(params.candidate.id);
    return true;
  } catch (err) {
    log.warn(
      `mark processed failed for "${headlinePrefix(params.candidate.headline)}": ${describeError(err)}`,
    );
    return false;
  }
}
