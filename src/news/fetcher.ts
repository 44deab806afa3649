import type { PipelineProfile } from "../config/types.pipeline.js";
import type { NewsTables } from "./tables.js";
import type { Candidate } from "./types.js";
import { createSubsystemLogger, describeError } from "../logging/logger.js";

const log = createSubsystemLogger("news/fetcher");

const HOUR_MS = 60 * 60 * 1000;

export function hoursAgoIso(hours: number, now: Date): string {
  return new Date(now.getTime() - hours * HOUR_MS).toISOString();
}

/** Newest-first candidate batch; a failed query is an empty batch. */
export async function fetchCandidates(params: {
  tables: NewsTables;
  profile: PipelineProfile;
  limit?: number;
  now?: Date;
}): Promise<Candidate[]> {
  const { tables, profile } = params;
  const limit = params.limit ?? profile.batchSize;
  try {
    const candidates =
      profile.fetchMode === "unprocessed"
        ? await tables.fetchUnprocessed({
            limit,
            sinceIso: hoursAgoIso(profile.recencyHours, params.now ?? new Date()),
          })
        : await tables.fetchLatest(limit);
    log.info(`fetched ${candidates.length} candidates from ${profile.sourceTable}`);
    return candidates.slice(0, limit);
  } catch (err) {
    log.error(`fetch from ${profile.sourceTable} failed: ${describeError(err)}`);
    return [];
  }
}
