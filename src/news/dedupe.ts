import type { DedupCheck, PipelineProfile } from "../config/types.pipeline.js";
import type { NewsTables } from "./tables.js";
import type { Candidate } from "./types.js";
import { createSubsystemLogger, describeError, headlinePrefix } from "../logging/logger.js";
import { hoursAgoIso } from "./fetcher.js";

const log = createSubsystemLogger("news/dedupe");

export type DuplicateMatch = DedupCheck | null;

async function runCheck(
  check: DedupCheck,
  candidate: Candidate,
  tables: NewsTables,
  params: { windowHours: number; now: Date },
): Promise<boolean> {
  switch (check) {
    case "link":
      return candidate.link ? tables.existsByLink(candidate.link) : false;
    case "headline":
      return candidate.headline
        ? tables.existsByHeadlineSince({
            headline: candidate.headline,
            sinceIso: hoursAgoIso(params.windowHours, params.now),
          })
        : false;
    case "id":
      return candidate.id ? tables.existsByOriginalId(String(candidate.id)) : false;
  }
}

/**
 * Returns the first dedup check that matched a stored record, or null.
 * Query failures count as "not a duplicate".
 */
export async function findDuplicate(params: {
  candidate: Candidate;
  tables: NewsTables;
  profile: PipelineProfile;
  now?: Date;
}): Promise<DuplicateMatch> {
  const { candidate, tables, profile } = params;
  const now = params.now ?? new Date();
  try {
    for (const check of profile.dedupChecks) {
      const matched = await runCheck(check, candidate, tables, {
        windowHours: profile.dedupHeadlineWindowHours,
        now,
      });
      if (matched) {
        log.debug(`duplicate by ${check}: ${headlinePrefix(candidate.headline)}`);
        return check;
      }
    }
    return null;
  } catch (err) {
    log.error(
      `dedup check failed for "${headlinePrefix(candidate.headline)}", treating as new: ${describeError(err)}`,
    );
    return null;
  }
}

export async function isDuplicate(params: {
  candidate: Candidate;
  tables: NewsTables;
  profile: PipelineProfile;
  now?: Date;
}): Promise<boolean> {
  return (await findDuplicate(params)) !== null;
}
