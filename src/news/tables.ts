import type { RetentionOrder } from "../config/types.pipeline.js";
import type { Candidate, StoredRecordRow } from "./types.js";

/**
 * Data-store operations used by the pipeline. Every method throws on a
 * transport or query error; the stages decide what a failure degrades to.
 */
export type NewsTables = {
  fetchLatest: (limit: number) => Promise<Candidate[]>;
  fetchUnprocessed: (params: { limit: number; sinceIso: string }) => Promise<Candidate[]>;
  markProcessed: (candidateId: string) => Promise<void>;
  existsByLink: (link: string) => Promise<boolean>;
  existsByHeadlineSince: (params: { headline: string; sinceIso: string }) => Promise<boolean>;
  existsByOriginalId: (originalId: string) => Promise<boolean>;
  countStored: () => Promise<number>;
  listOldestStoredIds: (params: { limit: number; orderBy: RetentionOrder }) => Promise<string[]>;
  deleteStored: (id: string) => Promise<void>;
  insertStored: (row: StoredRecordRow) => Promise<void>;
};
