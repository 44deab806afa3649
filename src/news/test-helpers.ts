import type { RetentionOrder } from "../config/types.pipeline.js";
import type { NewsTables } from "./tables.js";
import type { Candidate, StoredRecordRow } from "./types.js";

export type MemoryStoredRow = StoredRecordRow & { id: string };

export type MemoryNewsTables = NewsTables & {
  source: Candidate[];
  stored: MemoryStoredRow[];
  calls: string[];
  failing: Set<keyof NewsTables>;
};

export function buildCandidate(overrides: Partial<Candidate> = {}): Candidate {
  return {
    id: "1",
    headline: "Bitcoin surges 8% to break $45,000",
    description: "Bitcoin rallied overnight as ETF inflows accelerated.",
    sourceName: "Example Wire",
    publishedAt: "2026-10-18T09:00:00.000Z",
    link: "https://example.com/news/1",
    ingestedAt: "2026-10-18T09:05:00.000Z",
    processed: false,
    ...overrides,
  };
}

export function buildStoredRow(overrides: Partial<MemoryStoredRow> = {}): MemoryStoredRow {
  return {
    id: "row-0",
    original_id: "0",
    original_headline: "Older headline",
    original_description: "",
    original_link: "https://example.com/news/0",
    original_published_at: "2026-10-01T00:00:00.000Z",
    original_source_name: "Example Wire",
    processed_headline: "Older headline",
    processed_description: "Older description",
    tickers: ["BTC"],
    sentiment: "NEUTRAL",
    market_impact: "",
    relevance_score: 0.5,
    evaluation_reason: "",
    categories: [],
    importance_level: "MEDIUM",
    blockchain_mentioned: [],
    defi_protocol: [],
    price_mentioned: null,
    price_change_percent: null,
    volume_mentioned: null,
    market_cap_mentioned: null,
    processed_at: "2026-10-01T00:00:00.000Z",
    processing_version: "1.0",
    ...overrides,
  };
}

function compareNullableDesc(a: string | null, b: string | null): number {
  return (b ?? "").localeCompare(a ?? "");
}

function retentionKey(row: MemoryStoredRow, orderBy: RetentionOrder): string {
  return (orderBy === "processed_at" ? row.processed_at : row.original_published_at) ?? "\uffff";
}

/** In-process stand-in for the source and destination tables. */
export function createMemoryNewsTables(params: {
  source?: Candidate[];
  stored?: MemoryStoredRow[];
} = {}): MemoryNewsTables {
  const source = [...(params.source ?? [])];
  const stored = [...(params.stored ?? [])];
  const calls: string[] = [];
  const failing = new Set<keyof NewsTables>();
  let nextId = stored.length + 1;

  const track = (op: keyof NewsTables, detail?: string) => {
    calls.push(detail ? `${op}:${detail}` : op);
    if (failing.has(op)) {
      throw new Error(`${op} unavailable`);
    }
  };

  return {
    source,
    stored,
    calls,
    failing,
    async fetchLatest(limit) {
      track("fetchLatest");
      return [...source]
        .sort((a, b) => compareNullableDesc(a.publishedAt, b.publishedAt))
        .slice(0, limit)
        .map((candidate) => ({ ...candidate }));
    },
    async fetchUnprocessed({ limit, sinceIso }) {
      track("fetchUnprocessed");
      return source
        .filter((candidate) => !candidate.processed)
        .filter((candidate) => (candidate.ingestedAt ?? "") >= sinceIso)
        .sort((a, b) => compareNullableDesc(a.ingestedAt, b.ingestedAt))
        .slice(0, limit)
        .map((candidate) => ({ ...candidate }));
    },
    async markProcessed(candidateId) {
      track("markProcessed", candidateId);
      for (const candidate of source) {
        if (candidate.id === candidateId) {
          candidate.processed = true;
        }
      }
    },
    async existsByLink(link) {
      track("existsByLink");
      return stored.some((row) => row.original_link === link);
    },
    async existsByHeadlineSince({ headline, sinceIso }) {
      track("existsByHeadlineSince");
      return stored.some(
        (row) => row.original_headline === headline && row.processed_at >= sinceIso,
      );
    },
    async existsByOriginalId(originalId) {
      track("existsByOriginalId");
      return stored.some((row) => row.original_id === originalId);
    },
    async countStored() {
      track("countStored");
      return stored.length;
    },
    async listOldestStoredIds({ limit, orderBy }) {
      track("listOldestStoredIds");
      return [...stored]
        .sort((a, b) => retentionKey(a, orderBy).localeCompare(retentionKey(b, orderBy)))
        .slice(0, limit)
        .map((row) => row.id);
    },
    async deleteStored(id) {
      track("deleteStored", id);
      const idx = stored.findIndex((row) => row.id === id);
      if (idx >= 0) {
        stored.splice(idx, 1);
      }
    },
    async insertStored(row) {
      track("insertStored");
      stored.push({ ...row, id: `row-${nextId}` });
      nextId += 1;
    },
  };
}
