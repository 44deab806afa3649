import type { PipelineProfile } from "./types.pipeline.js";

export const DEFAULT_PROFILE_NAME = "crypto";

const CRYPTO_PROFILE: PipelineProfile = {
  name: "crypto",
  sourceTable: "crypto_news_articles",
  destinationTable: "crypto_clean_articles",
  columns: {
    id: "id",
    headline: "headline",
    description: "description",
    source: "source_name",
    publishedAt: "published_at",
    link: "link",
    ingestedAt: "created_at",
    processed: "processed",
  },
  fetchMode: "latest",
  batchSize: 20,
  recencyHours: 24,
  dedupChecks: ["link", "headline", "id"],
  dedupHeadlineWindowHours: 24,
  rubric: "inclusive",
  evaluationFormat: "json",
  retention: { ceiling: 100, orderBy: "original_published_at" },
  markProcessed: "never",
  defaultTicker: "BTC",
  placeholderTicker: "CRYPTO",
  processingVersion: "1.0",
};

const CRYPTO_STRICT_PROFILE: PipelineProfile = {
  ...CRYPTO_PROFILE,
  name: "crypto-strict",
  destinationTable: "crypto_breaking_articles",
  fetchMode: "unprocessed",
  batchSize: 10,
  rubric: "strict",
  retention: { ceiling: 100, orderBy: "processed_at" },
  markProcessed: "handled",
};

export const BUILTIN_PROFILES: Readonly<Record<string, PipelineProfile>> = {
  [CRYPTO_PROFILE.name]: CRYPTO_PROFILE,
  [CRYPTO_STRICT_PROFILE.name]: CRYPTO_STRICT_PROFILE,
};
