export type Candidate = {
  id: string;
  headline: string;
  description: string;
  sourceName: string;
  publishedAt: string | null;
  link: string;
  ingestedAt: string | null;
  processed: boolean;
};

export type Decision = "PASS" | "BLOCK";

export type Importance = "HIGH" | "MEDIUM" | "LOW";

export type Sentiment = "BULLISH" | "BEARISH" | "NEUTRAL";

export type EvaluationResult = {
  decision: Decision;
  reason: string;
  relevanceScore: number | null;
  categories: string[];
  importance: Importance | null;
  mentionedAssets: string[];
  mentionedBlockchains: string[];
};

export type Evaluation = {
  passed: boolean;
  result: EvaluationResult;
  /** True when the BLOCK came from a model or parse error, not a decision. */
  failed: boolean;
};

export type TransformedRecord = {
  processedHeadline: string;
  processedDescription: string;
  tickers: string[];
  sentiment: Sentiment;
  marketImpact: string;
  priceMentioned: number | null;
  priceChangePercent: number | null;
  volumeMentioned: number | null;
  marketCapMentioned: number | null;
};

/** Destination table row as written by the store stage. */
export type StoredRecordRow = {
  original_id: string;
  original_headline: string;
  original_description: string;
  original_link: string;
  original_published_at: string | null;
  original_source_name: string;
  processed_headline: string;
  processed_description: string;
  tickers: string[];
  sentiment: Sentiment;
  market_impact: string;
  relevance_score: number;
  evaluation_reason: string;
  categories: string[];
  importance_level: Importance;
  blockchain_mentioned: string[];
  defi_protocol: string[];
  price_mentioned: number | null;
  price_change_percent: number | null;
  volume_mentioned: number | null;
  market_cap_mentioned: number | null;
  processed_at: string;
  processing_version: string;
};

export type TokenUsage = { input: number; output: number; total: number };
