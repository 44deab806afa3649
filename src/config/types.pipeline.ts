export type FetchMode = "latest" | "unprocessed";

export type DedupCheck = "link" | "headline" | "id";

export type RubricKind = "inclusive" | "strict";

export type EvaluationFormat = "json" | "text";

export type RetentionOrder = "original_published_at" | "processed_at";

/**
 * When the source row gets its processed flag flipped.
 * - never: the source table is read-only
 * - stored: only after a successful store
 * - handled: after a store, a BLOCK decision or a duplicate hit
 */
export type MarkProcessedPolicy = "never" | "stored" | "handled";

/** Column names of the source table, keyed by candidate field. */
export type SourceColumns = {
  id: string;
  headline: string;
  description: string;
  source: string;
  publishedAt: string;
  link: string;
  ingestedAt: string;
  processed: string;
};

export type RetentionConfig = {
  /** Destination row count at which oldest-first pruning starts. */
  ceiling: number;
  orderBy: RetentionOrder;
};

export type PipelineProfile = {
  name: string;
  sourceTable: string;
  destinationTable: string;
  columns: SourceColumns;
  fetchMode: FetchMode;
  batchSize: number;
  /** Trailing window for the unprocessed fetch mode. */
  recencyHours: number;
  dedupChecks: DedupCheck[];
  dedupHeadlineWindowHours: number;
  rubric: RubricKind;
  evaluationFormat: EvaluationFormat;
  retention: RetentionConfig;
  markProcessed: MarkProcessedPolicy;
  /** Ticker used when the model returns none or only the placeholder. */
  defaultTicker: string;
  placeholderTicker: string;
  processingVersion: string;
};

export type PipelineProfileOverride = {
  extends?: string;
  sourceTable?: string;
  destinationTable?: string;
  columns?: Partial<SourceColumns>;
  fetchMode?: FetchMode;
  batchSize?: number;
  recencyHours?: number;
  dedupChecks?: DedupCheck[];
  dedupHeadlineWindowHours?: number;
  rubric?: RubricKind;
  evaluationFormat?: EvaluationFormat;
  retention?: Partial<RetentionConfig>;
  markProcessed?: MarkProcessedPolicy;
  defaultTicker?: string;
  placeholderTicker?: string;
  processingVersion?: string;
};
