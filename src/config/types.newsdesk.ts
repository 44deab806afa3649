import type { PipelineProfileOverride } from "./types.pipeline.js";

export type LlmConfig = {
  /** Model used by both stages unless a stage override is set. */
  model?: string;
  evaluationModel?: string;
  transformModel?: string;
};

export type NotifyConfig = {
  telegram?: {
    /** Chat IDs that receive run summaries and fatal exits. */
    chatIds?: Array<string | number>;
  };
  /** Send a summary after every batch, not only on fatal exit. */
  notifyOnRun?: boolean;
};

export type LoopConfig = {
  intervalSeconds?: number;
  maxConsecutiveFailures?: number;
  /** Pause between candidates that reached the model. */
  itemDelayMs?: number;
};

export type NewsdeskConfig = {
  profiles?: Record<string, PipelineProfileOverride>;
  llm?: LlmConfig;
  notify?: NotifyConfig;
  loop?: LoopConfig;
};
