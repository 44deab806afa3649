import type { TokenUsage } from "../news/types.js";

export type CompletionRequest = {
  /** Overrides the client's default model. */
  model?: string;
  system: string;
  prompt: string;
  temperature: number;
  maxTokens: number;
  /** Constrain the response to a JSON object. */
  json: boolean;
};

export type CompletionResult = {
  text: string;
  usage: TokenUsage;
};

/** Black-box completion endpoint; the pipeline never depends on a provider directly. */
export type CompletionClient = {
  complete: (request: CompletionRequest) => Promise<CompletionResult>;
};
