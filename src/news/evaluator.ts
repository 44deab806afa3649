import type { EvaluationFormat, PipelineProfile } from "../config/types.pipeline.js";
import type { CompletionClient } from "../llm/types.js";
import type { Candidate, Evaluation, EvaluationResult, Importance, TokenUsage } from "./types.js";
import { asRecord, extractJsonObject } from "../llm/json.js";
import { createSubsystemLogger, describeError, headlinePrefix } from "../logging/logger.js";
import {
  EVALUATION_SYSTEM_PROMPT,
  MISSING_DESCRIPTION_EVALUATE,
  buildEvaluationPrompt,
} from "./prompts.js";
import { resolvePromptDescription } from "./text.js";

const log = createSubsystemLogger("news/evaluator");

export const EVALUATION_TEMPERATURE = 0.3;
export const EVALUATION_MAX_TOKENS = 250;

function readStringList(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value
    .filter((entry): entry is string => typeof entry === "string")
    .map((entry) => entry.trim())
    .filter(Boolean);
}

function readImportance(value: unknown): Importance | null {
  if (typeof value !== "string") {
    return null;
  }
  const normalized = value.trim().toUpperCase();
  if (normalized === "HIGH" || normalized === "MEDIUM" || normalized === "LOW") {
    return normalized;
  }
  return null;
}

function readScore(value: unknown): number | null {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    return null;
  }
  return Math.min(1, Math.max(0, value));
}

export function parseJsonEvaluation(text: string): EvaluationResult {
  const obj = asRecord(extractJsonObject(text));
  if (!obj) {
    throw new Error("evaluation response is not a JSON object");
  }
  return {
    decision: obj.decision === "PASS" ? "PASS" : "BLOCK",
    reason: typeof obj.reason === "string" ? obj.reason.trim() : "",
    relevanceScore: readScore(obj.relevance_score),
    categories: readStringList(obj.categories),
    importance: readImportance(obj.importance),
    mentionedAssets: readStringList(obj.mentioned_cryptos),
    mentionedBlockchains: readStringList(obj.mentioned_blockchains),
  };
}

export function parseTextEvaluation(text: string): EvaluationResult {
  const trimmed = text.trim();
  const passed = trimmed.startsWith("PASS");
  const reason = trimmed.replace(/^(PASS|BLOCK)\b[\s:.-]*/, "").trim();
  return {
    decision: passed ? "PASS" : "BLOCK",
    reason,
    relevanceScore: null,
    categories: [],
    importance: null,
    mentionedAssets: [],
    mentionedBlockchains: [],
  };
}

export function parseEvaluation(text: string, format: EvaluationFormat): EvaluationResult {
  return format === "json" ? parseJsonEvaluation(text) : parseTextEvaluation(text);
}

export function buildErrorEvaluation(err: unknown): EvaluationResult {
  return {
    decision: "BLOCK",
    reason: `Error: ${describeError(err)}`,
    relevanceScore: 0,
    categories: [],
    importance: "LOW",
    mentionedAssets: [],
    mentionedBlockchains: [],
  };
}

export type Evaluator = (candidate: Candidate) => Promise<Evaluation & { usage: TokenUsage }>;

/**
 * Classification stage. A model or parse failure blocks the candidate
 * instead of failing the batch; nothing is retried.
 */
export function createEvaluator(params: {
  llm: CompletionClient;
  profile: PipelineProfile;
  model?: string;
}): Evaluator {
  const { llm, profile } = params;
  return async (candidate) => {
    const prompt = buildEvaluationPrompt({
      rubric: profile.rubric,
      format: profile.evaluationFormat,
      headline: candidate.headline,
      description: resolvePromptDescription(
        candidate.headline,
        candidate.description,
        MISSING_DESCRIPTION_EVALUATE,
      ),
      source: candidate.sourceName || "Unknown",
    });
    let usage: TokenUsage = { input: 0, output: 0, total: 0 };
    try {
      const completion = await llm.complete({
        model: params.model,
        system: EVALUATION_SYSTEM_PROMPT[profile.evaluationFormat],
        prompt,
        temperature: EVALUATION_TEMPERATURE,
        maxTokens: EVALUATION_MAX_TOKENS,
        json: profile.evaluationFormat === "json",
      });
      usage = completion.usage;
      const result = parseEvaluation(completion.text, profile.evaluationFormat);
      const passed = result.decision === "PASS";
      if (passed) {
        log.info(
          `PASSED (score: ${(result.relevanceScore ?? 0).toFixed(2)}): ${headlinePrefix(candidate.headline)}`,
        );
      } else {
        log.info(`BLOCKED: ${headlinePrefix(candidate.headline)}`);
      }
      return { passed, result, failed: false, usage };
    } catch (err) {
      log.error(`evaluate failed for "${headlinePrefix(candidate.headline)}": ${describeError(err)}`);
      return { passed: false, result: buildErrorEvaluation(err), failed: true, usage };
    }
  };
}
