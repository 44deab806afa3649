import { z } from "zod";
import type { PipelineProfile } from "../config/types.pipeline.js";
import type { CompletionClient } from "../llm/types.js";
import type { Candidate, Sentiment, TokenUsage, TransformedRecord } from "./types.js";
import { extractJsonObject } from "../llm/json.js";
import { createSubsystemLogger, describeError, headlinePrefix } from "../logging/logger.js";
import {
  MISSING_DESCRIPTION_TRANSFORM,
  TRANSFORM_SYSTEM_PROMPT,
  buildTransformPrompt,
} from "./prompts.js";
import { resolvePromptDescription } from "./text.js";

const log = createSubsystemLogger("news/transformer");

export const TRANSFORM_TEMPERATURE = 0.3;
export const TRANSFORM_MAX_TOKENS = 500;
export const MAX_TICKERS = 5;

const NullableNumberSchema = z.unknown().transform((value) =>
  typeof value === "number" && Number.isFinite(value) ? value : null,
);

const PresentSchema = z.unknown().refine((value) => value !== undefined, "Required");

export const TransformResponseSchema = z.object({
  processed_headline: z.string(),
  processed_description: z.string(),
  tickers: PresentSchema,
  sentiment: PresentSchema,
  market_impact: z.string(),
  price_mentioned: NullableNumberSchema,
  price_change_percent: NullableNumberSchema,
  volume_mentioned: NullableNumberSchema,
  market_cap_mentioned: NullableNumberSchema,
});

export function normalizeSentiment(value: unknown): Sentiment {
  if (typeof value === "string") {
    const normalized = value.trim().toUpperCase();
    if (normalized === "BULLISH" || normalized === "BEARISH" || normalized === "NEUTRAL") {
      return normalized;
    }
  }
  return "NEUTRAL";
}

export function normalizeTickers(
  value: unknown,
  params: { defaultTicker: string; placeholderTicker: string },
): string[] {
  const raw = Array.isArray(value) ? value : [];
  const tickers: string[] = [];
  for (const entry of raw) {
    if (typeof entry !== "string") {
      continue;
    }
    const ticker = entry.trim().replace(/^\$/, "").toUpperCase();
    if (ticker && !tickers.includes(ticker)) {
      tickers.push(ticker);
    }
  }
  if (
    tickers.length === 0 ||
    (tickers.length === 1 && tickers[0] === params.placeholderTicker)
  ) {
    return [params.defaultTicker];
  }
  return tickers.slice(0, MAX_TICKERS);
}

/**
 * Validates a rewrite response. Returns null when a required key is
 * missing; optional numeric keys fall back to null.
 */
export function parseTransformResponse(
  text: string,
  params: { defaultTicker: string; placeholderTicker: string },
): TransformedRecord | null {
  const parsed = TransformResponseSchema.safeParse(extractJsonObject(text));
  if (!parsed.success) {
    return null;
  }
  const data = parsed.data;
  return {
    processedHeadline: data.processed_headline.trim(),
    processedDescription: data.processed_description.trim(),
    tickers: normalizeTickers(data.tickers, params),
    sentiment: normalizeSentiment(data.sentiment),
    marketImpact: data.market_impact.trim(),
    priceMentioned: data.price_mentioned,
    priceChangePercent: data.price_change_percent,
    volumeMentioned: data.volume_mentioned,
    marketCapMentioned: data.market_cap_mentioned,
  };
}

export type Transformer = (
  candidate: Candidate,
) => Promise<{ record: TransformedRecord | null; usage: TokenUsage }>;

export function createTransformer(params: {
  llm: CompletionClient;
  profile: PipelineProfile;
  model?: string;
}): Transformer {
  const { llm, profile } = params;
  const tickerParams = {
    defaultTicker: profile.defaultTicker,
    placeholderTicker: profile.placeholderTicker,
  };
  return async (candidate) => {
    const prompt = buildTransformPrompt({
      headline: candidate.headline,
      description: resolvePromptDescription(
        candidate.headline,
        candidate.description,
        MISSING_DESCRIPTION_TRANSFORM,
      ),
      source: candidate.sourceName || "Unknown",
      link: candidate.link,
      placeholderTicker: profile.placeholderTicker,
    });
    let usage: TokenUsage = { input: 0, output: 0, total: 0 };
    try {
      const completion = await llm.complete({
        model: params.model,
        system: TRANSFORM_SYSTEM_PROMPT,
        prompt,
        temperature: TRANSFORM_TEMPERATURE,
        maxTokens: TRANSFORM_MAX_TOKENS,
        json: true,
      });
      usage = completion.usage;
      const record = parseTransformResponse(completion.text, tickerParams);
      if (!record) {
        log.error(`missing required fields in rewrite for "${headlinePrefix(candidate.headline)}"`);
      }
      return { record, usage };
    } catch (err) {
      log.error(`transform failed for "${headlinePrefix(candidate.headline)}": ${describeError(err)}`);
      return { record: null, usage };
    }
  };
}
