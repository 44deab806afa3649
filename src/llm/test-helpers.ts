import { vi } from "vitest";
import type { CompletionClient, CompletionRequest } from "./types.js";

export const STUB_USAGE = { input: 10, output: 5, total: 15 };

/** Deterministic completion client that replays queued responses in order. */
export function createStubCompletionClient(responses: Array<string | Error>) {
  const queue = [...responses];
  const requests: CompletionRequest[] = [];
  const complete = vi.fn(async (request: CompletionRequest) => {
    requests.push(request);
    const next = queue.shift();
    if (next === undefined) {
      throw new Error("no stubbed completion left");
    }
    if (next instanceof Error) {
      throw next;
    }
    return { text: next, usage: { ...STUB_USAGE } };
  });
  const client: CompletionClient = { complete };
  return { client, complete, requests };
}

export function evaluationJson(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    decision: "PASS",
    reason: "Bitcoin price move",
    relevance_score: 0.9,
    categories: ["Bitcoin"],
    importance: "HIGH",
    mentioned_cryptos: ["BTC"],
    mentioned_blockchains: ["Bitcoin"],
    ...overrides,
  });
}

export function transformJson(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    processed_headline: "Bitcoin $BTC surges 8% to break $45,000",
    processed_description: "Bitcoin $BTC jumps 8% as ETF inflows accelerate",
    tickers: ["BTC"],
    sentiment: "BULLISH",
    market_impact: "Momentum traders pile in as resistance breaks",
    price_mentioned: 45000,
    price_change_percent: 8,
    volume_mentioned: null,
    market_cap_mentioned: null,
    ...overrides,
  });
}
