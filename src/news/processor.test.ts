import { describe, expect, it, vi } from "vitest";
import { resolvePipelineProfile } from "../config/config.js";
import { createStubCompletionClient, evaluationJson, transformJson } from "../llm/test-helpers.js";
import { createNewsProcessor } from "./processor.js";
import { buildCandidate, buildStoredRow, createMemoryNewsTables } from "./test-helpers.js";

const crypto = resolvePipelineProfile({ name: "crypto", env: {} });
const fixedNow = () => new Date("2026-10-18T12:00:00.000Z");
const noSleep = () => vi.fn(async (_ms: number) => {});

const scenarioCandidate = buildCandidate({
  id: "42",
  headline: "Bitcoin surges 8% to break $45,000",
  link: "https://x/42",
});

describe("createNewsProcessor", () => {
  it("stores a candidate once across two cycles", async () => {
    const tables = createMemoryNewsTables({ source: [scenarioCandidate] });
    const stub = createStubCompletionClient([evaluationJson(), transformJson()]);
    const processor = createNewsProcessor({
      tables,
      llm: stub.client,
      profile: crypto,
      sleep: noSleep(),
      now: fixedNow,
    });

    const first = await processor.runBatch();
    const second = await processor.runBatch();

    expect(tables.stored).toHaveLength(1);
    expect(tables.stored[0]?.original_id).toBe("42");
    expect(tables.stored[0]?.processed_headline).toBe("Bitcoin $BTC surges 8% to break $45,000");
    expect(first.counts.stored).toBe(1);
    expect(second.counts.duplicates).toBe(1);
    expect(second.counts.evaluated).toBe(0);
    expect(stub.complete).toHaveBeenCalledTimes(2);
    expect(tables.calls.filter((call) => call === "existsByLink")).toHaveLength(2);
  });

  it("never stores a blocked candidate", async () => {
    const tables = createMemoryNewsTables({ source: [buildCandidate()] });
    const stub = createStubCompletionClient([evaluationJson({ decision: "BLOCK" })]);
    const processor = createNewsProcessor({ tables, llm: stub.client, profile: crypto, now: fixedNow });

    const summary = await processor.runBatch();

    expect(summary.counts.blocked).toBe(1);
    expect(tables.calls).not.toContain("insertStored");
    expect(stub.complete).toHaveBeenCalledTimes(1);
  });

  it("makes exactly one insert for a passed and transformed candidate", async () => {
    const tables = createMemoryNewsTables({ source: [buildCandidate()] });
    const stub = createStubCompletionClient([evaluationJson(), transformJson()]);
    const processor = createNewsProcessor({ tables, llm: stub.client, profile: crypto, now: fixedNow });

    expect(await processor.processCandidate(buildCandidate())).toBe("stored");
    expect(tables.calls.filter((call) => call === "insertStored")).toHaveLength(1);
  });

  it("drops a candidate whose rewrite lacks sentiment and continues", async () => {
    const tables = createMemoryNewsTables({
      source: [
        buildCandidate({ id: "a", link: "https://x/a", headline: "First", publishedAt: "2026-10-18T11:00:00.000Z" }),
        buildCandidate({ id: "b", link: "https://x/b", headline: "Second", publishedAt: "2026-10-18T10:00:00.000Z" }),
      ],
    });
    const stub = createStubCompletionClient([
      evaluationJson(),
      transformJson({ sentiment: undefined }),
      evaluationJson(),
      transformJson(),
    ]);
    const processor = createNewsProcessor({
      tables,
      llm: stub.client,
      profile: crypto,
      sleep: noSleep(),
      now: fixedNow,
    });

    const summary = await processor.runBatch();

    expect(summary.counts.transformFailed).toBe(1);
    expect(summary.counts.stored).toBe(1);
    expect(tables.stored.map((row) => row.original_id)).toEqual(["b"]);
  });

  it("pauses between candidates that reached the model", async () => {
    const tables = createMemoryNewsTables({
      source: [
        buildCandidate({ id: "a", link: "https://x/a", headline: "A", publishedAt: "2026-10-18T11:00:00.000Z" }),
        buildCandidate({ id: "b", link: "https://x/b", headline: "B", publishedAt: "2026-10-18T10:00:00.000Z" }),
        buildCandidate({ id: "c", link: "https://x/c", headline: "C", publishedAt: "2026-10-18T09:00:00.000Z" }),
      ],
    });
    const stub = createStubCompletionClient([
      evaluationJson({ decision: "BLOCK" }),
      evaluationJson({ decision: "BLOCK" }),
      evaluationJson({ decision: "BLOCK" }),
    ]);
    const sleep = noSleep();
    const processor = createNewsProcessor({ tables, llm: stub.client, profile: crypto, sleep, now: fixedNow });

    await processor.runBatch();

    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(1000);
  });

  it("does not pause after a duplicate", async () => {
    const tables = createMemoryNewsTables({
      source: [
        buildCandidate({ id: "a", link: "https://x/a", headline: "A", publishedAt: "2026-10-18T11:00:00.000Z" }),
        buildCandidate({ id: "b", link: "https://x/b", headline: "B", publishedAt: "2026-10-18T10:00:00.000Z" }),
      ],
      stored: [buildStoredRow({ original_link: "https://x/a" })],
    });
    const stub = createStubCompletionClient([evaluationJson({ decision: "BLOCK" })]);
    const sleep = noSleep();
    const processor = createNewsProcessor({ tables, llm: stub.client, profile: crypto, sleep, now: fixedNow });

    const summary = await processor.runBatch();

    expect(summary.counts.duplicates).toBe(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("sums token usage over the batch", async () => {
    const tables = createMemoryNewsTables({ source: [buildCandidate()] });
    const stub = createStubCompletionClient([evaluationJson(), transformJson()]);
    const processor = createNewsProcessor({ tables, llm: stub.client, profile: crypto, now: fixedNow });

    const summary = await processor.runBatch();

    expect(summary.tokenUsage).toEqual({ input: 20, output: 10, total: 30 });
    expect(summary.runId).toMatch(/^news-[0-9a-f-]{36}$/);
    expect(summary.startedAt).toBe("2026-10-18T12:00:00.000Z");
  });

  it("counts a stage that throws as an error and moves on", async () => {
    const tables = createMemoryNewsTables({ source: [buildCandidate()] });
    const stub = createStubCompletionClient([]);
    const processor = createNewsProcessor({
      tables,
      llm: stub.client,
      profile: crypto,
      now: fixedNow,
      evaluator: async () => {
        throw new Error("boom");
      },
    });

    const summary = await processor.runBatch();

    expect(summary.counts.errors).toBe(1);
    expect(summary.counts.stored).toBe(0);
  });
});

describe("markProcessed policy", () => {
  const sources = () => [
    buildCandidate({ id: "blocked", link: "https://x/blocked", headline: "Blocked", publishedAt: "2026-10-18T11:00:00.000Z" }),
    buildCandidate({ id: "dup", link: "https://x/dup", headline: "Dup", publishedAt: "2026-10-18T10:00:00.000Z" }),
    buildCandidate({ id: "kept", link: "https://x/kept", headline: "Kept", publishedAt: "2026-10-18T09:00:00.000Z" }),
    buildCandidate({ id: "broken", link: "https://x/broken", headline: "Broken", publishedAt: "2026-10-18T08:00:00.000Z" }),
  ];
  const responses = () => [
    evaluationJson({ decision: "BLOCK" }),
    evaluationJson(),
    transformJson(),
    evaluationJson(),
    transformJson({ processed_headline: 7 }),
  ];

  async function markedWith(policy: "never" | "stored" | "handled"): Promise<string[]> {
    const tables = createMemoryNewsTables({
      source: sources(),
      stored: [buildStoredRow({ original_link: "https://x/dup" })],
    });
    const stub = createStubCompletionClient(responses());
    const processor = createNewsProcessor({
      tables,
      llm: stub.client,
      profile: { ...crypto, markProcessed: policy },
      sleep: noSleep(),
      now: fixedNow,
    });
    await processor.runBatch();
    return tables.calls.filter((call) => call.startsWith("markProcessed"));
  }

  it("never writes the source table under never", async () => {
    expect(await markedWith("never")).toEqual([]);
  });

  it("marks only stored candidates under stored", async () => {
    expect(await markedWith("stored")).toEqual(["markProcessed:kept"]);
  });

  it("leaves candidates unmarked when the model call fails under handled", async () => {
    const tables = createMemoryNewsTables({
      source: [
        buildCandidate({ id: "a", link: "https://x/a", headline: "A", publishedAt: "2026-10-18T11:00:00.000Z" }),
        buildCandidate({ id: "b", link: "https://x/b", headline: "B", publishedAt: "2026-10-18T10:00:00.000Z" }),
      ],
    });
    const stub = createStubCompletionClient([
      new Error("503 upstream unavailable"),
      new Error("503 upstream unavailable"),
    ]);
    const processor = createNewsProcessor({
      tables,
      llm: stub.client,
      profile: { ...crypto, markProcessed: "handled" },
      sleep: noSleep(),
      now: fixedNow,
    });

    const summary = await processor.runBatch();

    expect(summary.counts.evaluationFailed).toBe(2);
    expect(summary.counts.blocked).toBe(0);
    expect(summary.counts.marked).toBe(0);
    expect(tables.calls.filter((call) => call.startsWith("markProcessed"))).toEqual([]);
    expect(tables.source.every((candidate) => !candidate.processed)).toBe(true);
  });

  it("also marks blocked and duplicate candidates under handled", async () => {
    expect(await markedWith("handled")).toEqual([
      "markProcessed:blocked",
      "markProcessed:dup",
      "markProcessed:kept",
    ]);
  });
});
