import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { VERSION } from "../version.js";
import { appendRunRecord, buildRunRecord, resolveOpsRunsPath } from "./runs.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("buildRunRecord", () => {
  it("computes duration and provenance", () => {
    const record = buildRunRecord({
      runId: "news-1",
      job: "news_processor",
      profile: "crypto",
      startedAt: "2026-10-18T12:00:00.000Z",
      finishedAt: "2026-10-18T12:00:12.500Z",
      ok: true,
      counts: { fetched: 3, stored: 1 },
    });
    expect(record.durationMs).toBe(12_500);
    expect(record.provenance).toEqual({ runId: "news-1", agent: "news_processor", version: VERSION });
  });

  it("never reports a negative duration", () => {
    const record = buildRunRecord({
      runId: "news-2",
      job: "news_processor",
      profile: "crypto",
      startedAt: "2026-10-18T12:00:01.000Z",
      finishedAt: "2026-10-18T12:00:00.000Z",
      ok: false,
      error: "boom",
    });
    expect(record.durationMs).toBe(0);
  });
});

describe("appendRunRecord", () => {
  it("appends one JSON line per run under the state dir", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "newsdesk-runs-"));
    tempDirs.push(dir);
    const env = { NEWSDESK_STATE_DIR: dir };
    const base = {
      job: "news_processor",
      profile: "crypto",
      startedAt: "2026-10-18T12:00:00.000Z",
      finishedAt: "2026-10-18T12:00:01.000Z",
      ok: true,
    };

    await appendRunRecord(buildRunRecord({ ...base, runId: "news-a" }), env);
    await appendRunRecord(buildRunRecord({ ...base, runId: "news-b" }), env);

    const filePath = resolveOpsRunsPath(env);
    expect(filePath).toBe(path.join(dir, "ops", "runs.ndjson"));
    const lines = fs.readFileSync(filePath, "utf8").trim().split("\n");
    expect(lines.map((line) => JSON.parse(line).runId)).toEqual(["news-a", "news-b"]);
  });
});
