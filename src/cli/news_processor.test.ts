import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigError } from "../config/config.js";
import { parseCliOptions, resolveCli, runNewsProcessorCli } from "./news_processor.js";

let stateDir = "";

beforeEach(() => {
  stateDir = fs.mkdtempSync(path.join(os.tmpdir(), "newsdesk-cli-"));
  vi.spyOn(console, "error").mockImplementation(() => {});
  vi.spyOn(console, "log").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(stateDir, { recursive: true, force: true });
});

const envWith = (extra: Record<string, string> = {}) => ({
  OPENAI_API_KEY: "test-key",
  SUPABASE_URL: "http://localhost:54321",
  SUPABASE_KEY: "test-key",
  NEWSDESK_STATE_DIR: stateDir,
  ...extra,
});

describe("parseCliOptions", () => {
  it("reads flags", () => {
    expect(
      parseCliOptions(["--mode", "once", "--batch-size", "5", "--profile", "crypto-strict"]),
    ).toEqual({ mode: "once", batchSize: 5, profile: "crypto-strict", config: undefined });
  });

  it("marks an unusable batch size", () => {
    expect(parseCliOptions(["--batch-size", "lots"]).batchSize).toBeNaN();
  });
});

describe("resolveCli", () => {
  it("layers flags over environment and config file", () => {
    fs.writeFileSync(
      path.join(stateDir, "newsdesk.json"),
      JSON.stringify({ profiles: { "crypto-strict": { recencyHours: 6 } } }),
    );
    const resolved = resolveCli(
      { mode: "once", batchSize: 4, profile: "crypto-strict" },
      envWith({ RUN_MODE: "continuous", BATCH_SIZE: "9" }),
    );
    expect(resolved.settings.runMode).toBe("once");
    expect(resolved.profile.name).toBe("crypto-strict");
    expect(resolved.profile.batchSize).toBe(4);
    expect(resolved.profile.recencyHours).toBe(6);
  });

  it("rejects an unusable batch size", () => {
    expect(() => resolveCli({ batchSize: Number.NaN }, envWith())).toThrow(ConfigError);
  });
});

describe("runNewsProcessorCli", () => {
  it("exits 1 when required variables are missing", async () => {
    expect(await runNewsProcessorCli([], {})).toBe(1);
  });

  it("exits 1 on an unknown profile", async () => {
    expect(await runNewsProcessorCli(["--profile", "weather"], envWith())).toBe(1);
  });

  it("exits 1 on an invalid run mode", async () => {
    expect(await runNewsProcessorCli(["--mode", "sometimes"], envWith())).toBe(1);
  });
});
