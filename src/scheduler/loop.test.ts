import { describe, expect, it, vi } from "vitest";
import { abortableSleep, computeSleepSeconds, runContinuous, runOnce } from "./loop.js";

/** Clock that advances by the given seconds on every read after the first of a pair. */
function steppingClock(cycleSeconds: number) {
  let current = 0;
  let reads = 0;
  return () => {
    reads += 1;
    if (reads % 2 === 0) {
      current += cycleSeconds * 1000;
    }
    return current;
  };
}

describe("computeSleepSeconds", () => {
  it("sleeps out the remainder of the interval", () => {
    expect(computeSleepSeconds(12)).toBe(48);
  });

  it("never sleeps less than a second", () => {
    expect(computeSleepSeconds(75)).toBe(1);
    expect(computeSleepSeconds(59.5)).toBe(1);
  });
});

describe("runOnce", () => {
  it("maps the cycle outcome to an exit code", async () => {
    expect(await runOnce(async () => true)).toBe(0);
    expect(await runOnce(async () => false)).toBe(1);
    expect(
      await runOnce(async () => {
        throw new Error("store unreachable");
      }),
    ).toBe(1);
  });
});

describe("runContinuous", () => {
  it("exits 1 after three consecutive failures", async () => {
    const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
    const onFatal = vi.fn(async (_failures: number) => {});
    const result = await runContinuous({
      runCycle: async () => {
        throw new Error("pipeline down");
      },
      sleep,
      onFatal,
      now: steppingClock(1),
    });
    expect(result).toEqual({ exitCode: 1, cycles: 3, reason: "too_many_failures" });
    expect(onFatal).toHaveBeenCalledWith(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it("resets the failure count after a success", async () => {
    const outcomes = [false, false, true, false, false, false];
    const runCycle = vi.fn(async () => outcomes.shift() ?? false);
    const result = await runContinuous({
      runCycle,
      sleep: async () => {},
      now: steppingClock(1),
    });
    expect(result.exitCode).toBe(1);
    expect(result.cycles).toBe(6);
  });

  it("sleeps for what remains of the interval", async () => {
    const controller = new AbortController();
    const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {
      controller.abort();
    });
    const result = await runContinuous({
      runCycle: async () => true,
      sleep,
      signal: controller.signal,
      now: steppingClock(12),
    });
    expect(sleep).toHaveBeenCalledWith(48_000, controller.signal);
    expect(result).toEqual({ exitCode: 0, cycles: 1, reason: "aborted" });
  });

  it("finishes the batch in flight when aborted", async () => {
    const controller = new AbortController();
    const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
    const runCycle = vi.fn(async () => {
      controller.abort();
      return true;
    });
    const result = await runContinuous({ runCycle, sleep, signal: controller.signal });
    expect(runCycle).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
    expect(result.exitCode).toBe(0);
  });

  it("does not start when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const runCycle = vi.fn(async () => true);
    const result = await runContinuous({ runCycle, signal: controller.signal });
    expect(runCycle).not.toHaveBeenCalled();
    expect(result.cycles).toBe(0);
  });
});

describe("abortableSleep", () => {
  it("resolves early when aborted", async () => {
    const controller = new AbortController();
    const pending = abortableSleep(60_000, controller.signal);
    controller.abort();
    await expect(pending).resolves.toBeUndefined();
  });
});
