import { setTimeout as delay } from "node:timers/promises";
import { createSubsystemLogger, describeError } from "../logging/logger.js";

const log = createSubsystemLogger("scheduler");

export const DEFAULT_INTERVAL_SECONDS = 60;
export const DEFAULT_MAX_CONSECUTIVE_FAILURES = 3;

export type CycleRunner = () => Promise<boolean>;

export type LoopResult = {
  exitCode: 0 | 1;
  cycles: number;
  reason: "aborted" | "too_many_failures";
};

export type LoopParams = {
  runCycle: CycleRunner;
  intervalSeconds?: number;
  maxConsecutiveFailures?: number;
  signal?: AbortSignal;
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onFatal?: (failures: number) => Promise<void>;
};

/** Soft cadence: sleep what is left of the interval, never less than a second. */
export function computeSleepSeconds(
  elapsedSeconds: number,
  intervalSeconds = DEFAULT_INTERVAL_SECONDS,
): number {
  return Math.max(intervalSeconds - elapsedSeconds, 1);
}

export async function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (signal?.aborted) {
      return;
    }
    throw err;
  }
}

async function runGuarded(runCycle: CycleRunner): Promise<boolean> {
  try {
    return await runCycle();
  } catch (err) {
    log.error(`cycle failed: ${describeError(err)}`);
    return false;
  }
}

/** `once` mode: 0 when the pass completed, 1 on a pipeline-level failure. */
export async function runOnce(runCycle: CycleRunner): Promise<0 | 1> {
  return (await runGuarded(runCycle)) ? 0 : 1;
}

export async function runContinuous(params: LoopParams): Promise<LoopResult> {
  const intervalSeconds = params.intervalSeconds ?? DEFAULT_INTERVAL_SECONDS;
  const maxFailures = params.maxConsecutiveFailures ?? DEFAULT_MAX_CONSECUTIVE_FAILURES;
  const now = params.now ?? Date.now;
  const sleep = params.sleep ?? abortableSleep;
  let failures = 0;
  let cycles = 0;

  while (!params.signal?.aborted) {
    const startedAt = now();
    const ok = await runGuarded(params.runCycle);
    cycles += 1;
    if (ok) {
      failures = 0;
    } else {
      failures += 1;
      if (failures >= maxFailures) {
        log.error(`too many consecutive failures (${failures}), exiting`);
        if (params.onFatal) {
          await params.onFatal(failures);
        }
        return { exitCode: 1, cycles, reason: "too_many_failures" };
      }
    }
    if (params.signal?.aborted) {
      break;
    }
    const elapsedSeconds = (now() - startedAt) / 1000;
    const sleepSeconds = computeSleepSeconds(elapsedSeconds, intervalSeconds);
    log.info(`took ${elapsedSeconds.toFixed(1)}s, next run in ${sleepSeconds.toFixed(1)}s`);
    await sleep(sleepSeconds * 1000, params.signal);
  }
  log.info("shutting down");
  return { exitCode: 0, cycles, reason: "aborted" };
}
