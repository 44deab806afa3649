import fs from "node:fs";
import path from "node:path";
import { resolveStateDir } from "../config/paths.js";
import { VERSION } from "../version.js";

export type RunRecord = {
  runId: string;
  job: string;
  profile: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  ok: boolean;
  counts?: Record<string, number>;
  tokenUsage?: { input: number; output: number; total: number };
  error?: string;
  provenance: { runId: string; agent: string; version: string };
};

export const OPS_RUNS_PATH = path.join("ops", "runs.ndjson");

export function resolveOpsRunsPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(resolveStateDir(env), OPS_RUNS_PATH);
}

export async function appendRunRecord(
  record: RunRecord,
  env: NodeJS.ProcessEnv = process.env,
): Promise<void> {
  const filePath = resolveOpsRunsPath(env);
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.appendFile(filePath, `${JSON.stringify(record)}\n`, "utf8");
}

export function buildRunRecord(params: {
  runId: string;
  job: string;
  profile: string;
  startedAt: string;
  finishedAt: string;
  ok: boolean;
  counts?: Record<string, number>;
  tokenUsage?: { input: number; output: number; total: number };
  error?: string;
}): RunRecord {
  const durationMs = new Date(params.finishedAt).getTime() - new Date(params.startedAt).getTime();
  return {
    runId: params.runId,
    job: params.job,
    profile: params.profile,
    startedAt: params.startedAt,
    finishedAt: params.finishedAt,
    durationMs: Math.max(0, durationMs),
    ok: params.ok,
    counts: params.counts,
    tokenUsage: params.tokenUsage,
    error: params.error,
    provenance: {
      runId: params.runId,
      agent: params.job,
      version: VERSION,
    },
  };
}
