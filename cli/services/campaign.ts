import { join } from "node:path";
import { writeFile } from "node:fs/promises";
import { ensureDir, pathExists } from "fs-extra/esm";
import { stringify } from "yaml";
import type { CampaignConfig, RunResult } from "../types.ts";
import { AdbSession } from "../utils/adb.ts";
import { SUMMARY_FILE } from "../utils/paths.ts";
import { getRunContext } from "../runtime/context.ts";
import { executeRun, type RunHooks } from "../runtime/lifecycle.ts";

export interface CampaignHooks extends RunHooks {
  onRunStart?: (runIndex: number, runCount: number) => void;
  onResult?: (result: RunResult) => void;
}

export async function prepareOutputDir(outputDir: string): Promise<void> {
  if (await pathExists(outputDir)) {
    throw new Error(`Output directory '${outputDir}' already exists. Choose a new one to keep previous runs intact.`);
  }
  await ensureDir(outputDir);
}

export function summaryPath(outputDir: string): string {
  return join(outputDir, SUMMARY_FILE);
}

export async function writeSummary(config: CampaignConfig, startedAt: Date, results: RunResult[]): Promise<void> {
  const doc = {
    started_at: startedAt.toISOString(),
    runs_planned: config.runs,
    events: config.events,
    packages: config.packages,
    filter: config.filter ?? null,
    match_description: config.matchDescription ?? null,
    results: results.map((r) => ({
      index: r.index,
      status: r.status,
      started_at: r.startedAt,
      duration_ms: r.durationMs,
      failure: r.failure ?? null,
      report_error: r.reportError ?? null,
      artifacts: r.artifacts,
    })),
  };
  await writeFile(summaryPath(config.outputDir), stringify(doc));
}

/**
 * Runs `config.runs` runs back to back on one device. A failed monkey run is
 * recorded and the campaign moves on; any other error ends the campaign.
 */
export async function runCampaign(
  session: AdbSession,
  config: CampaignConfig,
  hooks: CampaignHooks = {},
): Promise<RunResult[]> {
  const release = session.claim();
  try {
    await prepareOutputDir(config.outputDir);

    const startedAt = new Date();
    const results: RunResult[] = [];

    for (let runIndex = 0; runIndex < config.runs; runIndex++) {
      hooks.signal?.throwIfAborted();
      hooks.onRunStart?.(runIndex, config.runs);

      const ctx = getRunContext({ outputDir: config.outputDir, runIndex, runCount: config.runs });
      const result = await executeRun(session, ctx, config, hooks);

      results.push(result);
      await writeSummary(config, startedAt, results);
      hooks.onResult?.(result);
    }

    return results;
  } finally {
    release();
  }
}
