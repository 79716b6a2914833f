import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { pathExists } from "fs-extra/esm";
import { parse } from "yaml";
import { z } from "zod";
import type { RunStatus } from "../types.ts";
import { parseArtifactName, type ArtifactKind } from "../utils/artifact-naming.ts";
import { summaryPath } from "./campaign.ts";

export interface RunInfo {
  index: number;
  status: RunStatus;
  files: Partial<Record<ArtifactKind, string>>;
}

const SummarySchema = z.object({
  started_at: z.string(),
  runs_planned: z.number().int(),
  results: z.array(z.object({
    index: z.number().int(),
    status: z.enum(["clean", "failed"]),
    failure: z.string().nullable(),
  })),
});

export type CampaignSummary = z.infer<typeof SummarySchema>;

/**
 * Lists the runs found in a campaign output directory, in run order. A run
 * with a bugreport is a failed run.
 */
export async function listRuns(outputDir: string): Promise<RunInfo[]> {
  if (!(await pathExists(outputDir))) {
    throw new Error(`Output directory '${outputDir}' not found`);
  }

  const byIndex = new Map<number, RunInfo>();
  for (const name of await readdir(outputDir)) {
    const parsed = parseArtifactName(name);
    if (!parsed) continue;
    const run: RunInfo = byIndex.get(parsed.index) ?? { index: parsed.index, status: "clean", files: {} };
    run.files[parsed.kind] = join(outputDir, name);
    if (parsed.kind === "bugreport") run.status = "failed";
    byIndex.set(parsed.index, run);
  }

  return [...byIndex.values()].sort((a, b) => a.index - b.index);
}

export async function readSummary(outputDir: string): Promise<CampaignSummary | null> {
  const path = summaryPath(outputDir);
  if (!(await pathExists(path))) return null;
  try {
    return SummarySchema.parse(parse(await readFile(path, "utf8")));
  } catch (e) {
    console.warn(`Warning: Malformed campaign summary ${path}, ignoring: ${e}`);
    return null;
  }
}
