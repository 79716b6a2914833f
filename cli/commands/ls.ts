import type { ParsedArgs } from "minimist";
import chalk from "chalk";
import { listRuns, readSummary } from "../services/runs.ts";
import { ARTIFACT_KINDS } from "../utils/artifact-naming.ts";

export async function lsCommand(args: ParsedArgs) {
  const outputDir = args._[1];
  if (outputDir === undefined) {
    console.error("Error: Output directory is required.");
    console.error("Usage: monkeyloop ls <output-dir>");
    process.exit(1);
  }

  try {
    const dir = String(outputDir);
    const runs = await listRuns(dir);
    const summary = await readSummary(dir);

    if (summary) {
      console.log(`Campaign started ${summary.started_at}: ${summary.results.length}/${summary.runs_planned} run(s) recorded`);
    }

    if (runs.length === 0) {
      console.log("No runs found.");
      return;
    }

    const failures = new Map(summary?.results.map((r): [number, string | null] => [r.index, r.failure]) ?? []);

    console.log("RUN".padEnd(8) + "STATUS".padEnd(10) + "ARTIFACTS");
    console.log("-".repeat(60));
    for (const run of runs) {
      const status = run.status === "failed" ? chalk.red(run.status.padEnd(10)) : chalk.green(run.status.padEnd(10));
      const present = ARTIFACT_KINDS.filter((kind) => run.files[kind] !== undefined).join(", ");
      console.log(String(run.index).padEnd(8) + status + present);
      const failure = failures.get(run.index);
      if (failure) {
        console.log(chalk.dim(`        ${failure.split("\n")[0]}`));
      }
    }
  } catch (e) {
    console.error(e instanceof Error ? e.message : String(e));
    process.exit(1);
  }
}
