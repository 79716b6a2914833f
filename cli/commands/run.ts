import type { ParsedArgs } from "minimist";
import chalk from "chalk";
import { z } from "zod";
import { FILTERS, loadConfig, resolveCampaignConfig, type CampaignOverrides } from "../utils/config.ts";
import { AdbSession, createAdbTransport } from "../utils/adb.ts";
import { runCampaign } from "../services/campaign.ts";
import type { RunResult } from "../types.ts";

const toList = (value: unknown): unknown[] =>
  value === undefined || value === "" ? [] : Array.isArray(value) ? value : [value];

// minimist turns numeric-looking values into numbers, so strings are coerced back
const optionalString = z.preprocess((v) => (v === "" ? undefined : v), z.coerce.string().min(1).optional());

const RunArgsSchema = z.object({
  output: optionalString,
  runs: z.coerce.number().int().positive().optional(),
  events: z.coerce.number().int().positive().optional(),
  package: z.preprocess(toList, z.array(z.coerce.string().min(1))),
  filter: z.preprocess((v) => (v === "" ? undefined : v), z.enum(FILTERS).optional()),
  "match-description": optionalString,
  threshold: z.coerce.number().int().min(0).max(100).optional(),
  serial: optionalString,
});

export const RUN_ARGS_OPTIONS = {
  string: ["output", "package", "filter", "match-description", "serial"],
  alias: { o: "output", n: "runs", e: "events", p: "package", s: "serial" },
};

export function parseRunArgs(args: ParsedArgs): CampaignOverrides & { serial?: string } {
  const parsed = RunArgsSchema.parse(args);
  return {
    output: parsed.output,
    runs: parsed.runs,
    events: parsed.events,
    packages: parsed.package,
    filter: parsed.filter,
    matchDescription: parsed["match-description"],
    threshold: parsed.threshold,
    serial: parsed.serial,
  };
}

function printSummary(results: RunResult[]) {
  const failed = results.filter((r) => r.status === "failed");

  console.log("\n" + "RUN".padEnd(8) + "STATUS".padEnd(10) + "DURATION".padEnd(12) + "MONKEY LOG");
  console.log("-".repeat(70));
  for (const r of results) {
    const status = r.status === "clean" ? chalk.green(r.status.padEnd(10)) : chalk.red(r.status.padEnd(10));
    console.log(String(r.index).padEnd(8) + status + `${Math.round(r.durationMs / 1000)}s`.padEnd(12) + r.artifacts.monkey);
  }
  console.log(`\n${results.length} run(s), ${chalk.red(`${failed.length} failed`)}`);
}

export async function runCommand(args: ParsedArgs) {
  let overrides: ReturnType<typeof parseRunArgs>;
  try {
    overrides = parseRunArgs(args);
  } catch (e) {
    const message = e instanceof z.ZodError ? e.issues.map((i) => `--${i.path.join(".")}: ${i.message}`).join("\n") : String(e);
    console.error(`Error: Invalid arguments.\n${message}`);
    console.error("Usage: monkeyloop run [-o <dir>] [-n <runs>] [-e <events>] [-p <package>]... [--filter crash|anr] [--match-description <text>] [--threshold <percent>] [-s <serial>]");
    process.exit(1);
  }

  const config = await loadConfig();
  const campaign = resolveCampaignConfig(config, overrides);
  const session = new AdbSession(createAdbTransport({
    adbPath: config.adb_path,
    serial: overrides.serial ?? config.serial,
  }));

  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.warn("\nInterrupted, stopping after cleanup...");
    controller.abort();
  });

  console.log(`Starting campaign: ${campaign.runs} run(s) x ${campaign.events} events on ${campaign.packages.length} package(s)`);
  console.log(`Output: ${campaign.outputDir}`);

  try {
    const results = await runCampaign(session, campaign, {
      signal: controller.signal,
      onRunStart: (runIndex, runCount) => {
        console.log(chalk.bold(`\n▶ Run ${runIndex + 1}/${runCount}`));
      },
      onState: (state) => {
        console.log(chalk.dim(`  ${state}`));
      },
      onResult: (result) => {
        if (result.status === "failed") {
          console.log(chalk.red(`  ✗ failed, bugreport at ${result.artifacts.bugreport}`));
        } else {
          console.log(chalk.green("  ✓ clean"));
        }
      },
    });
    printSummary(results);
  } catch (e) {
    console.error(`\n❌ Campaign aborted:`);
    console.error(e instanceof Error ? e.message : String(e));
    console.log(`Artifacts so far in: ${campaign.outputDir}`);
    process.exit(1);
  }
}
