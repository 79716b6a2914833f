import { readFile } from "node:fs/promises";
import { pathExists } from "fs-extra/esm";
import { parse } from "smol-toml";
import deepmerge from "deepmerge";
import { z } from "zod";
import type { CampaignConfig, FailureFilter } from "../types.ts";
import { parseArgsString } from "./args.ts";
import { DEFAULT_OUTPUT_DIR, GLOBAL_CONFIG_PATH, LOCAL_CONFIG_PATH } from "./paths.ts";
import { seconds } from "./time.ts";

export const DEFAULT_PACKAGES = [
  "com.android.settings",
  "com.android.contacts",
  "com.android.dialer",
  "com.android.messaging",
  "com.android.calendar",
  "com.android.camera2",
  "com.android.gallery3d",
  "com.android.deskclock",
  "com.android.calculator2",
  "com.android.email",
  "com.android.browser",
  "com.android.music",
  "com.android.documentsui",
  "com.android.soundrecorder",
  "com.android.providers.downloads.ui",
  "com.android.quicksearchbox",
  "com.android.launcher3",
  "com.android.systemui",
  "com.android.inputmethod.latin",
];

export const FILTERS = ["crash", "anr"] as const satisfies readonly FailureFilter[];

export const ConfigSchema = z.object({
  adb_path: z.string().min(1),
  serial: z.string().min(1).optional(),
  runs: z.number().int().positive(),
  events: z.number().int().positive(),
  packages: z.array(z.string().min(1)).min(1),
  filter: z.enum(FILTERS).optional(),
  match_description: z.string().min(1).optional(),
  battery_threshold: z.number().int().min(0).max(100),
  logcat_filter: z.string(),
  report_command: z.string().min(1),
  delays: z.object({
    boot_poll: z.number().positive(),
    settle: z.number().min(0),
    charge_poll: z.number().positive(),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

const DEFAULT_CONFIG: AppConfig = {
  adb_path: "adb",
  runs: 10_000,
  events: 125_000,
  packages: DEFAULT_PACKAGES,
  battery_threshold: 20,
  logcat_filter: "",
  report_command: "monkey-report",
  delays: {
    boot_poll: 2,
    settle: 30,
    charge_poll: 60,
  },
};

const MERGE_OPTS: deepmerge.Options = { arrayMerge: (_target, source) => source };

async function mergeConfigFile(config: AppConfig, path: string): Promise<AppConfig> {
  if (!(await pathExists(path))) {
    return config;
  }
  try {
    const parsed = parse(await readFile(path, "utf8"));
    const result = ConfigSchema.safeParse(deepmerge<AppConfig, Record<string, unknown>>(config, parsed, MERGE_OPTS));
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      console.warn(`Warning: Ignoring invalid config ${path}: ${issues}`);
      return config;
    }
    return result.data;
  } catch (e) {
    console.warn(`Warning: Failed to parse ${path}: ${e}`);
    return config;
  }
}

export async function loadConfig(cwd = process.cwd()): Promise<AppConfig> {
  let config = structuredClone(DEFAULT_CONFIG);

  // Load local config (.monkeyloop/config.toml)
  config = await mergeConfigFile(config, LOCAL_CONFIG_PATH(cwd));

  // Load global config (.monkeyloop.config.toml) - Takes precedence
  config = await mergeConfigFile(config, GLOBAL_CONFIG_PATH(cwd));

  return config;
}

/** Command-line overrides for a campaign; unset fields fall back to the config. */
export interface CampaignOverrides {
  output?: string;
  runs?: number;
  events?: number;
  packages?: string[];
  filter?: FailureFilter;
  matchDescription?: string;
  threshold?: number;
}

export function resolveCampaignConfig(
  config: AppConfig,
  overrides: CampaignOverrides = {},
  cwd = process.cwd(),
  now = new Date(),
): CampaignConfig {
  const packages = overrides.packages && overrides.packages.length > 0 ? overrides.packages : config.packages;

  return {
    outputDir: overrides.output ?? DEFAULT_OUTPUT_DIR(cwd, now),
    runs: overrides.runs ?? config.runs,
    events: overrides.events ?? config.events,
    packages,
    filter: overrides.filter ?? config.filter,
    matchDescription: overrides.matchDescription ?? config.match_description,
    batteryThreshold: overrides.threshold ?? config.battery_threshold,
    logcatFilter: parseArgsString(config.logcat_filter),
    reportCommand: parseArgsString(config.report_command),
    timings: {
      bootPollMs: seconds(config.delays.boot_poll),
      settleMs: seconds(config.delays.settle),
      chargePollMs: seconds(config.delays.charge_poll),
    },
  };
}
