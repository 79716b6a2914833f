import type { FailureFilter, StressConfig } from "../types.ts"
import { quoteShellArg } from "./args.ts"

export const LAUNCHER_CATEGORY = "android.intent.category.LAUNCHER"

const BASE_FLAGS = [
  "-c", LAUNCHER_CATEGORY,
  "--ignore-security-exceptions",
  "--monitor-native-crashes",
  "-v", "-v", "-v",
]

// Failures the monkey should keep going past, so only the filtered kind stops it
const FILTER_FLAGS: Record<FailureFilter, string[]> = {
  anr: ["--ignore-crashes", "--ignore-native-crashes"],
  crash: ["--ignore-timeouts"],
}

/**
 * Builds the `adb shell monkey ...` argument list. The event count is always
 * last, as monkey requires.
 */
export function buildMonkeyArgs(config: StressConfig): string[] {
  const args = ["shell", "monkey", ...BASE_FLAGS]

  for (const pkg of config.packages) {
    args.push("-p", pkg)
  }

  if (config.filter) {
    args.push(...FILTER_FLAGS[config.filter])
  }

  if (config.matchDescription) {
    args.push("--match-description", quoteShellArg(config.matchDescription))
  }

  args.push(String(config.events))
  return args
}
