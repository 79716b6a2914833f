import type { ArtifactPaths } from "../types.ts";

export type RunState =
  | "idle"                 // Not started
  | "rebooting"            // Reboot issued, waiting for boot + settle
  | "awaiting-charge"      // Battery gate
  | "capturing"            // Output files opened, logcat starting
  | "stress-running"       // Monkey in the foreground
  | "clean"                // Monkey exited 0
  | "failed"               // Monkey exited non-0, bugreport collected
  | "artifact-collection"  // Capture stopped, report rendered for failures
  | "done";                // RunResult recorded

export interface RunContext {
  runIndex: number;
  runCount: number;
  stem: string;
  paths: ArtifactPaths;
}
