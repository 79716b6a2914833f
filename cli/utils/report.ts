import type { ArtifactPaths } from "../types.ts"
import { runCmd } from "./system.ts"

/**
 * Renders the HTML report of a failed run with the external report tool:
 * `<command...> <monkey> <logcat> <bugreport> <html>`.
 */
export async function renderReport(command: string[], artifacts: ArtifactPaths): Promise<void> {
  if (command.length === 0) {
    throw new Error("No report command configured")
  }
  await runCmd([...command, artifacts.monkey, artifacts.logcat, artifacts.bugreport, artifacts.report])
}
