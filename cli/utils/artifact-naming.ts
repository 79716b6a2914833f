import { basename, join } from "node:path"
import type { ArtifactPaths } from "../types.ts"

export type ArtifactKind = keyof ArtifactPaths

const SUFFIXES: Record<ArtifactKind, string> = {
  monkey: "-monkey.txt",
  logcat: "-logcat.txt",
  bugreport: "-bugreport.txt",
  report: ".html",
}

export const ARTIFACT_KINDS: readonly ArtifactKind[] = ["monkey", "logcat", "bugreport", "report"]

/**
 * Digits needed for the largest run index (`runCount - 1`), so stems sort
 * lexicographically in run order.
 */
export function padWidth(runCount: number): number {
  if (!Number.isInteger(runCount) || runCount < 1) {
    throw new RangeError(`Run count must be a positive integer, got ${runCount}`)
  }
  return String(runCount - 1).length
}

export function formatRunIndex(runIndex: number, runCount: number): string {
  if (!Number.isInteger(runIndex) || runIndex < 0 || runIndex >= runCount) {
    throw new RangeError(`Run index ${runIndex} is outside 0..${runCount - 1}`)
  }
  return String(runIndex).padStart(padWidth(runCount), "0")
}

export function getRunStem(outputDir: string, runIndex: number, runCount: number): string {
  return join(outputDir, formatRunIndex(runIndex, runCount))
}

export function getArtifactPaths(stem: string): ArtifactPaths {
  return {
    monkey: `${stem}${SUFFIXES.monkey}`,
    logcat: `${stem}${SUFFIXES.logcat}`,
    bugreport: `${stem}${SUFFIXES.bugreport}`,
    report: `${stem}${SUFFIXES.report}`,
  }
}

/**
 * Maps an artifact file name (or path) back to its run index and kind.
 * Returns null for files that are not run artifacts.
 */
export function parseArtifactName(fileName: string): { index: number; kind: ArtifactKind } | null {
  const name = basename(fileName)
  for (const kind of ARTIFACT_KINDS) {
    const suffix = SUFFIXES[kind]
    if (!name.endsWith(suffix)) continue
    const digits = name.slice(0, -suffix.length)
    if (/^\d+$/.test(digits)) {
      return { index: parseInt(digits, 10), kind }
    }
  }
  return null
}
