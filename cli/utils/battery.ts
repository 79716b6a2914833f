import { AdbSession } from "./adb.ts"
import { sleep as defaultSleep, type PollOptions } from "./time.ts"

export type DumpsysValue = boolean | number | string

const DEFAULT_CHARGE_POLL_MS = 60_000

function coerce(raw: string): DumpsysValue {
  const value = raw.trim()
  if (value === "true") return true
  if (value === "false") return false
  if (/^-?\d+$/.test(value)) return parseInt(value, 10)
  return value
}

/**
 * Parses the `key: value` lines of a dumpsys service dump.
 *
 * ```
 * Current Battery Service state:
 *   AC powered: false
 *   level: 85
 * ```
 * yields `{ "AC powered": false, level: 85 }`; header lines are skipped.
 */
export function parseDumpsys(text: string): Record<string, DumpsysValue> {
  const entries: Record<string, DumpsysValue> = {}
  for (const line of text.split(/\r?\n/)) {
    const sep = line.indexOf(":")
    if (sep === -1) continue
    const key = line.slice(0, sep).trim()
    const raw = line.slice(sep + 1)
    if (!key || !raw.trim()) continue
    entries[key] = coerce(raw)
  }
  return entries
}

export async function getBatteryLevel(session: AdbSession): Promise<number> {
  const dump = parseDumpsys(await session.shell(["dumpsys", "battery"]))
  const level = dump["level"]
  if (typeof level !== "number") {
    throw new Error(`Battery level unavailable in dumpsys output (got ${JSON.stringify(level)})`)
  }
  return level
}

/**
 * Polls the battery level until it is strictly above `threshold` and returns
 * the level that passed. Blocks indefinitely while the device charges.
 */
export async function waitForChargeAbove(
  session: AdbSession,
  threshold: number,
  options: PollOptions = {},
): Promise<number> {
  const pollMs = options.pollMs ?? DEFAULT_CHARGE_POLL_MS
  const sleep = options.sleep ?? defaultSleep

  while (true) {
    const level = await getBatteryLevel(session)
    if (level > threshold) return level
    console.log(`Battery at ${level}% (need > ${threshold}%), waiting ${Math.round(pollMs / 1000)}s to charge...`)
    await sleep(pollMs, options.signal)
  }
}
