import { AdbSession, ExecError } from "./adb.ts"
import { sleep as defaultSleep, type PollOptions } from "./time.ts"

export const BOOT_COMPLETED_PROP = "sys.boot_completed"
const DEFAULT_BOOT_POLL_MS = 2_000

/**
 * Blocks until the device accepts commands and reports `sys.boot_completed=1`,
 * then dismisses the keyguard. There is no attempt limit: a device that never
 * boots blocks until the signal (if any) aborts.
 */
export async function waitUntilBooted(session: AdbSession, options: PollOptions = {}): Promise<void> {
  const pollMs = options.pollMs ?? DEFAULT_BOOT_POLL_MS
  const sleep = options.sleep ?? defaultSleep

  await session.waitReady()

  while ((await session.getProperty(BOOT_COMPLETED_PROP)) !== "1") {
    await sleep(pollMs, options.signal)
  }

  await dismissKeyguard(session)
}

/**
 * Best-effort: a device without a keyguard (or an older `wm`) fails this
 * command, which must not fail the run.
 */
export async function dismissKeyguard(session: AdbSession): Promise<boolean> {
  try {
    await session.execute(["shell", "wm", "dismiss-keyguard"])
    return true
  } catch (e) {
    if (!(e instanceof ExecError)) throw e
    console.warn(`Warning: Failed to dismiss keyguard: ${e.message}`)
    return false
  }
}
