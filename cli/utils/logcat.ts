import { createWriteStream } from "node:fs"
import { once } from "node:events"
import { pipeline } from "node:stream/promises"
import type { AdbSession, StreamingProcess } from "./adb.ts"

export const LOGCAT_FORMAT = ["-v", "threadtime"]

/**
 * Background logcat capture for one run. Owns the logcat subprocess and the
 * file it streams into until `stop()` has completed.
 */
export class LogCapture {
  private stopping: Promise<void> | null = null

  private constructor(
    public readonly outputPath: string,
    private readonly logcat: StreamingProcess,
    private readonly flushed: Promise<void>,
  ) {}

  /**
   * Clears the device log buffer, then streams `adb logcat` into `outputPath`.
   */
  static async start(session: AdbSession, outputPath: string, filterSpec: string[] = []): Promise<LogCapture> {
    await session.execute(["logcat", "-c"])

    const file = createWriteStream(outputPath)
    await once(file, "open")

    let logcat: StreamingProcess
    try {
      logcat = session.stream(["logcat", ...LOGCAT_FORMAT, ...filterSpec])
    } catch (e) {
      file.destroy()
      throw e
    }
    const flushed = pipeline(logcat.output, file).catch((e: unknown) => {
      console.warn(`Warning: logcat output to ${outputPath} ended with an error: ${e}`)
    })

    return new LogCapture(outputPath, logcat, flushed)
  }

  get stopped(): boolean {
    return this.stopping !== null
  }

  /**
   * Terminates logcat and waits until the process has exited and the file is
   * flushed and closed. Safe to call more than once.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown()
    }
    return this.stopping
  }

  private async shutdown(): Promise<void> {
    try {
      this.logcat.kill()
    } catch (e) {
      console.warn(`Warning: Failed to signal logcat: ${e}`)
    }
    await this.logcat.exited
    await this.flushed
  }
}
