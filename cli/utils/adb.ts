import { spawn } from "node:child_process"
import type { Readable, Writable } from "node:stream"

export interface ExecOutput {
  code: number
  stdout: string
  stderr: string
}

/** A long-lived subprocess whose stdout is consumed by the caller. */
export interface StreamingProcess {
  readonly output: Readable
  /** Resolves with the exit code once the process and its stdio have closed. */
  readonly exited: Promise<number | null>
  kill(): void
}

export interface AdbTransport {
  /**
   * Runs one adb command to completion. When `output` is given, stdout and
   * stderr are written to it (it is not ended) and not buffered.
   */
  exec(args: string[], output?: Writable): Promise<ExecOutput>
  stream(args: string[]): StreamingProcess
}

export class ExecError extends Error {
  constructor(
    public readonly command: string[],
    public readonly exitCode: number,
    public readonly stderr = "",
  ) {
    const detail = stderr.trim() ? `\n${stderr.trim()}` : ""
    super(`adb command failed (exit ${exitCode}): adb ${command.join(" ")}${detail}`)
    this.name = "ExecError"
  }
}

export interface AdbTransportOptions {
  adbPath?: string
  serial?: string
}

export function createAdbTransport(options: AdbTransportOptions = {}): AdbTransport {
  const adbPath = options.adbPath ?? "adb"
  const prefix = options.serial ? ["-s", options.serial] : []

  return {
    exec: (args, output) =>
      new Promise<ExecOutput>((resolve, reject) => {
        const child = spawn(adbPath, [...prefix, ...args], { stdio: ["ignore", "pipe", "pipe"] })
        let stdout = ""
        let stderr = ""

        if (output) {
          // pipe() detaches from a failed output; keep reading so adb never blocks
          const drain = () => {
            child.stdout.resume()
            child.stderr.resume()
          }
          output.once("error", drain)
          child.once("close", () => output.off("error", drain))
          child.stdout.pipe(output, { end: false })
          child.stderr.pipe(output, { end: false })
        } else {
          child.stdout.setEncoding("utf8").on("data", (chunk: string) => {
            stdout += chunk
          })
          child.stderr.setEncoding("utf8").on("data", (chunk: string) => {
            stderr += chunk
          })
        }

        child.once("error", reject)
        // "close" fires after stdio is drained, so piped output is complete here
        child.once("close", (code) => resolve({ code: code ?? -1, stdout, stderr }))
      }),

    stream: (args) => {
      const child = spawn(adbPath, [...prefix, ...args], { stdio: ["ignore", "pipe", "ignore"] })
      const exited = new Promise<number | null>((resolve) => {
        child.once("close", (code) => resolve(code))
        child.once("error", (error) => {
          console.warn(`Warning: adb ${args.join(" ")} failed to start: ${error.message}`)
          resolve(null)
        })
      })
      return {
        output: child.stdout,
        exited,
        kill: () => {
          if (child.exitCode === null && child.signalCode === null) {
            child.kill("SIGTERM")
          }
        },
      }
    },
  }
}

/**
 * One device connection. Commands issued through the session run strictly one
 * after another; `stream()` subprocesses are independent of that queue.
 */
export class AdbSession {
  private tail: Promise<unknown> = Promise.resolve()
  private claimed = false

  constructor(public readonly transport: AdbTransport) {}

  /**
   * Marks the session as driven by one campaign. Returns the release function.
   */
  claim(): () => void {
    if (this.claimed) {
      throw new Error("Device session is already in use by another campaign")
    }
    this.claimed = true
    let released = false
    return () => {
      if (!released) {
        released = true
        this.claimed = false
      }
    }
  }

  async execute(args: string[]): Promise<void> {
    await this.run(args)
  }

  async executeCapturing(args: string[]): Promise<string> {
    const { stdout } = await this.run(args)
    return stdout
  }

  async executeToStream(args: string[], output: Writable): Promise<void> {
    await this.run(args, output)
  }

  shell(args: string[]): Promise<string> {
    return this.executeCapturing(["shell", ...args])
  }

  waitReady(): Promise<void> {
    return this.execute(["wait-for-device"])
  }

  async getProperty(name: string): Promise<string> {
    return (await this.shell(["getprop", name])).trim()
  }

  reboot(): Promise<void> {
    return this.execute(["reboot"])
  }

  stream(args: string[]): StreamingProcess {
    return this.transport.stream(args)
  }

  private run(args: string[], output?: Writable): Promise<ExecOutput> {
    const next = this.tail.then(async () => {
      const result = await this.transport.exec(args, output)
      if (result.code !== 0) {
        throw new ExecError(args, result.code, result.stderr)
      }
      return result
    })
    this.tail = next.catch(() => undefined)
    return next
  }
}
