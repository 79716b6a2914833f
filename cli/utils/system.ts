import { execFile } from "node:child_process"
import { promisify } from "node:util"

const execFileAsync = promisify(execFile)

// Helper to run a host command and get stdout
export async function runCmd(cmd: string[]): Promise<string> {
  const [file, ...args] = cmd
  if (!file) {
    throw new Error("Command is empty")
  }
  try {
    const { stdout } = await execFileAsync(file, args, { maxBuffer: 64 * 1024 * 1024 })
    return stdout.trim()
  } catch (e) {
    const stderr = e instanceof Error && "stderr" in e && typeof e.stderr === "string" ? e.stderr.trim() : ""
    const reason = stderr || (e instanceof Error ? e.message : String(e))
    throw new Error(`Command failed: ${cmd.join(" ")}\n${reason}`)
  }
}
