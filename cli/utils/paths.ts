import { join } from "node:path"

export const MONKEYLOOP_DIR = ".monkeyloop"
export const LOCAL_CONFIG_FILE = "config.toml"
export const GLOBAL_CONFIG_FILE = ".monkeyloop.config.toml"
export const SUMMARY_FILE = "campaign.yml"

const pad2 = (n: number) => String(n).padStart(2, "0")

/** Local-time `YYYYMMDD-HHMMSS`. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}` +
    `-${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`
  )
}

export const DEFAULT_OUTPUT_DIR = (cwd = process.cwd(), now = new Date()) =>
  process.env.MONKEYLOOP_OUT_DIR || join(cwd, `monkey-${formatTimestamp(now)}`)

export const LOCAL_CONFIG_PATH = (cwd = process.cwd()) => join(cwd, MONKEYLOOP_DIR, LOCAL_CONFIG_FILE)
export const GLOBAL_CONFIG_PATH = (cwd = process.cwd()) => join(cwd, GLOBAL_CONFIG_FILE)
