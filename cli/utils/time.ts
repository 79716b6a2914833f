import { setTimeout as delay } from "node:timers/promises"

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>

/**
 * Sleep for a specified number of milliseconds; rejects with an AbortError when
 * the signal fires first.
 */
export const sleep: SleepFn = (ms, signal) => delay(ms, undefined, { signal })

export interface PollOptions {
  pollMs?: number
  sleep?: SleepFn
  signal?: AbortSignal
}

export const seconds = (value: number): number => value * 1000
