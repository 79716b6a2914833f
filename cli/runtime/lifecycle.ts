import { createWriteStream, type WriteStream } from "node:fs";
import { once } from "node:events";
import { finished } from "node:stream/promises";
import type { CampaignConfig, RunResult, RunStatus, StressConfig } from "../types.ts";
import { AdbSession, ExecError } from "../utils/adb.ts";
import { waitUntilBooted } from "../utils/readiness.ts";
import { waitForChargeAbove } from "../utils/battery.ts";
import { LogCapture } from "../utils/logcat.ts";
import { buildMonkeyArgs } from "../utils/monkey.ts";
import { renderReport } from "../utils/report.ts";
import { sleep as defaultSleep, type SleepFn } from "../utils/time.ts";
import type { RunContext, RunState } from "./types.ts";

export type RunSettings = StressConfig &
  Pick<CampaignConfig, "batteryThreshold" | "logcatFilter" | "reportCommand" | "timings">;

export interface RunHooks {
  onState?: (state: RunState, ctx: RunContext) => void;
  sleep?: SleepFn;
  signal?: AbortSignal;
}

export interface StressOutcome {
  status: RunStatus;
  failure?: string;
}

interface OutputFile {
  stream: WriteStream;
  failure: unknown;
}

async function openOutput(path: string): Promise<OutputFile> {
  const stream = createWriteStream(path);
  await once(stream, "open");
  const file: OutputFile = { stream, failure: undefined };
  stream.on("error", (e) => {
    file.failure ??= e;
  });
  return file;
}

async function closeOutput(file: OutputFile): Promise<void> {
  if (file.failure === undefined) {
    try {
      file.stream.end();
      await finished(file.stream);
    } catch (e) {
      file.failure = e;
    }
  }
  if (file.failure !== undefined) {
    console.warn(`Warning: Failed to write ${file.stream.path}: ${file.failure}`);
  }
}

/**
 * Phase 1: Reboot
 * Reboots the device, waits for boot completion, then lets it settle so the
 * post-boot noise stays out of the run's logs.
 */
export async function reboot(session: AdbSession, settings: RunSettings, hooks: RunHooks = {}): Promise<void> {
  const sleep = hooks.sleep ?? defaultSleep;
  await session.reboot();
  await waitUntilBooted(session, { pollMs: settings.timings.bootPollMs, sleep, signal: hooks.signal });
  await sleep(settings.timings.settleMs, hooks.signal);
}

/**
 * Phase 2: Charge gate
 */
export function awaitCharge(session: AdbSession, settings: RunSettings, hooks: RunHooks = {}): Promise<number> {
  return waitForChargeAbove(session, settings.batteryThreshold, {
    pollMs: settings.timings.chargePollMs,
    sleep: hooks.sleep,
    signal: hooks.signal,
  });
}

/**
 * Phase 3: Capture
 * Opens the monkey output file and starts logcat, runs `body`, then closes the
 * file and stops logcat on every exit path.
 */
export async function withCapture<T>(
  session: AdbSession,
  ctx: RunContext,
  settings: RunSettings,
  body: (monkeyOutput: WriteStream) => Promise<T>,
): Promise<T> {
  const monkeyOutput = await openOutput(ctx.paths.monkey);
  try {
    const capture = await LogCapture.start(session, ctx.paths.logcat, settings.logcatFilter);
    try {
      return await body(monkeyOutput.stream);
    } finally {
      await capture.stop().catch((e: unknown) => {
        console.warn(`Warning: Failed to stop logcat capture: ${e}`);
      });
    }
  } finally {
    await closeOutput(monkeyOutput);
  }
}

/**
 * Phase 4: Stress
 * Runs monkey with both output streams going to `output`. A failing adb
 * command is the run's failure, unless `signal` was aborted while it ran: adb
 * killed by the interrupt is not a monkey failure. Anything else propagates.
 */
export async function runStress(
  session: AdbSession,
  config: StressConfig,
  output: WriteStream,
  signal?: AbortSignal,
): Promise<StressOutcome> {
  try {
    await session.executeToStream(buildMonkeyArgs(config), output);
    return { status: "clean" };
  } catch (e) {
    signal?.throwIfAborted();
    if (e instanceof ExecError) {
      return { status: "failed", failure: e.message };
    }
    throw e;
  }
}

export async function collectBugreport(session: AdbSession, path: string): Promise<void> {
  const output = await openOutput(path);
  try {
    await session.executeToStream(["bugreport"], output.stream);
  } finally {
    await closeOutput(output);
  }
}

/**
 * Phase 5: Report
 * Returns the renderer's error message instead of throwing; a missing report
 * does not stop the campaign.
 */
export async function renderFailureReport(settings: RunSettings, ctx: RunContext): Promise<string | undefined> {
  try {
    await renderReport(settings.reportCommand, ctx.paths);
    return undefined;
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    console.warn(`Warning: Report rendering failed for run ${ctx.runIndex}: ${message}`);
    return message;
  }
}

/**
 * Drives one run through all states and returns its result. Only a monkey
 * failure is absorbed into the result; every other error propagates after the
 * capture has been torn down.
 */
export async function executeRun(
  session: AdbSession,
  ctx: RunContext,
  settings: RunSettings,
  hooks: RunHooks = {},
): Promise<RunResult> {
  const enter = (state: RunState) => hooks.onState?.(state, ctx);
  const startedAt = new Date();

  enter("idle");
  enter("rebooting");
  await reboot(session, settings, hooks);

  enter("awaiting-charge");
  await awaitCharge(session, settings, hooks);

  enter("capturing");
  const outcome = await withCapture(session, ctx, settings, async (monkeyOutput) => {
    enter("stress-running");
    const result = await runStress(session, settings, monkeyOutput, hooks.signal);
    enter(result.status);
    if (result.status === "failed") {
      await collectBugreport(session, ctx.paths.bugreport);
    }
    return result;
  });

  enter("artifact-collection");
  const reportError = outcome.status === "failed" ? await renderFailureReport(settings, ctx) : undefined;

  enter("done");
  return {
    index: ctx.runIndex,
    status: outcome.status,
    artifacts: ctx.paths,
    failure: outcome.failure,
    reportError,
    startedAt: startedAt.toISOString(),
    durationMs: Date.now() - startedAt.getTime(),
  };
}
