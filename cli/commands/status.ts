import type { ParsedArgs } from "minimist";
import chalk from "chalk";
import { loadConfig } from "../utils/config.ts";
import { AdbSession, createAdbTransport } from "../utils/adb.ts";
import { BOOT_COMPLETED_PROP } from "../utils/readiness.ts";
import { parseDumpsys } from "../utils/battery.ts";

export async function statusCommand(args: ParsedArgs) {
  const config = await loadConfig();
  const serial = typeof args.serial === "string" && args.serial ? args.serial : config.serial;
  const session = new AdbSession(createAdbTransport({ adbPath: config.adb_path, serial }));

  try {
    const booted = (await session.getProperty(BOOT_COMPLETED_PROP)) === "1";
    const battery = parseDumpsys(await session.shell(["dumpsys", "battery"]));
    const level = typeof battery["level"] === "number" ? `${battery["level"]}%` : "unknown";
    const threshold = config.battery_threshold;

    console.log(`Device:   ${serial ?? "(default)"}`);
    console.log(`Booted:   ${booted ? chalk.green("yes") : chalk.yellow("no")}`);
    console.log(
      `Battery:  ${level}` +
      (typeof battery["level"] === "number" && battery["level"] <= threshold
        ? chalk.yellow(` (at or below the ${threshold}% gate)`)
        : ""),
    );
    for (const key of ["AC powered", "USB powered", "status", "temperature"]) {
      if (battery[key] !== undefined) {
        console.log(`  ${key}: ${battery[key]}`);
      }
    }
  } catch (e) {
    console.error("❌ Failed to query device:");
    console.error(e instanceof Error ? e.message : String(e));
    process.exit(1);
  }
}
