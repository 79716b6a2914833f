#!/usr/bin/env -S npx tsx

import minimist from "minimist";
import { runCommand, RUN_ARGS_OPTIONS } from "./commands/run.ts";
import { statusCommand } from "./commands/status.ts";
import { lsCommand } from "./commands/ls.ts";

function printUsage() {
  console.log("monkeyloop - reboot-gated monkey stress campaigns over adb");
  console.log("Commands:");
  console.log("  run [-o <dir>] [-n <runs>] [-e <events>] [-p <package>]... [--filter crash|anr]");
  console.log("      [--match-description <text>] [--threshold <percent>] [-s <serial>]");
  console.log("  status [-s <serial>]");
  console.log("  ls <output-dir>");
}

async function main() {
  const args = minimist(process.argv.slice(2), RUN_ARGS_OPTIONS);
  const command = args._[0];

  switch (command) {
    case "run":
      await runCommand(args);
      break;
    case "status":
      await statusCommand(args);
      break;
    case "ls":
      await lsCommand(args);
      break;
    default:
      printUsage();
      if (command !== undefined) {
        process.exitCode = 1;
      }
      break;
  }
}

main().catch((e: unknown) => {
  console.error("❌ monkeyloop crashed:", e);
  process.exit(1);
});
