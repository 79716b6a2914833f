import { describe, expect, it } from "vitest";
import minimist from "minimist";
import { parseRunArgs, RUN_ARGS_OPTIONS } from "./run.ts";

const parse = (argv: string[]) => parseRunArgs(minimist(["run", ...argv], RUN_ARGS_OPTIONS));

describe("parseRunArgs", () => {
  it("leaves unset options to the config", () => {
    expect(parse([])).toEqual({
      output: undefined,
      runs: undefined,
      events: undefined,
      packages: [],
      filter: undefined,
      matchDescription: undefined,
      threshold: undefined,
      serial: undefined,
    });
  });

  it("reads short and long flags", () => {
    expect(parse([
      "-o", "/tmp/out", "-n", "3", "-e", "5000",
      "-p", "com.example.app", "--package", "com.example.other",
      "--filter", "anr", "--match-description", "Force close",
      "--threshold", "35", "-s", "emulator-5554",
    ])).toEqual({
      output: "/tmp/out",
      runs: 3,
      events: 5000,
      packages: ["com.example.app", "com.example.other"],
      filter: "anr",
      matchDescription: "Force close",
      threshold: 35,
      serial: "emulator-5554",
    });
  });

  it("keeps numeric serials as strings", () => {
    expect(parse(["-s", "12345678"]).serial).toBe("12345678");
  });

  it("rejects unknown filters and bad counts", () => {
    expect(() => parse(["--filter", "freeze"])).toThrow();
    expect(() => parse(["-n", "0"])).toThrow();
    expect(() => parse(["--threshold", "101"])).toThrow();
  });
});
