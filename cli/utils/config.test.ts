import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import { mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { ensureDir } from "fs-extra/esm"
import { DEFAULT_PACKAGES, loadConfig, resolveCampaignConfig } from "./config.ts"

describe("loadConfig", () => {
	let tempDir: string

	beforeEach(async () => {
		tempDir = await mkdtemp(join(tmpdir(), "monkeyloop-"))
	})

	afterEach(async () => {
		vi.restoreAllMocks()
		await rm(tempDir, { recursive: true, force: true })
	})

	it("returns defaults without config files", async () => {
		const config = await loadConfig(tempDir)
		expect(config.adb_path).toBe("adb")
		expect(config.runs).toBe(10_000)
		expect(config.events).toBe(125_000)
		expect(config.packages).toEqual(DEFAULT_PACKAGES)
		expect(config.packages).toHaveLength(19)
		expect(config.battery_threshold).toBe(20)
		expect(config.report_command).toBe("monkey-report")
		expect(config.delays).toEqual({ boot_poll: 2, settle: 30, charge_poll: 60 })
	})

	it("reads the local config and lets the global one take precedence", async () => {
		await ensureDir(join(tempDir, ".monkeyloop"))
		await writeFile(join(tempDir, ".monkeyloop", "config.toml"), `
runs = 5
events = 500
packages = ["com.example.app"]

[delays]
settle = 0
`)
		await writeFile(join(tempDir, ".monkeyloop.config.toml"), `
runs = 3
filter = "anr"
`)

		const config = await loadConfig(tempDir)
		expect(config.runs).toBe(3)
		expect(config.events).toBe(500)
		expect(config.filter).toBe("anr")
		expect(config.packages).toEqual(["com.example.app"])
		expect(config.delays).toEqual({ boot_poll: 2, settle: 0, charge_poll: 60 })
	})

	it("ignores an invalid file with a warning", async () => {
		const warn = vi.spyOn(console, "warn").mockImplementation(() => {})
		await writeFile(join(tempDir, ".monkeyloop.config.toml"), `filter = "freeze"\n`)

		const config = await loadConfig(tempDir)
		expect(config.filter).toBeUndefined()
		expect(warn).toHaveBeenCalledTimes(1)
		expect(String(warn.mock.calls[0]?.[0])).toContain("Ignoring invalid config")
	})

	it("ignores a file that is not TOML", async () => {
		const warn = vi.spyOn(console, "warn").mockImplementation(() => {})
		await writeFile(join(tempDir, ".monkeyloop.config.toml"), `runs = [`)

		const config = await loadConfig(tempDir)
		expect(config.runs).toBe(10_000)
		expect(String(warn.mock.calls[0]?.[0])).toContain("Failed to parse")
	})
})

describe("resolveCampaignConfig", () => {
	const saved = process.env.MONKEYLOOP_OUT_DIR

	beforeEach(() => {
		delete process.env.MONKEYLOOP_OUT_DIR
	})

	afterEach(() => {
		if (saved === undefined) delete process.env.MONKEYLOOP_OUT_DIR
		else process.env.MONKEYLOOP_OUT_DIR = saved
	})

	it("fills in a timestamped output directory and converts delays", async () => {
		const config = await loadConfig(join(tmpdir(), "monkeyloop-missing"))
		const campaign = resolveCampaignConfig(
			{ ...config, logcat_filter: "ActivityManager:I *:S", report_command: "report-tool --html" },
			{},
			"/work",
			new Date(2024, 0, 2, 3, 4, 5),
		)

		expect(campaign.outputDir).toBe(join("/work", "monkey-20240102-030405"))
		expect(campaign.timings).toEqual({ bootPollMs: 2000, settleMs: 30_000, chargePollMs: 60_000 })
		expect(campaign.logcatFilter).toEqual(["ActivityManager:I", "*:S"])
		expect(campaign.reportCommand).toEqual(["report-tool", "--html"])
	})

	it("uses the environment output directory when set", async () => {
		process.env.MONKEYLOOP_OUT_DIR = "/data/campaign"
		const config = await loadConfig(join(tmpdir(), "monkeyloop-missing"))
		expect(resolveCampaignConfig(config, {}, "/work").outputDir).toBe("/data/campaign")
	})

	it("prefers command-line overrides", async () => {
		const config = await loadConfig(join(tmpdir(), "monkeyloop-missing"))
		const campaign = resolveCampaignConfig(config, {
			output: "/out",
			runs: 2,
			events: 50,
			packages: ["com.example.app"],
			filter: "crash",
			matchDescription: "Force close",
			threshold: 40,
		})

		expect(campaign).toMatchObject({
			outputDir: "/out",
			runs: 2,
			events: 50,
			packages: ["com.example.app"],
			filter: "crash",
			matchDescription: "Force close",
			batteryThreshold: 40,
		})
	})

	it("keeps the configured packages when none are given", async () => {
		const config = await loadConfig(join(tmpdir(), "monkeyloop-missing"))
		expect(resolveCampaignConfig(config, { packages: [] }).packages).toEqual(DEFAULT_PACKAGES)
	})
})
