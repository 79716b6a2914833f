import { beforeEach, describe, expect, it, vi } from "vitest"
import { renderReport } from "./report.ts"
import { runCmd } from "./system.ts"

vi.mock("./system.ts", () => ({ runCmd: vi.fn(async () => "") }))

const artifacts = {
	monkey: "/out/3-monkey.txt",
	logcat: "/out/3-logcat.txt",
	bugreport: "/out/3-bugreport.txt",
	report: "/out/3.html",
}

describe("renderReport", () => {
	beforeEach(() => {
		vi.mocked(runCmd).mockClear()
	})

	it("passes the run artifacts to the report tool in order", async () => {
		await renderReport(["report-tool", "--html"], artifacts)
		expect(runCmd).toHaveBeenCalledWith([
			"report-tool", "--html",
			"/out/3-monkey.txt", "/out/3-logcat.txt", "/out/3-bugreport.txt", "/out/3.html",
		])
	})

	it("fails without a command", async () => {
		await expect(renderReport([], artifacts)).rejects.toThrow("No report command configured")
		expect(runCmd).not.toHaveBeenCalled()
	})
})
