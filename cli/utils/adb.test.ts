import { describe, expect, it } from "vitest"
import { PassThrough } from "node:stream"
import { AdbSession, createAdbTransport, ExecError, type AdbTransport } from "./adb.ts"
import { FakeAdb } from "../tests/fake_adb.ts"

describe("ExecError", () => {
	it("keeps the command, exit code and stderr", () => {
		const error = new ExecError(["shell", "monkey"], 252, "  ** Monkey aborted due to error.\n")
		expect(error.name).toBe("ExecError")
		expect(error.exitCode).toBe(252)
		expect(error.command).toEqual(["shell", "monkey"])
		expect(error.message).toBe("adb command failed (exit 252): adb shell monkey\n** Monkey aborted due to error.")
	})
})

describe("AdbSession", () => {
	it("trims property values", async () => {
		const session = new AdbSession(new FakeAdb({ bootValues: ["1"] }))
		expect(await session.getProperty("sys.boot_completed")).toBe("1")
	})

	it("runs commands one at a time and keeps going after a failure", async () => {
		const started: string[] = []
		let active = 0
		let maxActive = 0
		const transport: AdbTransport = {
			exec: async (args) => {
				started.push(args.join(" "))
				active++
				maxActive = Math.max(maxActive, active)
				await new Promise((resolve) => setTimeout(resolve, 5))
				active--
				return { code: args[0] === "fail" ? 1 : 0, stdout: `${args.join(" ")}\n`, stderr: "" }
			},
			stream: () => {
				throw new Error("not used")
			},
		}
		const session = new AdbSession(transport)

		const results = await Promise.allSettled([
			session.execute(["first"]),
			session.execute(["fail"]),
			session.executeCapturing(["third"]),
		])

		expect(maxActive).toBe(1)
		expect(started).toEqual(["first", "fail", "third"])
		expect(results[0]).toEqual({ status: "fulfilled", value: undefined })
		expect(results[1]?.status).toBe("rejected")
		expect(results[2]).toEqual({ status: "fulfilled", value: "third\n" })
	})

	it("rejects a second claim until released", () => {
		const session = new AdbSession(new FakeAdb())
		const release = session.claim()
		expect(() => session.claim()).toThrow("already in use")
		release()
		release()
		expect(() => session.claim()).not.toThrow()
	})
})

describe("createAdbTransport", () => {
	// node stands in for the adb binary
	const transport = createAdbTransport({ adbPath: process.execPath })

	it("captures stdout and the exit code", async () => {
		const result = await transport.exec(["-e", "process.stdout.write('device'); process.exit(3)"])
		expect(result).toEqual({ code: 3, stdout: "device", stderr: "" })
	})

	it("writes both streams to the given output without ending it", async () => {
		const output = new PassThrough()
		let text = ""
		output.setEncoding("utf8").on("data", (chunk: string) => {
			text += chunk
		})

		const result = await transport.exec(["-e", "console.log('out'); console.error('err')"], output)
		await new Promise((resolve) => setImmediate(resolve))

		expect(result.code).toBe(0)
		expect(result.stdout).toBe("")
		expect(text).toContain("out\n")
		expect(text).toContain("err\n")
		expect(output.writableEnded).toBe(false)
	})

	it("kills a streaming process", async () => {
		const child = transport.stream(["-e", "setInterval(() => console.log('tick'), 10)"])
		child.output.resume()
		child.kill()
		expect(await child.exited).toBeNull()
		child.kill()
	})
})
