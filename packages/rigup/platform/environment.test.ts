import { mkdir } from "node:fs/promises"
import { join } from "node:path"
import { describe, expect, it } from "vitest"
import {
	captureEnvironment,
	hasPathEntry,
	refreshEnvironment,
	toSpawnEnv,
} from "@/platform/environment"
import { withTempDir } from "@/tests/helpers"

describe("captureEnvironment", () => {
	it("splits PATH and drops empty entries", () => {
		const env = captureEnvironment({ PATH: "/a::/b:" }, "linux", "/home/dev")

		expect(env.pathEntries).toEqual(["/a", "/b"])
	})

	it("keeps the Windows spelling of the PATH variable", () => {
		const env = captureEnvironment({ Path: "C:\\a;C:\\b" }, "win32", "C:\\Users\\dev")

		expect(env.pathEntries).toEqual(["C:\\a", "C:\\b"])
		expect(toSpawnEnv(env)).toEqual({ Path: "C:\\a;C:\\b" })
	})
})

describe("hasPathEntry", () => {
	it("ignores trailing separators", () => {
		const env = captureEnvironment({ PATH: "/opt/tools/" }, "linux", "/home/dev")

		expect(hasPathEntry(env, "/opt/tools")).toBe(true)
	})

	it("compares case-insensitively on Windows only", () => {
		const windows = captureEnvironment({ PATH: "C:\\Tools" }, "win32", "C:\\Users\\dev")
		const linux = captureEnvironment({ PATH: "/Tools" }, "linux", "/home/dev")

		expect(hasPathEntry(windows, "c:\\tools")).toBe(true)
		expect(hasPathEntry(linux, "/tools")).toBe(false)
	})
})

describe("refreshEnvironment", () => {
	it("prepends existing candidate directories in candidate order", async () => {
		await withTempDir(async (home) => {
			const localBin = join(home, ".local", "bin")
			const shims = join(home, ".local", "share", "mise", "shims")
			await mkdir(shims, { recursive: true })
			await mkdir(localBin, { recursive: true })
			const env = captureEnvironment({ PATH: "/usr/bin" }, "linux", home)

			const refreshed = await refreshEnvironment(env)

			expect(refreshed.added).toEqual([localBin, shims])
			expect(refreshed.env.pathEntries).toEqual([localBin, shims, "/usr/bin"])
			expect(env.pathEntries).toEqual(["/usr/bin"])
		})
	})

	it("returns the same environment when nothing is new", async () => {
		await withTempDir(async (home) => {
			const localBin = join(home, ".local", "bin")
			await mkdir(localBin, { recursive: true })
			const env = captureEnvironment({ PATH: `${localBin}:/usr/bin` }, "linux", home)

			const refreshed = await refreshEnvironment(env)

			expect(refreshed.added).toEqual([])
			expect(refreshed.env).toBe(env)
		})
	})
})
