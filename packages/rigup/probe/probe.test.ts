import { writeFile } from "node:fs/promises"
import { join } from "node:path"
import { describe, expect, it } from "vitest"
import { aptAdapter } from "@/packagers/apt"
import {
	isPackageInstalled,
	isRuntimeInstalled,
	resolveCommandPath,
	resolveRuntimeCommand,
	runtimeWhich,
} from "@/probe/probe"
import {
	createFakeMachine,
	packageRef,
	runtimeSpec,
	stepContext,
	withTempDir,
} from "@/tests/helpers"

describe("resolveCommandPath", () => {
	it("finds an executable on PATH", async () => {
		await withTempDir(async (root) => {
			const machine = await createFakeMachine(root)
			await machine.provide("git")

			expect(await resolveCommandPath("git", machine.env())).toBe(join(machine.binDir, "git"))
			expect(await resolveCommandPath("zsh", machine.env())).toBeNull()
		})
	})

	it("skips files without the execute bit", async () => {
		await withTempDir(async (root) => {
			const machine = await createFakeMachine(root)
			await writeFile(join(machine.binDir, "notes"), "plain\n")

			expect(await resolveCommandPath("notes", machine.env())).toBeNull()
		})
	})

	it("checks names with a separator as paths", async () => {
		await withTempDir(async (root) => {
			const machine = await createFakeMachine(root)
			await machine.provide("zsh")
			const target = join(machine.binDir, "zsh")

			expect(await resolveCommandPath(target, machine.env({ PATH: "" }))).toBe(target)
		})
	})
})

describe("resolveRuntimeCommand", () => {
	it("maps runtimes to the command that proves them", () => {
		expect(resolveRuntimeCommand(runtimeSpec("rust@stable"))).toBe("rustc")
		expect(resolveRuntimeCommand(runtimeSpec("Node@lts"))).toBe("node")
	})

	it("uses the runtime's own name when it collides with an object member", () => {
		expect(resolveRuntimeCommand(runtimeSpec("constructor@1"))).toBe("constructor")
		expect(resolveRuntimeCommand(runtimeSpec("toString"))).toBe("tostring")
	})
})

describe("isPackageInstalled", () => {
	it("reads the package database rather than PATH", async () => {
		await withTempDir(async (root) => {
			const machine = await createFakeMachine(root)
			machine.installedPackages.add("git")
			const { ctx } = stepContext(machine)

			expect(await isPackageInstalled(packageRef("git"), aptAdapter, ctx)).toBe(true)
			expect(await isPackageInstalled(packageRef("ripgrep"), aptAdapter, ctx)).toBe(false)
			expect(machine.callsOf("dpkg-query")).toEqual([
				'dpkg-query -W "-f=${Status}" git',
				'dpkg-query -W "-f=${Status}" ripgrep',
			])
		})
	})
})

describe("isRuntimeInstalled", () => {
	it("is false when the runtime manager is not on PATH", async () => {
		await withTempDir(async (root) => {
			const machine = await createFakeMachine(root)
			machine.installedRuntimes.add("node@lts")
			const { ctx } = stepContext(machine)

			expect(await isRuntimeInstalled(runtimeSpec("node@lts"), ctx)).toBe(false)
			expect(machine.calls).toEqual([])
		})
	})

	it("asks the runtime manager where the runtime lives", async () => {
		await withTempDir(async (root) => {
			const machine = await createFakeMachine(root)
			await machine.provide("mise")
			machine.installedRuntimes.add("node@lts")
			const { ctx } = stepContext(machine)

			expect(await isRuntimeInstalled(runtimeSpec("node@lts"), ctx)).toBe(true)
			expect(machine.callsOf("mise")).toEqual(["mise where node@lts"])
		})
	})
})

describe("runtimeWhich", () => {
	it("returns null when the runtime manager cannot resolve the command", async () => {
		await withTempDir(async (root) => {
			const machine = await createFakeMachine(root)
			const { ctx } = stepContext(machine)

			expect(await runtimeWhich("node", ctx)).toBeNull()
		})
	})
})
