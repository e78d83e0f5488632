import { describe, expect, it } from "vitest"
import type { CommandRunner, CommandSpec } from "@/exec/runner"
import { createPackageIndex } from "@/install/index"
import { installMandatory, installOptional, prepareSources } from "@/install/packages"
import { aptAdapter } from "@/packagers/apt"
import { scoopAdapter } from "@/packagers/scoop"
import {
	createFakeMachine,
	packageRef,
	stepContext,
	withTempDir,
	wslPlatform,
} from "@/tests/helpers"

function aptDeps() {
	return { adapter: aptAdapter, index: createPackageIndex(aptAdapter) }
}

describe("installMandatory", () => {
	it("installs what is missing and refreshes the index once", async () => {
		await withTempDir(async (root) => {
			const machine = await createFakeMachine(root)
			machine.installedPackages.add("git")
			machine.offerPackage("curl", "curl")
			machine.offerPackage("jq", "jq")
			const deps = aptDeps()
			const { ctx, reports } = stepContext(machine)

			const result = await installMandatory(
				[packageRef("git"), packageRef("curl"), packageRef("jq")],
				deps,
				ctx,
			)

			expect(result).toEqual({
				ok: true,
				value: { failed: [], installed: ["curl", "jq"], present: ["git"] },
			})
			expect(machine.mutations()).toEqual([
				"apt-get update",
				"apt-get install -y curl",
				"apt-get install -y jq",
			])
			expect(deps.index.refreshCount).toBe(1)
			expect(reports.messages("present")).toEqual(["git already installed"])
			expect(reports.messages("changed")).toEqual(["installed curl", "installed jq"])
		})
	})

	it("skips the index refresh when everything is present", async () => {
		await withTempDir(async (root) => {
			const machine = await createFakeMachine(root)
			machine.installedPackages.add("git")
			const deps = aptDeps()

			const result = await installMandatory([packageRef("git")], deps, stepContext(machine).ctx)

			expect(result).toBeOk()
			expect(machine.mutations()).toEqual([])
			expect(deps.index.refreshCount).toBe(0)
		})
	})

	it("stops at the first package that fails", async () => {
		await withTempDir(async (root) => {
			const machine = await createFakeMachine(root)
			machine.offerPackage("curl", "curl")

			const result = await installMandatory(
				[packageRef("no-such-package"), packageRef("curl")],
				aptDeps(),
				stepContext(machine).ctx,
			)

			expect(result.ok).toBe(false)
			if (!result.ok) {
				expect(result.error.message).toBe("Failed to install no-such-package (exit code 100).")
				expect(result.error.entity).toEqual({ kind: "package", name: "no-such-package" })
			}
			expect(machine.callsOf("apt-get")).toEqual([
				"apt-get update",
				"apt-get install -y no-such-package",
			])
		})
	})

	it("uses sudo when not root and not when root", async () => {
		await withTempDir(async (root) => {
			const machine = await createFakeMachine(root)
			machine.offerPackage("curl", "curl")
			const { ctx } = stepContext(machine, { platform: wslPlatform({ isRoot: true }) })

			await installMandatory([packageRef("curl")], aptDeps(), ctx)

			expect(machine.calls.filter((call) => call.command === "sudo")).toEqual([])
		})
	})

	it("only plans the refresh and installs in dry-run", async () => {
		await withTempDir(async (root) => {
			const machine = await createFakeMachine(root)
			machine.offerPackage("curl", "curl")
			const { ctx, reports } = stepContext(machine, { dryRun: true })

			const result = await installMandatory([packageRef("curl")], aptDeps(), ctx)

			expect(result).toEqual({
				ok: true,
				value: { failed: [], installed: ["curl"], present: [] },
			})
			expect(reports.messages("planned")).toEqual([
				"sudo apt-get update",
				"sudo apt-get install -y curl",
			])
			expect(machine.mutations()).toEqual([])
			expect(machine.installedPackages.has("curl")).toBe(false)
		})
	})
})

describe("installOptional", () => {
	it("reports a failure and carries on with the rest", async () => {
		await withTempDir(async (root) => {
			const machine = await createFakeMachine(root)
			machine.offerPackage("bat", "bat")
			const { ctx, reports } = stepContext(machine)

			const report = await installOptional(
				[packageRef("no-such-package"), packageRef("bat")],
				aptDeps(),
				ctx,
			)

			expect(report).toEqual({ failed: ["no-such-package"], installed: ["bat"], present: [] })
			expect(reports.messages("optional_failure")).toEqual([
				"optional package no-such-package is unavailable: Failed to install no-such-package (exit code 100).",
			])
			expect(machine.installedPackages.has("bat")).toBe(true)
		})
	})
})

describe("prepareSources", () => {
	function scriptedRunner(bucketList: string): CommandRunner & { scripts: string[] } {
		const scripts: string[] = []
		return {
			run: async (spec: CommandSpec) => {
				scripts.push(spec.args.at(-1) ?? "")
				const stdout = spec.args.includes("(scoop bucket list).Name") ? bucketList : ""
				return { ok: true, value: { exitCode: 0, stderr: "", stdout } }
			},
			scripts,
		}
	}

	it("adds missing buckets and invalidates the index", async () => {
		await withTempDir(async (root) => {
			const machine = await createFakeMachine(root)
			const runner = scriptedRunner("main\r\nExtras\r\n")
			const base = stepContext(machine, { platform: wslPlatform({ os: "windows" }) })
			const ctx = { ...base.ctx, runner }
			const deps = { adapter: scoopAdapter, index: createPackageIndex(scoopAdapter) }

			await deps.index.ensureFresh(ctx)
			const result = await prepareSources(
				[packageRef("extras/vscode"), packageRef("versions/python312"), packageRef("git")],
				deps,
				ctx,
			)
			await deps.index.ensureFresh(ctx)

			expect(result).toEqual({ ok: true, value: ["versions"] })
			expect(runner.scripts).toEqual([
				"scoop 'update'",
				"(scoop bucket list).Name",
				"scoop 'bucket' 'add' 'versions'",
				"scoop 'update'",
			])
			expect(deps.index.refreshCount).toBe(2)
			expect(base.reports.messages("present")).toEqual(["source extras already added"])
			expect(base.reports.messages("changed")).toEqual(["added source versions"])
		})
	})

	it("does nothing for an adapter without sources", async () => {
		await withTempDir(async (root) => {
			const machine = await createFakeMachine(root)

			const result = await prepareSources(
				[packageRef("backports/curl")],
				aptDeps(),
				stepContext(machine).ctx,
			)

			expect(result).toEqual({ ok: true, value: [] })
			expect(machine.calls).toEqual([])
		})
	})
})
