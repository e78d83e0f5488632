import { join } from "node:path"
import { describe, expect, it } from "vitest"
import { ensureDefaultShell } from "@/shell/default-shell"
import { createFakeMachine, stepContext, withTempDir, wslPlatform } from "@/tests/helpers"

describe("ensureDefaultShell", () => {
	it("changes the login shell to zsh", async () => {
		await withTempDir(async (root) => {
			const machine = await createFakeMachine(root)
			await machine.provide("zsh", "chsh")
			const zsh = join(machine.binDir, "zsh")
			const { ctx, reports } = stepContext(machine)

			expect(await ensureDefaultShell(ctx)).toBe("changed")
			expect(machine.mutations()).toEqual([`chsh -s ${zsh} dev`])
			expect(machine.loginShell).toBe(zsh)
			expect(reports.messages("changed")).toEqual([
				`default shell set to ${zsh}; it takes effect at next login`,
			])
		})
	})

	it("reads the user database so a second run changes nothing", async () => {
		await withTempDir(async (root) => {
			const machine = await createFakeMachine(root)
			await machine.provide("zsh", "chsh")
			await ensureDefaultShell(stepContext(machine).ctx)
			const { ctx } = stepContext(machine, { env: machine.env({ SHELL: "/bin/bash" }) })

			expect(await ensureDefaultShell(ctx)).toBe("present")
			expect(machine.callsOf("chsh")).toHaveLength(1)
		})
	})

	it("accepts a zsh at another path", async () => {
		await withTempDir(async (root) => {
			const machine = await createFakeMachine(root)
			await machine.provide("zsh", "chsh")
			machine.loginShell = "/usr/bin/zsh"
			const { ctx, reports } = stepContext(machine)

			expect(await ensureDefaultShell(ctx)).toBe("present")
			expect(reports.messages("present")).toEqual(["default shell is already /usr/bin/zsh"])
		})
	})

	it("warns without zsh", async () => {
		await withTempDir(async (root) => {
			const machine = await createFakeMachine(root)
			const { ctx, reports } = stepContext(machine)

			expect(await ensureDefaultShell(ctx)).toBe("skipped")
			expect(reports.messages("warning")).toEqual([
				"zsh is not installed; leaving the default shell unchanged.",
			])
		})
	})

	it("warns without chsh", async () => {
		await withTempDir(async (root) => {
			const machine = await createFakeMachine(root)
			await machine.provide("zsh")
			const { ctx, reports } = stepContext(machine)

			expect(await ensureDefaultShell(ctx)).toBe("skipped")
			expect(reports.messages("warning")).toEqual([
				`chsh is not available; set the default shell to ${join(machine.binDir, "zsh")} manually.`,
			])
		})
	})

	it("leaves Windows alone", async () => {
		await withTempDir(async (root) => {
			const machine = await createFakeMachine(root)
			await machine.provide("zsh", "chsh")
			const { ctx } = stepContext(machine, { platform: wslPlatform({ os: "windows" }) })

			expect(await ensureDefaultShell(ctx)).toBe("skipped")
			expect(machine.calls).toEqual([])
		})
	})
})
