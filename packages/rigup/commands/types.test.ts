import { consola } from "consola"
import { afterEach, describe, expect, it, vi } from "vitest"
import { CommandResult, formatErrorChain, printOutcome } from "@/commands/types"
import { parseManifest } from "@/manifest/parse"
import type { MandatoryStepError } from "@/types/errors"

describe("formatErrorChain", () => {
	it("prints details and the cause chain", () => {
		const error: MandatoryStepError = {
			cause: { command: "apt-get", message: "Unable to start apt-get: ENOENT", type: "spawn" },
			entity: { kind: "package", name: "curl" },
			exitCode: 100,
			message: "Failed to install curl (exit code 100).",
			type: "mandatory_step",
		}

		expect(formatErrorChain(error)).toBe(
			[
				"[mandatory_step] Failed to install curl (exit code 100). (package=curl, exitCode=100)",
				"Caused by:",
				"  [spawn] Unable to start apt-get: ENOENT (command=apt-get)",
			].join("\n"),
		)
	})

	it("lists schema issues with manifest paths", () => {
		const result = parseManifest('{"packageManager":"brew"}', "/m.json")

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(formatErrorChain(result.error).split("\n")).toEqual([
				"[load] Invalid manifest /m.json: packageManager must be one of apt, scoop, winget. (key=packageManager, path=/m.json, source=zod)",
				"  Zod issues:",
				"  - packageManager: must be one of apt, scoop, winget.",
			])
		}
	})
})

describe("printOutcome", () => {
	afterEach(() => {
		vi.restoreAllMocks()
		process.exitCode = undefined
	})

	it("reports success without touching the exit code", () => {
		const success = vi.spyOn(consola, "success").mockImplementation(() => undefined)

		printOutcome(CommandResult.completed(undefined))

		expect(success).toHaveBeenCalledWith("Done.")
		expect(process.exitCode).toBeUndefined()
	})

	it("names the failed phase and sets a non-zero exit code", () => {
		const error = vi.spyOn(consola, "error").mockImplementation(() => undefined)

		printOutcome(
			CommandResult.failed(
				{ message: "Manifest not found: /m.json", path: "/m.json", source: "manual", type: "load" },
				"manifest",
			),
		)

		expect(error.mock.calls).toEqual([
			["Failed during manifest."],
			["[load] Manifest not found: /m.json (path=/m.json, source=manual)"],
		])
		expect(process.exitCode).toBe(1)
	})
})
