import type { BaseError } from "@rigup/core"
import { consola } from "consola"
import type { ZodError } from "zod"
import { formatIssuePath } from "@/manifest/parse"
import type { ProvisionError } from "@/provision/types"
import type { RigupError } from "@/types/errors"

// CommandResult models user-facing flow outcomes; engine operations keep { ok, value } results.
export type CommandResult<T = void> =
	| { status: "completed"; value: T }
	| { status: "failed"; error: RigupError; phase?: ProvisionError["phase"] }

export const CommandResult = {
	completed: <T>(value: T): CommandResult<T> => ({ status: "completed", value }),
	failed: (error: RigupError, phase?: ProvisionError["phase"]): CommandResult<never> => ({
		error,
		phase,
		status: "failed",
	}),
} as const

export function printOutcome(result: CommandResult<unknown>, verbose = false): void {
	switch (result.status) {
		case "completed":
			consola.success("Done.")
			break
		case "failed":
			if (result.phase) {
				consola.error(`Failed during ${result.phase}.`)
			}
			consola.error(formatErrorChain(result.error))
			if (verbose) {
				printRawErrors(result.error)
			}
			process.exitCode = 1
			break
	}
}

export function formatErrorChain(error: BaseError): string {
	return formatErrorChainLines(error, 0).join("\n")
}

function formatErrorChainLines(error: BaseError, indent: number): string[] {
	const prefix = " ".repeat(indent)
	const detailParts = buildDetailParts(error)
	const details = detailParts.length ? ` (${detailParts.join(", ")})` : ""
	const lines = [`${prefix}[${error.type}] ${error.message}${details}`]

	const zodError = "zodError" in error ? error.zodError : undefined
	if (isZodError(zodError)) {
		lines.push(`${prefix}  Zod issues:`)
		for (const issue of zodError.issues) {
			lines.push(`${prefix}  - ${formatIssuePath(issue.path)}: ${issue.message}`)
		}
	}

	if (error.cause) {
		lines.push(`${prefix}Caused by:`)
		lines.push(...formatErrorChainLines(error.cause, indent + 2))
	}

	return lines
}

function isZodError(value: unknown): value is ZodError {
	return (
		typeof value === "object" &&
		value !== null &&
		"issues" in value &&
		Array.isArray((value as { issues?: unknown }).issues)
	)
}

function printRawErrors(error: BaseError): void {
	if (error.rawError) {
		console.error(error.rawError)
	}
	if (error.cause) {
		printRawErrors(error.cause)
	}
}

function buildDetailParts(error: BaseError): string[] {
	const details: string[] = []
	if ("key" in error && typeof error.key === "string") {
		details.push(`key=${error.key}`)
	}
	if ("path" in error && typeof error.path === "string") {
		details.push(`path=${error.path}`)
	}
	if ("source" in error && typeof error.source === "string") {
		details.push(`source=${error.source}`)
	}
	if ("operation" in error && typeof error.operation === "string") {
		details.push(`operation=${error.operation}`)
	}
	if ("target" in error && typeof error.target === "string") {
		details.push(`target=${error.target}`)
	}
	if ("command" in error && typeof error.command === "string") {
		details.push(`command=${error.command}`)
	}
	if ("entity" in error && typeof error.entity === "object" && error.entity) {
		const entity = error.entity as { kind?: string; name?: string }
		if (entity.kind && entity.name) {
			details.push(`${entity.kind}=${entity.name}`)
		}
	}
	if ("exitCode" in error && typeof error.exitCode === "number") {
		details.push(`exitCode=${error.exitCode}`)
	}
	return details
}
