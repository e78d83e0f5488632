import path from "node:path"
import type { Result } from "@rigup/core"
import { type CommandSpec, privileged, runMutation } from "@/exec/runner"
import { readTextFileIfExists, safeStat } from "@/io/fs"
import type { RepositorySource } from "@/manifest/types"
import { codenameSkipReason, renderSourceLine } from "@/repos/render"
import type { StepContext } from "@/types/context"
import type { EntityRef, MandatoryStepError } from "@/types/errors"

export interface RepositoryReport {
	/** True when any keyring or list file was written (or would be). */
	changed: boolean
	configured: string[]
	present: string[]
	skipped: string[]
}

interface RepositoryState {
	hasKeyring: boolean
	listContents: string | null
	hasLine: boolean
}

export async function ensureRepositories(
	repositories: readonly RepositorySource[],
	ctx: StepContext,
): Promise<Result<RepositoryReport, MandatoryStepError>> {
	const report: RepositoryReport = { changed: false, configured: [], present: [], skipped: [] }

	for (const repository of repositories) {
		const entity: EntityRef = { kind: "repository", name: repository.name }

		const skipReason = codenameSkipReason(repository, ctx.platform)
		if (skipReason) {
			ctx.report({ entity, kind: "warning", message: skipReason })
			report.skipped.push(repository.name)
			continue
		}

		const rendered = renderSourceLine(repository, ctx.platform)
		if (!rendered.ok) {
			return rendered
		}

		const state = await inspectRepository(repository, rendered.value)
		if (state.hasKeyring && state.hasLine) {
			ctx.report({
				entity,
				kind: "present",
				message: `repository ${repository.name} already configured`,
			})
			report.present.push(repository.name)
			continue
		}

		if (!state.hasKeyring) {
			const installed = await installKeyring(repository, entity, ctx)
			if (!installed.ok) {
				return installed
			}
		}

		if (!state.hasLine) {
			const appended = await appendSourceLine(repository, entity, rendered.value, state, ctx)
			if (!appended.ok) {
				return appended
			}
		}

		if (!ctx.dryRun) {
			ctx.report({ entity, kind: "changed", message: `configured repository ${repository.name}` })
		}
		report.changed = true
		report.configured.push(repository.name)
	}

	return { ok: true, value: report }
}

/**
 * A read error on either file counts as "not configured yet".
 */
async function inspectRepository(
	repository: RepositorySource,
	line: string,
): Promise<RepositoryState> {
	const keyring = await safeStat(repository.keyringPath)
	const hasKeyring = keyring.ok && keyring.value !== null && keyring.value.isFile()

	const list = await readTextFileIfExists(repository.listPath)
	const listContents = list.ok ? list.value : null
	return { hasKeyring, hasLine: containsLine(listContents, line), listContents }
}

export function containsLine(contents: string | null, line: string): boolean {
	if (contents === null) {
		return false
	}

	return contents.split("\n").some((existing) => existing.replace(/\r$/, "") === line)
}

async function installKeyring(
	repository: RepositorySource,
	entity: EntityRef,
	ctx: StepContext,
): Promise<Result<void, MandatoryStepError>> {
	const keyringDir = path.posix.dirname(repository.keyringPath)
	const mkdir = await runStep(ctx, entity, {
		args: ["-m", "0755", "-d", keyringDir],
		command: "install",
	})
	if (!mkdir.ok) {
		return mkdir
	}

	let key: Uint8Array = new Uint8Array()
	if (ctx.dryRun) {
		ctx.report({ entity, kind: "planned", message: `fetch signing key ${repository.keyUrl}` })
	} else {
		const fetched = await ctx.fetchKey(repository)
		if (!fetched.ok) {
			return fetched
		}
		key = fetched.value
	}

	const dearmor = await runStep(ctx, entity, {
		args: ["--dearmor", "--yes", "-o", repository.keyringPath],
		command: "gpg",
		input: key,
	})
	if (!dearmor.ok) {
		return dearmor
	}

	return runStep(ctx, entity, { args: ["a+r", repository.keyringPath], command: "chmod" })
}

async function appendSourceLine(
	repository: RepositorySource,
	entity: EntityRef,
	line: string,
	state: RepositoryState,
	ctx: StepContext,
): Promise<Result<void, MandatoryStepError>> {
	if (state.listContents === null) {
		const mkdir = await runStep(ctx, entity, {
			args: ["-m", "0755", "-d", path.posix.dirname(repository.listPath)],
			command: "install",
		})
		if (!mkdir.ok) {
			return mkdir
		}
	}

	const needsNewline =
		state.listContents !== null &&
		state.listContents.length > 0 &&
		!state.listContents.endsWith("\n")

	return runStep(ctx, entity, {
		args: ["-a", repository.listPath],
		command: "tee",
		input: `${needsNewline ? "\n" : ""}${line}\n`,
		stdio: "capture",
	})
}

async function runStep(
	ctx: StepContext,
	entity: EntityRef,
	spec: CommandSpec,
): Promise<Result<void, MandatoryStepError>> {
	const result = await runMutation(ctx, entity, privileged(ctx, spec))
	if (!result.ok) {
		return {
			error: {
				cause: result.error,
				entity,
				message: `Failed to configure repository ${entity.name}: ${result.error.message}`,
				type: "mandatory_step",
			},
			ok: false,
		}
	}

	if (result.value.exitCode !== 0) {
		const detail = result.value.stderr.trim()
		return {
			error: {
				entity,
				exitCode: result.value.exitCode,
				message: `Failed to configure repository ${entity.name}: '${spec.command}' exited with ${result.value.exitCode}${detail ? `: ${detail}` : ""}`,
				type: "mandatory_step",
			},
			ok: false,
		}
	}

	return { ok: true, value: undefined }
}
