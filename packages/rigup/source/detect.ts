import path from "node:path"
import { isGitUrl, type Result } from "@rigup/core"
import { defaultSourceDir, expandHome, readConfiguredSourceDir } from "@/config/chezmoi"
import { runQuery } from "@/exec/runner"
import { listDir, safeStat } from "@/io/fs"
import { type DesiredSource, type ManagedSourceState, samePath } from "@/source/state"
import type { StepContext } from "@/types/context"
import type { IoError, ParseError } from "@/types/errors"

export const DOTFILES_ENGINE = "chezmoi"

/**
 * Where the engine's source currently lives and what kind it is.
 */
export async function detectSourceState(
	configPath: string,
	ctx: StepContext,
): Promise<Result<ManagedSourceState, IoError | ParseError>> {
	const configured = await readConfiguredSourceDir(configPath, ctx.env)
	if (!configured.ok) {
		return configured
	}

	const defaultPath = defaultSourceDir(ctx.env)
	const sourcePath = configured.value ?? defaultPath

	const stats = await safeStat(sourcePath)
	if (!stats.ok) {
		return stats
	}
	if (stats.value === null || !stats.value.isDirectory()) {
		return { ok: true, value: { kind: "unconfigured", path: sourcePath } }
	}

	const entries = await listDir(sourcePath)
	if (!entries.ok) {
		return entries
	}
	if (entries.value.length === 0) {
		return { ok: true, value: { kind: "unconfigured", path: sourcePath } }
	}

	const atDefault = samePath(sourcePath, defaultPath, ctx.env.platform === "win32")
	if (atDefault && entries.value.includes(".git")) {
		const origin = await readOrigin(sourcePath, ctx)
		if (origin) {
			return { ok: true, value: { kind: "remote", origin, path: sourcePath } }
		}
	}

	return {
		ok: true,
		value: {
			kind: "local",
			managedTargets: await hasManagedTargets(sourcePath, ctx),
			path: sourcePath,
		},
	}
}

/**
 * A git URL is a remote source; anything else is a local directory,
 * resolved against `cwd`.
 */
export function parseDesiredSource(value: string, cwd: string, ctx: StepContext): DesiredSource {
	const trimmed = value.trim()
	if (isGitUrl(trimmed)) {
		return { kind: "remote", origin: trimmed }
	}

	return { kind: "local", path: path.resolve(cwd, expandHome(trimmed, ctx.env)) }
}

async function readOrigin(sourcePath: string, ctx: StepContext): Promise<string | null> {
	const result = await runQuery(ctx, {
		args: ["-C", sourcePath, "remote", "get-url", "origin"],
		command: "git",
	})
	if (!result.ok || result.value.exitCode !== 0) {
		return null
	}

	const origin = result.value.stdout.trim()
	return origin.length > 0 ? origin : null
}

/**
 * When the engine cannot answer, assume the source manages files so that it
 * is not switched away silently.
 */
async function hasManagedTargets(sourcePath: string, ctx: StepContext): Promise<boolean> {
	const result = await runQuery(ctx, {
		args: ["managed", "--source", sourcePath],
		command: DOTFILES_ENGINE,
	})
	if (!result.ok || result.value.exitCode !== 0) {
		return true
	}

	return result.value.stdout.trim().length > 0
}
