import os from "node:os"
import path from "node:path"
import { safeStat } from "@/io/fs"

/**
 * The process's view of PATH and the variables handed to child processes.
 * Values are never mutated: a refresh produces a new environment.
 */
export interface ProcessEnvironment {
	readonly platform: NodeJS.Platform
	readonly home: string
	readonly pathEntries: readonly string[]
	readonly vars: Readonly<Record<string, string>>
}

export interface EnvironmentRefresh {
	env: ProcessEnvironment
	added: string[]
}

export function captureEnvironment(
	source: NodeJS.ProcessEnv = process.env,
	platform: NodeJS.Platform = process.platform,
	home: string = os.homedir(),
): ProcessEnvironment {
	const vars: Record<string, string> = {}
	for (const [key, value] of Object.entries(source)) {
		if (value !== undefined) {
			vars[key] = value
		}
	}

	const pathValue = vars[pathKey(vars, platform)] ?? ""
	const pathEntries = pathValue
		.split(pathDelimiter(platform))
		.filter((entry) => entry.length > 0)

	return { home, pathEntries, platform, vars }
}

export function withPathEntries(
	env: ProcessEnvironment,
	pathEntries: readonly string[],
): ProcessEnvironment {
	return { ...env, pathEntries: [...pathEntries] }
}

/**
 * Variables for a child process, with PATH rebuilt from pathEntries.
 */
export function toSpawnEnv(env: ProcessEnvironment): Record<string, string> {
	return {
		...env.vars,
		[pathKey(env.vars, env.platform)]: env.pathEntries.join(pathDelimiter(env.platform)),
	}
}

export function hasPathEntry(env: ProcessEnvironment, entry: string): boolean {
	const normalize = (value: string) => {
		const trimmed = value.replace(/[\\/]+$/, "")
		return env.platform === "win32" ? trimmed.toLowerCase() : trimmed
	}
	const target = normalize(entry)
	return env.pathEntries.some((existing) => normalize(existing) === target)
}

export function joinForPlatform(env: ProcessEnvironment, ...segments: string[]): string {
	return env.platform === "win32" ? path.win32.join(...segments) : path.posix.join(...segments)
}

/**
 * Directories installers commonly write binaries into that a running process
 * has not seen yet.
 */
export function candidatePathEntries(env: ProcessEnvironment): string[] {
	if (env.platform === "win32") {
		const candidates = [
			joinForPlatform(env, env.home, "scoop", "shims"),
			joinForPlatform(env, env.home, ".cargo", "bin"),
		]
		const localAppData = env.vars.LOCALAPPDATA
		if (localAppData) {
			candidates.push(joinForPlatform(env, localAppData, "mise", "shims"))
		}
		return candidates
	}

	return [
		joinForPlatform(env, env.home, ".local", "bin"),
		joinForPlatform(env, env.home, ".cargo", "bin"),
		joinForPlatform(env, env.home, ".npm-global", "bin"),
		joinForPlatform(env, env.home, ".local", "share", "mise", "shims"),
	]
}

/**
 * Prepend every existing candidate directory that is not on PATH yet.
 */
export async function refreshEnvironment(env: ProcessEnvironment): Promise<EnvironmentRefresh> {
	const added: string[] = []
	for (const candidate of candidatePathEntries(env)) {
		if (hasPathEntry(env, candidate) || added.includes(candidate)) {
			continue
		}

		const stats = await safeStat(candidate)
		if (stats.ok && stats.value?.isDirectory()) {
			added.push(candidate)
		}
	}

	if (added.length === 0) {
		return { added, env }
	}

	return { added, env: withPathEntries(env, [...added, ...env.pathEntries]) }
}

function pathKey(vars: Readonly<Record<string, string>>, platform: NodeJS.Platform): string {
	if (platform !== "win32") {
		return "PATH"
	}

	return Object.keys(vars).find((key) => key.toUpperCase() === "PATH") ?? "Path"
}

function pathDelimiter(platform: NodeJS.Platform): string {
	return platform === "win32" ? ";" : ":"
}
