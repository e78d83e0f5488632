import { constants } from "node:fs"
import {
	access,
	copyFile,
	mkdir,
	readdir,
	readFile,
	rename,
	stat,
	writeFile,
} from "node:fs/promises"
import path from "node:path"
import type { AbsolutePath } from "@rigup/core"
import type { IoResult } from "@/io/types"

// Re-export types for convenience
export type { IoError, IoResult } from "@/io/types"

type StatResult = IoResult<Awaited<ReturnType<typeof stat>> | null>

export async function safeStat(targetPath: string): Promise<StatResult> {
	try {
		const stats = await stat(targetPath)
		return { ok: true, value: stats }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}

		return ioFailure(`Unable to access ${targetPath}.`, targetPath, "stat", error)
	}
}

export async function ensureDir(targetPath: string): Promise<IoResult<void>> {
	const stats = await safeStat(targetPath)
	if (!stats.ok) {
		return stats
	}

	if (stats.value && !stats.value.isDirectory()) {
		return ioFailure(`Expected directory at ${targetPath}.`, targetPath, "mkdir")
	}

	if (!stats.value) {
		try {
			await mkdir(targetPath, { recursive: true })
		} catch (error) {
			return ioFailure(`Unable to create ${targetPath}.`, targetPath, "mkdir", error)
		}
	}

	return { ok: true, value: undefined }
}

/**
 * Read a UTF-8 file; a missing file yields null instead of an error.
 */
export async function readTextFileIfExists(
	targetPath: string,
): Promise<IoResult<string | null>> {
	try {
		const contents = await readFile(targetPath, "utf8")
		return { ok: true, value: contents }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}

		return ioFailure(`Unable to read ${targetPath}.`, targetPath, "readFile", error)
	}
}

export async function writeTextFile(
	targetPath: string,
	contents: string,
): Promise<IoResult<void>> {
	try {
		await writeFile(targetPath, contents, "utf8")
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(`Unable to write ${targetPath}.`, targetPath, "writeFile", error)
	}
}

export async function copyPath(source: string, destination: string): Promise<IoResult<void>> {
	try {
		await copyFile(source, destination)
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(`Unable to copy ${source} to ${destination}.`, source, "copyFile", error)
	}
}

export async function movePath(source: string, destination: string): Promise<IoResult<void>> {
	try {
		await rename(source, destination)
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(`Unable to move ${source} to ${destination}.`, source, "rename", error)
	}
}

export async function listDir(targetPath: string): Promise<IoResult<string[]>> {
	try {
		const entries = await readdir(targetPath)
		return { ok: true, value: entries }
	} catch (error) {
		return ioFailure(`Unable to list ${targetPath}.`, targetPath, "readdir", error)
	}
}

export async function isExecutableFile(targetPath: string): Promise<boolean> {
	try {
		const stats = await stat(targetPath)
		if (!stats.isFile()) {
			return false
		}
		if (process.platform === "win32") {
			return true
		}
		await access(targetPath, constants.X_OK)
		return true
	} catch {
		return false
	}
}

function ioFailure<T>(
	message: string,
	targetPath: string,
	operation: string,
	error?: unknown,
): IoResult<T> {
	return {
		error: {
			message,
			operation,
			path: toAbsolutePath(targetPath),
			rawError: error instanceof Error ? error : undefined,
			type: "io",
		},
		ok: false,
	}
}

function toAbsolutePath(value: string): AbsolutePath {
	const resolved = path.isAbsolute(value) ? path.normalize(value) : path.resolve(value)
	return resolved as AbsolutePath
}

function isNotFound(error: unknown): boolean {
	return (
		typeof error === "object" &&
		error !== null &&
		"code" in error &&
		(error as { code?: string }).code === "ENOENT"
	)
}
