import path from "node:path"
import { coerceAbsolutePathDirect, type Result } from "@rigup/core"
import { parse } from "smol-toml"
import {
	type ConfigDocument,
	type EditResult,
	parseConfigDocument,
	serializeConfigDocument,
} from "@/config/document"
import {
	copyPath,
	ensureDir,
	movePath,
	readTextFileIfExists,
	safeStat,
	writeTextFile,
} from "@/io/fs"
import type { RunContext } from "@/types/context"
import type { IoError, ParseError } from "@/types/errors"

export type PersistContext = Pick<RunContext, "dryRun" | "now" | "report">

export type ConfigEdit = (doc: ConfigDocument) => EditResult

export interface PersistOutcome {
	changed: boolean
	/** Where the previous contents were copied, when a file existed. */
	backupPath: string | null
}

export type PersistResult = Result<PersistOutcome, IoError | ParseError>

/**
 * Local time as YYYYMMDD-HHmmss.
 */
export function formatTimestamp(date: Date): string {
	const pad = (value: number) => String(value).padStart(2, "0")
	return (
		`${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
		`-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
	)
}

/**
 * `<path>.<timestamp>.bak`, with a numeric suffix when a backup from the same
 * second already exists.
 */
export async function backupPathFor(targetPath: string, now: Date): Promise<string> {
	const base = `${targetPath}.${formatTimestamp(now)}`
	let candidate = `${base}.bak`
	for (let attempt = 1; ; attempt += 1) {
		const stats = await safeStat(candidate)
		if (stats.ok && stats.value === null) {
			return candidate
		}
		candidate = `${base}-${attempt}.bak`
	}
}

/**
 * Write `after` over `targetPath` only when it differs from `before`. The
 * previous file is copied aside first and the new one lands via rename.
 */
export async function persistWithBackup(
	targetPath: string,
	before: string | null,
	after: string,
	ctx: PersistContext,
): Promise<PersistResult> {
	if (before !== null && before === after) {
		return { ok: true, value: { backupPath: null, changed: false } }
	}

	try {
		parse(after)
	} catch (error) {
		return {
			error: {
				message: `Refusing to write ${targetPath}: the result is not valid TOML.`,
				path: coerceAbsolutePathDirect(path.resolve(targetPath)) ?? undefined,
				rawError: error instanceof Error ? error : undefined,
				source: "toml",
				type: "parse",
			},
			ok: false,
		}
	}

	const entity = { kind: "config" as const, name: targetPath }
	const backupPath = before === null ? null : await backupPathFor(targetPath, ctx.now())

	if (ctx.dryRun) {
		if (backupPath) {
			ctx.report({ entity, kind: "planned", message: `back up ${targetPath} to ${backupPath}` })
		}
		ctx.report({ entity, kind: "planned", message: `write ${targetPath}` })
		return { ok: true, value: { backupPath, changed: true } }
	}

	const dir = await ensureDir(path.dirname(targetPath))
	if (!dir.ok) {
		return dir
	}

	if (backupPath) {
		const copied = await copyPath(targetPath, backupPath)
		if (!copied.ok) {
			return copied
		}
	}

	const tempPath = `${targetPath}.${process.pid}.tmp`
	const written = await writeTextFile(tempPath, after)
	if (!written.ok) {
		return written
	}

	const moved = await movePath(tempPath, targetPath)
	if (!moved.ok) {
		return moved
	}

	ctx.report({
		entity,
		kind: "changed",
		message: backupPath ? `updated ${targetPath} (backup ${backupPath})` : `created ${targetPath}`,
	})
	return { ok: true, value: { backupPath, changed: true } }
}

/**
 * Load, apply edits in order, and persist. A missing file starts empty.
 */
export async function patchConfigFile(
	targetPath: string,
	edits: readonly ConfigEdit[],
	ctx: PersistContext,
): Promise<PersistResult> {
	const existing = await readTextFileIfExists(targetPath)
	if (!existing.ok) {
		return existing
	}

	const before = existing.value
	let doc = parseConfigDocument(before ?? "")
	for (const edit of edits) {
		doc = edit(doc).doc
	}

	const after = serializeConfigDocument(doc)
	if (before === null && after.length === 0) {
		return { ok: true, value: { backupPath: null, changed: false } }
	}

	const result = await persistWithBackup(targetPath, before, after, ctx)
	if (result.ok && !result.value.changed) {
		ctx.report({
			entity: { kind: "config", name: targetPath },
			kind: "present",
			message: `${targetPath} is up to date`,
		})
	}
	return result
}
