import type { Result } from "@rigup/core"
import { parse, stringify } from "smol-toml"
import {
	type ConfigDocument,
	type EditResult,
	removeTopLevelKey,
	stripNestedKey,
	upsertSection,
	upsertTopLevelKey,
} from "@/config/document"
import type { ConfigEdit } from "@/config/persist"
import { readTextFileIfExists } from "@/io/fs"
import { joinForPlatform, type ProcessEnvironment } from "@/platform/environment"
import type { IoError, ParseError } from "@/types/errors"

export const SOURCE_DIR_KEY = "sourceDir"
export const TEMPLATE_OPTIONS_LINE = 'options = ["missingkey=error"]'

export interface Identity {
	name?: string
	email?: string
}

export function defaultConfigPath(env: ProcessEnvironment): string {
	return joinForPlatform(env, env.home, ".config", "chezmoi", "chezmoi.toml")
}

export function defaultSourceDir(env: ProcessEnvironment): string {
	return joinForPlatform(env, env.home, ".local", "share", "chezmoi")
}

/**
 * The top-level sourceDir from the config file, with a leading ~ expanded.
 * Null when the file or the key is absent.
 */
export async function readConfiguredSourceDir(
	configPath: string,
	env: ProcessEnvironment,
): Promise<Result<string | null, IoError | ParseError>> {
	const contents = await readTextFileIfExists(configPath)
	if (!contents.ok) {
		return contents
	}
	if (contents.value === null) {
		return { ok: true, value: null }
	}

	let table: Record<string, unknown>
	try {
		table = parse(contents.value)
	} catch (error) {
		return {
			error: {
				message: `Unable to parse ${configPath} as TOML.`,
				rawError: error instanceof Error ? error : undefined,
				source: "toml",
				type: "parse",
			},
			ok: false,
		}
	}

	const value = table[SOURCE_DIR_KEY]
	if (typeof value !== "string" || value.trim().length === 0) {
		return { ok: true, value: null }
	}

	return { ok: true, value: expandHome(value.trim(), env) }
}

export function expandHome(value: string, env: ProcessEnvironment): string {
	if (value === "~") {
		return env.home
	}
	if (value.startsWith("~/") || value.startsWith("~\\")) {
		return joinForPlatform(env, env.home, value.slice(2))
	}
	return value
}

// === EDITS ===

/**
 * [data] name/email. Nothing to do without at least one of them.
 */
export function identityEdit(identity: Identity): ConfigEdit {
	return (doc: ConfigDocument): EditResult => {
		const lines: string[] = []
		if (identity.name) {
			lines.push(tomlLine("name", identity.name))
		}
		if (identity.email) {
			lines.push(tomlLine("email", identity.email))
		}
		if (lines.length === 0) {
			return { changed: false, doc }
		}
		return upsertSection(doc, "data", lines)
	}
}

/**
 * sourceDir must be a top-level key, so it goes ahead of every table and any
 * copy nested in a table is removed first.
 */
export function sourceLocationEdit(sourceDir: string): ConfigEdit {
	return (doc: ConfigDocument): EditResult => {
		const stripped = stripNestedKey(doc, SOURCE_DIR_KEY)
		const upserted = upsertTopLevelKey(
			stripped.doc,
			SOURCE_DIR_KEY,
			tomlLine(SOURCE_DIR_KEY, sourceDir),
		)
		return { changed: stripped.changed || upserted.changed, doc: upserted.doc }
	}
}

/**
 * Drops sourceDir entirely so the engine falls back to its default location.
 */
export function clearSourceLocationEdit(): ConfigEdit {
	return (doc: ConfigDocument): EditResult => {
		const stripped = stripNestedKey(doc, SOURCE_DIR_KEY)
		const removed = removeTopLevelKey(stripped.doc, SOURCE_DIR_KEY)
		return { changed: stripped.changed || removed.changed, doc: removed.doc }
	}
}

export function templateBehaviorEdit(): ConfigEdit {
	return (doc: ConfigDocument): EditResult =>
		upsertSection(doc, "template", [TEMPLATE_OPTIONS_LINE])
}

function tomlLine(key: string, value: string): string {
	return stringify({ [key]: value }).trim()
}
