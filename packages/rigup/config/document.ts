/**
 * Section-level model of a TOML-family config file.
 *
 * Parsing keeps every line exactly as written, so serializing an unmodified
 * document reproduces the input byte for byte. Edits work on whole sections
 * and never reorder sections they do not touch.
 */

export interface ConfigSection {
	/** Table name without brackets, e.g. "data" or "git.commit". */
	readonly name: string
	/** The header line as written. */
	readonly header: string
	/** Array-of-tables entries ([[name]]) are never targeted by name. */
	readonly isArray: boolean
	readonly body: readonly string[]
}

export interface ConfigDocument {
	/** Lines before the first table header: top-level keys and comments. */
	readonly preamble: readonly string[]
	readonly sections: readonly ConfigSection[]
	readonly trailingNewline: boolean
}

export interface EditResult {
	doc: ConfigDocument
	changed: boolean
}

const TABLE_HEADER = /^\s*\[\s*([^[\]]+?)\s*\]\s*(?:#.*)?\r?$/
const ARRAY_TABLE_HEADER = /^\s*\[\[\s*([^[\]]+?)\s*\]\]\s*(?:#.*)?\r?$/
const MULTILINE_DELIMITERS = ['"""', "'''"]

export function parseConfigDocument(text: string): ConfigDocument {
	if (text.length === 0) {
		return { preamble: [], sections: [], trailingNewline: false }
	}

	const trailingNewline = text.endsWith("\n")
	const lines = (trailingNewline ? text.slice(0, -1) : text).split("\n")

	const preamble: string[] = []
	const sections: ConfigSection[] = []
	let current: { name: string; header: string; isArray: boolean; body: string[] } | null =
		null
	let scan: ScanState = { depth: 0, quote: null }

	for (const line of lines) {
		if (scan.quote === null && scan.depth === 0) {
			const arrayMatch = ARRAY_TABLE_HEADER.exec(line)
			const tableMatch = arrayMatch ? null : TABLE_HEADER.exec(line)
			const match = arrayMatch ?? tableMatch
			if (match) {
				if (current) {
					sections.push(current)
				}
				current = { body: [], header: line, isArray: arrayMatch !== null, name: match[1] }
				continue
			}
		}

		scan = scanLine(line, scan)
		if (current) {
			current.body.push(line)
		} else {
			preamble.push(line)
		}
	}

	if (current) {
		sections.push(current)
	}

	return { preamble, sections, trailingNewline }
}

export function serializeConfigDocument(doc: ConfigDocument): string {
	const lines: string[] = [...doc.preamble]
	for (const section of doc.sections) {
		lines.push(section.header, ...section.body)
	}

	if (lines.length === 0) {
		return ""
	}

	return lines.join("\n") + (doc.trailingNewline ? "\n" : "")
}

/**
 * Replace the body of [name] with `lines`, or append the section when absent.
 * Blank lines that separated the old body from the next section are kept.
 */
export function upsertSection(
	doc: ConfigDocument,
	name: string,
	lines: readonly string[],
): EditResult {
	const index = doc.sections.findIndex((section) => !section.isArray && section.name === name)

	let next: ConfigDocument
	if (index >= 0) {
		const existing = doc.sections[index]
		const separator = trailingBlankLines(existing.body)
		const sections = [...doc.sections]
		sections[index] = { ...existing, body: [...lines, ...separator] }
		next = { ...doc, sections }
	} else {
		next = appendSection(doc, { body: [...lines], header: `[${name}]`, isArray: false, name })
	}

	return finish(doc, next)
}

/**
 * Set a top-level key that must appear before any table header.
 * Replaces the first existing declaration and drops repeats.
 */
export function upsertTopLevelKey(doc: ConfigDocument, key: string, line: string): EditResult {
	const pattern = keyPattern(key)
	const preamble: string[] = []
	let replaced = false
	for (const existing of doc.preamble) {
		if (!pattern.test(existing)) {
			preamble.push(existing)
			continue
		}
		if (!replaced) {
			preamble.push(line)
			replaced = true
		}
	}

	if (!replaced) {
		const insertAt = lastContentIndex(preamble) + 1
		preamble.splice(insertAt, 0, line)
		if (insertAt === preamble.length - 1 && doc.sections.length > 0) {
			preamble.push("")
		}
	}

	return finish(doc, { ...doc, preamble, trailingNewline: true })
}

export function removeTopLevelKey(doc: ConfigDocument, key: string): EditResult {
	const pattern = keyPattern(key)
	const preamble = doc.preamble.filter((line) => !pattern.test(line))
	return finish(doc, { ...doc, preamble })
}

/**
 * Remove `key = ...` declarations nested inside any table, so a canonical
 * top-level value is the only one left.
 */
export function stripNestedKey(doc: ConfigDocument, key: string): EditResult {
	const pattern = keyPattern(key)
	const sections = doc.sections.map((section) => {
		const body = section.body.filter((line) => !pattern.test(line))
		return body.length === section.body.length ? section : { ...section, body }
	})
	return finish(doc, { ...doc, sections })
}

function appendSection(doc: ConfigDocument, section: ConfigSection): ConfigDocument {
	const sections = [...doc.sections]
	let preamble = [...doc.preamble]

	const last = sections.at(-1)
	if (last) {
		if (needsSeparator(last.body)) {
			sections[sections.length - 1] = { ...last, body: [...last.body, ""] }
		}
	} else if (needsSeparator(preamble)) {
		preamble = [...preamble, ""]
	}

	sections.push(section)
	return { preamble, sections, trailingNewline: true }
}

function finish(before: ConfigDocument, after: ConfigDocument): EditResult {
	return {
		changed: serializeConfigDocument(before) !== serializeConfigDocument(after),
		doc: after,
	}
}

function needsSeparator(lines: readonly string[]): boolean {
	const last = lines.at(-1)
	return last !== undefined && last.trim().length > 0
}

function trailingBlankLines(lines: readonly string[]): string[] {
	const blanks: string[] = []
	for (let index = lines.length - 1; index >= 0; index -= 1) {
		if (lines[index].trim().length > 0) {
			break
		}
		blanks.unshift(lines[index])
	}
	return blanks
}

function lastContentIndex(lines: readonly string[]): number {
	for (let index = lines.length - 1; index >= 0; index -= 1) {
		if (lines[index].trim().length > 0) {
			return index
		}
	}
	return -1
}

function keyPattern(key: string): RegExp {
	const escaped = key.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
	return new RegExp(`^\\s*(?:${escaped}|"${escaped}"|'${escaped}')\\s*=`)
}

/** Open string delimiter and array nesting carried from one line to the next. */
interface ScanState {
	readonly quote: string | null
	readonly depth: number
}

/**
 * Follow strings and array brackets through one line so header-like lines
 * inside a multi-line string or array stay part of the value.
 */
function scanLine(line: string, state: ScanState): ScanState {
	let { depth, quote } = state
	let index = 0
	while (index < line.length) {
		if (quote !== null) {
			if ((quote === '"' || quote === '"""') && line[index] === "\\") {
				index += 2
				continue
			}
			if (line.startsWith(quote, index)) {
				index += quote.length
				quote = null
				continue
			}
			index += 1
			continue
		}

		const char = line[index]
		if (char === "#") {
			break
		}
		const multiline = MULTILINE_DELIMITERS.find((delimiter) => line.startsWith(delimiter, index))
		if (multiline) {
			quote = multiline
			index += multiline.length
			continue
		}
		if (char === '"' || char === "'") {
			quote = char
		} else if (char === "[") {
			depth += 1
		} else if (char === "]") {
			depth = Math.max(0, depth - 1)
		}
		index += 1
	}

	// Only the triple-quoted forms may span lines.
	if (quote === '"' || quote === "'") {
		quote = null
	}
	return { depth, quote }
}
