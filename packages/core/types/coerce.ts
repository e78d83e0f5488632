/**
 * Coercion Functions for Branded Types
 *
 * Pattern: returns the branded value on success, null on failure.
 */

import path from "node:path"
import type { AbsolutePath, GitUrl, NonEmptyString } from "./branded"

// === NON-EMPTY STRING ===

export function coerceNonEmpty(s: string): NonEmptyString | null {
	const trimmed = s.trim()
	if (trimmed.length === 0) return null
	return trimmed as NonEmptyString
}

// === ABSOLUTE PATH ===

/**
 * Coerce a string to AbsolutePath.
 * Relative paths are resolved against basePath; without one they are rejected.
 */
export function coerceAbsolutePath(s: string, basePath?: string): AbsolutePath | null {
	const trimmed = s.trim()
	if (trimmed.length === 0) return null

	if (path.isAbsolute(trimmed)) {
		return path.normalize(trimmed) as AbsolutePath
	}

	if (!basePath) {
		return null
	}

	return path.resolve(basePath, trimmed) as AbsolutePath
}

/**
 * Coerce a path already known to be absolute, such as process.cwd() or os.homedir().
 */
export function coerceAbsolutePathDirect(s: string): AbsolutePath | null {
	const trimmed = s.trim()
	if (trimmed.length === 0) return null
	if (!path.isAbsolute(trimmed)) return null
	return path.normalize(trimmed) as AbsolutePath
}

// === GIT URL ===

const SSH_GIT_PATTERN = /^(?:ssh:\/\/)?git@([^:/]+)[:/](.+?)(?:\.git)?\/?$/
const HTTPS_GIT_PATTERN = /^https?:\/\/([^/]+)\/(.+?)(?:\.git)?\/?$/

/**
 * Coerce a git remote to GitUrl.
 * git@host:owner/repo(.git) and https://host/owner/repo(.git) both become
 * https://host/owner/repo.
 */
export function coerceGitUrl(s: string): GitUrl | null {
	const trimmed = s.trim()
	if (trimmed.length === 0) return null

	const sshMatch = SSH_GIT_PATTERN.exec(trimmed)
	if (sshMatch) {
		const [, host, repoPath] = sshMatch
		return `https://${host.toLowerCase()}/${repoPath}` as GitUrl
	}

	const httpsMatch = HTTPS_GIT_PATTERN.exec(trimmed)
	if (httpsMatch) {
		const [, host, repoPath] = httpsMatch
		return `https://${host.toLowerCase()}/${repoPath}` as GitUrl
	}

	return null
}

export function isGitUrl(s: string): boolean {
	return coerceGitUrl(s) !== null
}

/**
 * Two remotes refer to the same repository when their canonical forms match.
 */
export function isSameGitRemote(a: string, b: string): boolean {
	const left = coerceGitUrl(a)
	const right = coerceGitUrl(b)
	if (left === null || right === null) {
		return a.trim() === b.trim()
	}

	return left === right
}
