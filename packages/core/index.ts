/**
 * @rigup/core
 *
 * Branded value types, their coercions and the shared Result model.
 */

export type { AbsolutePath, GitUrl, NonEmptyString } from "./types/branded"
export {
	coerceAbsolutePath,
	coerceAbsolutePathDirect,
	coerceGitUrl,
	coerceNonEmpty,
	isGitUrl,
	isSameGitRemote,
} from "./types/coerce"
export type { BaseError, Result } from "./types/error"
