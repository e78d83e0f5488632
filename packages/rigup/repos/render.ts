import type { Result } from "@rigup/core"
import type { RepositorySource } from "@/manifest/types"
import type { Platform } from "@/platform/detect"
import type { MandatoryStepError } from "@/types/errors"

/**
 * Substitute {arch} and {codename}. The loader has already rejected any
 * other placeholder.
 */
export function renderSourceLine(
	repository: RepositorySource,
	platform: Platform,
): Result<string, MandatoryStepError> {
	const line = repository.sourceLine
	if (line.includes("{codename}") && !platform.codename) {
		return {
			error: {
				entity: { kind: "repository", name: repository.name },
				message: `Repository ${repository.name} needs {codename}, but VERSION_CODENAME is not set in /etc/os-release.`,
				type: "mandatory_step",
			},
			ok: false,
		}
	}

	return {
		ok: true,
		value: line
			.replaceAll("{arch}", platform.arch)
			.replaceAll("{codename}", platform.codename ?? ""),
	}
}

/**
 * Null when the repository has no allow-list or the codename is on it;
 * otherwise the reason to skip.
 */
export function codenameSkipReason(
	repository: RepositorySource,
	platform: Platform,
): string | null {
	const allowList = repository.codenameAllowList
	if (!allowList || allowList.length === 0) {
		return null
	}

	const codename = platform.codename ?? ""
	if (allowList.some((allowed) => allowed === codename)) {
		return null
	}

	return `Skipping repository ${repository.name}: codename '${codename || "<unknown>"}' is not in [${allowList.join(", ")}].`
}
