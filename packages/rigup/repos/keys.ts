import { setTimeout as delay } from "node:timers/promises"
import type { Result } from "@rigup/core"
import type { RepositorySource } from "@/manifest/types"
import type { EntityRef, MandatoryStepError } from "@/types/errors"

/**
 * Downloads a repository's signing key. Swapped for a fake in tests.
 */
export type KeyFetcher = (
	repository: RepositorySource,
) => Promise<Result<Uint8Array, MandatoryStepError>>

export interface KeyFetcherOptions {
	/** Tries per key, network errors only. */
	attempts?: number
	/** Pause before the next try; grows by one second per failed try. */
	wait?: (ms: number) => Promise<unknown>
}

const RETRY_STEP_MS = 1000

export function createHttpKeyFetcher(options: KeyFetcherOptions = {}): KeyFetcher {
	const attempts = Math.max(1, options.attempts ?? 3)
	const wait = options.wait ?? delay

	return async (repository) => {
		const entity: EntityRef = { kind: "repository", name: repository.name }

		let response: Response | null = null
		let lastError: unknown = null
		for (let attempt = 0; attempt < attempts && !response; attempt += 1) {
			try {
				response = await fetch(repository.keyUrl)
			} catch (error) {
				lastError = error
				if (attempt < attempts - 1) {
					await wait(RETRY_STEP_MS * (attempt + 1))
				}
			}
		}

		if (!response) {
			return {
				error: {
					entity,
					message: `Unable to fetch signing key for ${repository.name} from ${repository.keyUrl}.`,
					rawError: lastError instanceof Error ? lastError : undefined,
					type: "mandatory_step",
				},
				ok: false,
			}
		}

		if (!response.ok) {
			return {
				error: {
					entity,
					message: `Signing key request for ${repository.name} failed: ${response.status} ${response.statusText}`,
					type: "mandatory_step",
				},
				ok: false,
			}
		}

		const bytes = new Uint8Array(await response.arrayBuffer())
		if (bytes.length === 0) {
			return {
				error: {
					entity,
					message: `Signing key for ${repository.name} at ${repository.keyUrl} is empty.`,
					type: "mandatory_step",
				},
				ok: false,
			}
		}

		return { ok: true, value: bytes }
	}
}

export const httpKeyFetcher: KeyFetcher = createHttpKeyFetcher()
