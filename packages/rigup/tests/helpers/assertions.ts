/**
 * Custom Vitest assertions for Result types
 *
 * These matchers make it easy to assert on Result<T, E> types
 * that follow the { ok: true, value: T } | { ok: false, error: E } pattern.
 */

import { expect } from "vitest"

interface OkResult<T> {
	ok: true
	value: T
}

interface ErrResult<E> {
	ok: false
	error: E
}

type Result<T, E> = OkResult<T> | ErrResult<E>

function isOk<T, E>(result: Result<T, E>): result is OkResult<T> {
	return result.ok === true
}

function isErr<T, E>(result: Result<T, E>): result is ErrResult<E> {
	return result.ok === false
}

expect.extend({
	/**
	 * @example
	 * expect(parseManifest(badInput, path)).toBeErr()
	 */
	toBeErr(received: Result<unknown, unknown>) {
		if (isErr(received)) {
			return {
				message: () =>
					`expected result not to be an error, but got: ${JSON.stringify(received.error)}`,
				pass: true,
			}
		}

		return {
			message: () =>
				`expected result to be an error, but got ok with value: ${JSON.stringify(received.value)}`,
			pass: false,
		}
	},

	/**
	 * @example
	 * expect(await loadManifest(missing)).toBeErrContaining("Manifest not found")
	 */
	toBeErrContaining(received: Result<unknown, unknown>, substring: string) {
		if (!isErr(received)) {
			return {
				message: () =>
					`expected result to be an error, but got ok with value: ${JSON.stringify(received.value)}`,
				pass: false,
			}
		}

		const errorString =
			typeof received.error === "object" && received.error !== null
				? JSON.stringify(received.error)
				: String(received.error)

		if (errorString.includes(substring)) {
			return {
				message: () => `expected error not to contain "${substring}", but it did`,
				pass: true,
			}
		}

		return {
			message: () => `expected error to contain "${substring}", but got: ${errorString}`,
			pass: false,
		}
	},

	/**
	 * @example
	 * expect(parseManifest(input, path)).toBeOk()
	 */
	toBeOk(received: Result<unknown, unknown>) {
		if (isOk(received)) {
			return {
				message: () =>
					`expected result not to be ok, but got value: ${JSON.stringify(received.value)}`,
				pass: true,
			}
		}

		const errorMessage =
			typeof received.error === "object" && received.error !== null
				? JSON.stringify(received.error, null, 2)
				: String(received.error)

		return {
			message: () => `expected result to be ok, but got error:\n${errorMessage}`,
			pass: false,
		}
	},
})

declare module "vitest" {
	// biome-ignore lint/suspicious/noExplicitAny: matches Vitest's Assertion default.
	interface Assertion<T = any> {
		toBeOk(): void
		toBeErr(): void
		toBeErrContaining(substring: string): void
	}

	interface AsymmetricMatchersContaining {
		toBeOk(): void
		toBeErr(): void
	}
}
