import type { Result } from "@rigup/core"
import { privileged, runMutation } from "@/exec/runner"
import type { PackageManagerAdapter } from "@/packagers/types"
import type { StepContext } from "@/types/context"
import type { MandatoryStepError } from "@/types/errors"

/**
 * Tracks whether the package manager's index is current for this run.
 * The refresh runs at most once until something invalidates it, and only
 * when an install actually needs it.
 */
export interface PackageIndex {
	ensureFresh(ctx: StepContext): Promise<Result<void, MandatoryStepError>>
	/** Call after adding a package source. */
	invalidate(): void
	readonly refreshCount: number
}

export function createPackageIndex(adapter: PackageManagerAdapter): PackageIndex {
	let fresh = false
	let refreshCount = 0

	return {
		ensureFresh: async (ctx) => {
			const spec = adapter.refreshIndexCommand()
			if (fresh || spec === null) {
				return { ok: true, value: undefined }
			}

			const entity = { kind: "index" as const, name: adapter.id }
			const result = await runMutation(
				ctx,
				entity,
				adapter.privileged ? privileged(ctx, spec) : spec,
			)
			if (!result.ok) {
				return {
					error: {
						cause: result.error,
						entity,
						message: `Failed to refresh the ${adapter.id} package index.`,
						type: "mandatory_step",
					},
					ok: false,
				}
			}
			if (result.value.exitCode !== 0) {
				return {
					error: {
						entity,
						exitCode: result.value.exitCode,
						message: `Refreshing the ${adapter.id} package index exited with ${result.value.exitCode}.`,
						type: "mandatory_step",
					},
					ok: false,
				}
			}

			fresh = true
			refreshCount += 1
			return { ok: true, value: undefined }
		},
		invalidate: () => {
			fresh = false
		},
		get refreshCount() {
			return refreshCount
		},
	}
}
