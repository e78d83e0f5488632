import { querySucceeds, runQuery } from "@/exec/runner"
import type { PackageReference, RuntimeSpec } from "@/manifest/types"
import type { PackageManagerAdapter } from "@/packagers/types"
import { isCommandOnPath } from "@/probe/path"
import type { StepContext } from "@/types/context"

export { isCommandOnPath, resolveCommandPath } from "@/probe/path"
export { resolveRuntimeCommand } from "@/probe/runtime"

export const RUNTIME_MANAGER = "mise"

/**
 * Ask the package manager's local database whether a package is installed.
 * A query that cannot run counts as "not installed".
 */
export async function isPackageInstalled(
	ref: PackageReference,
	adapter: PackageManagerAdapter,
	ctx: StepContext,
): Promise<boolean> {
	const result = await runQuery(ctx, adapter.queryCommand(ref))
	if (!result.ok) {
		return false
	}

	return adapter.interpretQuery(result.value)
}

/**
 * Asks the runtime manager rather than PATH, since shims can lag behind.
 */
export async function isRuntimeInstalled(spec: RuntimeSpec, ctx: StepContext): Promise<boolean> {
	if (!(await isCommandOnPath(RUNTIME_MANAGER, ctx.env))) {
		return false
	}

	return querySucceeds(ctx, { args: ["where", spec.raw], command: RUNTIME_MANAGER })
}

/**
 * Where the runtime manager thinks a command lives, for diagnostics.
 */
export async function runtimeWhich(command: string, ctx: StepContext): Promise<string | null> {
	const result = await runQuery(ctx, { args: ["which", command], command: RUNTIME_MANAGER })
	if (!result.ok || result.value.exitCode !== 0) {
		return null
	}

	const resolved = result.value.stdout.trim()
	return resolved.length > 0 ? resolved : null
}
