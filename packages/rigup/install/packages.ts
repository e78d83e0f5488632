import type { Result } from "@rigup/core"
import { type CommandResult, privileged, runMutation, runQuery } from "@/exec/runner"
import type { PackageIndex } from "@/install/index"
import type { PackageReference } from "@/manifest/types"
import type { PackageManagerAdapter } from "@/packagers/types"
import { isPackageInstalled } from "@/probe/probe"
import type { StepContext } from "@/types/context"
import type { EntityRef, MandatoryStepError } from "@/types/errors"

export interface PackageReport {
	installed: string[]
	present: string[]
	failed: string[]
}

export interface InstallerDeps {
	adapter: PackageManagerAdapter
	index: PackageIndex
}

/**
 * Every reference must end up installed; the first failure stops the run.
 */
export async function installMandatory(
	refs: readonly PackageReference[],
	deps: InstallerDeps,
	ctx: StepContext,
): Promise<Result<PackageReport, MandatoryStepError>> {
	const report = emptyReport()
	for (const ref of refs) {
		const outcome = await installOne(ref, deps, ctx)
		if (outcome === "present") {
			report.present.push(ref.id)
			continue
		}
		if (!outcome.ok) {
			return outcome
		}
		report.installed.push(ref.id)
	}
	return { ok: true, value: report }
}

/**
 * Best effort: a failure is reported and the next reference is tried.
 */
export async function installOptional(
	refs: readonly PackageReference[],
	deps: InstallerDeps,
	ctx: StepContext,
): Promise<PackageReport> {
	const report = emptyReport()
	for (const ref of refs) {
		const outcome = await installOne(ref, deps, ctx)
		if (outcome === "present") {
			report.present.push(ref.id)
			continue
		}
		if (!outcome.ok) {
			ctx.report({
				entity: { kind: "package", name: ref.id },
				kind: "optional_failure",
				message: `optional package ${ref.id} is unavailable: ${outcome.error.message}`,
			})
			report.failed.push(ref.id)
			continue
		}
		report.installed.push(ref.id)
	}
	return report
}

/**
 * Make sure every qualifier source (scoop bucket) the references use is known
 * to the package manager. A failed listing is treated as "none known".
 */
export async function prepareSources(
	refs: readonly PackageReference[],
	deps: InstallerDeps,
	ctx: StepContext,
): Promise<Result<string[], MandatoryStepError>> {
	const sources = deps.adapter.sources
	if (!sources) {
		return { ok: true, value: [] }
	}

	const wanted: string[] = []
	for (const ref of refs) {
		const source = sources.sourceFor(ref)
		if (source && !wanted.includes(source)) {
			wanted.push(source)
		}
	}
	if (wanted.length === 0) {
		return { ok: true, value: [] }
	}

	const listed = await runQuery(ctx, sources.listCommand())
	const known =
		listed.ok && listed.value.exitCode === 0
			? sources.parseList(listed.value.stdout).map((name) => name.toLowerCase())
			: []

	const added: string[] = []
	for (const source of wanted) {
		const entity: EntityRef = { kind: "bucket", name: source }
		if (known.includes(source.toLowerCase())) {
			ctx.report({ entity, kind: "present", message: `source ${source} already added` })
			continue
		}

		const result = await runMutation(ctx, entity, sources.addCommand(source))
		const failure = toStepError(entity, `add source ${source}`, result)
		if (failure) {
			return { error: failure, ok: false }
		}
		if (!ctx.dryRun) {
			ctx.report({ entity, kind: "changed", message: `added source ${source}` })
		}
		added.push(source)
	}

	if (added.length > 0) {
		deps.index.invalidate()
	}
	return { ok: true, value: added }
}

async function installOne(
	ref: PackageReference,
	deps: InstallerDeps,
	ctx: StepContext,
): Promise<"present" | Result<void, MandatoryStepError>> {
	const entity: EntityRef = { kind: "package", name: ref.id }
	if (await isPackageInstalled(ref, deps.adapter, ctx)) {
		ctx.report({ entity, kind: "present", message: `${ref.id} already installed` })
		return "present"
	}

	const fresh = await deps.index.ensureFresh(ctx)
	if (!fresh.ok) {
		return fresh
	}

	const spec = deps.adapter.installCommand(ref)
	const result = await runMutation(
		ctx,
		entity,
		deps.adapter.privileged ? privileged(ctx, spec) : spec,
	)
	const failure = toStepError(entity, `install ${ref.id}`, result)
	if (failure) {
		return { error: failure, ok: false }
	}

	if (!ctx.dryRun) {
		ctx.report({ entity, kind: "changed", message: `installed ${ref.id}` })
	}
	return { ok: true, value: undefined }
}

function toStepError(
	entity: EntityRef,
	action: string,
	result: CommandResult,
): MandatoryStepError | null {
	if (!result.ok) {
		return {
			cause: result.error,
			entity,
			message: `Failed to ${action}: ${result.error.message}`,
			type: "mandatory_step",
		}
	}

	if (result.value.exitCode !== 0) {
		return {
			entity,
			exitCode: result.value.exitCode,
			message: `Failed to ${action} (exit code ${result.value.exitCode}).`,
			type: "mandatory_step",
		}
	}

	return null
}

function emptyReport(): PackageReport {
	return { failed: [], installed: [], present: [] }
}
