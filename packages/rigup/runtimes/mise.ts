import type { Result } from "@rigup/core"
import { runMutation } from "@/exec/runner"
import type { RuntimeSpec } from "@/manifest/types"
import { type ProcessEnvironment, refreshEnvironment } from "@/platform/environment"
import {
	isCommandOnPath,
	isRuntimeInstalled,
	RUNTIME_MANAGER,
	resolveRuntimeCommand,
	runtimeWhich,
} from "@/probe/probe"
import type { StepContext } from "@/types/context"
import type {
	EntityRef,
	MandatoryStepError,
	MissingRuntime,
	RuntimeValidationError,
} from "@/types/errors"

export const WHICH_NOT_FOUND = "<not found by mise which>"

export interface RuntimeReport {
	installed: string[]
	present: string[]
	reshimmed: boolean
	validated: boolean
	/** Environment after shims were added to PATH. */
	env: ProcessEnvironment
}

export type RuntimeError = MandatoryStepError | RuntimeValidationError

export async function ensureRuntime(
	spec: RuntimeSpec,
	ctx: StepContext,
): Promise<Result<"present" | "installed", MandatoryStepError>> {
	const entity: EntityRef = { kind: "runtime", name: spec.raw }
	if (await isRuntimeInstalled(spec, ctx)) {
		ctx.report({ entity, kind: "present", message: `${spec.raw} already installed` })
		return { ok: true, value: "present" }
	}

	const result = await runMutation(ctx, entity, {
		args: ["use", "--global", spec.raw],
		command: RUNTIME_MANAGER,
	})
	if (!result.ok) {
		return {
			error: {
				cause: result.error,
				entity,
				message: `Failed to install runtime ${spec.raw}: ${result.error.message}`,
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
				message: `Failed to install runtime ${spec.raw}: '${RUNTIME_MANAGER} use --global ${spec.raw}' exited with ${result.value.exitCode}.`,
				type: "mandatory_step",
			},
			ok: false,
		}
	}

	if (!ctx.dryRun) {
		ctx.report({ entity, kind: "changed", message: `installed ${spec.raw}` })
	}
	return { ok: true, value: "installed" }
}

/**
 * Regenerate shims once, after every runtime install.
 */
export async function reshimAll(ctx: StepContext): Promise<Result<void, MandatoryStepError>> {
	const entity: EntityRef = { kind: "runtime", name: "shims" }
	const result = await runMutation(ctx, entity, { args: ["reshim"], command: RUNTIME_MANAGER })
	if (!result.ok || result.value.exitCode !== 0) {
		return {
			error: {
				cause: result.ok ? undefined : result.error,
				entity,
				exitCode: result.ok ? result.value.exitCode : undefined,
				message: `'${RUNTIME_MANAGER} reshim' failed.`,
				type: "mandatory_step",
			},
			ok: false,
		}
	}
	return { ok: true, value: undefined }
}

/**
 * Every runtime's probe command must resolve on the current PATH.
 */
export async function validateOnPath(
	specs: readonly RuntimeSpec[],
	ctx: StepContext,
): Promise<Result<void, RuntimeValidationError>> {
	const missing: MissingRuntime[] = []
	for (const spec of specs) {
		const command = resolveRuntimeCommand(spec)
		if (await isCommandOnPath(command, ctx.env)) {
			continue
		}

		const which = await runtimeWhich(command, ctx)
		missing.push({ command, diagnostic: which ?? WHICH_NOT_FOUND, runtime: spec.raw })
	}

	if (missing.length === 0) {
		return { ok: true, value: undefined }
	}

	return {
		error: {
			message: formatMissingRuntimes(missing),
			missing,
			type: "runtime_validation",
		},
		ok: false,
	}
}

export function formatMissingRuntimes(missing: readonly MissingRuntime[]): string {
	const lines = missing.map(
		(entry) =>
			`  runtime=${entry.runtime} command=${entry.command} miseWhich=${entry.diagnostic}`,
	)
	return [
		"Declared runtimes are not callable from PATH:",
		...lines,
		`Run '${RUNTIME_MANAGER} reshim' and check that the ${RUNTIME_MANAGER} shims directory is on PATH.`,
	].join("\n")
}

/**
 * Install what is missing, reshim when anything changed, pick up new PATH
 * entries and validate against them.
 */
export async function reconcileRuntimes(
	specs: readonly RuntimeSpec[],
	ctx: StepContext,
): Promise<Result<RuntimeReport, RuntimeError>> {
	const report: RuntimeReport = {
		env: ctx.env,
		installed: [],
		present: [],
		reshimmed: false,
		validated: false,
	}
	if (specs.length === 0) {
		return { ok: true, value: report }
	}

	if (!(await isCommandOnPath(RUNTIME_MANAGER, ctx.env))) {
		ctx.report({
			kind: "warning",
			message: `${RUNTIME_MANAGER} is not on PATH; skipping ${specs.length} runtime(s). Install it (e.g. with a script install) and rerun.`,
		})
		return { ok: true, value: report }
	}

	for (const spec of specs) {
		const ensured = await ensureRuntime(spec, ctx)
		if (!ensured.ok) {
			return ensured
		}
		if (ensured.value === "installed") {
			report.installed.push(spec.raw)
		} else {
			report.present.push(spec.raw)
		}
	}

	if (report.installed.length > 0) {
		const reshim = await reshimAll(ctx)
		if (!reshim.ok) {
			return reshim
		}
		report.reshimmed = true
	}

	const refreshed = await refreshEnvironment(ctx.env)
	report.env = refreshed.env

	if (ctx.dryRun && report.installed.length > 0) {
		ctx.report({
			kind: "warning",
			message: "Dry run: skipping PATH validation for runtimes that would be installed.",
		})
		return { ok: true, value: report }
	}

	const validated = await validateOnPath(specs, { ...ctx, env: refreshed.env })
	if (!validated.ok) {
		return validated
	}
	report.validated = true
	return { ok: true, value: report }
}
