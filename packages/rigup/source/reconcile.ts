import type { Result } from "@rigup/core"
import {
	clearSourceLocationEdit,
	defaultSourceDir,
	type Identity,
	identityEdit,
	sourceLocationEdit,
	templateBehaviorEdit,
} from "@/config/chezmoi"
import { type ConfigEdit, formatTimestamp, patchConfigFile } from "@/config/persist"
import { runMutation, runQuery } from "@/exec/runner"
import { movePath, safeStat } from "@/io/fs"
import { DOTFILES_ENGINE, detectSourceState } from "@/source/detect"
import {
	type DesiredSource,
	describeSource,
	planSourceTransition,
	type SourcePlan,
} from "@/source/state"
import type { StepContext } from "@/types/context"
import type { EntityRef, IoError, MandatoryStepError, ParseError } from "@/types/errors"

export interface ReconcileOptions {
	configPath: string
	force: boolean
	identity?: Identity
	/** Asked on a conflict when not already forced; true switches anyway. */
	confirmSwitch?: (message: string) => Promise<boolean>
}

export interface SourceOutcome {
	plan: SourcePlan
	/** The directory the engine applies from after reconciliation. */
	activePath: string
	backupPath: string | null
	applied: boolean
}

export type SourceError = MandatoryStepError | IoError | ParseError

const ENTITY: EntityRef = { kind: "source", name: DOTFILES_ENGINE }

/**
 * Bring the dotfiles engine's source in line with `desired`, within the
 * limits of planSourceTransition, then apply it.
 */
export async function reconcileManagedSource(
	desired: DesiredSource,
	options: ReconcileOptions,
	ctx: StepContext,
): Promise<Result<SourceOutcome, SourceError>> {
	const detected = await detectSourceState(options.configPath, ctx)
	if (!detected.ok) {
		return detected
	}

	const defaultPath = defaultSourceDir(ctx.env)
	const transition = {
		caseInsensitive: ctx.env.platform === "win32",
		defaultPath,
		force: options.force,
	}
	let plan = planSourceTransition(detected.value, desired, transition)
	if (plan.action === "conflict" && options.confirmSwitch && !ctx.dryRun) {
		if (await options.confirmSwitch(plan.message)) {
			plan = planSourceTransition(detected.value, desired, { ...transition, force: true })
		}
	}

	const outcome: SourceOutcome = {
		activePath: detected.value.path,
		applied: false,
		backupPath: null,
		plan,
	}

	const baseEdits: ConfigEdit[] = [
		identityEdit(options.identity ?? {}),
		templateBehaviorEdit(),
	]

	switch (plan.action) {
		case "keep":
			ctx.report({
				entity: ENTITY,
				kind: "present",
				message: `managed source is ${describeSource(plan.state)}`,
			})
			break
		case "conflict":
			ctx.report({ entity: ENTITY, kind: "conflict", message: plan.message })
			break
		case "switch": {
			ctx.report({
				entity: ENTITY,
				kind: "info",
				message: `switching managed source from ${describeSource(plan.from)} to ${describeSource(plan.desired)} (${plan.reason})`,
			})
			if (plan.backup) {
				const backup = await backupDirectory(plan.from.path, ctx)
				if (!backup.ok) {
					return backup
				}
				outcome.backupPath = backup.value
			}
			break
		}
		case "init":
			ctx.report({
				entity: ENTITY,
				kind: "info",
				message: `initializing managed source from ${describeSource(plan.desired)}`,
			})
			break
	}

	if (plan.action === "switch" || plan.action === "init") {
		const established = await establishSource(plan.desired, defaultPath, baseEdits, options, ctx)
		if (!established.ok) {
			return established
		}
		outcome.activePath = established.value
	} else {
		const patched = await patchConfigFile(options.configPath, baseEdits, ctx)
		if (!patched.ok) {
			return patched
		}
	}

	const applied = await applySource(outcome.activePath, ctx)
	if (!applied.ok) {
		return applied
	}
	outcome.applied = applied.value
	return { ok: true, value: outcome }
}

/**
 * Point the engine at `desired` and return the directory it will apply from.
 */
async function establishSource(
	desired: DesiredSource,
	defaultPath: string,
	baseEdits: readonly ConfigEdit[],
	options: ReconcileOptions,
	ctx: StepContext,
): Promise<Result<string, SourceError>> {
	if (desired.kind === "local") {
		const stats = await safeStat(desired.path)
		if (!stats.ok) {
			return stats
		}
		if (stats.value === null || !stats.value.isDirectory()) {
			return {
				error: {
					entity: ENTITY,
					message: `Managed source directory ${desired.path} does not exist.`,
					type: "mandatory_step",
				},
				ok: false,
			}
		}

		const patched = await patchConfigFile(
			options.configPath,
			[sourceLocationEdit(desired.path), ...baseEdits],
			ctx,
		)
		return patched.ok ? { ok: true, value: desired.path } : patched
	}

	// init clones into the configured sourceDir, so clear it first
	const patched = await patchConfigFile(
		options.configPath,
		[clearSourceLocationEdit(), ...baseEdits],
		ctx,
	)
	if (!patched.ok) {
		return patched
	}

	const init = await runMutation(ctx, ENTITY, {
		args: ["init", desired.origin],
		command: DOTFILES_ENGINE,
	})
	if (!init.ok || init.value.exitCode !== 0) {
		return {
			error: {
				cause: init.ok ? undefined : init.error,
				entity: ENTITY,
				exitCode: init.ok ? init.value.exitCode : undefined,
				message: `'${DOTFILES_ENGINE} init ${desired.origin}' failed.`,
				type: "mandatory_step",
			},
			ok: false,
		}
	}
	if (!ctx.dryRun) {
		ctx.report({ entity: ENTITY, kind: "changed", message: `initialized from ${desired.origin}` })
	}
	return { ok: true, value: defaultPath }
}

/**
 * Move a source directory aside as `<dir>.backup-<timestamp>`.
 */
export async function backupDirectory(
	dir: string,
	ctx: StepContext,
): Promise<Result<string | null, IoError>> {
	const stats = await safeStat(dir)
	if (!stats.ok) {
		return stats
	}
	if (stats.value === null) {
		return { ok: true, value: null }
	}

	const base = `${dir}.backup-${formatTimestamp(ctx.now())}`
	let target = base
	for (let attempt = 1; ; attempt += 1) {
		const existing = await safeStat(target)
		if (existing.ok && existing.value === null) {
			break
		}
		target = `${base}-${attempt}`
	}

	if (ctx.dryRun) {
		ctx.report({ entity: ENTITY, kind: "planned", message: `move ${dir} to ${target}` })
		return { ok: true, value: target }
	}

	const moved = await movePath(dir, target)
	if (!moved.ok) {
		return moved
	}
	ctx.report({ entity: ENTITY, kind: "changed", message: `backed up ${dir} to ${target}` })
	return { ok: true, value: target }
}

/**
 * Apply only when the engine reports drift between source and targets.
 * Returns whether apply ran (or would run).
 */
async function applySource(
	sourcePath: string,
	ctx: StepContext,
): Promise<Result<boolean, MandatoryStepError>> {
	const verify = await runQuery(ctx, {
		args: ["verify", "--source", sourcePath],
		command: DOTFILES_ENGINE,
	})
	if (verify.ok && verify.value.exitCode === 0) {
		ctx.report({ entity: ENTITY, kind: "present", message: "managed files are up to date" })
		return { ok: true, value: false }
	}

	const applied = await runMutation(ctx, ENTITY, {
		args: ["apply", "--source", sourcePath],
		command: DOTFILES_ENGINE,
	})
	if (!applied.ok || applied.value.exitCode !== 0) {
		return {
			error: {
				cause: applied.ok ? undefined : applied.error,
				entity: ENTITY,
				exitCode: applied.ok ? applied.value.exitCode : undefined,
				message: `'${DOTFILES_ENGINE} apply --source ${sourcePath}' failed.`,
				type: "mandatory_step",
			},
			ok: false,
		}
	}

	if (!ctx.dryRun) {
		ctx.report({
			entity: ENTITY,
			kind: "changed",
			message: `applied managed files from ${sourcePath}`,
		})
	}
	return { ok: true, value: true }
}
