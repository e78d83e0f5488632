import path from "node:path"
import { privileged, runMutation, runQuery } from "@/exec/runner"
import { resolveCommandPath } from "@/probe/probe"
import type { StepContext } from "@/types/context"
import type { EntityRef } from "@/types/errors"

export const PREFERRED_SHELL = "zsh"

export type ShellOutcome = "skipped" | "present" | "changed" | "failed"

/**
 * Make zsh the login shell when it is installed. Problems here never stop
 * the run; they are reported as warnings.
 */
export async function ensureDefaultShell(ctx: StepContext): Promise<ShellOutcome> {
	if (ctx.platform.os === "windows") {
		return "skipped"
	}

	const entity: EntityRef = { kind: "shell", name: PREFERRED_SHELL }
	const shellPath = await resolveCommandPath(PREFERRED_SHELL, ctx.env)
	if (!shellPath) {
		ctx.report({
			entity,
			kind: "warning",
			message: `${PREFERRED_SHELL} is not installed; leaving the default shell unchanged.`,
		})
		return "skipped"
	}

	const current = await currentLoginShell(ctx)
	if (current === shellPath || path.posix.basename(current) === PREFERRED_SHELL) {
		ctx.report({ entity, kind: "present", message: `default shell is already ${current}` })
		return "present"
	}

	const chsh = await resolveCommandPath("chsh", ctx.env)
	if (!chsh) {
		ctx.report({
			entity,
			kind: "warning",
			message: `chsh is not available; set the default shell to ${shellPath} manually.`,
		})
		return "skipped"
	}

	const result = await runMutation(
		ctx,
		entity,
		privileged(ctx, { args: ["-s", shellPath, ctx.platform.user], command: "chsh" }),
	)
	if (!result.ok || result.value.exitCode !== 0) {
		ctx.report({
			entity,
			kind: "warning",
			message: `Could not change the default shell to ${shellPath}${
				result.ok ? ` (exit code ${result.value.exitCode})` : `: ${result.error.message}`
			}.`,
		})
		return "failed"
	}

	if (!ctx.dryRun) {
		ctx.report({
			entity,
			kind: "changed",
			message: `default shell set to ${shellPath}; it takes effect at next login`,
		})
	}
	return "changed"
}

/**
 * The login shell from the user database; $SHELL only reflects the shell of
 * the session that started this process.
 */
export async function currentLoginShell(ctx: StepContext): Promise<string> {
	const result = await runQuery(ctx, { args: ["passwd", ctx.platform.user], command: "getent" })
	if (result.ok && result.value.exitCode === 0) {
		const fields = result.value.stdout.trim().split(":")
		if (fields.length >= 7 && fields[6].length > 0) {
			return fields[6]
		}
	}

	return ctx.env.vars.SHELL ?? ""
}
