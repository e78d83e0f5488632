import type { Result } from "@rigup/core"
import { type CommandSpec, runMutation, runQuery } from "@/exec/runner"
import type { ScriptInstall, ScriptPhase } from "@/manifest/types"
import type { StepContext } from "@/types/context"
import type { EntityRef, MandatoryStepError } from "@/types/errors"

export interface ScriptReport {
	ran: string[]
	present: string[]
}

/**
 * A login shell, so profile-managed PATH additions are visible to the script.
 */
export function shellCommand(ctx: StepContext, script: string): CommandSpec {
	if (ctx.platform.os === "windows") {
		return {
			args: ["-NoProfile", "-NonInteractive", "-Command", script],
			command: "powershell",
		}
	}

	return { args: ["-lc", script], command: "bash" }
}

/**
 * Run the installs declared for `phase` in manifest order. A check that
 * exits 0 means the tool is already there; a failing install stops the phase.
 */
export async function runScriptInstalls(
	phase: ScriptPhase,
	installs: readonly ScriptInstall[],
	ctx: StepContext,
): Promise<Result<ScriptReport, MandatoryStepError>> {
	const report: ScriptReport = { present: [], ran: [] }

	for (const install of installs) {
		if (install.phase !== phase) {
			continue
		}

		const entity: EntityRef = { kind: "script", name: install.name }
		const check = await runQuery(ctx, shellCommand(ctx, install.checkCommand))
		if (check.ok && check.value.exitCode === 0) {
			ctx.report({ entity, kind: "present", message: `${install.name} already installed` })
			report.present.push(install.name)
			continue
		}

		const result = await runMutation(ctx, entity, shellCommand(ctx, install.installCommand))
		if (!result.ok) {
			return {
				error: {
					cause: result.error,
					entity,
					message: `Script install ${install.name} could not start: ${result.error.message}`,
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
					message: `Script install ${install.name} failed with exit code ${result.value.exitCode}.`,
					type: "mandatory_step",
				},
				ok: false,
			}
		}

		if (!ctx.dryRun) {
			ctx.report({ entity, kind: "changed", message: `ran ${install.name} installer` })
		}
		report.ran.push(install.name)
	}

	return { ok: true, value: report }
}
