import { spawn } from "node:child_process"
import type { Result } from "@rigup/core"
import { type ProcessEnvironment, toSpawnEnv } from "@/platform/environment"
import type { StepContext } from "@/types/context"
import type { EntityRef, SpawnError } from "@/types/errors"

export interface CommandSpec {
	command: string
	args: string[]
	/** Written to the child's stdin, then closed. */
	input?: string | Uint8Array
	/** "inherit" streams output to the terminal; "capture" collects it. */
	stdio?: "capture" | "inherit"
}

export interface CommandOutcome {
	exitCode: number
	stdout: string
	stderr: string
}

export type CommandResult = Result<CommandOutcome, SpawnError>

export interface CommandRunner {
	run(spec: CommandSpec, env: ProcessEnvironment): Promise<CommandResult>
}

export function formatCommand(spec: CommandSpec): string {
	return [spec.command, ...spec.args]
		.map((part) => (/[\s"'$]/.test(part) ? JSON.stringify(part) : part))
		.join(" ")
}

/**
 * Runs subprocesses one at a time; each call resolves only after the child exits.
 */
export function createProcessRunner(): CommandRunner {
	return {
		run: (spec, env) =>
			new Promise<CommandResult>((resolve) => {
				const stdio = spec.stdio ?? "capture"
				const child = spawn(spec.command, spec.args, {
					env: toSpawnEnv(env),
					stdio: [
						spec.input === undefined ? "ignore" : "pipe",
						stdio === "inherit" ? "inherit" : "pipe",
						stdio === "inherit" ? "inherit" : "pipe",
					],
					windowsHide: true,
				})

				let stdout = ""
				let stderr = ""
				child.stdout?.setEncoding("utf8")
				child.stderr?.setEncoding("utf8")
				child.stdout?.on("data", (chunk: string) => {
					stdout += chunk
				})
				child.stderr?.on("data", (chunk: string) => {
					stderr += chunk
				})

				child.on("error", (error) => {
					resolve({
						error: {
							command: spec.command,
							message: `Unable to start ${spec.command}: ${error.message}`,
							rawError: error,
							type: "spawn",
						},
						ok: false,
					})
				})

				child.on("close", (code) => {
					resolve({ ok: true, value: { exitCode: code ?? 1, stderr, stdout } })
				})

				if (spec.input !== undefined && child.stdin) {
					child.stdin.end(spec.input)
				}
			}),
	}
}

/**
 * Run a read-only query. Dry-run does not affect queries.
 */
export async function runQuery(ctx: StepContext, spec: CommandSpec): Promise<CommandResult> {
	ctx.report({ kind: "command", message: formatCommand(spec) })
	return ctx.runner.run({ ...spec, stdio: spec.stdio ?? "capture" }, ctx.env)
}

/**
 * True when the query started and exited 0. Start failures count as false.
 */
export async function querySucceeds(ctx: StepContext, spec: CommandSpec): Promise<boolean> {
	const result = await runQuery(ctx, spec)
	return result.ok && result.value.exitCode === 0
}

/**
 * Run a command that changes machine state. Under dry-run the action is
 * reported as planned and a successful outcome is returned without running it.
 */
export async function runMutation(
	ctx: StepContext,
	entity: EntityRef,
	spec: CommandSpec,
): Promise<CommandResult> {
	const rendered = formatCommand(spec)
	if (ctx.dryRun) {
		ctx.report({ entity, kind: "planned", message: rendered })
		return { ok: true, value: { exitCode: 0, stderr: "", stdout: "" } }
	}

	ctx.report({ kind: "command", message: rendered })
	return ctx.runner.run({ ...spec, stdio: spec.stdio ?? "inherit" }, ctx.env)
}

/**
 * Prefix a command with sudo unless the process already runs as root or on Windows.
 */
export function privileged(ctx: StepContext, spec: CommandSpec): CommandSpec {
	if (ctx.platform.isRoot || ctx.platform.os === "windows") {
		return spec
	}

	return { ...spec, args: [spec.command, ...spec.args], command: "sudo" }
}

/**
 * Quote an argument for a PowerShell -Command string.
 */
export function quotePowerShell(value: string): string {
	return `'${value.replace(/'/g, "''")}'`
}

export function powershell(command: string, args: string[]): CommandSpec {
	const script = [command, ...args.map(quotePowerShell)].join(" ")
	return {
		args: ["-NoProfile", "-NonInteractive", "-Command", script],
		command: "powershell",
	}
}
