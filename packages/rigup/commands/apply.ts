import { confirm, isCancel } from "@clack/prompts"
import { consola } from "consola"
import { createConsolaReporter } from "@/commands/reporter"
import { CommandResult, printOutcome } from "@/commands/types"
import { readEnvSettings } from "@/env"
import { createProcessRunner } from "@/exec/runner"
import { detectPlatform } from "@/platform/detect"
import { captureEnvironment } from "@/platform/environment"
import { runProvision } from "@/provision/provision"
import type { ProvisionSummary } from "@/provision/types"
import { httpKeyFetcher } from "@/repos/keys"

export interface ApplyCommandOptions {
	dryRun: boolean
	skipPackages: boolean
	skipRuntimes: boolean
	skipShell: boolean
	skipDotfiles: boolean
	manifest?: string
	source?: string
	forceSource: boolean
	nonInteractive: boolean
	verbose: boolean
}

export async function applyCommand(options: ApplyCommandOptions): Promise<void> {
	const settings = readEnvSettings()
	const interactive = !options.nonInteractive && Boolean(process.stdin.isTTY)

	consola.info(options.dryRun ? "rigup plan" : "rigup apply")

	const result = await runProvision(
		{
			allowNonWsl: settings.allowNonWsl,
			chezmoiConfigPath: settings.chezmoiConfig,
			cwd: process.cwd(),
			dryRun: options.dryRun,
			forceSource: options.forceSource,
			manifestDir: settings.manifestDir,
			manifestPath: options.manifest,
			skipDotfiles: options.skipDotfiles,
			skipPackages: options.skipPackages,
			skipRuntimes: options.skipRuntimes,
			skipShell: options.skipShell,
			source: options.source,
			sourceFromEnv: settings.dotfilesSource,
		},
		{
			confirmSourceSwitch: interactive ? confirmSourceSwitch : undefined,
			env: captureEnvironment(),
			fetchKey: httpKeyFetcher,
			now: () => new Date(),
			platform: await detectPlatform(),
			report: createConsolaReporter(),
			runner: createProcessRunner(),
		},
	)

	if (!result.ok) {
		printOutcome(CommandResult.failed(result.error.error, result.error.phase), options.verbose)
		return
	}

	printSummary(result.value, options.dryRun)
	printOutcome(CommandResult.completed(undefined), options.verbose)
}

async function confirmSourceSwitch(message: string): Promise<boolean> {
	const answer = await confirm({
		initialValue: false,
		message: `${message}\nSwitch anyway? The current source is backed up first.`,
	})
	return !isCancel(answer) && answer
}

export function formatSummary(summary: ProvisionSummary, dryRun: boolean): string[] {
	const lines = [
		dryRun
			? `Would make ${summary.planned} change(s); ${summary.present} item(s) already in place.`
			: `Made ${summary.changed} change(s); ${summary.present} item(s) already in place.`,
	]
	if (summary.optionalFailures > 0) {
		lines.push(`${summary.optionalFailures} optional package(s) unavailable.`)
	}
	if (summary.conflicts > 0) {
		lines.push(`${summary.conflicts} managed-source conflict(s) left as they were.`)
	}
	if (summary.warnings > 0) {
		lines.push(`${summary.warnings} warning(s).`)
	}
	return lines
}

function printSummary(summary: ProvisionSummary, dryRun: boolean): void {
	for (const line of formatSummary(summary, dryRun)) {
		consola.info(line)
	}
}
