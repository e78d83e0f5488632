import { Command } from "commander"
import { consola } from "consola"
import { type ApplyCommandOptions, applyCommand } from "@/commands/apply"
import { probeCommand } from "@/commands/probe"
import pkg from "./package.json" with { type: "json" }

interface ApplyFlags {
	dryRun?: boolean
	skipPackages?: boolean
	skipRuntimes?: boolean
	skipShell?: boolean
	skipDotfiles?: boolean
	manifest?: string
	source?: string
	forceSource?: boolean
	nonInteractive?: boolean
	verbose?: boolean
}

function withApplyOptions(command: Command): Command {
	return command
		.option("--skip-packages", "Skip repositories and package installs")
		.option("--skip-runtimes", "Skip runtime installs and PATH validation")
		.option("--skip-shell", "Leave the default login shell alone")
		.option("--skip-dotfiles", "Skip managed dotfiles")
		.option("--manifest <path>", "Manifest to apply instead of the platform default")
		.option("--source <pathOrUrl>", "Managed dotfiles source (directory or git URL)")
		.option("--force-source", "Switch the managed source even over a custom or remote one")
		.option("--non-interactive", "Run without prompts")
		.option("--verbose", "Echo every command before it runs")
}

function toApplyOptions(flags: ApplyFlags, dryRun: boolean): ApplyCommandOptions {
	return {
		dryRun,
		forceSource: Boolean(flags.forceSource),
		manifest: flags.manifest,
		nonInteractive: Boolean(flags.nonInteractive),
		skipDotfiles: Boolean(flags.skipDotfiles),
		skipPackages: Boolean(flags.skipPackages),
		skipRuntimes: Boolean(flags.skipRuntimes),
		skipShell: Boolean(flags.skipShell),
		source: flags.source,
		verbose: Boolean(flags.verbose),
	}
}

async function main(): Promise<void> {
	const program = new Command()

	program
		.name("rigup")
		.description("Provision a workstation from a declarative manifest")
		.version(pkg.version, "-V, --version", "Output the version number")
		.showHelpAfterError()
		.showSuggestionAfterError()

	withApplyOptions(
		program
			.command("apply")
			.description("Bring this machine to the state the manifest declares")
			.option("--dry-run", "Report what would change without changing anything"),
	).action(async (flags: ApplyFlags) => {
		setVerbosity(flags.verbose)
		await applyCommand(toApplyOptions(flags, Boolean(flags.dryRun)))
	})

	withApplyOptions(
		program.command("plan").description("Same as apply --dry-run"),
	).action(async (flags: ApplyFlags) => {
		setVerbosity(flags.verbose)
		await applyCommand(toApplyOptions(flags, true))
	})

	program
		.command("probe")
		.description("Check whether a package, command or runtime is present")
		.argument("<kind>", "package, command or runtime")
		.argument("<name>", "Package reference, command name or runtime spec")
		.option("--manager <id>", "Package manager to ask (apt, scoop, winget)")
		.option("--verbose", "Echo the query command")
		.action(
			async (kind: string, name: string, options: { manager?: string; verbose?: boolean }) => {
				setVerbosity(options.verbose)
				await probeCommand(kind, name, { manager: options.manager })
			},
		)

	if (process.argv.length <= 2) {
		program.outputHelp()
		return
	}

	await program.parseAsync(process.argv)
}

function setVerbosity(verbose: boolean | undefined): void {
	if (verbose) {
		consola.level = 4
	}
}

main().catch((error: unknown) => {
	consola.error(error)
	process.exitCode = 1
})
