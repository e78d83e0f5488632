import type { CommandRunner } from "@/exec/runner"
import type { Platform } from "@/platform/detect"
import type { ProcessEnvironment } from "@/platform/environment"
import type { KeyFetcher } from "@/repos/keys"
import type { PhaseName, Reporter } from "@/types/context"
import type { RigupError } from "@/types/errors"

export interface ProvisionOptions {
	dryRun: boolean
	skipPackages: boolean
	skipRuntimes: boolean
	skipShell: boolean
	skipDotfiles: boolean
	/** --manifest, resolved against cwd and then manifestDir's parent. */
	manifestPath?: string
	manifestDir: string
	cwd: string
	/** --source, which wins over sourceFromEnv and the manifest. */
	source?: string
	sourceFromEnv?: string
	forceSource: boolean
	/** Permit Debian-family Linux outside WSL. */
	allowNonWsl: boolean
	chezmoiConfigPath?: string
}

export interface ProvisionDeps {
	platform: Platform
	env: ProcessEnvironment
	runner: CommandRunner
	report: Reporter
	fetchKey: KeyFetcher
	now: () => Date
	confirmSourceSwitch?: (message: string) => Promise<boolean>
}

export interface ProvisionSummary {
	manifestPath: string | null
	phases: PhaseName[]
	/** Mutating actions that ran. */
	changed: number
	/** Mutating actions withheld by dry-run. */
	planned: number
	present: number
	optionalFailures: number
	conflicts: number
	warnings: number
}

export interface ProvisionError {
	phase: PhaseName
	error: RigupError
}
