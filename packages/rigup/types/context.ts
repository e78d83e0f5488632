import type { CommandRunner } from "@/exec/runner"
import type { KeyFetcher } from "@/repos/keys"
import type { Platform } from "@/platform/detect"
import type { ProcessEnvironment } from "@/platform/environment"
import type { EntityRef } from "@/types/errors"

export type PhaseName =
	| "preflight"
	| "manifest"
	| "packages"
	| "scripts:pre-runtime"
	| "runtimes"
	| "scripts:post-runtime"
	| "shell"
	| "dotfiles"

export type ReportEntry =
	| { kind: "phase"; phase: PhaseName; message: string }
	/** Entity already in the desired state; nothing was done. */
	| { kind: "present"; entity: EntityRef; message: string }
	/** A mutating action ran. */
	| { kind: "changed"; entity: EntityRef; message: string }
	/** A mutating action that dry-run withheld. */
	| { kind: "planned"; entity: EntityRef; message: string }
	| { kind: "warning"; entity?: EntityRef; message: string }
	| { kind: "optional_failure"; entity: EntityRef; message: string }
	| { kind: "conflict"; entity: EntityRef; message: string }
	| { kind: "info"; message: string }
	| { kind: "command"; message: string }

export type Reporter = (entry: ReportEntry) => void

export interface RunContext {
	dryRun: boolean
	platform: Platform
	runner: CommandRunner
	report: Reporter
	fetchKey: KeyFetcher
	now: () => Date
}

/**
 * A RunContext bound to the environment of the current phase.
 */
export interface StepContext extends RunContext {
	env: ProcessEnvironment
}
