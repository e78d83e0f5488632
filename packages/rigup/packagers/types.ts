import type { CommandOutcome, CommandSpec } from "@/exec/runner"
import type { PackageManagerId, PackageReference } from "@/manifest/types"
import type { HostOs } from "@/platform/detect"

/**
 * The only place native package-manager syntax lives.
 */
export interface PackageManagerAdapter {
	readonly id: PackageManagerId
	/** Must be on PATH before any package work starts. */
	readonly binary: string
	readonly hosts: readonly HostOs[]
	/** Mutations need root (sudo when not already root). */
	readonly privileged: boolean
	queryCommand(ref: PackageReference): CommandSpec
	interpretQuery(outcome: CommandOutcome): boolean
	installCommand(ref: PackageReference): CommandSpec
	refreshIndexCommand(): CommandSpec | null
	sources?: SourceSupport
}

/**
 * Package sources a manager must know about before qualified packages install,
 * e.g. scoop buckets.
 */
export interface SourceSupport {
	sourceFor(ref: PackageReference): string | null
	listCommand(): CommandSpec
	parseList(stdout: string): string[]
	addCommand(source: string): CommandSpec
}
