import path from "node:path"
import { isSameGitRemote } from "@rigup/core"

export type ManagedSourceState =
	/** Nothing usable at `path`, the location a first run would use. */
	| { kind: "unconfigured"; path: string }
	| { kind: "local"; path: string; managedTargets: boolean }
	| { kind: "remote"; path: string; origin: string }

export type DesiredSource = { kind: "local"; path: string } | { kind: "remote"; origin: string }

export type SwitchReason = "default-location" | "no-managed-targets" | "forced"

export type SourcePlan =
	| { action: "init"; desired: DesiredSource }
	| { action: "keep"; state: Exclude<ManagedSourceState, { kind: "unconfigured" }> }
	| {
			action: "switch"
			from: Exclude<ManagedSourceState, { kind: "unconfigured" }>
			desired: DesiredSource
			reason: SwitchReason
			/** The current source directory is moved aside before switching. */
			backup: boolean
	  }
	| {
			action: "conflict"
			state: Exclude<ManagedSourceState, { kind: "unconfigured" }>
			desired: DesiredSource
			message: string
	  }

export interface TransitionOptions {
	defaultPath: string
	force: boolean
	/** Case-insensitive path comparison. */
	caseInsensitive?: boolean
}

/**
 * Decide which source the dotfiles engine should use. An operator's custom
 * local source and an existing remote origin are kept unless `force` is set.
 */
export function planSourceTransition(
	state: ManagedSourceState,
	desired: DesiredSource,
	options: TransitionOptions,
): SourcePlan {
	if (state.kind === "unconfigured") {
		return { action: "init", desired }
	}

	if (isSameSource(state, desired, options)) {
		return { action: "keep", state }
	}

	if (state.kind === "local") {
		if (samePath(state.path, options.defaultPath, options.caseInsensitive)) {
			return {
				action: "switch",
				backup: true,
				desired,
				from: state,
				reason: "default-location",
			}
		}
		if (!state.managedTargets) {
			return {
				action: "switch",
				backup: false,
				desired,
				from: state,
				reason: "no-managed-targets",
			}
		}
	}

	if (options.force) {
		return { action: "switch", backup: true, desired, from: state, reason: "forced" }
	}

	return { action: "conflict", desired, message: conflictMessage(state, desired), state }
}

export function describeSource(source: ManagedSourceState | DesiredSource): string {
	switch (source.kind) {
		case "unconfigured":
			return `nothing at ${source.path}`
		case "local":
			return source.path
		case "remote":
			return source.origin
	}
}

export function samePath(a: string, b: string, caseInsensitive = false): boolean {
	const left = path.resolve(a).replace(/[\\/]+$/, "")
	const right = path.resolve(b).replace(/[\\/]+$/, "")
	return caseInsensitive ? left.toLowerCase() === right.toLowerCase() : left === right
}

function isSameSource(
	state: Exclude<ManagedSourceState, { kind: "unconfigured" }>,
	desired: DesiredSource,
	options: TransitionOptions,
): boolean {
	if (state.kind === "local" && desired.kind === "local") {
		return samePath(state.path, desired.path, options.caseInsensitive)
	}
	if (state.kind === "remote" && desired.kind === "remote") {
		return isSameGitRemote(state.origin, desired.origin)
	}
	return false
}

function conflictMessage(
	state: Exclude<ManagedSourceState, { kind: "unconfigured" }>,
	desired: DesiredSource,
): string {
	const current =
		state.kind === "remote"
			? `was initialized from ${state.origin}`
			: `is the custom directory ${state.path}`
	return `Managed source ${current}; keeping it instead of switching to ${describeSource(desired)}. Pass --force-source to switch.`
}
