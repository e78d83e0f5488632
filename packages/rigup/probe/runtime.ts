import type { RuntimeSpec } from "@/manifest/types"

const COMMAND_OVERRIDES = new Map([
	["python", "python"],
	["rust", "rustc"],
])

/**
 * The command that proves a runtime is usable: rust→rustc, python→python,
 * otherwise the runtime's own name.
 */
export function resolveRuntimeCommand(spec: RuntimeSpec): string {
	return COMMAND_OVERRIDES.get(spec.name) ?? spec.name
}
