import { consola } from "consola"
import { createProcessRunner } from "@/exec/runner"
import { parsePackageReference, parseRuntimeSpec } from "@/manifest/parse"
import type { PackageManagerId } from "@/manifest/types"
import { getPackageManager, supportedPackageManagers } from "@/packagers/registry"
import { detectPlatform } from "@/platform/detect"
import { captureEnvironment } from "@/platform/environment"
import {
	isPackageInstalled,
	isRuntimeInstalled,
	resolveCommandPath,
	resolveRuntimeCommand,
} from "@/probe/probe"
import { httpKeyFetcher } from "@/repos/keys"
import type { StepContext } from "@/types/context"

export const PROBE_KINDS = ["package", "command", "runtime"] as const
export type ProbeKind = (typeof PROBE_KINDS)[number]

/**
 * Report whether one entity is present. Exit code 1 when it is not.
 */
export async function probeCommand(
	kind: string,
	name: string,
	options: { manager?: string },
): Promise<void> {
	const probeKind = PROBE_KINDS.find((known) => known === kind)
	if (!probeKind) {
		consola.error(`Unknown probe kind '${kind}'. Use one of: ${PROBE_KINDS.join(", ")}.`)
		process.exitCode = 1
		return
	}

	const platform = await detectPlatform()
	const ctx: StepContext = {
		dryRun: true,
		env: captureEnvironment(),
		fetchKey: httpKeyFetcher,
		now: () => new Date(),
		platform,
		report: (entry) => {
			if (entry.kind === "command") {
				consola.debug(`$ ${entry.message}`)
			}
		},
		runner: createProcessRunner(),
	}

	let present = false
	let detail = ""
	switch (probeKind) {
		case "command": {
			const resolved = await resolveCommandPath(name, ctx.env)
			present = resolved !== null
			detail = resolved ?? ""
			break
		}
		case "runtime": {
			const spec = parseRuntimeSpec(name)
			if (!spec) {
				consola.error(`'${name}' is not a runtime spec (name[@version]).`)
				process.exitCode = 1
				return
			}
			present = await isRuntimeInstalled(spec, ctx)
			detail = `command ${resolveRuntimeCommand(spec)}`
			break
		}
		case "package": {
			const ref = parsePackageReference(name)
			const manager = resolveManagerId(options.manager, ctx)
			if (!ref) {
				consola.error(`'${name}' is not a package reference (name or qualifier/name).`)
				process.exitCode = 1
				return
			}
			if (!manager) {
				const supported = supportedPackageManagers(platform)
				consola.error(
					`Package manager '${options.manager ?? ""}' is not available on ${platform.os}. Supported: ${supported.join(", ") || "none"}.`,
				)
				process.exitCode = 1
				return
			}
			present = await isPackageInstalled(ref, getPackageManager(manager), ctx)
			detail = `via ${manager}`
			break
		}
	}

	const suffix = detail ? ` (${detail})` : ""
	if (present) {
		consola.success(`${probeKind} ${name} is present${suffix}`)
	} else {
		consola.info(`${probeKind} ${name} is absent${suffix}`)
		process.exitCode = 1
	}
}

function resolveManagerId(
	requested: string | undefined,
	ctx: StepContext,
): PackageManagerId | null {
	const supported = supportedPackageManagers(ctx.platform)
	if (requested) {
		return supported.find((id) => id === requested) ?? null
	}
	return supported[0] ?? null
}
