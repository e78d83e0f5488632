import type { Result } from "@rigup/core"
import type { PackageManagerId } from "@/manifest/types"
import { aptAdapter } from "@/packagers/apt"
import { scoopAdapter } from "@/packagers/scoop"
import type { PackageManagerAdapter } from "@/packagers/types"
import { wingetAdapter } from "@/packagers/winget"
import type { Platform } from "@/platform/detect"
import type { PreconditionError } from "@/types/errors"

const ADAPTERS: Record<PackageManagerId, PackageManagerAdapter> = {
	apt: aptAdapter,
	scoop: scoopAdapter,
	winget: wingetAdapter,
}

export function getPackageManager(id: PackageManagerId): PackageManagerAdapter {
	return ADAPTERS[id]
}

export function supportedPackageManagers(platform: Platform): PackageManagerId[] {
	return Object.values(ADAPTERS)
		.filter((adapter) => adapter.hosts.includes(platform.os))
		.map((adapter) => adapter.id)
}

/**
 * The manifest's package manager must be one this host can drive.
 */
export function resolvePackageManager(
	id: PackageManagerId,
	platform: Platform,
): Result<PackageManagerAdapter, PreconditionError> {
	const adapter = getPackageManager(id)
	if (!adapter.hosts.includes(platform.os)) {
		const supported = supportedPackageManagers(platform)
		return {
			error: {
				message: `Package manager '${id}' is not supported on ${platform.os}. Supported: ${
					supported.length > 0 ? supported.join(", ") : "none"
				}.`,
				target: "packageManager",
				type: "precondition",
			},
			ok: false,
		}
	}

	return { ok: true, value: adapter }
}
