import path from "node:path"
import { coerceAbsolutePath, type Result } from "@rigup/core"
import { readTextFileIfExists, safeStat } from "@/io/fs"
import { type ManifestParseResult, parseManifest } from "@/manifest/parse"
import { isDebianFamily, type Platform } from "@/platform/detect"
import type { LoadError, PreconditionError } from "@/types/errors"

export const WINDOWS_MANIFEST = "windows.packages.json"
export const UBUNTU_MANIFEST = "linux.ubuntu.packages.json"

export async function loadManifest(manifestPath: string): Promise<ManifestParseResult> {
	const contents = await readTextFileIfExists(manifestPath)
	if (!contents.ok) {
		return {
			error: {
				cause: contents.error,
				message: `Unable to read manifest ${manifestPath}.`,
				path: manifestPath,
				source: "manual",
				type: "load",
			},
			ok: false,
		}
	}

	if (contents.value === null) {
		return {
			error: {
				message: `Manifest not found: ${manifestPath}`,
				path: manifestPath,
				source: "manual",
				type: "load",
			},
			ok: false,
		}
	}

	return parseManifest(contents.value, manifestPath)
}

export interface ManifestLocation {
	override?: string
	cwd: string
	manifestDir: string
	platform: Platform
}

/**
 * An explicit path is tried as given, then against the working directory,
 * then against the manifest directory's parent. Without one, the platform's
 * default manifest in manifestDir is used.
 */
export async function resolveManifestPath(
	location: ManifestLocation,
): Promise<Result<string, LoadError | PreconditionError>> {
	const { override, cwd, manifestDir, platform } = location

	if (override) {
		const candidates = [cwd, path.dirname(manifestDir)].map((base) =>
			coerceAbsolutePath(override, base),
		)
		for (const candidate of candidates) {
			if (!candidate) continue
			const stats = await safeStat(candidate)
			if (stats.ok && stats.value?.isFile()) {
				return { ok: true, value: candidate }
			}
		}

		return {
			error: {
				message: `Manifest not found: ${override}`,
				path: override,
				source: "manual",
				type: "load",
			},
			ok: false,
		}
	}

	if (platform.os === "windows") {
		return { ok: true, value: path.join(manifestDir, WINDOWS_MANIFEST) }
	}

	if ((platform.os === "wsl" || platform.os === "linux") && isDebianFamily(platform)) {
		return { ok: true, value: path.join(manifestDir, UBUNTU_MANIFEST) }
	}

	return {
		error: {
			message: `No default manifest for this host (os=${platform.os}, ID='${platform.distroId ?? ""}', ID_LIKE='${platform.idLike ?? ""}'). Pass --manifest.`,
			target: "manifest",
			type: "precondition",
		},
		ok: false,
	}
}
