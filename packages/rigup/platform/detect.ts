import os from "node:os"
import { readTextFileIfExists } from "@/io/fs"

export type HostOs = "windows" | "wsl" | "linux" | "unsupported"

export interface Platform {
	os: HostOs
	arch: string
	isRoot: boolean
	user: string
	distroId?: string
	idLike?: string
	codename?: string
}

export interface HostFacts {
	nodePlatform: NodeJS.Platform
	nodeArch: string
	osRelease: Record<string, string> | null
	kernelRelease: string | null
	vars: Readonly<Record<string, string | undefined>>
	uid: number | null
	user: string
}

const DEBIAN_FAMILY = new Set(["ubuntu", "debian", "linuxmint", "pop"])

const ARCH_TOKENS: Record<string, string> = {
	arm: "armhf",
	arm64: "arm64",
	ia32: "i386",
	x64: "amd64",
}

/**
 * Parse /etc/os-release KEY=value lines, unquoting values.
 */
export function parseOsRelease(contents: string): Record<string, string> {
	const result: Record<string, string> = {}
	for (const rawLine of contents.split(/\r?\n/)) {
		const line = rawLine.trim()
		if (!line || line.startsWith("#")) {
			continue
		}

		const separator = line.indexOf("=")
		if (separator <= 0) {
			continue
		}

		const key = line.slice(0, separator)
		let value = line.slice(separator + 1)
		if (
			value.length >= 2 &&
			((value.startsWith('"') && value.endsWith('"')) ||
				(value.startsWith("'") && value.endsWith("'")))
		) {
			value = value.slice(1, -1)
		}
		result[key] = value
	}
	return result
}

export function isDebianFamily(platform: Platform): boolean {
	if (platform.distroId && DEBIAN_FAMILY.has(platform.distroId)) {
		return true
	}
	return platform.idLike?.split(/\s+/).includes("debian") ?? false
}

export function classifyHost(facts: HostFacts): Platform {
	const arch = ARCH_TOKENS[facts.nodeArch] ?? facts.nodeArch
	const isRoot = facts.uid === 0
	const base = { arch, isRoot, user: facts.user }

	if (facts.nodePlatform === "win32") {
		return { ...base, os: "windows" }
	}

	if (facts.nodePlatform !== "linux") {
		return { ...base, os: "unsupported" }
	}

	const release = facts.osRelease ?? {}
	const distroFields = {
		codename: release.VERSION_CODENAME || release.UBUNTU_CODENAME || undefined,
		distroId: release.ID?.toLowerCase() || undefined,
		idLike: release.ID_LIKE?.toLowerCase() || undefined,
	}

	const isWsl =
		Boolean(facts.vars.WSL_DISTRO_NAME) ||
		Boolean(facts.vars.WSL_INTEROP) ||
		/microsoft|wsl/i.test(facts.kernelRelease ?? "")

	return { ...base, ...distroFields, os: isWsl ? "wsl" : "linux" }
}

export async function detectPlatform(): Promise<Platform> {
	const osRelease = await readOptional("/etc/os-release")
	const kernelRelease = await readOptional("/proc/sys/kernel/osrelease")

	return classifyHost({
		kernelRelease,
		nodeArch: process.arch,
		nodePlatform: process.platform,
		osRelease: osRelease === null ? null : parseOsRelease(osRelease),
		uid: typeof process.getuid === "function" ? process.getuid() : null,
		user: process.env.USER ?? process.env.USERNAME ?? os.userInfo().username,
		vars: process.env,
	})
}

async function readOptional(targetPath: string): Promise<string | null> {
	if (process.platform !== "linux") {
		return null
	}

	const contents = await readTextFileIfExists(targetPath)
	return contents.ok ? contents.value : null
}
