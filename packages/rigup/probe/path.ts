import path from "node:path"
import { isExecutableFile } from "@/io/fs"
import type { ProcessEnvironment } from "@/platform/environment"

const DEFAULT_PATHEXT = ".COM;.EXE;.BAT;.CMD"

/**
 * Find an executable for `name` on the environment's PATH. Names that already
 * contain a directory separator are checked as paths.
 */
export async function resolveCommandPath(
	name: string,
	env: ProcessEnvironment,
): Promise<string | null> {
	const pathApi = env.platform === "win32" ? path.win32 : path.posix
	const extensions = executableExtensions(name, env)

	if (name.includes("/") || (env.platform === "win32" && name.includes("\\"))) {
		for (const extension of extensions) {
			if (await isExecutableFile(`${name}${extension}`)) {
				return `${name}${extension}`
			}
		}
		return null
	}

	for (const directory of env.pathEntries) {
		for (const extension of extensions) {
			const candidate = pathApi.join(directory, `${name}${extension}`)
			if (await isExecutableFile(candidate)) {
				return candidate
			}
		}
	}

	return null
}

export async function isCommandOnPath(name: string, env: ProcessEnvironment): Promise<boolean> {
	return (await resolveCommandPath(name, env)) !== null
}

function executableExtensions(name: string, env: ProcessEnvironment): string[] {
	if (env.platform !== "win32") {
		return [""]
	}

	const pathExt = (env.vars.PATHEXT ?? DEFAULT_PATHEXT)
		.split(";")
		.filter((extension) => extension.length > 0)
	const hasExtension = pathExt.some((extension) =>
		name.toLowerCase().endsWith(extension.toLowerCase()),
	)
	return hasExtension ? [""] : ["", ...pathExt]
}
