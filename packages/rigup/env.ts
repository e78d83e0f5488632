import path from "node:path"

export interface EnvSettings {
	manifestDir: string
	dotfilesSource?: string
	chezmoiConfig?: string
	allowNonWsl: boolean
}

/**
 * Settings taken from RIGUP_* variables. Empty values count as unset.
 */
export function readEnvSettings(
	vars: NodeJS.ProcessEnv = process.env,
	cwd: string = process.cwd(),
): EnvSettings {
	const value = (key: string) => {
		const raw = vars[key]?.trim()
		return raw ? raw : undefined
	}

	const manifestDir = value("RIGUP_MANIFEST_DIR")
	return {
		allowNonWsl: value("RIGUP_ALLOW_NON_WSL") === "1",
		chezmoiConfig: value("RIGUP_CHEZMOI_CONFIG"),
		dotfilesSource: value("RIGUP_DOTFILES_SOURCE"),
		manifestDir: manifestDir ? path.resolve(cwd, manifestDir) : path.join(cwd, "manifests"),
	}
}
