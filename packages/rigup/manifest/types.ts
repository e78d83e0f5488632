import type { NonEmptyString } from "@rigup/core"

export type PackageManagerId = "apt" | "scoop" | "winget"

export const PACKAGE_MANAGER_IDS: readonly PackageManagerId[] = ["apt", "scoop", "winget"]

export type ScriptPhase = "pre-runtime" | "post-runtime"

/**
 * A package name plus an optional grouping qualifier: a scoop bucket, a winget
 * source or an apt target release. Identity is `id`.
 */
export interface PackageReference {
	readonly id: NonEmptyString
	readonly name: NonEmptyString
	readonly qualifier?: NonEmptyString
}

export interface RepositorySource {
	readonly name: NonEmptyString
	readonly keyUrl: NonEmptyString
	readonly keyringPath: NonEmptyString
	/** May contain {arch} and {codename} placeholders. */
	readonly sourceLine: NonEmptyString
	readonly listPath: NonEmptyString
	readonly codenameAllowList?: readonly NonEmptyString[]
}

export interface ScriptInstall {
	readonly name: NonEmptyString
	readonly checkCommand: NonEmptyString
	readonly installCommand: NonEmptyString
	readonly phase: ScriptPhase
}

export interface RuntimeSpec {
	/** As written in the manifest, e.g. "node@lts". */
	readonly raw: NonEmptyString
	/** Lower-cased tool name. */
	readonly name: NonEmptyString
	readonly version?: NonEmptyString
}

export interface DotfilesSettings {
	readonly source: NonEmptyString
	readonly name?: NonEmptyString
	readonly email?: NonEmptyString
}

export interface Manifest {
	readonly packageManager: PackageManagerId
	readonly systemPackages: readonly PackageReference[]
	readonly optionalPackages: readonly PackageReference[]
	readonly repositories: readonly RepositorySource[]
	readonly scriptInstalls: readonly ScriptInstall[]
	readonly runtimes: readonly RuntimeSpec[]
	readonly dotfiles?: DotfilesSettings
	readonly sourcePath: string
}
