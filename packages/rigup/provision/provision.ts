import type { Result } from "@rigup/core"
import { defaultConfigPath } from "@/config/chezmoi"
import { createPackageIndex } from "@/install/index"
import { installMandatory, installOptional, prepareSources } from "@/install/packages"
import { runScriptInstalls, type ScriptReport } from "@/install/scripts"
import { loadManifest, resolveManifestPath } from "@/manifest/load"
import type { Manifest, ScriptPhase } from "@/manifest/types"
import { resolvePackageManager } from "@/packagers/registry"
import type { PackageManagerAdapter } from "@/packagers/types"
import { isDebianFamily } from "@/platform/detect"
import { refreshEnvironment } from "@/platform/environment"
import { isCommandOnPath } from "@/probe/probe"
import type {
	ProvisionDeps,
	ProvisionError,
	ProvisionOptions,
	ProvisionSummary,
} from "@/provision/types"
import { ensureRepositories } from "@/repos/configure"
import { reconcileRuntimes } from "@/runtimes/mise"
import { ensureDefaultShell } from "@/shell/default-shell"
import { DOTFILES_ENGINE, parseDesiredSource } from "@/source/detect"
import { reconcileManagedSource } from "@/source/reconcile"
import type { PhaseName, Reporter, RunContext, StepContext } from "@/types/context"
import type { MandatoryStepError, PreconditionError, RigupError } from "@/types/errors"

export type ProvisionResult = Result<ProvisionSummary, ProvisionError>

/**
 * Run every phase in order. The first fatal error ends the run; what was
 * already applied stays applied, and a corrected rerun picks up from there.
 */
export async function runProvision(
	options: ProvisionOptions,
	deps: ProvisionDeps,
): Promise<ProvisionResult> {
	const summary: ProvisionSummary = {
		changed: 0,
		conflicts: 0,
		manifestPath: null,
		optionalFailures: 0,
		phases: [],
		planned: 0,
		present: 0,
		warnings: 0,
	}

	const run: RunContext = {
		dryRun: options.dryRun,
		fetchKey: deps.fetchKey,
		now: deps.now,
		platform: deps.platform,
		report: tally(deps.report, summary),
		runner: deps.runner,
	}
	let env = deps.env

	const enter = (phase: PhaseName, message: string): StepContext => {
		summary.phases.push(phase)
		run.report({ kind: "phase", message, phase })
		return { ...run, env }
	}
	const fail = (phase: PhaseName, error: RigupError): ProvisionResult => ({
		error: { error, phase },
		ok: false,
	})
	const refresh = async () => {
		const refreshed = await refreshEnvironment(env)
		env = refreshed.env
		if (refreshed.added.length > 0) {
			run.report({ kind: "info", message: `added to PATH: ${refreshed.added.join(", ")}` })
		}
	}

	// === PREFLIGHT ===
	enter("preflight", "Checking platform")
	const supported = checkPlatform(options, deps)
	if (!supported.ok) {
		return fail("preflight", supported.error)
	}
	if (options.dryRun) {
		run.report({ kind: "info", message: "Dry run: no changes will be made." })
	}

	// === MANIFEST ===
	const manifestCtx = enter("manifest", "Loading manifest")
	const manifestPath = await resolveManifestPath({
		cwd: options.cwd,
		manifestDir: options.manifestDir,
		override: options.manifestPath,
		platform: deps.platform,
	})
	if (!manifestPath.ok) {
		return fail("manifest", manifestPath.error)
	}
	summary.manifestPath = manifestPath.value

	const loaded = await loadManifest(manifestPath.value)
	if (!loaded.ok) {
		return fail("manifest", loaded.error)
	}
	const manifest = loaded.value
	run.report({ kind: "info", message: `Using manifest ${manifest.sourcePath}` })

	const resolved = resolvePackageManager(manifest.packageManager, deps.platform)
	if (!resolved.ok) {
		return fail("manifest", resolved.error)
	}

	let adapter: PackageManagerAdapter | null = null
	if (!options.skipPackages) {
		adapter = resolved.value
		const tools = await checkRequiredTools(manifest, adapter, manifestCtx)
		if (!tools.ok) {
			return fail("manifest", tools.error)
		}
	}

	// === PACKAGES ===
	if (adapter) {
		const ctx = enter("packages", `Installing packages with ${adapter.id}`)
		const index = createPackageIndex(adapter)
		const installer = { adapter, index }

		const sources = await prepareSources(
			[...manifest.systemPackages, ...manifest.optionalPackages],
			installer,
			ctx,
		)
		if (!sources.ok) {
			return fail("packages", sources.error)
		}

		if (manifest.repositories.length > 0) {
			if (adapter.id === "apt") {
				const repos = await ensureRepositories(manifest.repositories, ctx)
				if (!repos.ok) {
					return fail("packages", repos.error)
				}
				if (repos.value.changed) {
					index.invalidate()
					const fresh = await index.ensureFresh(ctx)
					if (!fresh.ok) {
						return fail("packages", fresh.error)
					}
				}
			} else {
				run.report({
					kind: "warning",
					message: `Ignoring ${manifest.repositories.length} repository source(s): only apt uses them.`,
				})
			}
		}

		const mandatory = await installMandatory(manifest.systemPackages, installer, ctx)
		if (!mandatory.ok) {
			return fail("packages", mandatory.error)
		}
		await installOptional(manifest.optionalPackages, installer, ctx)
		await refresh()
	} else {
		run.report({ kind: "info", message: "Skipping packages (--skip-packages)." })
	}

	// === SCRIPTS AND RUNTIMES ===
	const preScripts = await runScripts("pre-runtime", manifest, enter)
	if (!preScripts.ok) {
		return fail("scripts:pre-runtime", preScripts.error)
	}
	await refresh()

	if (!options.skipRuntimes) {
		const ctx = enter("runtimes", "Installing runtimes")
		const runtimes = await reconcileRuntimes(manifest.runtimes, ctx)
		if (!runtimes.ok) {
			return fail("runtimes", runtimes.error)
		}
		env = runtimes.value.env
		await refresh()
	} else {
		run.report({ kind: "info", message: "Skipping runtimes (--skip-runtimes)." })
	}

	const postScripts = await runScripts("post-runtime", manifest, enter)
	if (!postScripts.ok) {
		return fail("scripts:post-runtime", postScripts.error)
	}
	await refresh()

	// === SHELL ===
	if (!options.skipShell && deps.platform.os !== "windows") {
		const ctx = enter("shell", "Checking default shell")
		await ensureDefaultShell(ctx)
	}

	// === DOTFILES ===
	if (options.skipDotfiles) {
		run.report({ kind: "info", message: "Skipping dotfiles (--skip-dotfiles)." })
		return { ok: true, value: summary }
	}

	const rawSource = options.source ?? options.sourceFromEnv ?? manifest.dotfiles?.source
	if (!rawSource) {
		run.report({ kind: "info", message: "No managed dotfiles source configured; skipping." })
		return { ok: true, value: summary }
	}

	const ctx = enter("dotfiles", `Reconciling dotfiles with ${DOTFILES_ENGINE}`)
	if (!(await isCommandOnPath(DOTFILES_ENGINE, env))) {
		if (options.dryRun) {
			run.report({
				kind: "warning",
				message: `${DOTFILES_ENGINE} is not on PATH yet; skipping dotfiles in dry run.`,
			})
			return { ok: true, value: summary }
		}
		return fail("dotfiles", missingTool(DOTFILES_ENGINE, "to apply managed dotfiles"))
	}

	const source = await reconcileManagedSource(
		parseDesiredSource(rawSource, options.cwd, ctx),
		{
			configPath: options.chezmoiConfigPath ?? defaultConfigPath(env),
			confirmSwitch: options.forceSource ? undefined : deps.confirmSourceSwitch,
			force: options.forceSource,
			identity: { email: manifest.dotfiles?.email, name: manifest.dotfiles?.name },
		},
		ctx,
	)
	if (!source.ok) {
		return fail("dotfiles", source.error)
	}

	return { ok: true, value: summary }
}

/**
 * Windows, WSL, or (when allowed) plain Linux of the Debian family.
 */
export function checkPlatform(
	options: Pick<ProvisionOptions, "allowNonWsl">,
	deps: Pick<ProvisionDeps, "platform">,
): Result<void, PreconditionError> {
	const { platform } = deps
	if (platform.os === "windows") {
		return { ok: true, value: undefined }
	}

	if (platform.os === "unsupported") {
		return {
			error: {
				message: "Unsupported platform: rigup runs on Windows or on Ubuntu under WSL2.",
				target: "platform",
				type: "precondition",
			},
			ok: false,
		}
	}

	if (platform.os === "linux" && !options.allowNonWsl) {
		return {
			error: {
				message:
					"This Linux host is not WSL. Set RIGUP_ALLOW_NON_WSL=1 to provision it anyway.",
				target: "platform",
				type: "precondition",
			},
			ok: false,
		}
	}

	if (!isDebianFamily(platform)) {
		return {
			error: {
				message: `Unsupported distribution '${platform.distroId ?? "unknown"}': a Debian-family distribution is required.`,
				target: "platform",
				type: "precondition",
			},
			ok: false,
		}
	}

	return { ok: true, value: undefined }
}

async function checkRequiredTools(
	manifest: Manifest,
	adapter: PackageManagerAdapter,
	ctx: StepContext,
): Promise<Result<void, PreconditionError>> {
	if (!(await isCommandOnPath(adapter.binary, ctx.env))) {
		return {
			error: missingTool(adapter.binary, `for packageManager '${adapter.id}'`),
			ok: false,
		}
	}

	if (adapter.id === "apt" && manifest.repositories.length > 0) {
		if (!(await isCommandOnPath("gpg", ctx.env))) {
			return { error: missingTool("gpg", "to install repository signing keys"), ok: false }
		}
	}

	return { ok: true, value: undefined }
}

function missingTool(tool: string, purpose: string): PreconditionError {
	return {
		message: `Required tool '${tool}' was not found on PATH (needed ${purpose}).`,
		target: tool,
		type: "precondition",
	}
}

async function runScripts(
	phase: ScriptPhase,
	manifest: Manifest,
	enter: (phase: PhaseName, message: string) => StepContext,
): Promise<Result<ScriptReport | null, MandatoryStepError>> {
	const installs = manifest.scriptInstalls.filter((install) => install.phase === phase)
	if (installs.length === 0) {
		return { ok: true, value: null }
	}

	const ctx = enter(`scripts:${phase}`, `Running ${phase} script installs`)
	return runScriptInstalls(phase, installs, ctx)
}

/**
 * Count report entries into the summary on their way to the real reporter.
 */
function tally(report: Reporter, summary: ProvisionSummary): Reporter {
	return (entry) => {
		switch (entry.kind) {
			case "changed":
				summary.changed += 1
				break
			case "planned":
				summary.planned += 1
				break
			case "present":
				summary.present += 1
				break
			case "warning":
				summary.warnings += 1
				break
			case "optional_failure":
				summary.optionalFailures += 1
				break
			case "conflict":
				summary.conflicts += 1
				break
		}
		report(entry)
	}
}
