import { coerceNonEmpty, type NonEmptyString, type Result } from "@rigup/core"
import { z } from "zod"
import type {
	Manifest,
	PackageReference,
	RepositorySource,
	RuntimeSpec,
} from "@/manifest/types"
import { PACKAGE_MANAGER_IDS } from "@/manifest/types"
import type { LoadError } from "@/types/errors"

export type ManifestParseResult = Result<Manifest, LoadError>

export const SOURCE_LINE_PLACEHOLDERS = ["arch", "codename"] as const

const PLACEHOLDER_PATTERN = /\{([^{}]*)\}/g

const trimmedString = z
	.string({ invalid_type_error: "must be a string.", required_error: "is required." })
	.transform((value, ctx): NonEmptyString => {
		const coerced = coerceNonEmpty(value)
		if (coerced === null) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must not be empty." })
			return z.NEVER
		}
		return coerced
	})

const packageReferenceSchema = trimmedString.transform(
	(value, ctx): PackageReference => {
		const parts = value.split("/")
		if (parts.length > 2) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: `"${value}" must be "name" or "qualifier/name".`,
			})
			return z.NEVER
		}

		const name = coerceNonEmpty(parts.length === 2 ? parts[1] : parts[0])
		const qualifier = parts.length === 2 ? coerceNonEmpty(parts[0]) : undefined
		if (name === null || qualifier === null) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: `"${value}" has an empty qualifier or name.`,
			})
			return z.NEVER
		}

		return qualifier ? { id: value, name, qualifier } : { id: value, name }
	},
)

const packageListSchema = z.array(packageReferenceSchema)

const sourceLineSchema = trimmedString.superRefine((value, ctx) => {
	for (const match of value.matchAll(PLACEHOLDER_PATTERN)) {
		const placeholder = match[1]
		if (!SOURCE_LINE_PLACEHOLDERS.some((known) => known === placeholder)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: `uses unknown placeholder {${placeholder}}; allowed: {arch}, {codename}.`,
			})
		}
	}
})

const repositorySchema = z
	.object({
		codenameAllowList: z.array(trimmedString).optional(),
		keyringPath: trimmedString,
		keyUrl: trimmedString,
		listPath: trimmedString,
		name: trimmedString,
		sourceLine: sourceLineSchema,
	})
	.strict()

const scriptInstallSchema = z
	.object({
		checkCommand: trimmedString,
		installCommand: trimmedString,
		name: trimmedString,
		phase: z
			.enum(["pre-runtime", "post-runtime"], {
				errorMap: () => ({ message: 'must be "pre-runtime" or "post-runtime".' }),
			})
			.default("pre-runtime"),
	})
	.strict()

const runtimeSpecSchema = trimmedString.transform((value, ctx): RuntimeSpec => {
	const separator = value.indexOf("@")
	const rawName = separator === -1 ? value : value.slice(0, separator)
	const name = coerceNonEmpty(rawName.toLowerCase())
	if (name === null) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			message: `"${value}" is missing a runtime name.`,
		})
		return z.NEVER
	}

	if (separator === -1) {
		return { name, raw: value }
	}

	const version = coerceNonEmpty(value.slice(separator + 1))
	if (version === null) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			message: `"${value}" has an empty version after "@".`,
		})
		return z.NEVER
	}

	return { name, raw: value, version }
})

const dotfilesSchema = z
	.object({
		email: trimmedString.optional(),
		name: trimmedString.optional(),
		source: trimmedString,
	})
	.strict()

const manifestSchema = z
	.object({
		$schema: z.string().optional(),
		aptRepositories: z.array(repositorySchema).optional(),
		dotfiles: dotfilesSchema.optional(),
		miseRuntimes: z.array(runtimeSpecSchema).optional(),
		optionalPackages: packageListSchema.optional(),
		packageManager: z.enum(["apt", "scoop", "winget"], {
			errorMap: (issue, ctx) =>
				issue.code === z.ZodIssueCode.invalid_type && ctx.data === undefined
					? { message: "is required." }
					: { message: `must be one of ${PACKAGE_MANAGER_IDS.join(", ")}.` },
		}),
		packages: packageListSchema.optional(),
		repositories: z.array(repositorySchema).optional(),
		runtimes: z.array(runtimeSpecSchema).optional(),
		scriptInstalls: z.array(scriptInstallSchema).optional(),
		systemPackages: packageListSchema.optional(),
	})
	.strict()
	.superRefine((value, ctx) => {
		const aliases: Array<[keyof typeof value, keyof typeof value]> = [
			["systemPackages", "packages"],
			["repositories", "aptRepositories"],
			["runtimes", "miseRuntimes"],
		]
		for (const [primary, legacy] of aliases) {
			if (hasEntries(value[primary]) && hasEntries(value[legacy])) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					message: `cannot be combined with "${primary}"; use "${primary}" only.`,
					path: [legacy],
				})
			}
		}

		const repositoryKey = hasEntries(value.repositories) ? "repositories" : "aptRepositories"
		const repositories = preferPrimary(value.repositories, value.aptRepositories)
		reportDuplicates(
			repositories.map((repository) => repository.name),
			repositoryKey,
			ctx,
		)
		reportDuplicates(
			(value.scriptInstalls ?? []).map((install) => install.name),
			"scriptInstalls",
			ctx,
		)
	})

type ParsedManifest = z.infer<typeof manifestSchema>

export function parseManifest(contents: string, sourcePath: string): ManifestParseResult {
	let raw: unknown
	try {
		raw = JSON.parse(contents)
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error)
		return {
			error: {
				message: `Invalid JSON in ${sourcePath}: ${reason}`,
				path: sourcePath,
				rawError: error instanceof Error ? error : undefined,
				source: "manual",
				type: "load",
			},
			ok: false,
		}
	}

	if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
		return {
			error: {
				message: `Manifest ${sourcePath} must be a JSON object.`,
				path: sourcePath,
				source: "manual",
				type: "load",
			},
			ok: false,
		}
	}

	const parsed = manifestSchema.safeParse(raw)
	if (!parsed.success) {
		const issue = parsed.error.issues[0]
		const key = issue ? formatIssuePath(issue.path) : "<root>"
		const detail = issue?.message ?? "is invalid."
		return {
			error: {
				key,
				message: `Invalid manifest ${sourcePath}: ${key} ${detail}`,
				path: sourcePath,
				source: "zod",
				type: "load",
				zodError: parsed.error,
			},
			ok: false,
		}
	}

	return { ok: true, value: toManifest(parsed.data, sourcePath) }
}

/**
 * Render a zod issue path the way it reads in the manifest: repositories[1].keyUrl
 */
export function formatIssuePath(issuePath: ReadonlyArray<string | number>): string {
	if (issuePath.length === 0) {
		return "<root>"
	}

	return issuePath
		.map((segment, index) =>
			typeof segment === "number"
				? `[${segment}]`
				: index === 0
					? segment
					: `.${segment}`,
		)
		.join("")
}

function toManifest(value: ParsedManifest, sourcePath: string): Manifest {
	const systemPackages = preferPrimary(value.systemPackages, value.packages)
	const repositories: RepositorySource[] = preferPrimary(
		value.repositories,
		value.aptRepositories,
	)

	return {
		dotfiles: value.dotfiles,
		optionalPackages: dedupePackages(value.optionalPackages ?? []),
		packageManager: value.packageManager,
		repositories,
		runtimes: preferPrimary(value.runtimes, value.miseRuntimes),
		scriptInstalls: value.scriptInstalls ?? [],
		sourcePath,
		systemPackages: dedupePackages(systemPackages),
	}
}

function dedupePackages(refs: readonly PackageReference[]): PackageReference[] {
	const seen = new Set<string>()
	const unique: PackageReference[] = []
	for (const ref of refs) {
		if (seen.has(ref.id)) {
			continue
		}
		seen.add(ref.id)
		unique.push(ref)
	}
	return unique
}

function reportDuplicates(names: readonly string[], key: string, ctx: z.RefinementCtx): void {
	const seen = new Set<string>()
	names.forEach((name, index) => {
		if (seen.has(name)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: `duplicates the name "${name}".`,
				path: [key, index, "name"],
			})
		}
		seen.add(name)
	})
}

function hasEntries(value: unknown): boolean {
	return Array.isArray(value) && value.length > 0
}

/**
 * An empty or missing primary key defers to its legacy alias.
 */
function preferPrimary<T>(primary: T[] | undefined, legacy: T[] | undefined): T[] {
	if (primary && primary.length > 0) {
		return primary
	}
	return legacy ?? primary ?? []
}

/**
 * Parse a single "qualifier/name" reference outside of a manifest.
 */
export function parsePackageReference(value: string): PackageReference | null {
	const parsed = packageReferenceSchema.safeParse(value)
	return parsed.success ? parsed.data : null
}

export function parseRuntimeSpec(value: string): RuntimeSpec | null {
	const parsed = runtimeSpecSchema.safeParse(value)
	return parsed.success ? parsed.data : null
}
