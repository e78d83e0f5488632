import type { AbsolutePath, BaseError } from "@rigup/core"
import type { ZodError } from "zod"

export type EntityKind =
	| "package"
	| "bucket"
	| "repository"
	| "index"
	| "script"
	| "runtime"
	| "shell"
	| "config"
	| "source"

export interface EntityRef {
	kind: EntityKind
	name: string
}

export type LoadError =
	| (BaseError & {
			type: "load"
			source: "zod"
			path: string
			key: string
			zodError: ZodError
	  })
	| (BaseError & {
			type: "load"
			source: "manual"
			path: string
			key?: string
	  })

export interface PreconditionError extends BaseError {
	type: "precondition"
	target: string
}

export interface MandatoryStepError extends BaseError {
	type: "mandatory_step"
	entity: EntityRef
	exitCode?: number
}

export interface MissingRuntime {
	runtime: string
	command: string
	diagnostic: string
}

export interface RuntimeValidationError extends BaseError {
	type: "runtime_validation"
	missing: MissingRuntime[]
}

export interface IoError extends BaseError {
	type: "io"
	path: AbsolutePath
	operation: string
}

export interface ParseError extends BaseError {
	type: "parse"
	source: string
	path?: AbsolutePath
}

export interface SpawnError extends BaseError {
	type: "spawn"
	command: string
}

export type RigupError =
	| LoadError
	| PreconditionError
	| MandatoryStepError
	| RuntimeValidationError
	| IoError
	| ParseError
	| SpawnError
