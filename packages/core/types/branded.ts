/**
 * Branded types used across rigup.
 *
 * Only the coercion functions in ./coerce should create branded values.
 */

declare const NonEmptyStringBrand: unique symbol
declare const AbsolutePathBrand: unique symbol
declare const GitUrlBrand: unique symbol

type Brand<T, B extends symbol> = T & { readonly [K in B]: true }

/**
 * A non-empty, trimmed string.
 */
export type NonEmptyString = Brand<string, typeof NonEmptyStringBrand>

/**
 * An absolute, normalized filesystem path.
 */
export type AbsolutePath = Brand<string, typeof AbsolutePathBrand>

/**
 * A git remote in canonical https form, without a trailing .git.
 */
export type GitUrl = Brand<string, typeof GitUrlBrand>
