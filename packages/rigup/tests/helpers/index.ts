/**
 * Test helpers barrel export
 *
 * @example
 * import { createFakeMachine, stepContext, withTempDir } from "@/tests/helpers"
 */

export * from "@/tests/helpers/assertions"
export * from "@/tests/helpers/builders"
export * from "@/tests/helpers/context"
export * from "@/tests/helpers/fs"
export * from "@/tests/helpers/machine"
export * from "@/tests/helpers/reporter"
