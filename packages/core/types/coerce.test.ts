import { describe, expect, it } from "vitest"
import {
	coerceAbsolutePath,
	coerceAbsolutePathDirect,
	coerceGitUrl,
	coerceNonEmpty,
	isGitUrl,
	isSameGitRemote,
} from "./coerce"

describe("coerceNonEmpty", () => {
	it("trims surrounding whitespace", () => {
		expect(coerceNonEmpty("  git  ")).toBe("git")
	})

	it("rejects blank strings", () => {
		expect(coerceNonEmpty("   ")).toBeNull()
	})
})

describe("coerceAbsolutePath", () => {
	it("normalizes absolute paths", () => {
		expect(coerceAbsolutePath("/etc/apt/../apt/keyrings")).toBe("/etc/apt/keyrings")
	})

	it("resolves relative paths against a base", () => {
		expect(coerceAbsolutePath("manifests/a.json", "/repo")).toBe("/repo/manifests/a.json")
	})

	it("rejects relative paths without a base", () => {
		expect(coerceAbsolutePath("manifests/a.json")).toBeNull()
	})
})

describe("coerceAbsolutePathDirect", () => {
	it("rejects relative paths", () => {
		expect(coerceAbsolutePathDirect("relative")).toBeNull()
	})
})

describe("coerceGitUrl", () => {
	it("converts ssh remotes to https", () => {
		expect(coerceGitUrl("git@github.com:someone/dotfiles.git")).toBe(
			"https://github.com/someone/dotfiles",
		)
	})

	it("strips a trailing .git from https remotes", () => {
		expect(coerceGitUrl("https://GitHub.com/someone/dotfiles.git")).toBe(
			"https://github.com/someone/dotfiles",
		)
	})

	it("rejects local paths", () => {
		expect(coerceGitUrl("/home/someone/dotfiles")).toBeNull()
		expect(isGitUrl("C:\\Users\\someone\\dotfiles")).toBe(false)
	})
})

describe("isSameGitRemote", () => {
	it("matches ssh and https forms of one repository", () => {
		expect(
			isSameGitRemote(
				"git@github.com:someone/dotfiles.git",
				"https://github.com/someone/dotfiles",
			),
		).toBe(true)
	})

	it("distinguishes different repositories", () => {
		expect(
			isSameGitRemote(
				"https://github.com/someone/dotfiles",
				"https://github.com/someone/other-dotfiles",
			),
		).toBe(false)
	})
})
