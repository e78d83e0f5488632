import { describe, expect, it } from "vitest"
import { resolvePackageManager, supportedPackageManagers } from "@/packagers/registry"
import { wingetAdapter } from "@/packagers/winget"
import { packageRef, wslPlatform } from "@/tests/helpers"

const windows = wslPlatform({ codename: undefined, distroId: undefined, os: "windows" })

describe("supportedPackageManagers", () => {
	it("offers apt under WSL and scoop or winget on Windows", () => {
		expect(supportedPackageManagers(wslPlatform())).toEqual(["apt"])
		expect(supportedPackageManagers(windows)).toEqual(["scoop", "winget"])
		expect(supportedPackageManagers(wslPlatform({ os: "unsupported" }))).toEqual([])
	})
})

describe("resolvePackageManager", () => {
	it("rejects a manager the host cannot run", () => {
		expect(resolvePackageManager("scoop", wslPlatform())).toBeErrContaining(
			"Package manager 'scoop' is not supported on wsl. Supported: apt.",
		)
	})

	it("returns the adapter for a supported manager", () => {
		const result = resolvePackageManager("winget", windows)

		expect(result.ok && result.value.id).toBe("winget")
	})
})

describe("wingetAdapter", () => {
	it("passes a qualifier as the source", () => {
		expect(wingetAdapter.installCommand(packageRef("msstore/Git.Git"))).toEqual({
			args: [
				"install",
				"--id",
				"Git.Git",
				"--exact",
				"--silent",
				"--accept-package-agreements",
				"--accept-source-agreements",
				"--source",
				"msstore",
			],
			command: "winget",
		})
		expect(wingetAdapter.refreshIndexCommand()).toBeNull()
	})
})
