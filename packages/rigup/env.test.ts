import { describe, expect, it } from "vitest"
import { readEnvSettings } from "@/env"

describe("readEnvSettings", () => {
	it("defaults the manifest directory to ./manifests", () => {
		expect(readEnvSettings({}, "/work")).toEqual({
			allowNonWsl: false,
			chezmoiConfig: undefined,
			dotfilesSource: undefined,
			manifestDir: "/work/manifests",
		})
	})

	it("resolves overrides and treats blank values as unset", () => {
		const settings = readEnvSettings(
			{
				RIGUP_ALLOW_NON_WSL: "1",
				RIGUP_CHEZMOI_CONFIG: "   ",
				RIGUP_DOTFILES_SOURCE: " git@github.com:example/dotfiles.git ",
				RIGUP_MANIFEST_DIR: "team/manifests",
			},
			"/work",
		)

		expect(settings).toEqual({
			allowNonWsl: true,
			chezmoiConfig: undefined,
			dotfilesSource: "git@github.com:example/dotfiles.git",
			manifestDir: "/work/team/manifests",
		})
	})

	it("only enables non-WSL Linux for the value 1", () => {
		expect(readEnvSettings({ RIGUP_ALLOW_NON_WSL: "true" }, "/").allowNonWsl).toBe(false)
	})
})
