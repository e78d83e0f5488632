import type { PackageManagerAdapter } from "@/packagers/types"

const AGREEMENTS = ["--accept-package-agreements", "--accept-source-agreements"]

export const wingetAdapter: PackageManagerAdapter = {
	binary: "winget",
	hosts: ["windows"],
	id: "winget",
	installCommand: (ref) => ({
		args: [
			"install",
			"--id",
			ref.name,
			"--exact",
			"--silent",
			...AGREEMENTS,
			...(ref.qualifier ? ["--source", ref.qualifier] : []),
		],
		command: "winget",
	}),
	interpretQuery: (outcome) => outcome.exitCode === 0,
	privileged: false,
	queryCommand: (ref) => ({
		args: [
			"list",
			"--id",
			ref.name,
			"--exact",
			"--disable-interactivity",
			"--accept-source-agreements",
		],
		command: "winget",
	}),
	refreshIndexCommand: () => null,
}
