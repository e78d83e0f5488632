import { powershell } from "@/exec/runner"
import type { PackageManagerAdapter } from "@/packagers/types"

export const scoopAdapter: PackageManagerAdapter = {
	binary: "scoop",
	hosts: ["windows"],
	id: "scoop",
	installCommand: (ref) =>
		powershell("scoop", ["install", ref.qualifier ? `${ref.qualifier}/${ref.name}` : ref.name]),
	interpretQuery: (outcome) => outcome.exitCode === 0,
	privileged: false,
	queryCommand: (ref) => powershell("scoop", ["prefix", ref.name]),
	refreshIndexCommand: () => powershell("scoop", ["update"]),
	sources: {
		addCommand: (bucket) => powershell("scoop", ["bucket", "add", bucket]),
		listCommand: () => ({
			args: ["-NoProfile", "-NonInteractive", "-Command", "(scoop bucket list).Name"],
			command: "powershell",
		}),
		parseList: (stdout) =>
			stdout
				.split(/\r?\n/)
				.map((line) => line.trim())
				.filter((line) => line.length > 0),
		sourceFor: (ref) => ref.qualifier ?? null,
	},
}
