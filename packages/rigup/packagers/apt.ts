import type { PackageManagerAdapter } from "@/packagers/types"

const INSTALLED_STATUS = /(^|\s)installed$/

export const aptAdapter: PackageManagerAdapter = {
	binary: "apt-get",
	hosts: ["wsl", "linux"],
	id: "apt",
	installCommand: (ref) => ({
		args: ["install", "-y", ref.qualifier ? `${ref.name}/${ref.qualifier}` : ref.name],
		command: "apt-get",
	}),
	interpretQuery: (outcome) =>
		outcome.exitCode === 0 && INSTALLED_STATUS.test(outcome.stdout.trim()),
	privileged: true,
	queryCommand: (ref) => ({
		args: ["-W", "-f=${Status}", ref.name],
		command: "dpkg-query",
	}),
	refreshIndexCommand: () => ({ args: ["update"], command: "apt-get" }),
}
