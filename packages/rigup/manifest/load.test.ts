import { join } from "node:path"
import { describe, expect, it } from "vitest"
import { loadManifest, resolveManifestPath } from "@/manifest/load"
import { withTempDir, wslPlatform, writeText } from "@/tests/helpers"

describe("loadManifest", () => {
	it("reports a missing file", async () => {
		await withTempDir(async (dir) => {
			const target = join(dir, "missing.json")

			expect(await loadManifest(target)).toBeErrContaining(`Manifest not found: ${target}`)
		})
	})

	it("parses the file with its path as the source", async () => {
		await withTempDir(async (dir) => {
			const target = join(dir, "m.json")
			await writeText(target, JSON.stringify({ packageManager: "apt", systemPackages: ["git"] }))

			const result = await loadManifest(target)

			expect(result).toBeOk()
			if (result.ok) {
				expect(result.value.sourcePath).toBe(target)
				expect(result.value.systemPackages.map((ref) => ref.id)).toEqual(["git"])
			}
		})
	})
})

describe("resolveManifestPath", () => {
	it("picks the platform default", async () => {
		const manifestDir = "/opt/rigup/manifests"

		expect(
			await resolveManifestPath({ cwd: "/", manifestDir, platform: wslPlatform() }),
		).toEqual({ ok: true, value: "/opt/rigup/manifests/linux.ubuntu.packages.json" })
		expect(
			await resolveManifestPath({
				cwd: "/",
				manifestDir,
				platform: wslPlatform({ codename: undefined, distroId: undefined, os: "windows" }),
			}),
		).toEqual({ ok: true, value: "/opt/rigup/manifests/windows.packages.json" })
	})

	it("accepts a Debian derivative through ID_LIKE", async () => {
		const result = await resolveManifestPath({
			cwd: "/",
			manifestDir: "/m",
			platform: wslPlatform({ distroId: "pop", idLike: "ubuntu debian" }),
		})

		expect(result).toEqual({ ok: true, value: "/m/linux.ubuntu.packages.json" })
	})

	it("has no default for other distributions", async () => {
		const result = await resolveManifestPath({
			cwd: "/",
			manifestDir: "/m",
			platform: wslPlatform({ distroId: "fedora", os: "linux" }),
		})

		expect(result).toBeErrContaining("No default manifest for this host (os=linux, ID='fedora'")
	})

	it("resolves a relative override against the working directory first", async () => {
		await withTempDir(async (dir) => {
			const cwd = join(dir, "work")
			await writeText(join(cwd, "custom.json"), "{}")

			const result = await resolveManifestPath({
				cwd,
				manifestDir: join(dir, "repo", "manifests"),
				override: "custom.json",
				platform: wslPlatform(),
			})

			expect(result).toEqual({ ok: true, value: join(cwd, "custom.json") })
		})
	})

	it("falls back to the manifest directory's parent", async () => {
		await withTempDir(async (dir) => {
			const repo = join(dir, "repo")
			await writeText(join(repo, "manifests", "team.json"), "{}")

			const result = await resolveManifestPath({
				cwd: join(dir, "elsewhere"),
				manifestDir: join(repo, "manifests"),
				override: "manifests/team.json",
				platform: wslPlatform(),
			})

			expect(result).toEqual({ ok: true, value: join(repo, "manifests", "team.json") })
		})
	})

	it("fails when an override exists nowhere", async () => {
		await withTempDir(async (dir) => {
			const result = await resolveManifestPath({
				cwd: dir,
				manifestDir: join(dir, "manifests"),
				override: "nope.json",
				platform: wslPlatform(),
			})

			expect(result).toBeErrContaining("Manifest not found: nope.json")
		})
	})
})
