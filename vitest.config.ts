import { fileURLToPath } from "node:url"
import { defineConfig } from "vitest/config"

const root = fileURLToPath(new URL(".", import.meta.url))

export default defineConfig({
	resolve: {
		alias: {
			"@rigup/core": `${root}packages/core/index.ts`,
			"@": `${root}packages/rigup`,
		},
	},
	test: {
		coverage: {
			exclude: ["**/node_modules/**", "**/*.test.ts", "packages/rigup/tests/**"],
			provider: "v8",
			reporter: ["text", "json", "html"],
		},
		environment: "node",
		exclude: ["**/node_modules/**", "**/dist/**"],
		globals: false,
		include: ["packages/**/*.test.ts"],
	},
})
