import { defineConfig } from "vitest/config"

export default defineConfig({
	test: {
		include: ["test/**/*.test.ts"],
		globals: false, // Explicit imports preferred
		environment: "node",
		testTimeout: 30000,
		setupFiles: ["test/helpers/setup.ts"],
		coverage: {
			provider: "v8",
			reporter: ["text", "json-summary", "html"],
			include: ["src/**/*.ts"],
			exclude: [
				"src/cli/**",
				"src/logger.ts",
				"src/progress.ts",
				"src/spinner.ts",
				"src/ui.ts",
				"src/prompts.ts",
			],
			thresholds: {
				// Security and state-machine critical modules
				"src/url-policy.ts": { statements: 90, branches: 80 },
				"src/catalog.ts": { statements: 85, branches: 70 },
				"src/core/coordinator.ts": { statements: 80, branches: 65 },
			},
		},
	},
})
