import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const src = (path: string) => fileURLToPath(new URL(`./packages/${path}`, import.meta.url));

export default defineConfig({
	test: {
		globals: true,
		environment: "node",
		include: ["packages/*/src/**/*.test.ts"],
		coverage: {
			provider: "v8",
			reporter: ["text", "lcov", "json-summary"],
			include: ["packages/*/src/**/*.ts"],
			exclude: [
				"**/__tests__/**",
				"**/*.test.ts",
				"**/test-utils/**",
				"packages/cli/src/index.ts",
				"packages/cli/src/commands/**",
			],
			thresholds: {
				lines: 80,
				branches: 75,
				functions: 80,
				statements: 80,
			},
		},
	},
	resolve: {
		alias: {
			"@polyfield/core/error": src("core/src/error/index.ts"),
			"@polyfield/core/language": src("core/src/language/index.ts"),
			"@polyfield/core/logger": src("core/src/logger/index.ts"),
			"@polyfield/core/utils": src("core/src/utils/index.ts"),
			"@polyfield/core": src("core/src/index.ts"),
			"@polyfield/kysely-adapter": src("kysely-adapter/src/index.ts"),
			"@polyfield/test-utils": src("test-utils/src/index.ts"),
			polyfield: src("polyfield/src/index.ts"),
		},
	},
});
