import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const src = (pkg: string) => fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
	test: {
		globals: true,
		environment: "node",
		include: ["packages/*/src/**/__tests__/**/*.test.ts"],
		coverage: {
			provider: "v8",
			reporter: ["text", "lcov", "json-summary"],
			include: ["packages/*/src/**/*.ts"],
			exclude: ["**/__tests__/**", "**/*.test.ts", "**/test-utils/**"],
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
			"@trackline/core": src("core"),
			"@trackline/test-utils": src("test-utils"),
		},
	},
});
