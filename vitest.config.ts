// CHANGE: Vitest configuration for CORE/SHELL test suites
// WHY: Native ESM with explicit imports; tests live under test/ mirroring src/
// PURITY: SHELL (configuration only)
// INVARIANT: Deterministic test execution without side effects

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // IMPORTANT: Use explicit imports for type safety
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**"],
		},
	},
});
