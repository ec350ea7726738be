// CHANGE: Vitest configuration for CORE/SHELL test suites
// WHY: Native ESM, explicit imports, isolated tests
// INVARIANT: Deterministic test execution without shared state between files

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		// Tests import { describe, it, expect } from "vitest" explicitly
		globals: false,
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		// CHANGE: Coverage floor for CORE
		// INVARIANT: ∀ f ∈ src/core/**/*.ts: lines(f) ≥ 90%
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**", "src/index.ts", "src/main.ts"],
			thresholds: {
				"src/core/**/*.ts": {
					lines: 90,
					statements: 90,
				},
			},
		},

		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
