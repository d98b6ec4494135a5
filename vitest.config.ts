// CHANGE: Vitest configuration
// WHY: Native ESM, explicit imports from "vitest"
// PURITY: SHELL (configuration only)
// INVARIANT: Deterministic test execution; tests never reach the network or real helm/conftest
// COMPLEXITY: O(n) test execution where n = |test_files|

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // IMPORTANT: Use explicit imports for type safety
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],
		// Temp-dir round trips through real file I/O
		testTimeout: 20_000,
		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
