import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		environment: "node",
		include: ["tests/**/*.test.ts"],
		// PGlite boots a WASM Postgres per test file
		testTimeout: 30000,
		hookTimeout: 30000,
	},
});
