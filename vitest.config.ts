import { defineConfig } from "vitest/config"

export default defineConfig({
	test: {
		include: ["src/**/*.test.ts"],
		environment: "node",
		// config tests chdir, which worker threads do not support
		pool: "forks",
		testTimeout: 10000,
	},
})
