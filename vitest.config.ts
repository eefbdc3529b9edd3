import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		environment: "node",
		include: ["tests/**/*.test.ts"],
		env: {
			BATCH_RACE_LOG_DIR: "/tmp/batch-race-test-logs",
			LOG_LEVEL: "silent",
		},
	},
});
