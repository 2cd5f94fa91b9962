import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		name: "common",
		coverage: {
			exclude: ["**/*.mock.ts", "**/index.ts", "src/types/**"],
			include: ["src/**/*.ts"],
			reporter: ["html", "json", "lcov", "text"],
		},
		globals: true,
		pool: "threads",
		restoreMocks: true,
	},
});
