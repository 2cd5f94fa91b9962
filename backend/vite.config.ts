import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		name: "backend",
		setupFiles: ["./src/test/setup.ts"],
		coverage: {
			exclude: ["**/*.mock.ts", "src/Main.ts", "src/index.ts", "src/util/ModelDef.ts"],
			include: ["src/**/*.ts"],
			reporter: ["html", "json", "lcov", "text"],
		},
		env: {
			LOG_TRANSPORTS: "console",
			DISABLE_LOGGING: "true",
		},
		globals: true,
		pool: "threads",
		restoreMocks: true,
	},
});
