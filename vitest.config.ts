import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		projects: ["common/vite.config.ts", "backend/vite.config.ts"],
	},
});
