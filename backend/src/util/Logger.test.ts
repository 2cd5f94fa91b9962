import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("weblogger-common/server", () => ({
	createLog: vi.fn(() => ({
		info: vi.fn(),
		debug: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
	})),
}));

describe("Logger", () => {
	beforeEach(() => {
		vi.resetModules();
	});

	describe("getLog", () => {
		it("should call createLog with module name string", async () => {
			const { getLog } = await import("./Logger");
			const { createLog } = await import("weblogger-common/server");

			const logger = getLog("test-module");

			expect(createLog).toHaveBeenCalledWith("test-module");
			expect(logger.info).toBeDefined();
		});

		it("should call createLog with ImportMeta object", async () => {
			const { getLog } = await import("./Logger");
			const { createLog } = await import("weblogger-common/server");

			const mockImportMeta = { url: "file:///path/to/module.ts" } as ImportMeta;
			getLog(mockImportMeta);

			expect(createLog).toHaveBeenCalledWith(mockImportMeta);
		});
	});
});
