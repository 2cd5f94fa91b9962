import { createHealthService } from "./HealthService";
import type { CheckResult, HealthCheck } from "./HealthTypes";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../config/Config", () => ({
	getConfig: vi.fn(),
}));

import { getConfig } from "../config/Config";

describe("HealthService", () => {
	beforeEach(() => {
		vi.mocked(getConfig).mockReturnValue({ NODE_ENV: "test" } as unknown as ReturnType<typeof getConfig>);
		process.env.GIT_COMMIT_SHA = "abc1234567890";
	});

	afterEach(() => {
		delete process.env.GIT_COMMIT_SHA;
	});

	function createMockCheck(name: string, critical: boolean, result: CheckResult, delayMs = 0): HealthCheck {
		return {
			name,
			critical,
			check: vi.fn().mockImplementation(async () => {
				if (delayMs > 0) {
					await new Promise(resolve => setTimeout(resolve, delayMs));
				}
				return result;
			}),
		};
	}

	it("returns healthy when all checks pass", async () => {
		const service = createHealthService({
			checks: [
				createMockCheck("database", true, { status: "healthy", latencyMs: 10 }),
				createMockCheck("themes", false, { status: "healthy", latencyMs: 1 }),
			],
		});

		const result = await service.check();

		expect(result.status).toBe("healthy");
		expect(result.checks).toEqual({
			database: { status: "healthy", latencyMs: 10 },
			themes: { status: "healthy", latencyMs: 1 },
		});
	});

	it("returns unhealthy when a critical check fails", async () => {
		const service = createHealthService({
			checks: [
				createMockCheck("database", true, { status: "unhealthy", message: "Connection refused" }),
				createMockCheck("themes", false, { status: "healthy" }),
			],
		});

		const result = await service.check();

		expect(result.status).toBe("unhealthy");
		expect(result.checks.database?.message).toBe("Connection refused");
	});

	it("stays healthy when only a non-critical check fails", async () => {
		const service = createHealthService({
			checks: [
				createMockCheck("database", true, { status: "healthy" }),
				createMockCheck("uploads", false, { status: "unhealthy", message: "Directory not writable: ./uploads" }),
			],
		});

		const result = await service.check();

		expect(result.status).toBe("healthy");
		expect(result.checks.uploads?.status).toBe("unhealthy");
	});

	it("reports a check that takes too long as unhealthy", async () => {
		const service = createHealthService({
			checks: [
				createMockCheck("fast", true, { status: "healthy" }),
				createMockCheck("slow", true, { status: "healthy" }, 300),
			],
			timeoutMs: 50,
		});

		const result = await service.check();

		expect(result.status).toBe("unhealthy");
		expect(result.checks.fast?.status).toBe("healthy");
		expect(result.checks.slow).toEqual({ status: "unhealthy", message: "Check timed out" });
	});

	it("reports a check that throws as unhealthy", async () => {
		const failing: HealthCheck = {
			name: "database",
			critical: true,
			check: vi.fn().mockRejectedValue(new Error("boom")),
		};

		const result = await createHealthService({ checks: [failing] }).check();

		expect(result.checks.database?.status).toBe("unhealthy");
	});

	it("includes the version, environment and timestamp", async () => {
		vi.mocked(getConfig).mockReturnValue({ NODE_ENV: "production" } as unknown as ReturnType<typeof getConfig>);

		const result = await createHealthService({ checks: [] }).check();

		expect(result.version).toBe("abc1234");
		expect(result.environment).toBe("production");
		expect(result.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
	});

	it("reports an unknown version without GIT_COMMIT_SHA", async () => {
		delete process.env.GIT_COMMIT_SHA;

		const result = await createHealthService({ checks: [] }).check();

		expect(result.version).toBe("unknown");
	});
});
