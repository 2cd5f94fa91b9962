import type { HealthResponse, HealthService } from "../health";
import { createStatusRouter } from "./StatusRouter";
import express, { type Express } from "express";
import request from "supertest";
import { describe, expect, it, vi } from "vitest";

function createApp(healthService?: HealthService): Express {
	const app = express();
	app.use("/status", createStatusRouter(healthService));
	return app;
}

function healthResponse(status: HealthResponse["status"]): HealthResponse {
	return {
		status,
		timestamp: "2024-06-01T12:00:00.000Z",
		version: "abc1234",
		environment: "test",
		checks: {
			database: status === "healthy" ? { status: "healthy", latencyMs: 3 } : { status: "unhealthy" },
			themes: { status: "healthy", latencyMs: 1 },
		},
	};
}

describe("StatusRouter", () => {
	describe("GET /check", () => {
		it("should return OK", async () => {
			const response = await request(createApp()).get("/status/check");

			expect(response.status).toBe(200);
			expect(response.text).toBe("OK");
		});
	});

	describe("GET /health", () => {
		it("should report liveness without a health service", async () => {
			const response = await request(createApp()).get("/status/health");

			expect(response.status).toBe(200);
			expect(response.body.status).toBe("healthy");
			expect(new Date(response.body.timestamp).toISOString()).toBe(response.body.timestamp);
		});

		it("should return 200 with the check results when healthy", async () => {
			const healthService: HealthService = { check: vi.fn().mockResolvedValue(healthResponse("healthy")) };

			const response = await request(createApp(healthService)).get("/status/health");

			expect(response.status).toBe(200);
			expect(response.body).toEqual(healthResponse("healthy"));
		});

		it("should return 503 when a critical check fails", async () => {
			const healthService: HealthService = { check: vi.fn().mockResolvedValue(healthResponse("unhealthy")) };

			const response = await request(createApp(healthService)).get("/status/health");

			expect(response.status).toBe(503);
			expect(response.body.checks.database).toEqual({ status: "unhealthy" });
		});

		it("should return 503 when the health service throws", async () => {
			const healthService: HealthService = { check: vi.fn().mockRejectedValue(new Error("Unexpected error")) };

			const response = await request(createApp(healthService)).get("/status/health");

			expect(response.status).toBe(503);
			expect(response.body.message).toBe("Health check failed unexpectedly");
		});
	});
});
