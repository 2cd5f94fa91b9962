import type { HealthService } from "../health";
import { getLog } from "../util/Logger";
import express, { type Router } from "express";

const log = getLog(import.meta);

/**
 * Liveness and health endpoints for load balancers and monitoring.
 */
export function createStatusRouter(healthService?: HealthService): Router {
	const router = express.Router();

	router.get("/check", (_req, res) => {
		res.send("OK");
	});

	/**
	 * 200 when every critical check passes, 503 otherwise.
	 * Without a health service only liveness is reported.
	 */
	router.get("/health", async (_req, res) => {
		if (!healthService) {
			res.json({ status: "healthy", timestamp: new Date().toISOString() });
			return;
		}
		try {
			const result = await healthService.check();
			res.status(result.status === "healthy" ? 200 : 503).json(result);
		} catch (error) {
			log.error(error, "Health check failed unexpectedly.");
			res.status(503).json({
				status: "unhealthy",
				timestamp: new Date().toISOString(),
				message: "Health check failed unexpectedly",
			});
		}
	});

	return router;
}
