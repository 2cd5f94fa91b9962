import { getConfig } from "../config/Config";
import { getLog } from "../util/Logger";
import { withTimeout } from "../util/Timeout";
import type { CheckResult, HealthCheck, HealthResponse } from "./HealthTypes";

const log = getLog(import.meta);

const DEFAULT_TIMEOUT_MS = 2000;

export interface HealthService {
	check(): Promise<HealthResponse>;
}

export interface HealthServiceOptions {
	checks: Array<HealthCheck>;
	/** Per-check timeout (default: 2000) */
	timeoutMs?: number;
}

/**
 * Runs every check in parallel. The server is unhealthy when any critical check is.
 */
export function createHealthService(options: HealthServiceOptions): HealthService {
	const { checks, timeoutMs = DEFAULT_TIMEOUT_MS } = options;

	return {
		check: runChecks,
	};

	async function runCheck(healthCheck: HealthCheck): Promise<CheckResult> {
		try {
			return await withTimeout(healthCheck.check(), timeoutMs);
		} catch (error) {
			log.warn({ check: healthCheck.name, error }, "Health check failed: %s", healthCheck.name);
			return { status: "unhealthy", message: "Check timed out" };
		}
	}

	async function runChecks(): Promise<HealthResponse> {
		const results = await Promise.all(checks.map(runCheck));

		const checksRecord: Record<string, CheckResult> = {};
		let healthy = true;
		checks.forEach((healthCheck, index) => {
			const result = results[index] ?? { status: "unhealthy" };
			checksRecord[healthCheck.name] = result;
			if (healthCheck.critical && result.status === "unhealthy") {
				healthy = false;
			}
		});

		return {
			status: healthy ? "healthy" : "unhealthy",
			timestamp: new Date().toISOString(),
			version: process.env.GIT_COMMIT_SHA?.substring(0, 7) ?? "unknown",
			environment: getConfig().NODE_ENV,
			checks: checksRecord,
		};
	}
}
