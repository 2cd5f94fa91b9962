/**
 * - healthy: the dependency answered
 * - disabled: not configured in this deployment
 * - unhealthy: the check failed or timed out
 */
export type HealthStatus = "healthy" | "unhealthy" | "disabled";

export interface CheckResult {
	status: HealthStatus;
	latencyMs?: number;
	message?: string;
}

export interface HealthCheck {
	/** Key of the result in the health response, e.g. "database" */
	name: string;
	/** A failing critical check makes the whole server unhealthy */
	critical: boolean;
	check(): Promise<CheckResult>;
}

/**
 * Body of GET /api/status/health
 */
export interface HealthResponse {
	status: "healthy" | "unhealthy";
	/** ISO-8601 */
	timestamp: string;
	/** Short commit SHA from GIT_COMMIT_SHA, or "unknown" */
	version: string;
	environment: string;
	checks: Record<string, CheckResult>;
}
