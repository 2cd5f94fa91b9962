import type { CheckResult, HealthCheck } from "../HealthTypes";
import { constants } from "node:fs";
import { access } from "node:fs/promises";

export interface DirectoryCheckOptions {
	name: string;
	dir: string;
	/** Also require write access */
	writable?: boolean;
	critical?: boolean;
}

/**
 * Verifies a directory the server reads from (themes) or writes to (uploads) is usable.
 */
export function createDirectoryCheck(options: DirectoryCheckOptions): HealthCheck {
	const { name, dir, writable = false, critical = false } = options;
	const mode = writable ? constants.R_OK | constants.W_OK : constants.R_OK;

	return {
		name,
		critical,
		check,
	};

	async function check(): Promise<CheckResult> {
		const start = Date.now();
		try {
			await access(dir, mode);
			return { status: "healthy", latencyMs: Date.now() - start };
		} catch (_error) {
			return {
				status: "unhealthy",
				latencyMs: Date.now() - start,
				message: writable ? `Directory not writable: ${dir}` : `Directory not readable: ${dir}`,
			};
		}
	}
}
