import { loadEnvFiles } from "../util/Env";
import { getLog } from "../util/Logger";
import { createEnv } from "@t3-oss/env-core";
import { z } from "zod";

const log = getLog(import.meta);

const BooleanSchema = z
	.string()
	// only allow "true" or "false"
	.refine(s => s === "true" || s === "false")
	// transform to boolean
	.transform(s => s === "true")
	.default("false");

const configSchema = {
	server: {
		// Weblog handle served at the site root when URL_STRATEGY is "standard"
		DEFAULT_WEBLOG_HANDLE: z.string().optional(),
		HOST: z.string().default("0.0.0.0"),
		LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).default("info"),
		NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
		// Absolute origin used when the "site.absoluteurl" runtime property is empty
		ORIGIN: z.string().url().default("http://localhost:8034"),
		PORT: z.coerce.number().int().positive().default(8034),
		POSTGRES_DATABASE: z.string().default(""),
		POSTGRES_HOST: z.string().default(""),
		POSTGRES_LOGGING: BooleanSchema,
		POSTGRES_PASSWORD: z.string().default(""),
		POSTGRES_POOL_MAX: z.coerce.number().default(5),
		POSTGRES_PORT: z.coerce.number().default(5432),
		POSTGRES_SSL: BooleanSchema,
		POSTGRES_USERNAME: z.string().default(""),
		// Context path the application is mounted under
		ROOT_PATH: z.string().startsWith("/").default("/"),
		SEQUELIZE: z.enum(["memory", "postgres"]).default("memory"),
		SKIP_SEQUELIZE_SYNC: BooleanSchema,
		THEMES_DIR: z.string().default("./themes"),
		UPLOADS_DIR: z.string().default("./uploads"),
		URL_STRATEGY: z.enum(["multiweblog", "standard"]).default("multiweblog"),
	},
	/**
	 * What object holds the environment variables at runtime.
	 */
	runtimeEnv: process.env,

	/**
	 * Treat `PORT=` in a ".env" file as unset so that defaults apply.
	 */
	emptyStringAsUndefined: true,
};

/**
 * Creates a new configuration object from the current environment
 */
function createConfig() {
	return createEnv(configSchema);
}

export type Config = ReturnType<typeof createConfig>;

let currentConfig: Config | undefined;

/**
 * Gets the current configuration object, creating it from the environment on first use.
 */
export function getConfig(): Config {
	if (!currentConfig) {
		currentConfig = createConfig();
	}
	return currentConfig;
}

/**
 * Re-reads .env and .env.local and recreates the configuration object.
 */
export function reloadConfig(): Config {
	loadEnvFiles();
	currentConfig = undefined;
	const config = getConfig();
	log.info({ urlStrategy: config.URL_STRATEGY, sequelize: config.SEQUELIZE }, "Configuration reloaded");
	return config;
}

/**
 * Resets the configuration cache, forcing it to be recreated on the next call to getConfig().
 * This is primarily useful for testing when environment variables change between tests.
 */
export function resetConfig(): void {
	currentConfig = undefined;
}

/**
 * The context path without a trailing slash, so "/" becomes "" and "/blogs/" becomes "/blogs".
 */
export function getRelativeContextPath(config: Pick<Config, "ROOT_PATH">): string {
	return config.ROOT_PATH.replace(/\/+$/, "");
}
