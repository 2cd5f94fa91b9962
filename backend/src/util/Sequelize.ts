import { type Config, getConfig } from "../config/Config";
import { getLog } from "./Logger";
import { Sequelize } from "sequelize";

const log = getLog(import.meta);

function getErrorCode(error: unknown): string | undefined {
	if (error instanceof Error && "parent" in error) {
		const parent: unknown = error.parent;
		if (parent && typeof parent === "object" && "code" in parent && typeof parent.code === "string") {
			return parent.code;
		}
	}
	return;
}

/**
 * Formats a database connection error with actionable guidance.
 */
export function formatConnectionError(error: unknown, host: string, port: number): Error {
	const originalMessage = error instanceof Error ? error.message : String(error);

	if (getErrorCode(error) === "ECONNREFUSED") {
		const message = [
			`PostgreSQL connection refused at ${host}:${port}`,
			"",
			"To fix:",
			"  - Start PostgreSQL, or check your POSTGRES_HOST and POSTGRES_PORT settings",
			"  - Or use in-memory mode: set SEQUELIZE=memory in your .env file",
		].join("\n");
		return new Error(message, { cause: error });
	}

	return new Error(`Failed to connect to PostgreSQL at ${host}:${port}: ${originalMessage}`, { cause: error });
}

/**
 * An open database and the way to release everything behind it.
 */
export interface SequelizeConnection {
	readonly sequelize: Sequelize;
	close(): Promise<void>;
}

export async function createSequelize(config: Config = getConfig()): Promise<SequelizeConnection> {
	const sequelizeMode = config.SEQUELIZE;
	switch (sequelizeMode) {
		case "memory": {
			const { sequelize, server } = await createMemorySequelize();
			return {
				sequelize,
				close: async () => {
					await sequelize.close();
					await server.stop();
				},
			};
		}
		case "postgres": {
			const sequelize = await createPostgresSequelize(config);
			return { sequelize, close: () => sequelize.close() };
		}
	}
}

export interface MemorySequelizeInstance {
	sequelize: Sequelize;
	server: { stop: () => Promise<void> };
}

/**
 * An in-memory PGlite database served over a local socket, used for local development and tests.
 * Takes the first free port from 5434 to 5444.
 */
export async function createMemorySequelize(): Promise<MemorySequelizeInstance> {
	const { PGlite } = await import("@electric-sql/pglite");
	const { PGLiteSocketServer } = await import("@electric-sql/pglite-socket");

	const db = new PGlite("memory://");
	let port = 5434;
	const maxPort = 5444;
	let server: InstanceType<typeof PGLiteSocketServer> | null = null;

	while (port <= maxPort) {
		try {
			server = new PGLiteSocketServer({ db, port });
			await server.start();
			break;
		} catch (error) {
			if (port === maxPort || (error instanceof Error && !error.message.includes("EADDRINUSE"))) {
				throw error;
			}
			port++;
		}
	}

	if (!server) {
		throw new Error("Failed to create PGLiteSocketServer");
	}

	const config = getConfig();

	const sequelize = new Sequelize({
		username: "postgres",
		password: "postgres",
		host: "localhost",
		port,
		dialect: "postgres",
		dialectOptions: { ssl: false },
		logging: config.POSTGRES_LOGGING,
		pool: { max: 1, min: 0, idle: 0 },
		define: { underscored: true },
	});
	log.info({ port }, "In-memory database ready");

	return { sequelize, server };
}

export function getPostgresConnectionUri(config: Config): string {
	const username = encodeURIComponent(config.POSTGRES_USERNAME);
	const password = encodeURIComponent(config.POSTGRES_PASSWORD);
	return `postgres://${username}:${password}@${config.POSTGRES_HOST}:${config.POSTGRES_PORT}/${config.POSTGRES_DATABASE}`;
}

export async function createPostgresSequelize(config: Config): Promise<Sequelize> {
	const sequelize = new Sequelize(getPostgresConnectionUri(config), {
		dialect: "postgres",
		dialectOptions: config.POSTGRES_SSL ? { ssl: { rejectUnauthorized: false } } : {},
		logging: config.POSTGRES_LOGGING,
		pool: { max: config.POSTGRES_POOL_MAX },
		define: { underscored: true },
	});

	try {
		await sequelize.authenticate();
		log.info("PostgreSQL connection established successfully");
	} catch (error) {
		throw formatConnectionError(error, config.POSTGRES_HOST, config.POSTGRES_PORT);
	}

	return sequelize;
}
