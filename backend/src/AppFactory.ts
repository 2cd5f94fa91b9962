import { version } from "../package.json";
import { type Config, getConfig } from "./config/Config";
import { createDatabase, type Database } from "./core/Database";
import { createDatabaseCheck, createDirectoryCheck, createHealthService, type HealthService } from "./health";
import { createAdminRouter } from "./router/AdminRouter";
import { createMediaResourceRouter } from "./router/MediaResourceRouter";
import { createPreviewResourceRouter } from "./router/PreviewResourceRouter";
import { createResourceRouter, type SiteRouterOptions } from "./router/ResourceRouter";
import { createStatusRouter } from "./router/StatusRouter";
import { createWeblogRouter } from "./router/WeblogRouter";
import { createMediaFileStorage, type MediaFileStorage } from "./services/MediaFileStorage";
import { createResourceResolver, type ResourceResolver } from "./services/ResourceResolver";
import { createRuntimeConfigService, type RuntimeConfigService } from "./services/RuntimeConfigService";
import { createThemeManager, type ThemeManager } from "./services/ThemeManager";
import type { UrlContextProvider, UrlStrategy } from "./url/UrlStrategy";
import { createUrlContextProvider, createUrlStrategy } from "./url/UrlStrategyFactory";
import { getLog } from "./util/Logger";
import { createSequelize } from "./util/Sequelize";
import { mkdir } from "node:fs/promises";
import express, { type Express } from "express";
import morgan from "morgan";

const log = getLog(import.meta);

/**
 * Everything the routers need, built once at startup.
 */
export interface AppServices {
	readonly config: Config;
	readonly database: Database;
	readonly themeManager: ThemeManager;
	readonly mediaFileStorage: MediaFileStorage;
	readonly runtimeConfigService: RuntimeConfigService;
	readonly resourceResolver: ResourceResolver;
	readonly getUrlContext: UrlContextProvider;
	readonly siteUrlStrategy: UrlStrategy;
	readonly healthService?: HealthService;
	/** Closes the database and anything serving it */
	close(): Promise<void>;
}

/**
 * A callback run when the server is shutting down.
 */
export interface ExitHandler {
	stop(code?: number): void | Promise<void>;
}

export async function createAppServices(config: Config = getConfig()): Promise<AppServices> {
	const { sequelize, close } = await createSequelize(config);
	const database = await createDatabase(sequelize, { skipSync: config.SKIP_SEQUELIZE_SYNC });

	const runtimeConfigService = createRuntimeConfigService(database.runtimePropertyDao);
	await runtimeConfigService.load();

	// URL_STRATEGY problems surface here rather than on the first request
	const getUrlContext = createUrlContextProvider(config, runtimeConfigService);
	const siteUrlStrategy = createUrlStrategy(config, getUrlContext);

	await mkdir(config.UPLOADS_DIR, { recursive: true });
	const themeManager = createThemeManager(config.THEMES_DIR);
	const mediaFileStorage = createMediaFileStorage(config.UPLOADS_DIR);
	const resourceResolver = createResourceResolver({
		themeManager,
		mediaFileDao: database.mediaFileDao,
		mediaFileStorage,
	});

	const healthService = createHealthService({
		checks: [
			createDatabaseCheck(sequelize),
			createDirectoryCheck({ name: "themes", dir: config.THEMES_DIR }),
			createDirectoryCheck({ name: "uploads", dir: config.UPLOADS_DIR, writable: true }),
		],
	});

	return {
		config,
		database,
		themeManager,
		mediaFileStorage,
		runtimeConfigService,
		resourceResolver,
		getUrlContext,
		siteUrlStrategy,
		healthService,
		close,
	};
}

export function createExpressApp(services: AppServices): Express {
	const { config, database, themeManager, mediaFileStorage, runtimeConfigService, resourceResolver } = services;
	const { weblogDao, mediaFileDao } = database;

	const app = express();
	app.set("trust proxy", 1);

	app.use(
		morgan(":method :url :status :res[content-length] - :response-time ms", {
			stream: {
				write: (message: string) => {
					log.debug(message.trim());
				},
			},
		}),
	);

	// Each router parses its own bodies: media uploads stay raw whatever their content type
	app.use("/api/admin", createAdminRouter({ runtimeConfigService, themeManager }));
	app.use(
		"/api/weblogs",
		createWeblogRouter({
			weblogDao,
			mediaFileDao,
			mediaFileStorage,
			themeManager,
			runtimeConfigService,
			siteUrlStrategy: services.siteUrlStrategy,
			getUrlContext: services.getUrlContext,
		}),
	);
	app.use("/api/status", createStatusRouter(services.healthService));

	app.use("/authoring/previewresource", createPreviewResourceRouter(weblogDao, resourceResolver));

	const siteOptions: SiteRouterOptions =
		config.URL_STRATEGY === "standard" && config.DEFAULT_WEBLOG_HANDLE
			? { defaultHandle: config.DEFAULT_WEBLOG_HANDLE }
			: {};
	app.use(createResourceRouter(weblogDao, resourceResolver, siteOptions));
	app.use(createMediaResourceRouter(weblogDao, mediaFileDao, mediaFileStorage, siteOptions));

	log.info({ urlStrategy: config.URL_STRATEGY }, "Express app created");
	return app;
}

/**
 * Builds the services, mounts the routers under ROOT_PATH and listens on HOST:PORT.
 */
export async function createAndStartServer(config: Config = getConfig()): Promise<Express> {
	log.info(`Weblogger v${version} starting up on Node ${process.version}`);

	const services = await createAppServices(config);
	const app = express();
	app.use(config.ROOT_PATH, createExpressApp(services));

	const shutdownHandlers: Array<ExitHandler> = [
		{
			stop: () => services.close(),
		},
	];

	async function shutdown(signal: NodeJS.Signals): Promise<void> {
		log.info("Exiting due to signal: %s", signal);
		for (const shutdownHandler of shutdownHandlers) {
			try {
				await shutdownHandler.stop(0);
			} catch (error) {
				log.error(error, "Shutdown handler failed.");
			}
		}
		process.exit(0);
	}

	for (const signal of ["SIGINT", "SIGTERM", "SIGHUP"] as const) {
		process.once(signal, () => {
			shutdown(signal).catch(error => log.error(error, "Shutdown failed."));
		});
	}

	process.on("exit", () => {
		log.info("Weblogger stopped at %s", new Date());
	});

	app.listen(config.PORT, config.HOST, () => log.info({ host: config.HOST, port: config.PORT }, "ready"));
	return app;
}
