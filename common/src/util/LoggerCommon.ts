import type { DestinationStream, Logger as PinoLogger, StreamEntry } from "pino";
import pino from "pino";

/**
 * Log stream type - using pino's native streams.
 */
export type LogStreamType = "console" | "file";

/**
 * Log level type - using pino's native levels
 */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

const LOG_LEVELS: ReadonlyArray<LogLevel> = ["trace", "debug", "info", "warn", "error", "fatal"];

export function isLogLevel(value: string | undefined): value is LogLevel {
	return LOG_LEVELS.some(level => level === value);
}

/**
 * Console transport configuration.
 */
export interface ConsoleTransportConfig {
	type: "console";
	level: LogLevel;
	/**
	 * Pretty-print through pino-pretty instead of writing JSON lines to stdout.
	 */
	pretty: boolean;
}

/**
 * File transport configuration. Files are rotated daily by pino-roll,
 * e.g. `${fileDirectoryPath}/${filenamePrefix}.2024-01-31.1.log`.
 */
export interface FileTransportConfig {
	type: "file";
	level: LogLevel;
	filenamePrefix: string;
	fileDirectoryPath: string;
	/**
	 * Date pattern for rotated file names, e.g. "yyyy-MM-dd"
	 */
	datePattern: string;
	/**
	 * Number of rotated files to keep.
	 */
	maxFiles: number;
	/**
	 * Size at which a file is rotated early, e.g. "500m". Units are "k", "m" or "g".
	 */
	maxSize: string;
}

export type LoggingTransportConfig = ConsoleTransportConfig | FileTransportConfig;

export interface LoggingConfig {
	/**
	 * When false every logger is a shared no-op logger.
	 */
	enabled: boolean;
	level: LogLevel;
	transports: Array<LoggingTransportConfig>;
	/**
	 * Per-module level overrides, keyed by source file name without extension.
	 */
	moduleOverrides: Record<string, LogLevel>;
}

const transports = new Map<LogStreamType, DestinationStream>();

function createTransport(transportConfig: LoggingTransportConfig): DestinationStream {
	if (transportConfig.type === "file") {
		const { datePattern, filenamePrefix, fileDirectoryPath, maxFiles, maxSize, level } = transportConfig;
		return pino.transport({
			targets: [
				{
					target: "pino-roll",
					level,
					options: {
						file: `${fileDirectoryPath}/${filenamePrefix}`,
						frequency: "daily",
						size: maxSize,
						dateFormat: datePattern,
						extension: ".log",
						mkdir: true,
						limit: {
							count: maxFiles,
						},
					},
				},
			],
		});
	}
	if (transportConfig.pretty) {
		return pino.transport({
			target: "pino-pretty",
			level: transportConfig.level,
			options: {
				colorize: true,
				translateTime: "yyyy-mm-dd HH:MM:ss",
				ignore: "pid,hostname",
				messageFormat: "{module} - {msg}",
				singleLine: true,
			},
		});
	}
	return process.stdout;
}

function getServerTransport(transportConfig: LoggingTransportConfig): DestinationStream {
	const existing = transports.get(transportConfig.type);
	if (existing) {
		return existing;
	}
	const transport = createTransport(transportConfig);
	transports.set(transportConfig.type, transport);
	return transport;
}

/**
 * Derives a module name from a file URL or path: the file name without its extension.
 */
export function getModuleName(module: string | ImportMeta): string {
	const moduleUrl = typeof module === "string" ? module : module.url;
	const lastSlashIndex = moduleUrl.lastIndexOf("/");
	const fileNameWithExtension = lastSlashIndex >= 0 ? moduleUrl.substring(lastSlashIndex + 1) : moduleUrl;
	const parts = fileNameWithExtension.split(".");
	return parts.length > 1 ? parts.slice(0, -1).join(".") : fileNameWithExtension;
}

/**
 * Parses "module1:level1,module2:level2". Entries with an unknown level are dropped.
 */
export function parseModuleOverrides(moduleOverrides: string): Record<string, LogLevel> {
	const overrides: Record<string, LogLevel> = {};
	if (!moduleOverrides) {
		return overrides;
	}
	for (const pair of moduleOverrides.split(",")) {
		const [module, lvl] = pair.split(":").map(part => part.trim());
		const level = lvl?.toLowerCase();
		if (!module || !isLogLevel(level)) {
			if (module) {
				// biome-ignore lint/suspicious/noConsole: the logger is not available yet
				console.log(`Unable to set ${module} log level to ${lvl} as it is an invalid value`);
			}
			continue;
		}
		overrides[module] = level;
	}
	return overrides;
}

/**
 * Create a logging configuration.
 *
 * @param transportNames comma-separated transport names, e.g. "console,file"
 * @param moduleOverrides module-specific levels in the format "module1:level1,module2:level2"
 */
export function createLoggingConfig(
	enabled: boolean,
	filenamePrefix: string,
	level: LogLevel,
	pretty: boolean,
	transportNames: string,
	moduleOverrides: string,
	fileDirectoryPath: string,
	datePattern = "yyyy-MM-dd",
	maxFiles = 14,
	maxSize = "500m",
): LoggingConfig {
	const transportConfigs: Array<LoggingTransportConfig> = [];
	for (const transport of transportNames.split(",").map(t => t.trim())) {
		if (transport === "file") {
			transportConfigs.push({
				type: "file",
				filenamePrefix,
				fileDirectoryPath,
				datePattern,
				maxFiles,
				maxSize,
				level,
			});
		} else if (transport === "console") {
			transportConfigs.push({ type: "console", level, pretty });
		}
	}
	return {
		enabled,
		level,
		transports: transportConfigs,
		moduleOverrides: parseModuleOverrides(moduleOverrides),
	};
}

/**
 * Reads the logging configuration from the environment:
 * - DISABLE_LOGGING: "true" turns every logger into a no-op logger.
 * - LOG_LEVEL: default level, "info" when unset or invalid.
 * - LOG_PRETTY: pretty-print console output. Defaults to "true" in development.
 * - LOG_TRANSPORTS: e.g. "console,file". Defaults to console in development and file otherwise.
 * - LOG_LEVEL_OVERRIDES: e.g. "ResourceResolver:debug,Config:warn".
 * - LOG_FILE_NAME_PREFIX, LOG_FILE_DIRECTORY_PATH, LOG_FILE_DATE_PATTERN, LOG_FILE_MAX_FILES:
 *   file transport settings.
 */
export function getLoggingConfig(): LoggingConfig {
	const enabled = process.env.DISABLE_LOGGING !== "true";
	const isDevelopment = process.env.NODE_ENV === "development";
	const envLevel = process.env.LOG_LEVEL?.toLowerCase();
	const level = isLogLevel(envLevel) ? envLevel : "info";
	const pretty = (process.env.LOG_PRETTY ?? (isDevelopment ? "true" : "false")) === "true";
	const transportNames = process.env.LOG_TRANSPORTS ?? (isDevelopment ? "console" : "file");
	return createLoggingConfig(
		enabled,
		process.env.LOG_FILE_NAME_PREFIX ?? "weblogger",
		level,
		pretty,
		transportNames,
		process.env.LOG_LEVEL_OVERRIDES ?? "",
		process.env.LOG_FILE_DIRECTORY_PATH ?? "./logs",
		process.env.LOG_FILE_DATE_PATTERN ?? "yyyy-MM-dd",
		Number(process.env.LOG_FILE_MAX_FILES ?? "14"),
	);
}

function createDefaultLogger(config: LoggingConfig): PinoLogger {
	const streams: Array<StreamEntry> = config.transports.map(transportConfig => ({
		level: transportConfig.level,
		stream: getServerTransport(transportConfig),
	}));
	if (streams.length > 1) {
		return pino({ level: config.level }, pino.multistream(streams));
	}
	if (streams.length === 1) {
		return pino({ level: config.level }, streams[0].stream);
	}
	return pino({ level: config.level });
}

// Helper to get the more verbose of two levels
function getMinimumLevel(level1: LogLevel, level2: LogLevel): LogLevel {
	return LOG_LEVELS.indexOf(level1) < LOG_LEVELS.indexOf(level2) ? level1 : level2;
}

function createModuleLogger(
	moduleName: string,
	loggingConfig: LoggingConfig,
	defaultLoggerProvider: (config: LoggingConfig) => PinoLogger,
): PinoLogger {
	const effectiveLevel = loggingConfig.moduleOverrides[moduleName] ?? loggingConfig.level;

	// An override more verbose than the default needs a parent logger (and transports) at that level
	const parentLevel = getMinimumLevel(effectiveLevel, loggingConfig.level);
	const logger = defaultLoggerProvider({
		...loggingConfig,
		level: parentLevel,
		transports: loggingConfig.transports.map(t => ({ ...t, level: parentLevel })),
	});

	return logger.child({ module: moduleName }, { level: effectiveLevel });
}

export type Logger = PinoLogger;

let noopLoggerInstance: Logger | undefined;

function getNoOpLogger(): Logger {
	if (!noopLoggerInstance) {
		noopLoggerInstance = pino({ enabled: false });
	}
	return noopLoggerInstance;
}

/**
 * Get a logger for the specified module. The module name is derived from the file name,
 * so call `createLog(import.meta)` near the top of the file (after imports).
 *
 * @param loggingConfigProvider replaces the environment-based configuration.
 * @param defaultLoggerProvider replaces the transport-backed root logger.
 */
export function createLog(
	module: string | ImportMeta,
	loggingConfigProvider?: () => LoggingConfig,
	defaultLoggerProvider?: (config: LoggingConfig) => PinoLogger,
): Logger {
	const config = (loggingConfigProvider ?? getLoggingConfig)();
	if (!config.enabled) {
		return getNoOpLogger();
	}
	return createModuleLogger(getModuleName(module), config, defaultLoggerProvider ?? createDefaultLogger);
}
