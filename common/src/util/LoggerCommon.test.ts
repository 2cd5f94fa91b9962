import {
	createLog,
	createLoggingConfig,
	getLoggingConfig,
	getModuleName,
	isLogLevel,
	type LoggingConfig,
	parseModuleOverrides,
} from "./LoggerCommon";
import pino from "pino";
import { afterEach, describe, expect, it, vi } from "vitest";

function testConfig(overrides: Partial<LoggingConfig> = {}): LoggingConfig {
	return {
		enabled: true,
		level: "info",
		transports: [{ type: "console", level: "info", pretty: false }],
		moduleOverrides: {},
		...overrides,
	};
}

describe("LoggerCommon", () => {
	afterEach(() => {
		delete process.env.DISABLE_LOGGING;
		delete process.env.LOG_LEVEL;
		delete process.env.LOG_PRETTY;
		delete process.env.LOG_TRANSPORTS;
		delete process.env.LOG_LEVEL_OVERRIDES;
	});

	describe("getModuleName", () => {
		it("should strip the directory and extension from a file URL", () => {
			expect(getModuleName({ url: "file:///srv/app/src/services/ResourceResolver.ts" } as ImportMeta)).toBe(
				"ResourceResolver",
			);
		});

		it("should keep inner dots of the file name", () => {
			expect(getModuleName("/srv/app/MediaFileDao.mock.ts")).toBe("MediaFileDao.mock");
		});

		it("should return a bare name unchanged", () => {
			expect(getModuleName("Config")).toBe("Config");
		});
	});

	describe("isLogLevel", () => {
		it("should accept pino levels only", () => {
			expect(isLogLevel("debug")).toBe(true);
			expect(isLogLevel("verbose")).toBe(false);
			expect(isLogLevel(undefined)).toBe(false);
		});
	});

	describe("parseModuleOverrides", () => {
		it("should parse module:level pairs", () => {
			expect(parseModuleOverrides("ResourceResolver:debug, Config : WARN")).toEqual({
				ResourceResolver: "debug",
				Config: "warn",
			});
		});

		it("should drop invalid levels", () => {
			const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {
				// silence
			});
			expect(parseModuleOverrides("ThemeManager:loud,AppFactory:info")).toEqual({ AppFactory: "info" });
			expect(consoleSpy).toHaveBeenCalledWith("Unable to set ThemeManager log level to loud as it is an invalid value");
		});

		it("should return no overrides for an empty string", () => {
			expect(parseModuleOverrides("")).toEqual({});
		});
	});

	describe("createLoggingConfig", () => {
		it("should create console and file transports in the given order", () => {
			const config = createLoggingConfig(true, "weblogger", "debug", true, "console, file", "", "/var/log/weblogger");

			expect(config.transports).toEqual([
				{ type: "console", level: "debug", pretty: true },
				{
					type: "file",
					level: "debug",
					filenamePrefix: "weblogger",
					fileDirectoryPath: "/var/log/weblogger",
					datePattern: "yyyy-MM-dd",
					maxFiles: 14,
					maxSize: "500m",
				},
			]);
		});

		it("should ignore unknown transport names", () => {
			const config = createLoggingConfig(true, "weblogger", "info", false, "syslog", "", "./logs");
			expect(config.transports).toEqual([]);
		});
	});

	describe("getLoggingConfig", () => {
		it("should read level, transports and overrides from the environment", () => {
			process.env.LOG_LEVEL = "WARN";
			process.env.LOG_TRANSPORTS = "console";
			process.env.LOG_LEVEL_OVERRIDES = "MediaFileStorage:trace";

			const config = getLoggingConfig();

			expect(config.enabled).toBe(true);
			expect(config.level).toBe("warn");
			expect(config.transports).toEqual([{ type: "console", level: "warn", pretty: false }]);
			expect(config.moduleOverrides).toEqual({ MediaFileStorage: "trace" });
		});

		it("should fall back to info for an unknown level", () => {
			process.env.LOG_LEVEL = "chatty";
			expect(getLoggingConfig().level).toBe("info");
		});

		it("should be disabled when DISABLE_LOGGING is true", () => {
			process.env.DISABLE_LOGGING = "true";
			expect(getLoggingConfig().enabled).toBe(false);
		});
	});

	describe("createLog", () => {
		it("should return a silent logger when logging is disabled", () => {
			const provider = vi.fn();
			const log = createLog("Disabled", () => testConfig({ enabled: false }), provider);

			expect(provider).not.toHaveBeenCalled();
			expect(log.isLevelEnabled("fatal")).toBe(false);
		});

		it("should bind the module name and use the default level", () => {
			const root = pino({ level: "info" });
			const childSpy = vi.spyOn(root, "child");
			const log = createLog(
				{ url: "file:///app/src/router/ResourceRouter.ts" } as ImportMeta,
				() => testConfig(),
				() => root,
			);

			expect(childSpy).toHaveBeenCalledWith({ module: "ResourceRouter" }, { level: "info" });
			expect(log.level).toBe("info");
		});

		it("should lower the parent level when a module override is more verbose", () => {
			const provider = vi.fn((config: LoggingConfig) => pino({ level: config.level }));
			const log = createLog(
				"ThemeManager",
				() => testConfig({ moduleOverrides: { ThemeManager: "debug" } }),
				provider,
			);

			const parentConfig = provider.mock.calls[0][0];
			expect(parentConfig.level).toBe("debug");
			expect(parentConfig.transports).toEqual([{ type: "console", level: "debug", pretty: false }]);
			expect(log.level).toBe("debug");
		});

		it("should keep the parent level when a module override is quieter", () => {
			const provider = vi.fn((config: LoggingConfig) => pino({ level: config.level }));
			const log = createLog("Sequelize", () => testConfig({ moduleOverrides: { Sequelize: "error" } }), provider);

			expect(provider.mock.calls[0][0].level).toBe("info");
			expect(log.level).toBe("error");
		});
	});
});
