import { type Config, getRelativeContextPath } from "../config/Config";
import { ABSOLUTE_URL_PROPERTY, type RuntimeConfigService } from "../services/RuntimeConfigService";
import { createMultiWeblogUrlStrategy, createStandardUrlStrategy } from "./MultiWeblogUrlStrategy";
import type { UrlContext, UrlContextProvider, UrlStrategy } from "./UrlStrategy";

export class UrlStrategyConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "UrlStrategyConfigError";
	}
}

/**
 * Picks the site URL strategy named by URL_STRATEGY.
 */
export function createUrlStrategy(
	config: Pick<Config, "URL_STRATEGY" | "DEFAULT_WEBLOG_HANDLE">,
	getUrlContext: UrlContextProvider,
): UrlStrategy {
	switch (config.URL_STRATEGY) {
		case "multiweblog":
			return createMultiWeblogUrlStrategy(getUrlContext);
		case "standard":
			if (!config.DEFAULT_WEBLOG_HANDLE) {
				throw new UrlStrategyConfigError("DEFAULT_WEBLOG_HANDLE is required when URL_STRATEGY is standard");
			}
			return createStandardUrlStrategy(getUrlContext, config.DEFAULT_WEBLOG_HANDLE);
	}
}

/**
 * The absolute URL is the "site.absoluteurl" runtime property when set, otherwise ORIGIN
 * followed by the context path.
 */
export function createUrlContextProvider(
	config: Pick<Config, "ROOT_PATH" | "ORIGIN">,
	runtimeConfigService: Pick<RuntimeConfigService, "getProperty">,
): UrlContextProvider {
	const relativeUrl = getRelativeContextPath(config);
	const fallbackAbsoluteUrl = `${config.ORIGIN.replace(/\/+$/, "")}${relativeUrl}`;

	return (): UrlContext => {
		const configured = runtimeConfigService.getProperty(ABSOLUTE_URL_PROPERTY)?.trim();
		return {
			relativeUrl,
			absoluteUrl: configured ? configured.replace(/\/+$/, "") : fallbackAbsoluteUrl,
		};
	};
}
