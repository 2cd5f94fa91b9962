/**
 * Site URL strategies: where readers find a weblog.
 *
 * MultiWeblog puts every weblog under `/<handle>/`. Standard serves one default weblog at the
 * context root and the others as MultiWeblog does.
 */

import type { UrlContextProvider, UrlParams, UrlStrategy, UrlWeblog } from "./UrlStrategy";
import {
	getCollectionPath,
	getContextUrl,
	getFilterParams,
	getLocaleSegment,
	stripLeadingSlash,
	toQueryString,
} from "./UrlStrategySupport";
import {
	type CollectionUrlRequest,
	type EntryUrlRequest,
	encode,
	getQueryString,
	type PageUrlRequest,
	type ResourceUrlRequest,
	type RootUrlRequest,
} from "weblogger-common";

function createSiteUrlStrategy(
	getUrlContext: UrlContextProvider,
	getWeblogPath: (handle: string) => string,
): UrlStrategy {
	return {
		getWeblogUrl,
		getEntryUrl,
		getCollectionUrl,
		getPageUrl,
		getResourceUrl,
		getMediaFileUrl,
	};

	function getWeblogUrl(weblog: UrlWeblog | undefined, request: UrlParams<RootUrlRequest>): string | undefined {
		return getBaseUrl(weblog, request.locale, request.absolute);
	}

	function getEntryUrl(weblog: UrlWeblog | undefined, request: UrlParams<EntryUrlRequest>): string | undefined {
		const base = getBaseUrl(weblog, request.locale, request.absolute);
		if (base === undefined || !request.entryAnchor) {
			return base;
		}
		return `${base}entry/${encode(request.entryAnchor)}`;
	}

	function getCollectionUrl(weblog: UrlWeblog | undefined, request: UrlParams<CollectionUrlRequest>): string | undefined {
		const base = getBaseUrl(weblog, request.locale, request.absolute);
		if (base === undefined) {
			return;
		}
		const { segment, params } = getCollectionPath(request);
		return `${base}${segment}${toQueryString(params)}`;
	}

	function getPageUrl(weblog: UrlWeblog | undefined, request: UrlParams<PageUrlRequest>): string | undefined {
		if (!request.pageLink) {
			return getCollectionUrl(weblog, request);
		}
		const base = getBaseUrl(weblog, request.locale, request.absolute);
		if (base === undefined) {
			return;
		}
		const entry = request.entryAnchor ? encode(request.entryAnchor) : undefined;
		return `${base}page/${request.pageLink}${toQueryString({ entry, ...getFilterParams(request) })}`;
	}

	function getResourceUrl(weblog: UrlWeblog | undefined, request: UrlParams<ResourceUrlRequest>): string | undefined {
		const base = getBaseUrl(weblog, undefined, request.absolute);
		if (base === undefined) {
			return;
		}
		return `${base}resource/${stripLeadingSlash(request.filePath)}`;
	}

	function getMediaFileUrl(
		weblog: UrlWeblog | undefined,
		fileId: string,
		thumbnail: boolean,
		absolute: boolean,
	): string | undefined {
		const base = getBaseUrl(weblog, undefined, absolute);
		if (base === undefined) {
			return;
		}
		const query = thumbnail ? getQueryString([["t", "true"]]) : "";
		return `${base}mediaresource/${encode(fileId)}${query}`;
	}

	function getBaseUrl(
		weblog: UrlWeblog | undefined,
		locale: string | undefined,
		absolute: boolean,
	): string | undefined {
		if (!weblog) {
			return;
		}
		const contextUrl = getContextUrl(getUrlContext(), absolute);
		return `${contextUrl}${getWeblogPath(weblog.handle)}${getLocaleSegment(locale)}`;
	}
}

export function createMultiWeblogUrlStrategy(getUrlContext: UrlContextProvider): UrlStrategy {
	return createSiteUrlStrategy(getUrlContext, handle => `/${handle}/`);
}

export function createStandardUrlStrategy(getUrlContext: UrlContextProvider, defaultHandle: string): UrlStrategy {
	return createSiteUrlStrategy(getUrlContext, handle => (handle === defaultHandle ? "/" : `/${handle}/`));
}
