/**
 * URLs into the authoring preview of a weblog, optionally rendered with a theme other than
 * the weblog's own. Media files are served from the site, so those URLs come from `site`.
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
	CUSTOM_THEME,
	type EntryUrlRequest,
	encode,
	type PageUrlRequest,
	type ResourceUrlRequest,
	type RootUrlRequest,
} from "weblogger-common";

export const PREVIEW_PATH = "/authoring/preview";

export const PREVIEW_RESOURCE_PATH = "/authoring/previewresource";

export function createPreviewUrlStrategy(
	site: UrlStrategy,
	getUrlContext: UrlContextProvider,
	previewTheme?: string,
): UrlStrategy {
	const theme = previewTheme ? encode(previewTheme) : undefined;

	return {
		getWeblogUrl,
		getEntryUrl,
		getCollectionUrl,
		getPageUrl,
		getResourceUrl,
		getMediaFileUrl: (weblog, fileId, thumbnail, absolute) =>
			site.getMediaFileUrl(weblog, fileId, thumbnail, absolute),
	};

	function getWeblogUrl(weblog: UrlWeblog | undefined, request: UrlParams<RootUrlRequest>): string | undefined {
		const base = getBaseUrl(weblog, request.locale, request.absolute);
		return base === undefined ? undefined : `${base}${toQueryString({ theme })}`;
	}

	function getEntryUrl(weblog: UrlWeblog | undefined, request: UrlParams<EntryUrlRequest>): string | undefined {
		const base = getBaseUrl(weblog, request.locale, request.absolute);
		if (base === undefined) {
			return;
		}
		const previewEntry = request.entryAnchor ? encode(request.entryAnchor) : undefined;
		return `${base}${toQueryString({ theme, previewEntry })}`;
	}

	function getCollectionUrl(
		weblog: UrlWeblog | undefined,
		request: UrlParams<CollectionUrlRequest>,
	): string | undefined {
		const base = getBaseUrl(weblog, request.locale, request.absolute);
		if (base === undefined) {
			return;
		}
		const { segment, params } = getCollectionPath(request);
		return `${base}${segment}${toQueryString({ ...params, theme })}`;
	}

	// the entry anchor has no meaning for a previewed page
	function getPageUrl(weblog: UrlWeblog | undefined, request: UrlParams<PageUrlRequest>): string | undefined {
		if (!request.pageLink) {
			return getCollectionUrl(weblog, request);
		}
		const base = getBaseUrl(weblog, request.locale, request.absolute);
		if (base === undefined) {
			return;
		}
		return `${base}page/${request.pageLink}${toQueryString({ ...getFilterParams(request), theme })}`;
	}

	function getResourceUrl(weblog: UrlWeblog | undefined, request: UrlParams<ResourceUrlRequest>): string | undefined {
		if (!weblog) {
			return;
		}
		const contextUrl = getContextUrl(getUrlContext(), request.absolute);
		const query = toQueryString({ theme: previewTheme === CUSTOM_THEME ? undefined : theme });
		return `${contextUrl}${PREVIEW_RESOURCE_PATH}/${weblog.handle}/${stripLeadingSlash(request.filePath)}${query}`;
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
		return `${contextUrl}${PREVIEW_PATH}/${weblog.handle}/${getLocaleSegment(locale)}`;
	}
}
