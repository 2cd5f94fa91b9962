import type { Weblog } from "../model/Weblog";
import type {
	CollectionUrlRequest,
	EntryUrlRequest,
	PageUrlRequest,
	ResourceUrlRequest,
	RootUrlRequest,
	WeblogUrlRequest,
} from "weblogger-common";

/**
 * Where the application is mounted.
 */
export interface UrlContext {
	/** Context path without a trailing slash, "" at the root */
	readonly relativeUrl: string;
	/** Scheme, host and context path without a trailing slash */
	readonly absoluteUrl: string;
}

/**
 * Reads the current context on every call, so a changed absolute URL applies at once.
 */
export type UrlContextProvider = () => UrlContext;

/**
 * The part of a weblog a URL strategy needs.
 */
export type UrlWeblog = Pick<Weblog, "handle">;

export type UrlParams<T> = Omit<T, "kind">;

/**
 * Builds outbound URLs for a weblog. Every method returns undefined when the weblog is missing,
 * and identical inputs always give identical output.
 */
export interface UrlStrategy {
	getWeblogUrl(weblog: UrlWeblog | undefined, request: UrlParams<RootUrlRequest>): string | undefined;
	getEntryUrl(weblog: UrlWeblog | undefined, request: UrlParams<EntryUrlRequest>): string | undefined;
	getCollectionUrl(weblog: UrlWeblog | undefined, request: UrlParams<CollectionUrlRequest>): string | undefined;
	/**
	 * A custom page, or the collection URL when no page link is given.
	 */
	getPageUrl(weblog: UrlWeblog | undefined, request: UrlParams<PageUrlRequest>): string | undefined;
	getResourceUrl(weblog: UrlWeblog | undefined, request: UrlParams<ResourceUrlRequest>): string | undefined;
	/**
	 * URL of an uploaded media file, or of its thumbnail.
	 */
	getMediaFileUrl(
		weblog: UrlWeblog | undefined,
		fileId: string,
		thumbnail: boolean,
		absolute: boolean,
	): string | undefined;
}

/**
 * Dispatches a tagged URL request to the matching strategy method.
 */
export function buildUrl(
	strategy: UrlStrategy,
	weblog: UrlWeblog | undefined,
	request: WeblogUrlRequest,
): string | undefined {
	switch (request.kind) {
		case "root":
			return strategy.getWeblogUrl(weblog, request);
		case "entry":
			return strategy.getEntryUrl(weblog, request);
		case "collection":
			return strategy.getCollectionUrl(weblog, request);
		case "page":
			return strategy.getPageUrl(weblog, request);
		case "resource":
			return strategy.getResourceUrl(weblog, request);
	}
}
