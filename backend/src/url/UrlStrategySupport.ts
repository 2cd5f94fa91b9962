import type { UrlContext } from "./UrlStrategy";
import {
	type CollectionUrlParams,
	encode,
	encodePath,
	getEncodedTagsString,
	getQueryString,
	ROOT_CATEGORY,
} from "weblogger-common";

/**
 * Query parameter names in the order they are written.
 */
export const QUERY_PARAM_ORDER = ["theme", "previewEntry", "entry", "date", "cat", "tags", "page"] as const;

export type QueryParamName = (typeof QUERY_PARAM_ORDER)[number];

/**
 * Already-encoded query values. Undefined and empty values are left out.
 */
export type QueryParams = Partial<Record<QueryParamName, string | undefined>>;

export function toQueryString(params: QueryParams): string {
	const pairs: Array<[string, string]> = [];
	for (const name of QUERY_PARAM_ORDER) {
		const value = params[name];
		if (value) {
			pairs.push([name, value]);
		}
	}
	return getQueryString(pairs);
}

export function getContextUrl(context: UrlContext, absolute: boolean): string {
	return absolute ? context.absoluteUrl : context.relativeUrl;
}

export function getLocaleSegment(locale: string | undefined): string {
	return locale ? `${locale}/` : "";
}

/**
 * The "root" category stands for no category.
 */
export function normalizeCategory(category: string | undefined): string | undefined {
	return category && category !== ROOT_CATEGORY ? category : undefined;
}

function getPageParam(pageNum: number | undefined): string | undefined {
	return pageNum !== undefined && pageNum > 0 ? String(pageNum) : undefined;
}

function getTags(tags: ReadonlyArray<string> | undefined): ReadonlyArray<string> | undefined {
	return tags && tags.length > 0 ? tags : undefined;
}

/**
 * Every collection filter as a query parameter, for URLs whose path is already fixed.
 */
export function getFilterParams(params: CollectionUrlParams): QueryParams {
	const category = normalizeCategory(params.category);
	const tags = getTags(params.tags);
	return {
		date: params.date,
		cat: category ? encode(category) : undefined,
		tags: tags ? getEncodedTagsString(tags) : undefined,
		page: getPageParam(params.pageNum),
	};
}

export interface CollectionPath {
	/** Path segment without a leading slash, "" when no filter is in the path */
	readonly segment: string;
	/** Filters the segment did not consume */
	readonly params: QueryParams;
}

/**
 * Puts at most one filter in the path: a category, else a date, else tags.
 * The other filters become query parameters.
 */
export function getCollectionPath(params: CollectionUrlParams): CollectionPath {
	const category = normalizeCategory(params.category);
	const tags = getTags(params.tags);
	const filters = getFilterParams(params);

	if (category) {
		return { segment: `category/${encodePath(category)}`, params: { ...filters, cat: undefined } };
	}
	if (params.date) {
		return { segment: `date/${params.date}`, params: { ...filters, date: undefined } };
	}
	if (tags) {
		return { segment: `tags/${getEncodedTagsString(tags)}`, params: { ...filters, tags: undefined } };
	}
	return { segment: "", params: filters };
}

/**
 * Strips a single leading slash from a file path.
 */
export function stripLeadingSlash(path: string): string {
	return path.startsWith("/") ? path.substring(1) : path;
}
