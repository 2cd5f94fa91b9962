/**
 * Kinds of URL a weblog URL strategy can build.
 */
export type WeblogUrlKind = "root" | "entry" | "collection" | "page" | "resource";

/**
 * Category name that stands for "all categories". It never appears in a URL.
 */
export const ROOT_CATEGORY = "root";

/**
 * Theme id of a weblog whose templates are edited per weblog rather than shared.
 */
export const CUSTOM_THEME = "custom";

/**
 * Optional filters of a collection or custom page URL.
 */
export interface CollectionUrlParams {
	readonly category?: string | undefined;
	/**
	 * A date token such as "20240131", used verbatim.
	 */
	readonly date?: string | undefined;
	readonly tags?: ReadonlyArray<string> | undefined;
	readonly pageNum?: number | undefined;
}

interface BaseUrlRequest {
	readonly locale?: string | undefined;
	readonly absolute: boolean;
}

export interface RootUrlRequest extends BaseUrlRequest {
	readonly kind: "root";
}

export interface EntryUrlRequest extends BaseUrlRequest {
	readonly kind: "entry";
	readonly entryAnchor?: string | undefined;
}

export interface CollectionUrlRequest extends BaseUrlRequest, CollectionUrlParams {
	readonly kind: "collection";
}

export interface PageUrlRequest extends BaseUrlRequest, CollectionUrlParams {
	readonly kind: "page";
	readonly pageLink?: string | undefined;
	readonly entryAnchor?: string | undefined;
}

export interface ResourceUrlRequest extends BaseUrlRequest {
	readonly kind: "resource";
	readonly filePath: string;
}

export type WeblogUrlRequest =
	| RootUrlRequest
	| EntryUrlRequest
	| CollectionUrlRequest
	| PageUrlRequest
	| ResourceUrlRequest;

/**
 * Response of the preview URL endpoint.
 */
export interface PreviewUrlResponse {
	readonly url: string;
}
