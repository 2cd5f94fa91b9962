import type { RuntimePropertyDef, RuntimePropertyError, WeblogSummary } from "../types/Weblog";
import type { PreviewUrlResponse, WeblogUrlRequest } from "../types/WeblogUrl";
import { type ClientAuth, readError } from "./Client";

const WEBLOGS_PATH = "/api/weblogs";
const PROPERTIES_PATH = "/api/admin/properties";

export interface RuntimeProperties {
	readonly properties: Record<string, string>;
	readonly defs: Array<RuntimePropertyDef>;
}

export interface RuntimePropertiesUpdate {
	readonly properties: Record<string, string>;
	readonly commentPlugins?: Array<string>;
}

/**
 * Thrown when the server rejects a runtime property update.
 */
export class RuntimePropertiesRejectedError extends Error {
	readonly errors: Array<RuntimePropertyError>;

	constructor(errors: Array<RuntimePropertyError>) {
		super(`Invalid runtime properties: ${errors.map(e => e.property).join(", ")}`);
		this.name = "RuntimePropertiesRejectedError";
		this.errors = errors;
	}
}

export interface WeblogClient {
	/**
	 * Looks up a weblog by handle. Resolves to undefined for an unknown handle.
	 */
	getWeblog(handle: string): Promise<WeblogSummary | undefined>;
	/**
	 * Asks the server for a preview URL of the given weblog.
	 * @param previewTheme theme to preview instead of the weblog's own.
	 */
	getPreviewUrl(handle: string, request: WeblogUrlRequest, previewTheme?: string): Promise<string>;
	getRuntimeProperties(): Promise<RuntimeProperties>;
	saveRuntimeProperties(update: RuntimePropertiesUpdate): Promise<Record<string, string>>;
}

function toSearchParams(request: WeblogUrlRequest, previewTheme: string | undefined): URLSearchParams {
	const search = new URLSearchParams({ kind: request.kind, absolute: String(request.absolute) });
	const optional: Record<string, string | number | undefined> = {
		theme: previewTheme,
		locale: request.locale,
	};
	switch (request.kind) {
		case "entry":
			optional.entryAnchor = request.entryAnchor;
			break;
		case "page":
			optional.pageLink = request.pageLink;
			optional.entryAnchor = request.entryAnchor;
			optional.category = request.category;
			optional.date = request.date;
			optional.tags = request.tags?.join(",");
			optional.pageNum = request.pageNum;
			break;
		case "collection":
			optional.category = request.category;
			optional.date = request.date;
			optional.tags = request.tags?.join(",");
			optional.pageNum = request.pageNum;
			break;
		case "resource":
			optional.filePath = request.filePath;
			break;
		case "root":
			break;
	}
	for (const [name, value] of Object.entries(optional)) {
		if (value !== undefined && value !== "") {
			search.set(name, String(value));
		}
	}
	return search;
}

export function createWeblogClient(baseUrl: string, auth: ClientAuth): WeblogClient {
	return {
		getWeblog,
		getPreviewUrl,
		getRuntimeProperties,
		saveRuntimeProperties,
	};

	async function getWeblog(handle: string): Promise<WeblogSummary | undefined> {
		const response = await fetch(`${baseUrl}${WEBLOGS_PATH}/${encodeURIComponent(handle)}`, auth.createRequest("GET"));
		if (auth.checkUnauthorized?.(response)) {
			throw new Error("Unauthorized");
		}
		if (response.status === 404) {
			return;
		}
		if (!response.ok) {
			throw new Error(await readError(response, `Failed to get weblog ${handle}`));
		}
		return (await response.json()) as WeblogSummary;
	}

	async function getPreviewUrl(handle: string, request: WeblogUrlRequest, previewTheme?: string): Promise<string> {
		const search = toSearchParams(request, previewTheme);
		const response = await fetch(
			`${baseUrl}${WEBLOGS_PATH}/${encodeURIComponent(handle)}/preview-url?${search.toString()}`,
			auth.createRequest("GET"),
		);
		if (auth.checkUnauthorized?.(response)) {
			throw new Error("Unauthorized");
		}
		if (!response.ok) {
			throw new Error(await readError(response, "Failed to build preview URL"));
		}
		const body = (await response.json()) as PreviewUrlResponse;
		return body.url;
	}

	async function getRuntimeProperties(): Promise<RuntimeProperties> {
		const response = await fetch(`${baseUrl}${PROPERTIES_PATH}`, auth.createRequest("GET"));
		if (auth.checkUnauthorized?.(response)) {
			throw new Error("Unauthorized");
		}
		if (!response.ok) {
			throw new Error(await readError(response, "Failed to get runtime properties"));
		}
		return (await response.json()) as RuntimeProperties;
	}

	async function saveRuntimeProperties(update: RuntimePropertiesUpdate): Promise<Record<string, string>> {
		const response = await fetch(`${baseUrl}${PROPERTIES_PATH}`, auth.createRequest("PUT", update));
		if (auth.checkUnauthorized?.(response)) {
			throw new Error("Unauthorized");
		}
		if (response.status === 400) {
			const body = (await response.json()) as { errors?: Array<RuntimePropertyError> };
			throw new RuntimePropertiesRejectedError(body.errors ?? []);
		}
		if (!response.ok) {
			throw new Error(await readError(response, "Failed to save runtime properties"));
		}
		const body = (await response.json()) as { properties: Record<string, string> };
		return body.properties;
	}
}
