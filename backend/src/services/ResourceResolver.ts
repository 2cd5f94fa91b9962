/**
 * Decides where a weblog resource path is served from.
 *
 * Lookup order:
 * 1. the preview theme override, when one is given
 * 2. the weblog's own shared theme (none for custom themes)
 * 3. the weblog's uploaded media files, matched by original upload path
 *
 * A strategy finds the path only when its resource opens. A lookup or open error is
 * logged and the next strategy runs. The caller owns the stream of the resource found.
 */

import type { MediaFileDao } from "../dao/MediaFileDao";
import type { Weblog } from "../model/Weblog";
import { getLog } from "../util/Logger";
import { openReadable } from "../util/StreamUtil";
import type { MediaFileStorage } from "./MediaFileStorage";
import type { Theme, ThemeManager } from "./ThemeManager";
import type { Readable } from "node:stream";

const log = getLog(import.meta);

export type ResourceSource = "theme" | "media-file";

export interface ResourceCandidate {
	readonly source: ResourceSource;
	/** Path inside the weblog's namespace, without a leading slash */
	readonly path: string;
	/** Epoch milliseconds */
	readonly lastModified: number;
	/** Known content type; otherwise the caller derives one from the path */
	readonly contentType?: string | undefined;
	/** Already open; whoever receives the candidate must consume or destroy it */
	readonly stream: Readable;
}

export interface ResolverFailure {
	readonly strategy: "preview-theme" | "weblog-theme" | "media-file";
	readonly error: unknown;
}

export type ResolveResult =
	| { readonly status: "found"; readonly resource: ResourceCandidate }
	| { readonly status: "not-found" }
	| { readonly status: "lookup-failure"; readonly failures: Array<ResolverFailure> };

export interface ResourceResolver {
	/**
	 * Resolves a path inside a weblog's resource namespace.
	 * @param resourcePath may begin with a single slash, which is ignored.
	 * @param themeOverride preview theme id, consulted before the weblog's theme when non-empty.
	 */
	resolve(weblog: Weblog, resourcePath: string, themeOverride?: string): Promise<ResolveResult>;
}

export interface ResourceResolverDeps {
	readonly themeManager: ThemeManager;
	readonly mediaFileDao: MediaFileDao;
	readonly mediaFileStorage: MediaFileStorage;
}

/**
 * Strips a single leading slash.
 */
export function normalizeResourcePath(resourcePath: string): string {
	return resourcePath.startsWith("/") ? resourcePath.substring(1) : resourcePath;
}

async function fromTheme(theme: Theme, path: string): Promise<ResourceCandidate | undefined> {
	const resource = theme.getResource(path);
	if (!resource) {
		return;
	}
	return {
		source: "theme",
		path: resource.path,
		lastModified: resource.lastModified,
		stream: await openReadable(() => resource.openStream()),
	};
}

export function createResourceResolver(deps: ResourceResolverDeps): ResourceResolver {
	const { themeManager, mediaFileDao, mediaFileStorage } = deps;

	return { resolve };

	async function fromMediaFiles(weblog: Weblog, path: string): Promise<ResourceCandidate | undefined> {
		const mediaFile = await mediaFileDao.getMediaFileByOriginalPath(weblog.id, path);
		if (!mediaFile) {
			return;
		}
		return {
			source: "media-file",
			path,
			lastModified: mediaFile.updatedAt.getTime(),
			contentType: mediaFile.contentType,
			stream: await openReadable(() => mediaFileStorage.openStream(weblog.handle, mediaFile.id)),
		};
	}

	async function resolve(weblog: Weblog, resourcePath: string, themeOverride?: string): Promise<ResolveResult> {
		const path = normalizeResourcePath(resourcePath);
		const failures: Array<ResolverFailure> = [];
		const strategies: Array<[ResolverFailure["strategy"], () => Promise<ResourceCandidate | undefined>]> = [];

		if (themeOverride) {
			strategies.push(["preview-theme", async () => fromTheme(await themeManager.getTheme(themeOverride), path)]);
		}
		strategies.push([
			"weblog-theme",
			async () => {
				const theme = await themeManager.getWeblogTheme(weblog);
				return theme ? fromTheme(theme, path) : undefined;
			},
		]);
		strategies.push(["media-file", () => fromMediaFiles(weblog, path)]);

		for (const [strategy, lookup] of strategies) {
			try {
				const resource = await lookup();
				if (resource) {
					log.debug({ handle: weblog.handle, path, source: resource.source }, "Resolved resource %s", path);
					return { status: "found", resource };
				}
			} catch (error) {
				log.error(error, "Error looking up %s resource %s for weblog %s", strategy, path, weblog.handle);
				failures.push({ strategy, error });
			}
		}

		return failures.length > 0 ? { status: "lookup-failure", failures } : { status: "not-found" };
	}
}
