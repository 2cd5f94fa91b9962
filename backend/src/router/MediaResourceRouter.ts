import type { MediaFileDao } from "../dao/MediaFileDao";
import type { WeblogDao } from "../dao/WeblogDao";
import type { MediaFileStorage } from "../services/MediaFileStorage";
import { getLog } from "../util/Logger";
import { sendResource } from "../util/ResourceResponse";
import { openReadable } from "../util/StreamUtil";
import { handleLookupError, isLookupError, isMediaFileId, lookupWeblog } from "../util/RouterUtil";
import type { SiteRouterOptions } from "./ResourceRouter";
import express, { type Request, type Response, type Router } from "express";

const log = getLog(import.meta);

const THUMBNAIL_CONTENT_TYPE = "image/png";

/**
 * Serves uploaded media files by id, or their thumbnails with `?t=true`.
 * A file without a thumbnail is served in full.
 */
export function createMediaResourceRouter(
	weblogDao: WeblogDao,
	mediaFileDao: MediaFileDao,
	mediaFileStorage: MediaFileStorage,
	options?: SiteRouterOptions,
): Router {
	const router = express.Router();
	const { defaultHandle } = options ?? {};

	if (defaultHandle) {
		router.get("/mediaresource/:fileId", (req: Request, res: Response) => serveMediaFile(defaultHandle, req, res));
	}

	/**
	 * GET /:handle/mediaresource/:fileId[?t=true]
	 */
	router.get("/:handle/mediaresource/:fileId", (req: Request, res: Response) =>
		serveMediaFile(req.params.handle, req, res),
	);

	return router;

	async function serveMediaFile(handle: string | undefined, req: Request, res: Response) {
		const { fileId } = req.params;
		try {
			const weblog = await lookupWeblog(weblogDao, handle);
			if (isLookupError(weblog)) {
				return handleLookupError(res, weblog);
			}
			const mediaFile = isMediaFileId(fileId) ? await mediaFileDao.getMediaFile(fileId) : undefined;
			if (!mediaFile || mediaFile.weblogId !== weblog.id) {
				return res.status(404).json({ error: "Media file not found" });
			}

			const thumbnail = req.query.t === "true" && mediaFile.hasThumbnail;
			const stream = await openReadable(() => mediaFileStorage.openStream(weblog.handle, mediaFile.id, thumbnail));
			await sendResource(req, res, {
				source: "media-file",
				path: mediaFile.originalPath,
				lastModified: mediaFile.updatedAt.getTime(),
				contentType: thumbnail ? THUMBNAIL_CONTENT_TYPE : mediaFile.contentType,
				stream,
			});
		} catch (error) {
			log.error(error, "Failed to serve media file %s for weblog %s", fileId, handle);
			if (!res.headersSent) {
				res.status(500).json({ error: "Failed to serve media file" });
			}
		}
	}
}
