import type { WeblogDao } from "../dao/WeblogDao";
import type { ResourceResolver } from "../services/ResourceResolver";
import { getLog } from "../util/Logger";
import { sendResolveResult } from "../util/ResourceResponse";
import { getWildcardParam, handleLookupError, isLookupError, lookupWeblog } from "../util/RouterUtil";
import express, { type Request, type Response, type Router } from "express";

const log = getLog(import.meta);

/**
 * Serves resources to the authoring preview. A `theme` query parameter names a theme that is
 * searched before the weblog's own.
 */
export function createPreviewResourceRouter(weblogDao: WeblogDao, resourceResolver: ResourceResolver): Router {
	const router = express.Router();

	/**
	 * GET /:handle/*path?theme=
	 */
	router.get("/:handle/*path", async (req: Request, res: Response) => {
		const { handle } = req.params;
		const path = getWildcardParam(req.params.path);
		const theme = typeof req.query.theme === "string" ? req.query.theme : undefined;
		try {
			const weblog = await lookupWeblog(weblogDao, handle);
			if (isLookupError(weblog)) {
				return handleLookupError(res, weblog);
			}
			const result = await resourceResolver.resolve(weblog, path, theme);
			await sendResolveResult(req, res, result);
		} catch (error) {
			log.error(error, "Failed to serve preview resource %s for weblog %s", path, handle);
			if (!res.headersSent) {
				res.status(500).json({ error: "Failed to serve resource" });
			}
		}
	});

	return router;
}
