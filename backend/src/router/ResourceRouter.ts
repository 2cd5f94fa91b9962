import type { WeblogDao } from "../dao/WeblogDao";
import type { ResourceResolver } from "../services/ResourceResolver";
import { getLog } from "../util/Logger";
import { sendResolveResult } from "../util/ResourceResponse";
import { getWildcardParam, handleLookupError, isLookupError, lookupWeblog } from "../util/RouterUtil";
import express, { type Request, type Response, type Router } from "express";

const log = getLog(import.meta);

export interface SiteRouterOptions {
	/** Weblog served at the site root, when URL_STRATEGY is "standard" */
	defaultHandle?: string | undefined;
}

/**
 * Serves theme resources and media files by path from a weblog's resource namespace.
 */
export function createResourceRouter(
	weblogDao: WeblogDao,
	resourceResolver: ResourceResolver,
	options?: SiteRouterOptions,
): Router {
	const router = express.Router();
	const { defaultHandle } = options ?? {};

	if (defaultHandle) {
		router.get("/resource/*path", (req: Request, res: Response) => serveResource(defaultHandle, req, res));
	}

	/**
	 * GET /:handle/resource/*path
	 */
	router.get("/:handle/resource/*path", (req: Request, res: Response) => serveResource(req.params.handle, req, res));

	return router;

	async function serveResource(handle: string | undefined, req: Request, res: Response) {
		const path = getWildcardParam(req.params.path);
		try {
			const weblog = await lookupWeblog(weblogDao, handle);
			if (isLookupError(weblog)) {
				return handleLookupError(res, weblog);
			}
			const result = await resourceResolver.resolve(weblog, path);
			await sendResolveResult(req, res, result);
		} catch (error) {
			log.error(error, "Failed to serve resource %s for weblog %s", path, handle);
			if (!res.headersSent) {
				res.status(500).json({ error: "Failed to serve resource" });
			}
		}
	}
}
