import type { RuntimeConfigService } from "../services/RuntimeConfigService";
import { type ThemeManager, ThemeNotFoundError } from "../services/ThemeManager";
import { getLog } from "../util/Logger";
import express, { type Request, type Response, type Router } from "express";
import { z } from "zod";

const log = getLog(import.meta);

const PropertiesUpdateSchema = z.object({
	properties: z.record(z.string(), z.string()),
	commentPlugins: z.array(z.string()).optional(),
});

export interface AdminRouterOptions {
	runtimeConfigService: RuntimeConfigService;
	themeManager: ThemeManager;
}

/**
 * Site administration: runtime properties and theme reloads.
 */
export function createAdminRouter(options: AdminRouterOptions): Router {
	const { runtimeConfigService, themeManager } = options;
	const router = express.Router();
	router.use(express.json({ limit: "1mb" }));

	router.get("/properties", (_req: Request, res: Response) => {
		res.json({ properties: runtimeConfigService.getProperties(), defs: runtimeConfigService.defs });
	});

	/**
	 * PUT /properties
	 * Body: { properties: Record<string, string>, commentPlugins?: Array<string> }
	 *
	 * The properties form a full form submission: an absent boolean is saved as false.
	 * Any invalid value rejects the whole update.
	 */
	router.put("/properties", async (req: Request, res: Response) => {
		const parsed = PropertiesUpdateSchema.safeParse(req.body);
		if (!parsed.success) {
			return res.status(400).json({ error: "Expected { properties, commentPlugins? }" });
		}
		try {
			const result = await runtimeConfigService.updateProperties(
				parsed.data.properties,
				parsed.data.commentPlugins,
			);
			if (result.status === "invalid") {
				return res.status(400).json({ error: "Invalid runtime properties", errors: result.errors });
			}
			res.json({ properties: result.properties });
		} catch (error) {
			log.error(error, "Error saving runtime properties.");
			res.status(500).json({ error: "Failed to save runtime properties" });
		}
	});

	router.post("/themes/:themeId/reload", async (req: Request, res: Response) => {
		const { themeId } = req.params;
		if (!themeId) {
			return res.status(400).json({ error: "Theme id is required" });
		}
		try {
			const theme = await themeManager.reloadTheme(themeId);
			log.info({ themeId }, "Reloaded theme %s", themeId);
			res.json({ id: theme.id, name: theme.name, resources: theme.listResources().length });
		} catch (error) {
			if (error instanceof ThemeNotFoundError) {
				return res.status(404).json({ error: error.message });
			}
			log.error(error, "Error reloading theme %s.", themeId);
			res.status(500).json({ error: "Failed to reload theme" });
		}
	});

	return router;
}
