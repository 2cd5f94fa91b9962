import type { MediaFileDao } from "../dao/MediaFileDao";
import type { WeblogDao } from "../dao/WeblogDao";
import type { MediaFile } from "../model/MediaFile";
import type { Weblog } from "../model/Weblog";
import type { MediaFileStorage } from "../services/MediaFileStorage";
import type { RuntimeConfigService } from "../services/RuntimeConfigService";
import { type ThemeManager, ThemeNotFoundError } from "../services/ThemeManager";
import { createPreviewUrlStrategy } from "../url/PreviewUrlStrategy";
import { buildUrl, type UrlContextProvider, type UrlStrategy } from "../url/UrlStrategy";
import { getLog } from "../util/Logger";
import {
	handleLookupError,
	isLookupError,
	isMediaFileId,
	type LookupError,
	lookupWeblog,
} from "../util/RouterUtil";
import { randomUUID } from "node:crypto";
import { posix } from "node:path";
import express, { type NextFunction, type Request, type Response, type Router } from "express";
import { UniqueConstraintError } from "sequelize";
import {
	CUSTOM_THEME,
	type MediaFileSummary,
	type PreviewUrlResponse,
	type WeblogSummary,
	type WeblogUrlRequest,
} from "weblogger-common";
import { z } from "zod";

const log = getLog(import.meta);

export const UPLOAD_MAX_SIZE_PROPERTY = "uploads.file.maxsize";

/** Upload limit while uploads.file.maxsize is unset or invalid */
const DEFAULT_UPLOAD_LIMIT = "100mb";

const BYTES_PER_MB = 1024 * 1024;

const HandleSchema = z
	.string()
	.min(1)
	.max(64)
	.regex(/^[A-Za-z0-9][A-Za-z0-9_-]*$/, "Handle may only contain letters, digits, '-' and '_'");

const CreateWeblogSchema = z.object({
	handle: HandleSchema,
	name: z.string().trim().min(1),
	editorTheme: z.string().min(1),
	locale: z.string().min(1).optional(),
});

const UpdateThemeSchema = z.object({
	theme: z.string().min(1),
});

function isUploadPathSegment(segment: string): boolean {
	return segment !== "" && segment !== "." && segment !== "..";
}

const UploadPathSchema = z
	.string()
	.min(1)
	.max(1024)
	.transform(path => (path.startsWith("/") ? path.substring(1) : path))
	.refine(path => path.split("/").every(isUploadPathSegment), "Invalid upload path");

const PreviewUrlQuerySchema = z.object({
	kind: z.enum(["root", "entry", "collection", "page", "resource"]),
	absolute: z
		.enum(["true", "false"])
		.default("false")
		.transform(value => value === "true"),
	theme: z.string().optional(),
	locale: z.string().optional(),
	entryAnchor: z.string().optional(),
	pageLink: z.string().optional(),
	category: z.string().optional(),
	date: z.string().optional(),
	tags: z
		.string()
		.optional()
		.transform(value => value?.split(",").filter(tag => tag.length > 0)),
	pageNum: z.coerce.number().int().min(0).optional(),
	filePath: z.string().optional(),
});

type PreviewUrlQuery = z.infer<typeof PreviewUrlQuerySchema>;

export interface WeblogRouterDeps {
	readonly weblogDao: WeblogDao;
	readonly mediaFileDao: MediaFileDao;
	readonly mediaFileStorage: MediaFileStorage;
	readonly themeManager: ThemeManager;
	readonly runtimeConfigService: Pick<RuntimeConfigService, "getProperty">;
	/** Builds reader-facing URLs, such as those of media files */
	readonly siteUrlStrategy: UrlStrategy;
	readonly getUrlContext: UrlContextProvider;
}

export function toWeblogSummary(weblog: Weblog): WeblogSummary {
	const { id, handle, name, editorTheme, locale } = weblog;
	return { id, handle, name, editorTheme, locale };
}

function formatIssues(error: z.ZodError): string {
	return error.issues.map(issue => `${issue.path.join(".") || "request"}: ${issue.message}`).join("; ");
}

function toPreviewRequest(query: PreviewUrlQuery): WeblogUrlRequest | undefined {
	const { locale, absolute } = query;
	const collection = {
		category: query.category,
		date: query.date,
		tags: query.tags,
		pageNum: query.pageNum,
	};
	switch (query.kind) {
		case "root":
			return { kind: "root", locale, absolute };
		case "entry":
			return { kind: "entry", locale, absolute, entryAnchor: query.entryAnchor };
		case "collection":
			return { kind: "collection", locale, absolute, ...collection };
		case "page":
			return {
				kind: "page",
				locale,
				absolute,
				pageLink: query.pageLink,
				entryAnchor: query.entryAnchor,
				...collection,
			};
		case "resource":
			return query.filePath ? { kind: "resource", locale, absolute, filePath: query.filePath } : undefined;
	}
}

/**
 * Rejects oversized uploads from express.raw() with 413 instead of the default HTML error.
 */
function handlePayloadTooLarge(err: Error, _req: Request, res: Response, next: NextFunction) {
	if (err.name === "PayloadTooLargeError") {
		return res.status(413).json({ error: "File is too large" });
	}
	next(err);
}

export function createWeblogRouter(deps: WeblogRouterDeps): Router {
	const { weblogDao, mediaFileDao, mediaFileStorage, themeManager, runtimeConfigService, siteUrlStrategy } = deps;
	const router = express.Router();
	const jsonBody = express.json({ limit: "1mb" });

	router.get("/", async (_req: Request, res: Response) => {
		try {
			const weblogs = await weblogDao.listWeblogs();
			res.json(weblogs.map(toWeblogSummary));
		} catch (error) {
			log.error(error, "Error listing weblogs.");
			res.status(500).json({ error: "Failed to list weblogs" });
		}
	});

	router.post("/", jsonBody, async (req: Request, res: Response) => {
		const parsed = CreateWeblogSchema.safeParse(req.body);
		if (!parsed.success) {
			return res.status(400).json({ error: formatIssues(parsed.error) });
		}
		try {
			const themeError = await checkTheme(parsed.data.editorTheme);
			if (themeError) {
				return res.status(400).json({ error: themeError });
			}
			const weblog = await weblogDao.createWeblog(parsed.data);
			log.info({ handle: weblog.handle }, "Created weblog %s", weblog.handle);
			res.status(201).json(toWeblogSummary(weblog));
		} catch (error) {
			if (error instanceof UniqueConstraintError) {
				return res.status(409).json({ error: `Handle already in use: ${parsed.data.handle}` });
			}
			log.error(error, "Error creating weblog.");
			res.status(500).json({ error: "Failed to create weblog" });
		}
	});

	router.get("/:handle", async (req: Request, res: Response) => {
		try {
			const weblog = await lookupWeblog(weblogDao, req.params.handle);
			if (isLookupError(weblog)) {
				return handleLookupError(res, weblog);
			}
			res.json(toWeblogSummary(weblog));
		} catch (error) {
			log.error(error, "Error getting weblog %s.", req.params.handle);
			res.status(500).json({ error: "Failed to get weblog" });
		}
	});

	router.put("/:handle/theme", jsonBody, async (req: Request, res: Response) => {
		const parsed = UpdateThemeSchema.safeParse(req.body);
		if (!parsed.success) {
			return res.status(400).json({ error: formatIssues(parsed.error) });
		}
		const { handle } = req.params;
		try {
			const themeError = await checkTheme(parsed.data.theme);
			if (themeError) {
				return res.status(400).json({ error: themeError });
			}
			const weblog = handle ? await weblogDao.updateTheme(handle, parsed.data.theme) : undefined;
			if (!weblog) {
				return res.status(404).json({ error: "Weblog not found" });
			}
			log.info({ handle, theme: parsed.data.theme }, "Switched weblog %s to theme %s", handle, parsed.data.theme);
			res.json(toWeblogSummary(weblog));
		} catch (error) {
			log.error(error, "Error updating theme of weblog %s.", handle);
			res.status(500).json({ error: "Failed to update theme" });
		}
	});

	/**
	 * GET /:handle/preview-url?kind=root|entry|collection|page|resource&absolute=&theme=&...
	 */
	router.get("/:handle/preview-url", async (req: Request, res: Response) => {
		const parsed = PreviewUrlQuerySchema.safeParse(req.query);
		if (!parsed.success) {
			return res.status(400).json({ error: formatIssues(parsed.error) });
		}
		const urlRequest = toPreviewRequest(parsed.data);
		if (!urlRequest) {
			return res.status(400).json({ error: "filePath is required for resource URLs" });
		}
		try {
			const weblog = await lookupWeblog(weblogDao, req.params.handle);
			if (isLookupError(weblog)) {
				return handleLookupError(res, weblog);
			}
			const preview = createPreviewUrlStrategy(siteUrlStrategy, deps.getUrlContext, parsed.data.theme);
			const url = buildUrl(preview, weblog, urlRequest);
			if (url === undefined) {
				return res.status(404).json({ error: "Weblog not found" });
			}
			const body: PreviewUrlResponse = { url };
			res.json(body);
		} catch (error) {
			log.error(error, "Error building preview URL for weblog %s.", req.params.handle);
			res.status(500).json({ error: "Failed to build preview URL" });
		}
	});

	router.get("/:handle/media", async (req: Request, res: Response) => {
		try {
			const weblog = await lookupWeblog(weblogDao, req.params.handle);
			if (isLookupError(weblog)) {
				return handleLookupError(res, weblog);
			}
			const mediaFiles = await mediaFileDao.listMediaFiles(weblog.id);
			res.json(mediaFiles.map(mediaFile => toMediaFileSummary(weblog, mediaFile)));
		} catch (error) {
			log.error(error, "Error listing media files of weblog %s.", req.params.handle);
			res.status(500).json({ error: "Failed to list media files" });
		}
	});

	/**
	 * POST /:handle/media?path=images/logo.png
	 * Raw body; Content-Type names the file's type.
	 */
	router.post("/:handle/media", rawBody, handlePayloadTooLarge, async (req: Request, res: Response) => {
		const parsedPath = UploadPathSchema.safeParse(req.query.path);
		if (!parsedPath.success) {
			return res.status(400).json({ error: formatIssues(parsedPath.error) });
		}
		const originalPath = parsedPath.data;
		if (!(req.body instanceof Buffer) || req.body.length === 0) {
			return res.status(400).json({ error: "No file data provided" });
		}
		const content = req.body;
		try {
			const weblog = await lookupWeblog(weblogDao, req.params.handle);
			if (isLookupError(weblog)) {
				return handleLookupError(res, weblog);
			}
			if (await mediaFileDao.getMediaFileByOriginalPath(weblog.id, originalPath)) {
				return res.status(409).json({ error: `A file already exists at ${originalPath}` });
			}

			const id = randomUUID();
			await mediaFileStorage.saveFile(weblog.handle, id, content);
			let mediaFile: MediaFile;
			try {
				mediaFile = await mediaFileDao.createMediaFile({
					id,
					weblogId: weblog.id,
					name: posix.basename(originalPath),
					originalPath,
					contentType: req.get("Content-Type")?.split(";")[0]?.trim() || "application/octet-stream",
					length: content.length,
				});
			} catch (error) {
				await mediaFileStorage.deleteFile(weblog.handle, id);
				if (error instanceof UniqueConstraintError) {
					return res.status(409).json({ error: `A file already exists at ${originalPath}` });
				}
				throw error;
			}

			log.info({ handle: weblog.handle, id, size: content.length }, "Uploaded media file %s", originalPath);
			res.status(201).json(toMediaFileSummary(weblog, mediaFile));
		} catch (error) {
			log.error(error, "Error uploading media file to weblog %s.", req.params.handle);
			res.status(500).json({ error: "Failed to upload media file" });
		}
	});

	/**
	 * PUT /:handle/media/:fileId/thumbnail
	 * Raw PNG body.
	 */
	router.put("/:handle/media/:fileId/thumbnail", rawBody, handlePayloadTooLarge, async (req: Request, res: Response) => {
		if (!(req.body instanceof Buffer) || req.body.length === 0) {
			return res.status(400).json({ error: "No thumbnail data provided" });
		}
		const content = req.body;
		try {
			const found = await lookupMediaFile(req);
			if (isLookupError(found)) {
				return handleLookupError(res, found);
			}
			const { weblog, mediaFile } = found;
			await mediaFileStorage.saveThumbnail(weblog.handle, mediaFile.id, content);
			await mediaFileDao.setHasThumbnail(mediaFile.id);
			res.json(toMediaFileSummary(weblog, { ...mediaFile, hasThumbnail: true }));
		} catch (error) {
			log.error(error, "Error storing thumbnail for media file %s.", req.params.fileId);
			res.status(500).json({ error: "Failed to store thumbnail" });
		}
	});

	router.delete("/:handle/media/:fileId", async (req: Request, res: Response) => {
		try {
			const found = await lookupMediaFile(req);
			if (isLookupError(found)) {
				return handleLookupError(res, found);
			}
			const { weblog, mediaFile } = found;
			await mediaFileDao.deleteMediaFile(mediaFile.id);
			await mediaFileStorage.deleteFile(weblog.handle, mediaFile.id);
			log.info({ handle: weblog.handle, id: mediaFile.id }, "Deleted media file %s", mediaFile.originalPath);
			res.status(204).send();
		} catch (error) {
			log.error(error, "Error deleting media file %s.", req.params.fileId);
			res.status(500).json({ error: "Failed to delete media file" });
		}
	});

	return router;

	/**
	 * @returns an error message for an unusable theme id
	 */
	async function checkTheme(themeId: string): Promise<string | undefined> {
		if (themeId === CUSTOM_THEME) {
			return;
		}
		try {
			await themeManager.getTheme(themeId);
		} catch (error) {
			if (error instanceof ThemeNotFoundError) {
				return `Unknown theme: ${themeId}`;
			}
			throw error;
		}
	}

	function getMaxUploadBytes(): number | undefined {
		const maxMb = Number.parseFloat(runtimeConfigService.getProperty(UPLOAD_MAX_SIZE_PROPERTY) ?? "");
		return Number.isFinite(maxMb) && maxMb > 0 ? Math.floor(maxMb * BYTES_PER_MB) : undefined;
	}

	/**
	 * Reads the raw body, limited by the size property as it stands for this request.
	 */
	function rawBody(req: Request, res: Response, next: NextFunction) {
		express.raw({ type: () => true, limit: getMaxUploadBytes() ?? DEFAULT_UPLOAD_LIMIT })(req, res, next);
	}

	async function lookupMediaFile(req: Request): Promise<{ weblog: Weblog; mediaFile: MediaFile } | LookupError> {
		const weblog = await lookupWeblog(weblogDao, req.params.handle);
		if (isLookupError(weblog)) {
			return weblog;
		}
		const { fileId } = req.params;
		const mediaFile = isMediaFileId(fileId) ? await mediaFileDao.getMediaFile(fileId) : undefined;
		if (!mediaFile || mediaFile.weblogId !== weblog.id) {
			return { status: 404, message: "Media file not found" };
		}
		return { weblog, mediaFile };
	}

	function toMediaFileSummary(weblog: Weblog, mediaFile: MediaFile): MediaFileSummary {
		const { id, name, originalPath, contentType, length } = mediaFile;
		return {
			id,
			name,
			originalPath,
			contentType,
			length,
			url: siteUrlStrategy.getMediaFileUrl(weblog, id, false, false) ?? "",
			thumbnailUrl: mediaFile.hasThumbnail ? siteUrlStrategy.getMediaFileUrl(weblog, id, true, false) : undefined,
		};
	}
}
