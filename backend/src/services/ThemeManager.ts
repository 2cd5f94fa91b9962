/**
 * Loads shared themes from the themes directory.
 *
 * A theme is a directory `<themesDir>/<themeId>/` holding a `theme.json` descriptor.
 * Every other file below that directory is a theme resource, addressed by its path
 * relative to the theme directory with "/" separators.
 */

import type { Weblog } from "../model/Weblog";
import { getLog } from "../util/Logger";
import { createReadStream } from "node:fs";
import { readdir, readFile, stat } from "node:fs/promises";
import { join, relative, sep } from "node:path";
import type { Readable } from "node:stream";
import { CUSTOM_THEME } from "weblogger-common";
import { z } from "zod";

const log = getLog(import.meta);

const DESCRIPTOR_FILE = "theme.json";

const THEME_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

const ThemeDescriptorSchema = z.object({
	name: z.string().min(1),
	author: z.string().optional(),
	description: z.string().optional(),
});

export type ThemeDescriptor = z.infer<typeof ThemeDescriptorSchema>;

/**
 * A static file bundled with a theme.
 */
export interface ThemeResource {
	readonly path: string;
	/** Modification time in epoch milliseconds */
	readonly lastModified: number;
	openStream(): Readable;
}

export interface Theme extends ThemeDescriptor {
	readonly id: string;
	/**
	 * Looks up a resource. A single leading slash is ignored.
	 */
	getResource(path: string): ThemeResource | undefined;
	listResources(): Array<string>;
}

export class ThemeNotFoundError extends Error {
	readonly themeId: string;

	constructor(themeId: string, options?: ErrorOptions) {
		super(`Theme not found: ${themeId}`, options);
		this.name = "ThemeNotFoundError";
		this.themeId = themeId;
	}
}

export interface ThemeManager {
	/**
	 * Gets a theme by id, loading it on first use.
	 * @throws ThemeNotFoundError when no valid theme has that id.
	 */
	getTheme(themeId: string): Promise<Theme>;
	/**
	 * Gets the shared theme a weblog is configured with, or undefined when the weblog
	 * uses custom templates and so has no bundled resources.
	 * @throws ThemeNotFoundError when the configured theme does not exist.
	 */
	getWeblogTheme(weblog: Pick<Weblog, "editorTheme">): Promise<Theme | undefined>;
	/**
	 * Drops the cached copy of a theme and loads it again from disk.
	 */
	reloadTheme(themeId: string): Promise<Theme>;
}

interface ResourceFile {
	readonly absolutePath: string;
	readonly lastModified: number;
}

async function collectFiles(dir: string, root: string, files: Map<string, ResourceFile>): Promise<void> {
	const entries = await readdir(dir, { withFileTypes: true });
	for (const entry of entries) {
		const absolutePath = join(dir, entry.name);
		if (entry.isDirectory()) {
			await collectFiles(absolutePath, root, files);
		} else if (entry.isFile()) {
			const relativePath = relative(root, absolutePath).split(sep).join("/");
			if (relativePath !== DESCRIPTOR_FILE) {
				const stats = await stat(absolutePath);
				files.set(relativePath, { absolutePath, lastModified: Math.floor(stats.mtimeMs) });
			}
		}
	}
}

function createTheme(id: string, descriptor: ThemeDescriptor, files: Map<string, ResourceFile>): Theme {
	return {
		id,
		...descriptor,
		getResource(path) {
			const key = path.startsWith("/") ? path.substring(1) : path;
			const file = files.get(key);
			if (!file) {
				return;
			}
			return {
				path: key,
				lastModified: file.lastModified,
				openStream: () => createReadStream(file.absolutePath),
			};
		},
		listResources() {
			return [...files.keys()].sort();
		},
	};
}

async function loadTheme(themesDir: string, themeId: string): Promise<Theme> {
	if (!THEME_ID_PATTERN.test(themeId)) {
		throw new ThemeNotFoundError(themeId);
	}
	const themeDir = join(themesDir, themeId);
	let raw: string;
	try {
		raw = await readFile(join(themeDir, DESCRIPTOR_FILE), "utf-8");
	} catch (error) {
		throw new ThemeNotFoundError(themeId, { cause: error });
	}
	let descriptor: unknown;
	try {
		descriptor = JSON.parse(raw);
	} catch (error) {
		throw new ThemeNotFoundError(themeId, { cause: error });
	}
	const parsed = ThemeDescriptorSchema.safeParse(descriptor);
	if (!parsed.success) {
		throw new ThemeNotFoundError(themeId, { cause: parsed.error });
	}
	const files = new Map<string, ResourceFile>();
	await collectFiles(themeDir, themeDir, files);
	log.info({ themeId, resources: files.size }, "Loaded theme %s", themeId);
	return createTheme(themeId, parsed.data, files);
}

export function createThemeManager(themesDir: string): ThemeManager {
	const themes = new Map<string, Promise<Theme>>();

	return {
		getTheme,
		getWeblogTheme,
		reloadTheme,
	};

	function getTheme(themeId: string): Promise<Theme> {
		const cached = themes.get(themeId);
		if (cached) {
			return cached;
		}
		const loading = loadTheme(themesDir, themeId);
		themes.set(themeId, loading);
		// Failed loads are not cached
		loading.catch(() => {
			if (themes.get(themeId) === loading) {
				themes.delete(themeId);
			}
		});
		return loading;
	}

	async function getWeblogTheme(weblog: Pick<Weblog, "editorTheme">): Promise<Theme | undefined> {
		if (!weblog.editorTheme || weblog.editorTheme === CUSTOM_THEME) {
			return;
		}
		return await getTheme(weblog.editorTheme);
	}

	function reloadTheme(themeId: string): Promise<Theme> {
		themes.delete(themeId);
		return getTheme(themeId);
	}
}
