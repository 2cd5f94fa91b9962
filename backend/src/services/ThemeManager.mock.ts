import type { Weblog } from "../model/Weblog";
import { type Theme, type ThemeManager, ThemeNotFoundError } from "./ThemeManager";
import { Readable } from "node:stream";
import { vi } from "vitest";

/**
 * A theme whose resources hold the given text, all modified at `lastModified`.
 */
export function mockTheme(id: string, resources: Record<string, string> = {}, lastModified = 1_700_000_000_000): Theme {
	return {
		id,
		name: id,
		getResource: vi.fn((path: string) => {
			const key = path.startsWith("/") ? path.substring(1) : path;
			const content = resources[key];
			if (content === undefined) {
				return;
			}
			return { path: key, lastModified, openStream: () => Readable.from([content]) };
		}),
		listResources: vi.fn(() => Object.keys(resources).sort()),
	};
}

export function mockThemeManager(themes: Array<Theme> = []): ThemeManager {
	const byId = new Map(themes.map(theme => [theme.id, theme]));
	const getTheme = vi.fn((themeId: string) => {
		const theme = byId.get(themeId);
		return theme ? Promise.resolve(theme) : Promise.reject(new ThemeNotFoundError(themeId));
	});
	return {
		getTheme,
		getWeblogTheme: vi.fn((weblog: Pick<Weblog, "editorTheme">) =>
			weblog.editorTheme === "custom" ? Promise.resolve(undefined) : getTheme(weblog.editorTheme),
		),
		reloadTheme: getTheme,
	};
}
