import type { Weblog } from "./Weblog";

export function mockWeblog(overrides: Partial<Weblog> = {}): Weblog {
	return {
		id: 1,
		handle: "myblog",
		name: "My Blog",
		editorTheme: "basic",
		locale: null,
		visible: true,
		active: true,
		createdAt: new Date("2024-01-01"),
		updatedAt: new Date("2024-01-01"),
		...overrides,
	};
}
