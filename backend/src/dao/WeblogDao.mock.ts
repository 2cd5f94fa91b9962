import { mockWeblog } from "../model/Weblog.mock";
import type { WeblogDao } from "./WeblogDao";
import { vi } from "vitest";

export function mockWeblogDao(): WeblogDao {
	return {
		createWeblog: vi.fn().mockResolvedValue(mockWeblog()),
		getWeblog: vi.fn().mockResolvedValue(mockWeblog()),
		getWeblogByHandle: vi.fn().mockResolvedValue(mockWeblog()),
		listWeblogs: vi.fn().mockResolvedValue([mockWeblog()]),
		updateTheme: vi.fn().mockResolvedValue(mockWeblog()),
		deleteWeblog: vi.fn().mockResolvedValue(undefined),
	};
}
