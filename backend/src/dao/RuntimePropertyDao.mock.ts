import type { RuntimePropertyDao } from "./RuntimePropertyDao";
import { vi } from "vitest";

export function mockRuntimePropertyDao(properties: Record<string, string> = {}): RuntimePropertyDao {
	return {
		getProperties: vi.fn().mockResolvedValue(properties),
		saveProperties: vi.fn().mockResolvedValue(undefined),
	};
}
