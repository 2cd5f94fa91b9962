import type { MediaFileStorage } from "./MediaFileStorage";
import { Readable } from "node:stream";
import { vi } from "vitest";

export function mockMediaFileStorage(content = "media-bytes"): MediaFileStorage {
	return {
		openStream: vi.fn(() => Readable.from([content])),
		saveFile: vi.fn().mockResolvedValue(undefined),
		saveThumbnail: vi.fn().mockResolvedValue(undefined),
		deleteFile: vi.fn().mockResolvedValue(undefined),
	};
}
