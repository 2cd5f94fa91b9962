import { mockMediaFile } from "../model/MediaFile.mock";
import type { MediaFileDao } from "./MediaFileDao";
import { vi } from "vitest";

export function mockMediaFileDao(): MediaFileDao {
	return {
		createMediaFile: vi.fn().mockResolvedValue(mockMediaFile()),
		getMediaFile: vi.fn().mockResolvedValue(mockMediaFile()),
		getMediaFileByOriginalPath: vi.fn().mockResolvedValue(undefined),
		listMediaFiles: vi.fn().mockResolvedValue([mockMediaFile()]),
		setHasThumbnail: vi.fn().mockResolvedValue(true),
		deleteMediaFile: vi.fn().mockResolvedValue(true),
	};
}
