import type { MediaFile } from "./MediaFile";

export function mockMediaFile(overrides: Partial<MediaFile> = {}): MediaFile {
	return {
		id: "5f0c2a9e-1111-4c8e-9d3b-000000000001",
		weblogId: 1,
		name: "logo.png",
		originalPath: "images/logo.png",
		contentType: "image/png",
		length: 1024,
		hasThumbnail: false,
		createdAt: new Date("2024-01-01"),
		updatedAt: new Date("2024-01-01"),
		...overrides,
	};
}
