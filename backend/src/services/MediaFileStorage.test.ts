import { createMediaFileStorage, InvalidMediaPathError, type MediaFileStorage } from "./MediaFileStorage";
import { mkdtemp, readFile, rm, stat } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { text } from "node:stream/consumers";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

describe("MediaFileStorage", () => {
	let uploadsDir: string;
	let storage: MediaFileStorage;

	beforeEach(async () => {
		uploadsDir = await mkdtemp(join(tmpdir(), "uploads-"));
		storage = createMediaFileStorage(uploadsDir);
	});

	afterEach(async () => {
		await rm(uploadsDir, { recursive: true, force: true });
	});

	it("should store files under the weblog handle", async () => {
		await storage.saveFile("myblog", "file-1", Buffer.from("hello"));

		expect(await readFile(join(uploadsDir, "myblog", "file-1"), "utf-8")).toBe("hello");
	});

	it("should store thumbnails beside the file", async () => {
		await storage.saveThumbnail("myblog", "file-1", Buffer.from("thumb"));

		expect(await readFile(join(uploadsDir, "myblog", "file-1_sm"), "utf-8")).toBe("thumb");
	});

	it("should open the file or its thumbnail", async () => {
		await storage.saveFile("myblog", "file-1", Buffer.from("full"));
		await storage.saveThumbnail("myblog", "file-1", Buffer.from("small"));

		expect(await text(storage.openStream("myblog", "file-1"))).toBe("full");
		expect(await text(storage.openStream("myblog", "file-1", true))).toBe("small");
	});

	it("should surface a missing file as a stream error", async () => {
		await expect(text(storage.openStream("myblog", "missing"))).rejects.toThrow("ENOENT");
	});

	it("should delete a file and its thumbnail", async () => {
		await storage.saveFile("myblog", "file-1", Buffer.from("full"));
		await storage.saveThumbnail("myblog", "file-1", Buffer.from("small"));

		await storage.deleteFile("myblog", "file-1");

		await expect(stat(join(uploadsDir, "myblog", "file-1"))).rejects.toThrow("ENOENT");
		await expect(stat(join(uploadsDir, "myblog", "file-1_sm"))).rejects.toThrow("ENOENT");
	});

	it("should ignore deleting a file that does not exist", async () => {
		await expect(storage.deleteFile("myblog", "missing")).resolves.toBeUndefined();
	});

	it("should reject path segments that could leave the uploads directory", () => {
		expect(() => storage.openStream("..", "file-1")).toThrow(InvalidMediaPathError);
		expect(() => storage.openStream("myblog", "../other/file-1")).toThrow("Invalid media path segment: ../other/file-1");
	});
});
