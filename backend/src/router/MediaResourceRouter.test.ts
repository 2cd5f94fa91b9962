import type { MediaFileDao } from "../dao/MediaFileDao";
import { mockMediaFileDao } from "../dao/MediaFileDao.mock";
import type { WeblogDao } from "../dao/WeblogDao";
import { mockWeblogDao } from "../dao/WeblogDao.mock";
import { mockMediaFile } from "../model/MediaFile.mock";
import type { MediaFileStorage } from "../services/MediaFileStorage";
import { mockMediaFileStorage } from "../services/MediaFileStorage.mock";
import { createMediaResourceRouter } from "./MediaResourceRouter";
import { randomUUID } from "node:crypto";
import { createReadStream } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Readable } from "node:stream";
import express, { type Express } from "express";
import request from "supertest";
import { beforeEach, describe, expect, it, vi } from "vitest";

const FILE_ID = "5f0c2a9e-1111-4c8e-9d3b-000000000001";

describe("MediaResourceRouter", () => {
	let app: Express;
	let weblogDao: WeblogDao;
	let mediaFileDao: MediaFileDao;
	let mediaFileStorage: MediaFileStorage;

	function setupApp(defaultHandle?: string): void {
		app = express();
		app.use(createMediaResourceRouter(weblogDao, mediaFileDao, mediaFileStorage, { defaultHandle }));
	}

	beforeEach(() => {
		weblogDao = mockWeblogDao();
		mediaFileDao = mockMediaFileDao();
		mediaFileStorage = mockMediaFileStorage("png-bytes");
		setupApp();
	});

	it("should serve a media file by id", async () => {
		const response = await request(app).get(`/myblog/mediaresource/${FILE_ID}`);

		expect(response.status).toBe(200);
		expect(response.headers["content-type"]).toBe("image/png");
		expect(response.headers["last-modified"]).toBe("Mon, 01 Jan 2024 00:00:00 GMT");
		expect(Buffer.from(response.body).toString()).toBe("png-bytes");
		expect(mediaFileDao.getMediaFile).toHaveBeenCalledWith(FILE_ID);
		expect(mediaFileStorage.openStream).toHaveBeenCalledWith("myblog", FILE_ID, false);
	});

	it("should serve the thumbnail as PNG", async () => {
		vi.mocked(mediaFileDao.getMediaFile).mockResolvedValue(
			mockMediaFile({ contentType: "image/jpeg", hasThumbnail: true }),
		);

		const response = await request(app).get(`/myblog/mediaresource/${FILE_ID}?t=true`);

		expect(response.status).toBe(200);
		expect(response.headers["content-type"]).toBe("image/png");
		expect(mediaFileStorage.openStream).toHaveBeenCalledWith("myblog", FILE_ID, true);
	});

	it("should serve the full file when there is no thumbnail", async () => {
		vi.mocked(mediaFileDao.getMediaFile).mockResolvedValue(mockMediaFile({ contentType: "image/jpeg" }));

		const response = await request(app).get(`/myblog/mediaresource/${FILE_ID}?t=true`);

		expect(response.status).toBe(200);
		expect(response.headers["content-type"]).toBe("image/jpeg");
		expect(mediaFileStorage.openStream).toHaveBeenCalledWith("myblog", FILE_ID, false);
	});

	it("should answer 304 and release the stream when the client copy is current", async () => {
		const stream = Readable.from(["png-bytes"]);
		vi.mocked(mediaFileStorage.openStream).mockReturnValue(stream);

		const response = await request(app)
			.get(`/myblog/mediaresource/${FILE_ID}`)
			.set("If-Modified-Since", "Tue, 02 Jan 2024 00:00:00 GMT");

		expect(response.status).toBe(304);
		expect(stream.destroyed).toBe(true);
	});

	it("should return 500 when the stored file is missing", async () => {
		vi.mocked(mediaFileStorage.openStream).mockImplementation(() =>
			createReadStream(join(tmpdir(), `media-missing-${randomUUID()}`)),
		);

		const response = await request(app).get(`/myblog/mediaresource/${FILE_ID}`);

		expect(response.status).toBe(500);
		expect(response.body).toEqual({ error: "Failed to serve media file" });
	});

	it("should not serve another weblog's file", async () => {
		vi.mocked(mediaFileDao.getMediaFile).mockResolvedValue(mockMediaFile({ weblogId: 2 }));

		const response = await request(app).get(`/myblog/mediaresource/${FILE_ID}`);

		expect(response.status).toBe(404);
		expect(response.body).toEqual({ error: "Media file not found" });
	});

	it("should return 404 for an id that is not a UUID", async () => {
		const response = await request(app).get("/myblog/mediaresource/not-an-id");

		expect(response.status).toBe(404);
		expect(mediaFileDao.getMediaFile).not.toHaveBeenCalled();
	});

	it("should return 404 for an unknown weblog", async () => {
		vi.mocked(weblogDao.getWeblogByHandle).mockResolvedValue(undefined);

		const response = await request(app).get(`/nope/mediaresource/${FILE_ID}`);

		expect(response.status).toBe(404);
		expect(response.body).toEqual({ error: "Weblog not found" });
	});

	it("should return 500 when the lookup throws", async () => {
		vi.mocked(mediaFileDao.getMediaFile).mockRejectedValue(new Error("connection lost"));

		const response = await request(app).get(`/myblog/mediaresource/${FILE_ID}`);

		expect(response.status).toBe(500);
		expect(response.body).toEqual({ error: "Failed to serve media file" });
	});

	it("should serve the default weblog's files at the root", async () => {
		setupApp("myblog");

		const response = await request(app).get(`/mediaresource/${FILE_ID}`);

		expect(response.status).toBe(200);
		expect(weblogDao.getWeblogByHandle).toHaveBeenCalledWith("myblog");
	});
});
