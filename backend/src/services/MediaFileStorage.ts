/**
 * Stores uploaded media file bytes on disk as `<uploadsDir>/<weblogHandle>/<fileId>`,
 * with an optional thumbnail beside each file as `<fileId>_sm`.
 */

import { getLog } from "../util/Logger";
import { createReadStream } from "node:fs";
import { mkdir, rm, writeFile } from "node:fs/promises";
import { join, resolve, sep } from "node:path";
import type { Readable } from "node:stream";

const log = getLog(import.meta);

const THUMBNAIL_SUFFIX = "_sm";

const NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

export interface MediaFileStorage {
	/**
	 * Opens the stored bytes of a file, or of its thumbnail.
	 * Errors (such as a missing file) surface on the stream.
	 */
	openStream(weblogHandle: string, fileId: string, thumbnail?: boolean): Readable;
	saveFile(weblogHandle: string, fileId: string, content: Buffer): Promise<void>;
	saveThumbnail(weblogHandle: string, fileId: string, content: Buffer): Promise<void>;
	/**
	 * Removes a file and its thumbnail. Missing files are ignored.
	 */
	deleteFile(weblogHandle: string, fileId: string): Promise<void>;
}

export class InvalidMediaPathError extends Error {
	constructor(segment: string) {
		super(`Invalid media path segment: ${segment}`);
		this.name = "InvalidMediaPathError";
	}
}

export function createMediaFileStorage(uploadsDir: string): MediaFileStorage {
	const root = resolve(uploadsDir);

	return {
		openStream,
		saveFile,
		saveThumbnail,
		deleteFile,
	};

	function weblogDir(weblogHandle: string): string {
		if (!NAME_PATTERN.test(weblogHandle)) {
			throw new InvalidMediaPathError(weblogHandle);
		}
		return join(root, weblogHandle);
	}

	function filePath(weblogHandle: string, fileName: string): string {
		if (!NAME_PATTERN.test(fileName)) {
			throw new InvalidMediaPathError(fileName);
		}
		const path = join(weblogDir(weblogHandle), fileName);
		if (!path.startsWith(root + sep)) {
			throw new InvalidMediaPathError(fileName);
		}
		return path;
	}

	function openStream(weblogHandle: string, fileId: string, thumbnail = false): Readable {
		return createReadStream(filePath(weblogHandle, thumbnail ? fileId + THUMBNAIL_SUFFIX : fileId));
	}

	async function write(weblogHandle: string, fileName: string, content: Buffer): Promise<void> {
		const path = filePath(weblogHandle, fileName);
		await mkdir(weblogDir(weblogHandle), { recursive: true });
		await writeFile(path, content);
		log.debug({ weblogHandle, fileName, size: content.length }, "Stored media file %s", fileName);
	}

	async function saveFile(weblogHandle: string, fileId: string, content: Buffer): Promise<void> {
		await write(weblogHandle, fileId, content);
	}

	async function saveThumbnail(weblogHandle: string, fileId: string, content: Buffer): Promise<void> {
		await write(weblogHandle, fileId + THUMBNAIL_SUFFIX, content);
	}

	async function deleteFile(weblogHandle: string, fileId: string): Promise<void> {
		await rm(filePath(weblogHandle, fileId), { force: true });
		await rm(filePath(weblogHandle, fileId + THUMBNAIL_SUFFIX), { force: true });
	}
}
