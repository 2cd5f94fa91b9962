import { ReadStream } from "node:fs";
import type { Readable } from "node:stream";

/**
 * Opens a stream and settles once it can be read.
 * File streams open asynchronously; a missing or unreadable file rejects here
 * instead of surfacing later on the stream. Other streams are returned as they are.
 */
export function openReadable(open: () => Readable): Promise<Readable> {
	let stream: Readable;
	try {
		stream = open();
	} catch (error) {
		return Promise.reject(error);
	}
	if (!(stream instanceof ReadStream) || !stream.pending) {
		return Promise.resolve(stream);
	}
	const fileStream = stream;
	return new Promise<Readable>((resolve, reject) => {
		function onReady() {
			fileStream.off("error", onError);
			resolve(fileStream);
		}
		function onError(error: Error) {
			fileStream.off("ready", onReady);
			reject(error);
		}
		fileStream.once("ready", onReady);
		fileStream.once("error", onError);
	});
}
