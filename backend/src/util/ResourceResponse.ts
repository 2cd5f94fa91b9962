import type { ResolveResult, ResourceCandidate } from "../services/ResourceResolver";
import { getLog } from "./Logger";
import { extname } from "node:path";
import type { Request, Response } from "express";

const log = getLog(import.meta);

const DEFAULT_CONTENT_TYPE = "application/octet-stream";

/**
 * True when the client's copy, dated by If-Modified-Since, is at least as new as `lastModified`.
 * HTTP dates carry whole seconds, so both sides are compared in seconds.
 */
export function isNotModified(req: Request, lastModified: number): boolean {
	const header = req.get("If-Modified-Since");
	if (!header) {
		return false;
	}
	const since = Date.parse(header);
	if (Number.isNaN(since)) {
		return false;
	}
	return Math.floor(since / 1000) >= Math.floor(lastModified / 1000);
}

export function setLastModifiedHeader(res: Response, lastModified: number): void {
	res.set("Last-Modified", new Date(lastModified).toUTCString());
}

/**
 * Streams a resolved resource, answering 304 when the client's copy is current.
 * The resource's stream is released on every exit path.
 */
export async function sendResource(req: Request, res: Response, resource: ResourceCandidate): Promise<void> {
	const { stream } = resource;
	setLastModifiedHeader(res, resource.lastModified);
	if (isNotModified(req, resource.lastModified)) {
		stream.destroy();
		res.status(304).end();
		return;
	}

	res.type(resource.contentType ?? (extname(resource.path) || DEFAULT_CONTENT_TYPE));

	await new Promise<void>(resolve => {
		stream.once("error", error => {
			stream.destroy();
			sendReadError(res, resource, error);
			resolve();
		});
		res.once("close", () => {
			stream.destroy();
			resolve();
		});
		stream.pipe(res);
	});
}

function sendReadError(res: Response, resource: ResourceCandidate, error: unknown): void {
	log.error(error, "Error sending resource %s", resource.path);
	if (res.headersSent) {
		res.destroy();
	} else {
		res.removeHeader("Content-Type");
		res.status(500).json({ error: "Failed to read resource" });
	}
}

/**
 * Sends a resolver result. Lookup failures were already logged and read as not found.
 */
export async function sendResolveResult(req: Request, res: Response, result: ResolveResult): Promise<void> {
	if (result.status === "found") {
		await sendResource(req, res, result.resource);
		return;
	}
	res.status(404).json({ error: "Resource not found" });
}
