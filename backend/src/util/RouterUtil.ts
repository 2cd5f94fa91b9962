import type { WeblogDao } from "../dao/WeblogDao";
import type { Weblog } from "../model/Weblog";
import type { Response } from "express";
import { z } from "zod";

const MediaFileIdSchema = z.string().uuid();

export interface LookupError {
	readonly status: number;
	readonly message: string;
}

/**
 * Type guard to check if a value is a LookupError
 * @param value the value to check
 * @returns true if value is a LookupError, false otherwise
 */
export function isLookupError<T extends object>(value: T | LookupError): value is LookupError {
	return "status" in value && "message" in value;
}

/**
 * Helper to handle lookup errors in responses
 * @param res the response
 * @param lookupError the lookup error
 */
export function handleLookupError(res: Response, lookupError: LookupError) {
	const { status, message } = lookupError;
	return res.status(status).json({ error: message });
}

/**
 * Looks up an active weblog by handle.
 * @param weblogDao the weblog DAO
 * @param handle the handle from the request path
 * @returns the weblog if found, otherwise a LookupError
 */
export async function lookupWeblog(weblogDao: WeblogDao, handle: string | undefined): Promise<Weblog | LookupError> {
	if (!handle) {
		return { status: 400, message: "Weblog handle is required" };
	}
	const weblog = await weblogDao.getWeblogByHandle(handle);
	return weblog ?? { status: 404, message: "Weblog not found" };
}

/**
 * Joins a wildcard route parameter back into a path.
 * Express 5 hands wildcards over as an array of segments.
 */
export function getWildcardParam(value: string | Array<string> | undefined): string {
	return Array.isArray(value) ? value.join("/") : (value ?? "");
}

/**
 * Media file ids are UUIDs; anything else cannot name a file.
 */
export function isMediaFileId(value: string | undefined): value is string {
	return MediaFileIdSchema.safeParse(value).success;
}
