/**
 * Encoding helpers shared by every weblog URL strategy.
 *
 * `encode` produces application/x-www-form-urlencoded output (space becomes "+"),
 * which is what query values and path segments on the weblog side expect.
 */

function escapeReserved(char: string): string {
	return `%${char.charCodeAt(0).toString(16).toUpperCase()}`;
}

/**
 * Form-encodes a value. Only letters, digits and `-_.*` are left as they are.
 */
export function encode(value: string): string {
	return encodeURIComponent(value)
		.replace(/[!'()~]/g, escapeReserved)
		.replace(/%20/g, "+");
}

/**
 * Encodes every segment of a path, keeping the "/" separators.
 */
export function encodePath(path: string): string {
	return path.split("/").map(encode).join("/");
}

/**
 * Encodes a tag list as `tag1+tag2+...`, each tag form-encoded.
 */
export function getEncodedTagsString(tags: ReadonlyArray<string>): string {
	return tags.map(encode).join("+");
}

/**
 * Builds `?name=value&...` from already-encoded values, in iteration order.
 * An empty set gives an empty string.
 */
export function getQueryString(params: Iterable<readonly [string, string]>): string {
	const pairs: Array<string> = [];
	for (const [name, value] of params) {
		pairs.push(`${name}=${value}`);
	}
	return pairs.length > 0 ? `?${pairs.join("&")}` : "";
}
