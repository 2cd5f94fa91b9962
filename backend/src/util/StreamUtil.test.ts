import { openReadable } from "./StreamUtil";
import { createReadStream } from "node:fs";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Readable } from "node:stream";
import { text } from "node:stream/consumers";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

describe("StreamUtil", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "stream-util-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("should resolve a file stream once it is open", async () => {
		await writeFile(join(dir, "site.css"), "body {}");

		const stream = await openReadable(() => createReadStream(join(dir, "site.css")));

		expect(await text(stream)).toBe("body {}");
	});

	it("should reject when the file does not exist", async () => {
		await expect(openReadable(() => createReadStream(join(dir, "missing.css")))).rejects.toMatchObject({
			code: "ENOENT",
		});
	});

	it("should reject when opening throws", async () => {
		await expect(
			openReadable(() => {
				throw new Error("bad path");
			}),
		).rejects.toThrow("bad path");
	});

	it("should return other streams unchanged", async () => {
		const source = Readable.from(["bytes"]);

		expect(await openReadable(() => source)).toBe(source);
	});
});
