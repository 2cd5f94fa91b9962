import { createDirectoryCheck } from "./DirectoryCheck";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

describe("DirectoryCheck", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "directory-check-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("returns healthy for a usable directory", async () => {
		const check = createDirectoryCheck({ name: "uploads", dir, writable: true });

		const result = await check.check();

		expect(result.status).toBe("healthy");
		expect(check.name).toBe("uploads");
		expect(check.critical).toBe(false);
	});

	it("returns unhealthy for a missing directory", async () => {
		const missing = join(dir, "missing");

		const result = await createDirectoryCheck({ name: "themes", dir: missing }).check();

		expect(result.status).toBe("unhealthy");
		expect(result.message).toBe(`Directory not readable: ${missing}`);
	});
});
