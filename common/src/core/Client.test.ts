import { createClientAuth, readError } from "./Client";
import { describe, expect, it, vi } from "vitest";

describe("Client", () => {
	describe("createClientAuth", () => {
		it("should create a bodiless request without headers", () => {
			const auth = createClientAuth();

			expect(auth.createRequest("GET")).toEqual({
				method: "GET",
				headers: {},
				body: null,
				credentials: "include",
			});
		});

		it("should send JSON bodies and the bearer token", () => {
			const auth = createClientAuth("test-token");

			expect(auth.createRequest("PUT", { a: 1 })).toEqual({
				method: "PUT",
				headers: { "Content-Type": "application/json", Authorization: "Bearer test-token" },
				body: '{"a":1}',
				credentials: "include",
			});
		});

		it("should let additional options override defaults", () => {
			const auth = createClientAuth();

			expect(auth.createRequest("GET", undefined, { credentials: "omit" }).credentials).toBe("omit");
		});

		it("should notify on 401 responses only", () => {
			const onUnauthorized = vi.fn();
			const auth = createClientAuth(undefined, { onUnauthorized });

			expect(auth.checkUnauthorized?.(new Response(null, { status: 200 }))).toBe(false);
			expect(onUnauthorized).not.toHaveBeenCalled();
			expect(auth.checkUnauthorized?.(new Response(null, { status: 401 }))).toBe(true);
			expect(onUnauthorized).toHaveBeenCalledTimes(1);
		});
	});

	describe("readError", () => {
		it("should read the error field of a JSON body", async () => {
			const response = new Response(JSON.stringify({ error: "Weblog not found" }), { status: 404 });

			expect(await readError(response, "fallback")).toBe("Weblog not found");
		});

		it("should fall back when the body is not JSON", async () => {
			const response = new Response("oops", { status: 500 });

			expect(await readError(response, "fallback")).toBe("fallback");
		});

		it("should fall back when the error field is empty", async () => {
			const response = new Response(JSON.stringify({ error: "" }), { status: 500 });

			expect(await readError(response, "fallback")).toBe("fallback");
		});
	});
});
