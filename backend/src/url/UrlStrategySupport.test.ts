import {
	getCollectionPath,
	getFilterParams,
	normalizeCategory,
	stripLeadingSlash,
	toQueryString,
} from "./UrlStrategySupport";
import { describe, expect, it } from "vitest";

describe("UrlStrategySupport", () => {
	describe("toQueryString", () => {
		it("should write parameters in the fixed order", () => {
			expect(toQueryString({ page: "2", cat: "Tech", theme: "sunset", previewEntry: "a" })).toBe(
				"?theme=sunset&previewEntry=a&cat=Tech&page=2",
			);
		});

		it("should leave out undefined and empty values", () => {
			expect(toQueryString({ date: "", tags: undefined })).toBe("");
			expect(toQueryString({})).toBe("");
		});
	});

	describe("normalizeCategory", () => {
		it("should treat the root category as no category", () => {
			expect(normalizeCategory("root")).toBeUndefined();
			expect(normalizeCategory("")).toBeUndefined();
			expect(normalizeCategory(undefined)).toBeUndefined();
			expect(normalizeCategory("Tech")).toBe("Tech");
		});
	});

	describe("getFilterParams", () => {
		it("should encode every filter", () => {
			expect(
				toQueryString(
					getFilterParams({ category: "Web & Mobile", date: "20240131", tags: ["a b", "c"], pageNum: 4 }),
				),
			).toBe("?date=20240131&cat=Web+%26+Mobile&tags=a+b+c&page=4");
		});

		it("should skip page zero", () => {
			expect(getFilterParams({ pageNum: 0 }).page).toBeUndefined();
		});
	});

	describe("getCollectionPath", () => {
		it("should put the category in the path ahead of date and tags", () => {
			const { segment, params } = getCollectionPath({
				category: "Tech/Web",
				date: "20240131",
				tags: ["a b", "c"],
				pageNum: 2,
			});

			expect(segment).toBe("category/Tech/Web");
			expect(toQueryString(params)).toBe("?date=20240131&tags=a+b+c&page=2");
		});

		it("should put the date in the path when there is no category", () => {
			const { segment, params } = getCollectionPath({ category: "root", date: "20240131", tags: ["news"] });

			expect(segment).toBe("date/20240131");
			expect(toQueryString(params)).toBe("?tags=news");
		});

		it("should put tags in the path when they are the only filter", () => {
			const { segment, params } = getCollectionPath({ tags: ["x", "y z"] });

			expect(segment).toBe("tags/x+y+z");
			expect(toQueryString(params)).toBe("");
		});

		it("should ignore an empty tag list", () => {
			const { segment, params } = getCollectionPath({ tags: [], pageNum: 1 });

			expect(segment).toBe("");
			expect(toQueryString(params)).toBe("?page=1");
		});
	});

	describe("stripLeadingSlash", () => {
		it("should strip a single leading slash", () => {
			expect(stripLeadingSlash("/css/a.css")).toBe("css/a.css");
			expect(stripLeadingSlash("//css/a.css")).toBe("/css/a.css");
			expect(stripLeadingSlash("css/a.css")).toBe("css/a.css");
		});
	});
});
