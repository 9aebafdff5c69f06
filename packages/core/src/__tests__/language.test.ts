import { describe, expect, it } from "vitest";
import {
	canonicalFieldName,
	concreteFieldName,
	concreteFieldNames,
	isEmptyValue,
	normalizeLanguageCode,
	primarySubtag,
	translate,
} from "../language/index.js";

describe("normalizeLanguageCode", () => {
	it("replaces hyphens with underscores", () => {
		expect(normalizeLanguageCode("en-us")).toBe("en_us");
		expect(normalizeLanguageCode("zh-hans-cn")).toBe("zh_hans_cn");
	});

	it("leaves plain codes alone", () => {
		expect(normalizeLanguageCode("fr")).toBe("fr");
	});
});

describe("concreteFieldName", () => {
	it("joins canonical name and normalized code with an underscore", () => {
		expect(concreteFieldName("title", "en")).toBe("title_en");
		expect(concreteFieldName("title", "pt-br")).toBe("title_pt_br");
	});

	it("keeps underscores in the canonical name", () => {
		expect(concreteFieldName("page_title", "fr")).toBe("page_title_fr");
	});
});

describe("concreteFieldNames", () => {
	it("returns one name per language in order", () => {
		expect(concreteFieldNames("body", ["en", "fr", "en-gb"])).toEqual([
			"body_en",
			"body_fr",
			"body_en_gb",
		]);
	});
});

describe("primarySubtag", () => {
	it("cuts at the first hyphen", () => {
		expect(primarySubtag("fr-ca")).toBe("fr");
	});

	it("cuts at the first underscore", () => {
		expect(primarySubtag("pt_br")).toBe("pt");
	});

	it("truncates once for multi-segment codes", () => {
		expect(primarySubtag("zh-hans-cn")).toBe("zh");
	});

	it("returns three-letter primary subtags whole", () => {
		expect(primarySubtag("ast-es")).toBe("ast");
	});

	it("returns codes without a region unchanged", () => {
		expect(primarySubtag("de")).toBe("de");
	});
});

describe("canonicalFieldName", () => {
	it("reads the back-reference rather than parsing the name", () => {
		expect(
			canonicalFieldName("page_title_en", {
				type: "text",
				originalField: "page_title",
				language: "en",
			}),
		).toBe("page_title");
	});

	it("returns the field's own name when it was not expanded", () => {
		expect(canonicalFieldName("slug", { type: "text" })).toBe("slug");
	});
});

describe("isEmptyValue", () => {
	it("treats missing and blank values as empty", () => {
		expect(isEmptyValue(undefined)).toBe(true);
		expect(isEmptyValue(null)).toBe(true);
		expect(isEmptyValue("")).toBe(true);
		expect(isEmptyValue([])).toBe(true);
	});

	it("treats zero, false and whitespace as values", () => {
		expect(isEmptyValue(0)).toBe(false);
		expect(isEmptyValue(false)).toBe(false);
		expect(isEmptyValue(" ")).toBe(false);
		expect(isEmptyValue({})).toBe(false);
	});
});

describe("translate", () => {
	it("returns a frozen array of the given names", () => {
		const marker = translate("title", "body");
		expect(marker).toEqual(["title", "body"]);
		expect(Object.isFrozen(marker)).toBe(true);
	});
});
