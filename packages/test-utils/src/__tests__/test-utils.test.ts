import type { ModelSchema } from "@polyfield/core";
import { translate } from "polyfield";
import { describe, expect, it } from "vitest";
import { assertConcreteFields, assertRelaxedConstraints } from "../assertions.js";
import { getTestInstance } from "../get-test-instance.js";

const models = {
	article: {
		fields: {
			title: { type: "text" as const, notNull: true, required: true },
			summary: { type: "text" as const, notNull: true, default: "" },
			lang: { type: "varchar" as const },
		},
		translate: translate("title", "summary"),
		defaultLanguageField: "lang",
	},
};

describe("getTestInstance", () => {
	it("defaults to English and French", () => {
		const { polyfield } = getTestInstance({ models });

		expect(polyfield.languages.map((language) => language.code)).toEqual(["en", "fr"]);
		expect(polyfield.fallbackLanguage).toBe("en");
	});

	it("switches the active language", () => {
		const { polyfield, setLanguage } = getTestInstance({ models });
		const record = { title_en: "Hello", title_fr: "Bonjour" };

		setLanguage("fr");
		expect(polyfield.get("article", record, "title")).toBe("Bonjour");

		setLanguage(undefined);
		expect(polyfield.get("article", record, "title")).toBe("Hello");
	});

	it("records log entries", () => {
		const { polyfield, logs, setLanguage } = getTestInstance({ models });
		setLanguage("es");

		polyfield.set("article", { lang: "de" }, "title", "Hallo");

		expect(logs.at(-1)).toEqual({
			level: "warn",
			message: "Discarded assignment: no concrete field in the language chain",
			data: { model: "article", field: "title", chain: ["es", "de"] },
		});
	});
});

describe("assertConcreteFields", () => {
	it("passes for an expanded schema", () => {
		const { polyfield } = getTestInstance({ models, languages: ["en", "fr", "pt-br"] });

		expect(() => assertConcreteFields(polyfield.model("article"), ["en", "fr", "pt-br"])).not.toThrow();
	});

	it("reports a missing language", () => {
		const { polyfield } = getTestInstance({ models });

		expect(() => assertConcreteFields(polyfield.model("article"), ["en", "fr", "de"])).toThrow(
			"Model article: missing concrete field title_de",
		);
	});

	it("reports a stored canonical name", () => {
		const schema: ModelSchema = {
			name: "broken",
			tableName: "broken",
			abstract: false,
			fields: {
				title: { type: "text" },
				title_en: { type: "text", originalField: "title", language: "en" },
			},
			indexes: [],
			translatableFields: ["title"],
			defaultLanguageField: null,
			accessors: {},
		};

		expect(() => assertConcreteFields(schema, ["en"])).toThrow(
			"Model broken: canonical name title is stored as a field",
		);
	});
});

describe("assertRelaxedConstraints", () => {
	it("passes for an expanded schema, keeping not-null fields that have a default", () => {
		const { polyfield } = getTestInstance({ models });
		const article = polyfield.model("article");

		expect(article.fields.summary_fr?.notNull).toBe(true);
		expect(() => assertRelaxedConstraints(article, "en")).not.toThrow();
	});

	it("reports a required non-fallback field", () => {
		const { polyfield } = getTestInstance({ models });

		expect(() => assertRelaxedConstraints(polyfield.model("article"), "fr")).toThrow(
			"Model article: title_en must be optional and nullable",
		);
	});
});
