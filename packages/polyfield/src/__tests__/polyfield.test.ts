import { createNoopLogger } from "@polyfield/core/logger";
import { describe, expect, it } from "vitest";
import {
	ConfigError,
	createPolyfield,
	FieldNotFoundError,
	type ModelDefinition,
	PolyfieldError,
	translate,
} from "../index.js";

// =============================================================================
// FIXTURE
// =============================================================================

function setup() {
	const language: { active: string | undefined } = { active: "en" };

	const polyfield = createPolyfield({
		languages: [
			{ code: "en", label: "English" },
			{ code: "fr", label: "Français" },
		],
		fallbackLanguage: "en",
		getLanguage: () => language.active,
		logger: createNoopLogger(),
		models: {
			named: {
				abstract: true,
				fields: { name: { type: "varchar", maxLength: 120, notNull: true, required: true } },
				translate: translate("name"),
			},
			described: {
				abstract: true,
				fields: { description: { type: "text", label: "Description" } },
				translate: translate("description"),
			},
			product: {
				extends: ["named", "described"],
				fields: {
					id: { type: "serial", primaryKey: true },
					sku: { type: "varchar", maxLength: 32, notNull: true },
				},
			},
			article: {
				fields: {
					id: { type: "serial", primaryKey: true },
					title: { type: "text", notNull: true, required: true, label: "Title" },
					page_title: { type: "text" },
					default_lang: { type: "varchar", maxLength: 5 },
				},
				translate: translate("title", "page_title"),
				defaultLanguageField: "default_lang",
			},
		},
	});

	return { polyfield, language };
}

// =============================================================================
// SCHEMA
// =============================================================================

describe("createPolyfield schemas", () => {
	it("creates exactly one concrete field per translatable field and language", () => {
		const { polyfield } = setup();
		const article = polyfield.model("article");

		for (const field of article.translatableFields) {
			for (const language of ["en", "fr"]) {
				const matches = Object.keys(article.fields).filter(
					(name) =>
						article.fields[name]?.originalField === field &&
						article.fields[name]?.language === language,
				);
				expect(matches).toEqual([`${field}_${language}`]);
			}
		}
		expect(article.fields).not.toHaveProperty("title");
		expect(article.fields).not.toHaveProperty("page_title");
	});

	it("maps every concrete field back to its canonical name", () => {
		const { polyfield } = setup();

		expect(polyfield.canonicalFieldName("article", "page_title_fr")).toBe("page_title");
		expect(polyfield.canonicalFieldName("article", "title_en")).toBe("title");
		expect(polyfield.canonicalFieldName("article", "default_lang")).toBe("default_lang");
	});

	it("rejects reverse lookup of a name the model does not have", () => {
		const { polyfield } = setup();

		expect(() => polyfield.canonicalFieldName("article", "title")).toThrow(
			`Model "article" has no field "title"`,
		);
	});

	it("keeps constraints on the fallback field and relaxes the others", () => {
		const { polyfield } = setup();
		const { fields } = polyfield.model("article");

		expect(fields.title_en?.notNull).toBe(true);
		expect(fields.title_en?.required).toBe(true);
		expect(fields.title_fr?.notNull).toBe(false);
		expect(fields.title_fr?.required).toBe(false);
		expect(fields.title_fr?.label).toBe("Title (fr)");
	});

	it("exposes the union of translatable fields inherited from two abstract models", () => {
		const { polyfield } = setup();
		const product = polyfield.model("product");

		expect([...product.translatableFields].sort()).toEqual(["description", "name"]);
		expect(Object.keys(product.fields)).toEqual([
			"name_en",
			"name_fr",
			"description_en",
			"description_fr",
			"id",
			"sku",
		]);
		expect(product.fields.name_fr?.maxLength).toBe(120);
	});

	it("includes abstract models in the schema map", () => {
		const { polyfield } = setup();

		expect(Object.keys(polyfield.schemas)).toEqual(["named", "described", "product", "article"]);
		expect(polyfield.schemas.named?.abstract).toBe(true);
	});

	it("throws UNKNOWN_MODEL for undeclared models", () => {
		const polyfield = createPolyfield<Record<string, ModelDefinition>>({
			languages: ["en"],
			logger: createNoopLogger(),
			models: {},
		});

		try {
			polyfield.model("comment");
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(PolyfieldError);
			if (error instanceof PolyfieldError) {
				expect(error.code).toBe("UNKNOWN_MODEL");
				expect(error.message).toBe(`Model "comment" is not declared`);
			}
		}
	});
});

// =============================================================================
// DECLARATION ERRORS
// =============================================================================

describe("createPolyfield declaration errors", () => {
	function create(article: ModelDefinition) {
		return createPolyfield({
			languages: ["en", "fr"],
			logger: createNoopLogger(),
			models: { article },
		});
	}

	it("raises ConfigError when the marker is a plain list", () => {
		expect(() => create({ fields: { title: { type: "text" } }, translate: ["title"] })).toThrow(
			ConfigError,
		);
	});

	it("raises FieldNotFoundError when the marker names a missing field", () => {
		expect(() =>
			create({ fields: { title: { type: "text" } }, translate: translate("subtitle") }),
		).toThrow(FieldNotFoundError);
	});

	it("raises ConfigError for invalid options before reading models", () => {
		expect(() =>
			createPolyfield({ languages: ["en"], fallbackLanguage: "fr", models: {} }),
		).toThrow(ConfigError);
	});
});

// =============================================================================
// GET / SET
// =============================================================================

describe("polyfield.get / polyfield.set", () => {
	it("round-trips a value in the active language", () => {
		const { polyfield } = setup();
		const record = {};

		expect(polyfield.set("article", record, "title", "Hello")).toBe(true);
		expect(polyfield.get("article", record, "title")).toBe("Hello");
	});

	it("returns nothing for an unsupported language when the fallback is unset", () => {
		const { polyfield, language } = setup();
		language.active = "es";

		expect(polyfield.get("article", { title_fr: "Bonjour" }, "title")).toBeUndefined();
	});

	it("matches the primary subtag", () => {
		const { polyfield, language } = setup();
		language.active = "fr-ca";

		expect(polyfield.get("article", { title_fr: "Bonjour" }, "title")).toBe("Bonjour");
	});

	it("honours the record's default language", () => {
		const { polyfield, language } = setup();
		language.active = "es";

		expect(polyfield.get("article", { default_lang: "fr", title_fr: "Salut" }, "title")).toBe(
			"Salut",
		);
	});

	it("uses the fallback language when getLanguage returns nothing", () => {
		const { polyfield, language } = setup();
		language.active = undefined;

		expect(polyfield.getActiveLanguage()).toBe("en");
		expect(polyfield.get("article", { title_en: "Hello", title_fr: "Bonjour" }, "title")).toBe(
			"Hello",
		);
	});

	it("resolves inherited fields on the child model", () => {
		const { polyfield, language } = setup();
		language.active = "fr";
		const record = {};

		polyfield.set("product", record, "name", "Chaise");

		expect(record).toEqual({ name_fr: "Chaise" });
		expect(polyfield.get("product", record, "name")).toBe("Chaise");
	});

	it("throws UNKNOWN_FIELD for a field that is not translatable", () => {
		const { polyfield } = setup();

		expect(() => polyfield.get("article", {}, "default_lang")).toThrow(
			`Field "default_lang" is not a translatable field of model "article"`,
		);
	});

	it("prefers a withLanguage scope over getLanguage", () => {
		const { polyfield } = setup();
		const record = { title_en: "Hello", title_fr: "Bonjour" };

		expect(polyfield.withLanguage("fr", () => polyfield.get("article", record, "title"))).toBe(
			"Bonjour",
		);
		expect(polyfield.get("article", record, "title")).toBe("Hello");
	});
});

// =============================================================================
// RECORD HELPERS
// =============================================================================

describe("polyfield.localize", () => {
	it("adds every logical field resolved in the active language", () => {
		const { polyfield, language } = setup();
		language.active = "fr";
		const record = { id: 1, title_en: "Hello", title_fr: "Bonjour", page_title_en: "Home" };

		expect(polyfield.localize("article", record)).toEqual({
			...record,
			title: "Bonjour",
			page_title: "Home",
		});
	});

	it("can drop the per-language fields", () => {
		const { polyfield } = setup();
		const record = { id: 1, title_en: "Hello", title_fr: "Bonjour", default_lang: "en" };

		expect(polyfield.localize("article", record, { stripConcrete: true })).toEqual({
			id: 1,
			default_lang: "en",
			title: "Hello",
			page_title: undefined,
		});
	});

	it("leaves the input record untouched", () => {
		const { polyfield } = setup();
		const record = { title_en: "Hello" };

		polyfield.localize("article", record, { stripConcrete: true });

		expect(record).toEqual({ title_en: "Hello" });
	});
});

describe("polyfield.translations", () => {
	it("lists the stored value in every configured language", () => {
		const { polyfield } = setup();

		expect(polyfield.translations("article", { title_fr: "Bonjour" }, "title")).toEqual({
			en: undefined,
			fr: "Bonjour",
		});
	});
});

describe("field name helpers", () => {
	it("names concrete fields for the active or a given language", () => {
		const { polyfield, language } = setup();
		language.active = "fr";

		expect(polyfield.fieldName("title")).toBe("title_fr");
		expect(polyfield.fieldName("title", "pt-br")).toBe("title_pt_br");
		expect(polyfield.fieldNames("title")).toEqual(["title_en", "title_fr"]);
		expect(polyfield.fallbackFieldName("title")).toBe("title_en");
	});

	it("exposes the resolved languages", () => {
		const { polyfield } = setup();

		expect(polyfield.fallbackLanguage).toBe("en");
		expect(polyfield.languages).toEqual([
			{ code: "en", label: "English" },
			{ code: "fr", label: "Français" },
		]);
	});
});
