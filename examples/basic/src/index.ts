import { createJsonLogger } from "@polyfield/core/logger";
import { createPolyfield, translate } from "polyfield";

const polyfield = createPolyfield({
	languages: [
		{ code: "en", label: "English" },
		{ code: "fr", label: "Français" },
		{ code: "pt-br", label: "Português (Brasil)" },
	],
	fallbackLanguage: "en",
	logger: createJsonLogger({ level: "warn" }),
	models: {
		translatable: {
			abstract: true,
			fields: {
				title: { type: "varchar", maxLength: 200, notNull: true, label: "Title" },
			},
			translate: translate("title"),
		},
		article: {
			extends: ["translatable"],
			fields: {
				id: { type: "serial", primaryKey: true },
				body: { type: "text", label: "Body" },
				default_lang: { type: "varchar", maxLength: 8 },
			},
			translate: translate("body"),
			defaultLanguageField: "default_lang",
		},
	},
});

function main() {
	const article = polyfield.model("article");
	console.log("Concrete fields of article:");
	for (const [name, field] of Object.entries(article.fields)) {
		const origin = field.originalField ? ` <- ${field.originalField} [${field.language}]` : "";
		console.log(`  ${name}: ${field.type}${field.notNull ? " NOT NULL" : ""}${origin}`);
	}

	const record: Record<string, unknown> = {};
	polyfield.set("article", record, "title", "Hello");
	polyfield.withLanguage("fr", () => {
		polyfield.set("article", record, "title", "Bonjour");
		polyfield.set("article", record, "body", "Le texte");
	});
	console.log("\nStored record:", record);

	for (const language of ["en", "fr", "pt-br", "fr-ca", "es"]) {
		const localized = polyfield.withLanguage(language, () =>
			polyfield.localize("article", record, { stripConcrete: true }),
		);
		console.log(`  ${language.padEnd(5)} → title=${String(localized.title)} body=${String(localized.body)}`);
	}

	console.log("\nTranslations of title:", polyfield.translations("article", record, "title"));
}

main();
