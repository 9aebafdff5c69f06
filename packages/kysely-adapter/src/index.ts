export {
	fieldLanguages,
	type TranslatedColumnOptions,
	translatedColumn,
	translatedColumns,
} from "./translated-column.js";
