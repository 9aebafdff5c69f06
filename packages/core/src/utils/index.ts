export { cloneDefault, cloneFieldDefinition } from "./clone.js";
export { toSnakeCase } from "./naming.js";
