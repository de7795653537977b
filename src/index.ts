export type { Infer, FieldValue, ModelData } from "./infer.js";
export { field } from "./field.js";
export * from "./field.builder.js";
export * from "./scalar.fields.js";
export * from "./compound.fields.js";
export * from "./model.js";
export * from "./options.js";
export * from "./roles.js";
export * from "./errors.js";
export type * from "./types.js";
export { parseDateTimeISO } from "./validation/dateTime.ISO8601.js";
