import type { FieldBuilder } from "./field.builder.js";
import type { ModelDefinition } from "./model.js";
import type { FieldShape } from "./types.js";

/** The typed value a field converts to. */
export type FieldValue<F> = F extends FieldBuilder<infer T> ? T : never;

/** Instance data for a shape: every field may be unset. */
export type ModelData<S extends FieldShape> = {
  [K in keyof S]?: FieldValue<S[K]>;
};

export type Infer<T> =
  T extends ModelDefinition<infer S extends FieldShape>
    ? ModelData<S>
    : T extends FieldShape
      ? ModelData<T>
      : never;
