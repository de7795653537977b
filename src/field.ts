import {
  ListField,
  ModelField,
  type ListFieldOptions,
} from "./compound.fields.js";
import type { FieldBuilder } from "./field.builder.js";
import type { ModelDefinition } from "./model.js";
import {
  BooleanField,
  DateTimeField,
  IntegerField,
  NumberField,
  StringField,
} from "./scalar.fields.js";
import type { FieldShape } from "./types.js";

export const field = {
  string: () => new StringField(),
  integer: () => new IntegerField(),
  number: () => new NumberField(),
  boolean: () => new BooleanField(),
  dateTime: () => new DateTimeField(),
  list: <T>(itemField: FieldBuilder<T>, options?: ListFieldOptions) =>
    new ListField<T>(itemField, options),
  model: <S extends FieldShape>(definition: ModelDefinition<S>) =>
    new ModelField<S>(definition),
};
