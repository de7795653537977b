import {
  ConversionError,
  REQUIRED_MESSAGE,
  SizeConstraintViolation,
  StructureMismatch,
  isFieldError,
} from "./errors.js";
import { FieldBuilder } from "./field.builder.js";
import { isRecord, type Model, type ModelDefinition } from "./model.js";
import type {
  FieldDescription,
  FieldKind,
  FieldShape,
  SerializedRecord,
  SerializedValue,
} from "./types.js";

const plural = (n: number) => (n === 1 ? "item" : "items");

/**
 * A field holding another model. Mappings are converted into fully validated
 * instances of the wrapped definition; any failure inside surfaces as one
 * `StructureMismatch` on the outer field.
 */
export class ModelField<S extends FieldShape = FieldShape> extends FieldBuilder<
  Model<S>
> {
  readonly kind: FieldKind = "model";

  constructor(readonly definition: ModelDefinition<S>) {
    super();
  }

  /** Instances of the wrapped model are re-validated into a fresh copy. */
  convert(raw: unknown): Model<S> {
    if (!this.definition.isInstance(raw) && !isRecord(raw)) {
      throw new StructureMismatch("Please use a mapping for this field.");
    }

    const instance = this.definition.create();
    if (!instance.validate(raw)) {
      throw new StructureMismatch(
        Object.entries(instance.errors).flatMap(([name, messages]) =>
          messages.map((message) => `${name}: ${message}`)
        )
      );
    }
    return instance;
  }

  /** Reuses `role` when the nested definition declares it, else emits everything. */
  toPrimitive(value: Model<S>, role?: string): SerializedRecord {
    const nestedRole =
      role !== undefined && value.definition.options.hasRole(role)
        ? role
        : undefined;
    return value.serialize(nestedRole);
  }

  describe(): FieldDescription {
    return { ...super.describe(), model: this.definition.name };
  }
}

export interface ListFieldOptions {
  minSize?: number;
  maxSize?: number;
}

/**
 * A list of values of one inner field type.
 *
 * `required` only governs whether the key must be present; length is
 * constrained by `minSize`/`maxSize`. A `null` list is a missing value only
 * when `minSize` is declared.
 */
export class ListField<T> extends FieldBuilder<T[]> {
  readonly kind: FieldKind = "list";
  minSize?: number;
  maxSize?: number;

  constructor(
    readonly itemField: FieldBuilder<T>,
    options: ListFieldOptions = {}
  ) {
    super();
    this.minSize = options.minSize;
    this.maxSize = options.maxSize;
  }

  min(size: number): this {
    this.minSize = size;
    return this;
  }

  max(size: number): this {
    this.maxSize = size;
    return this;
  }

  convert(raw: unknown): T[] {
    if (!Array.isArray(raw)) {
      throw new StructureMismatch("Please provide a list for this field.");
    }
    if (
      this.itemField instanceof ModelField &&
      !raw.every((item) => item === null || item === undefined || isRecord(item))
    ) {
      throw new StructureMismatch(
        "Please provide a list of mappings for this field."
      );
    }

    const items: T[] = [];
    const messages: string[] = [];
    raw.forEach((item: unknown, index) => {
      if (item === null || item === undefined) {
        messages.push(`Item ${index}: ${REQUIRED_MESSAGE}`);
        return;
      }
      try {
        items.push(this.itemField.clean(item));
      } catch (err) {
        if (!isFieldError(err)) throw err;
        messages.push(...err.messages.map((m) => `Item ${index}: ${m}`));
      }
    });

    if (messages.length > 0) throw new ConversionError(messages);
    return items;
  }

  validate(value: T[]): void {
    super.validate(value);
    if (this.minSize !== undefined && value.length < this.minSize) {
      throw new SizeConstraintViolation(
        `Please provide at least ${this.minSize} ${plural(this.minSize)}.`
      );
    }
    if (this.maxSize !== undefined && value.length > this.maxSize) {
      throw new SizeConstraintViolation(
        `Please provide no more than ${this.maxSize} ${plural(this.maxSize)}.`
      );
    }
  }

  rejectsMissingValue(): boolean {
    return this.minSize !== undefined;
  }

  toPrimitive(value: T[], role?: string): SerializedValue[] {
    return value.map((item) => this.itemField.toPrimitive(item, role));
  }

  describe(): FieldDescription {
    return {
      ...super.describe(),
      items: this.itemField.describe(),
      minSize: this.minSize,
      maxSize: this.maxSize,
    };
  }
}
