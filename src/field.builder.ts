import { ValidationError } from "./errors.js";
import type { FieldDescription, FieldKind, SerializedValue } from "./types.js";

interface FieldCheck<T> {
  test(value: T): boolean;
  message: string;
}

function isFactory<T>(value: T | (() => T)): value is () => T {
  return typeof value === "function";
}

/**
 * Base of every field type. A field knows how to turn a raw value into its
 * typed form (`convert`), how to check a typed value (`validate`) and how to
 * render it back into a plain value (`toPrimitive`).
 *
 * Conversion and validation report failures by throwing a `FieldError`;
 * the owning model records them under the field's name.
 */
export abstract class FieldBuilder<T = unknown> {
  /** Phantom carrying the typed value; never assigned. */
  declare readonly _type: T;

  abstract readonly kind: FieldKind;

  isRequired = false;
  _description = "";
  private defaultFactory?: () => T;
  private checks: FieldCheck<T>[] = [];

  abstract convert(raw: unknown): T;

  abstract toPrimitive(value: T, role?: string): SerializedValue;

  required(): this {
    this.isRequired = true;
    return this;
  }

  optional(): this {
    this.isRequired = false;
    return this;
  }

  /** A plain value, or a factory called each time the default is needed. */
  default(value: T | (() => T)): this {
    this.defaultFactory = isFactory(value) ? value : () => value;
    return this;
  }

  description(desc: string): this {
    this._description = desc;
    return this;
  }

  validator(fn: (value: T) => boolean, message = "Invalid value."): this {
    this.checks.push({ test: fn, message });
    return this;
  }

  hasDefault(): boolean {
    return this.defaultFactory !== undefined;
  }

  getDefault(): T | undefined {
    return this.defaultFactory?.();
  }

  /** Runs every check and throws one `ValidationError` listing the failures. */
  validate(value: T): void {
    const failed = this.checks
      .filter((check) => !check.test(value))
      .map((check) => check.message);
    if (failed.length > 0) {
      throw new ValidationError(failed);
    }
  }

  clean(raw: unknown): T {
    const value = this.convert(raw);
    this.validate(value);
    return value;
  }

  /** Whether an explicit null is reported as a missing required value. */
  rejectsMissingValue(): boolean {
    return this.isRequired;
  }

  describe(): FieldDescription {
    return {
      kind: this.kind,
      required: this.isRequired,
      description: this._description,
      hasDefault: this.hasDefault(),
    };
  }
}

export default FieldBuilder;
