import { ConversionError } from "./errors.js";
import { FieldBuilder } from "./field.builder.js";
import type { FieldKind } from "./types.js";
import { parseDateTimeISO } from "./validation/dateTime.ISO8601.js";

/** Renders a raw value for use inside an error message. */
export function show(raw: unknown): string {
  if (Array.isArray(raw)) return "a list";
  switch (typeof raw) {
    case "string":
    case "number":
    case "bigint":
    case "boolean":
      return `'${String(raw)}'`;
    case "object":
      return raw === null ? "null" : "a mapping";
    default:
      return typeof raw;
  }
}

export class StringField extends FieldBuilder<string> {
  readonly kind: FieldKind = "string";

  convert(raw: unknown): string {
    switch (typeof raw) {
      case "string":
        return raw;
      case "number":
        if (Number.isFinite(raw)) return String(raw);
        break;
      case "bigint":
      case "boolean":
        return String(raw);
    }
    throw new ConversionError("Couldn't interpret value as string.");
  }

  toPrimitive(value: string): string {
    return value;
  }

  minLength(min: number): this {
    return this.validator(
      (value) => value.length >= min,
      `String value is too short (minimum ${min} characters).`
    );
  }

  maxLength(max: number): this {
    return this.validator(
      (value) => value.length <= max,
      `String value is too long (maximum ${max} characters).`
    );
  }

  pattern(regex: RegExp): this {
    return this.validator(
      (value) => regex.test(value),
      "String value did not match validation regex."
    );
  }

  choices(values: readonly string[]): this {
    return this.validator(
      (value) => values.includes(value),
      `Value must be one of: ${values.join(", ")}.`
    );
  }
}

abstract class NumericField extends FieldBuilder<number> {
  min(min: number): this {
    return this.validator(
      (value) => value >= min,
      `Value must be at least ${min}.`
    );
  }

  max(max: number): this {
    return this.validator(
      (value) => value <= max,
      `Value must be at most ${max}.`
    );
  }

  toPrimitive(value: number): number {
    return value;
  }
}

export class IntegerField extends NumericField {
  readonly kind: FieldKind = "integer";

  convert(raw: unknown): number {
    if (typeof raw === "number" && Number.isSafeInteger(raw)) return raw;
    if (typeof raw === "string" && /^[+-]?\d+$/.test(raw.trim())) {
      const parsed = Number.parseInt(raw.trim(), 10);
      if (Number.isSafeInteger(parsed)) return parsed;
    }
    throw new ConversionError(`Value ${show(raw)} is not an integer.`);
  }
}

export class NumberField extends NumericField {
  readonly kind: FieldKind = "number";

  convert(raw: unknown): number {
    if (typeof raw === "number" && Number.isFinite(raw)) return raw;
    if (typeof raw === "string" && raw.trim() !== "") {
      const parsed = Number(raw.trim());
      if (Number.isFinite(parsed)) return parsed;
    }
    throw new ConversionError(`Value ${show(raw)} is not a number.`);
  }
}

const TRUE_STRINGS = new Set(["true", "1"]);
const FALSE_STRINGS = new Set(["false", "0"]);

export class BooleanField extends FieldBuilder<boolean> {
  readonly kind: FieldKind = "boolean";

  convert(raw: unknown): boolean {
    if (typeof raw === "boolean") return raw;
    if (raw === 1 || raw === 0) return raw === 1;
    if (typeof raw === "string") {
      const lowered = raw.trim().toLowerCase();
      if (TRUE_STRINGS.has(lowered)) return true;
      if (FALSE_STRINGS.has(lowered)) return false;
    }
    throw new ConversionError(`Value ${show(raw)} is not a boolean.`);
  }

  toPrimitive(value: boolean): boolean {
    return value;
  }
}

export class DateTimeField extends FieldBuilder<Date> {
  readonly kind: FieldKind = "datetime";

  convert(raw: unknown): Date {
    if (raw instanceof Date) {
      if (!Number.isNaN(raw.getTime())) return new Date(raw.getTime());
    } else if (typeof raw === "string") {
      const parsed = parseDateTimeISO(raw);
      if (parsed) return parsed;
    }
    throw new ConversionError(
      `Could not parse ${show(raw)}. Should be ISO 8601.`
    );
  }

  toPrimitive(value: Date): string {
    return value.toISOString();
  }
}
