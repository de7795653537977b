/**
 * Error kinds raised by fields and models.
 *
 * Field-level failures (`FieldError` and its subclasses) are caught by the
 * validation engine and recorded on the instance. Configuration and
 * construction failures are thrown to the caller.
 */

export type ModelErrorCode =
  | "CONVERSION_ERROR"
  | "VALIDATION_ERROR"
  | "REQUIRED_FIELD_MISSING"
  | "STRUCTURE_MISMATCH"
  | "SIZE_CONSTRAINT_VIOLATION"
  | "INVALID_CONFIGURATION"
  | "MODEL_VALIDATION_FAILED"
  | "FIELD_NOT_SET";

export const REQUIRED_MESSAGE = "This field is required.";

export class ModelError extends Error {
  readonly code: ModelErrorCode;

  constructor(code: ModelErrorCode, message: string) {
    super(message);
    this.name = "ModelError";
    this.code = code;
  }
}

// ─── Field-level ─────────────────────────────────────────────────────────────

export class FieldError extends ModelError {
  readonly messages: readonly string[];

  constructor(code: ModelErrorCode, messages: string | readonly string[]) {
    const list = typeof messages === "string" ? [messages] : [...messages];
    super(code, list.join(" "));
    this.name = "FieldError";
    this.messages = list;
  }
}

export class ConversionError extends FieldError {
  constructor(messages: string | readonly string[]) {
    super("CONVERSION_ERROR", messages);
    this.name = "ConversionError";
  }
}

export class ValidationError extends FieldError {
  constructor(messages: string | readonly string[]) {
    super("VALIDATION_ERROR", messages);
    this.name = "ValidationError";
  }
}

export class RequiredFieldMissing extends FieldError {
  constructor(message: string = REQUIRED_MESSAGE) {
    super("REQUIRED_FIELD_MISSING", message);
    this.name = "RequiredFieldMissing";
  }
}

export class StructureMismatch extends FieldError {
  constructor(messages: string | readonly string[]) {
    super("STRUCTURE_MISMATCH", messages);
    this.name = "StructureMismatch";
  }
}

export class SizeConstraintViolation extends FieldError {
  constructor(message: string) {
    super("SIZE_CONSTRAINT_VIOLATION", message);
    this.name = "SizeConstraintViolation";
  }
}

// ─── Surfaced ────────────────────────────────────────────────────────────────

export class InvalidConfiguration extends ModelError {
  constructor(message: string) {
    super("INVALID_CONFIGURATION", message);
    this.name = "InvalidConfiguration";
  }
}

/** Thrown by construction when required fields end up without a value. */
export class ModelValidationError extends ModelError {
  readonly model: string;
  readonly errors: Readonly<Record<string, readonly string[]>>;

  constructor(model: string, errors: Record<string, readonly string[]>) {
    const fields = Object.keys(errors);
    super(
      "MODEL_VALIDATION_FAILED",
      `Invalid ${model}: ${fields
        .map((name) => `${name} (${(errors[name] ?? []).join(" ")})`)
        .join(", ")}`
    );
    this.name = "ModelValidationError";
    this.model = model;
    this.errors = errors;
  }

  get fields(): string[] {
    return Object.keys(this.errors);
  }
}

export class FieldNotSetError extends ModelError {
  readonly field: string;

  constructor(model: string, field: string, declared: boolean) {
    super(
      "FIELD_NOT_SET",
      declared
        ? `Field ${field} of ${model} has no value`
        : `${model} has no field named ${field}`
    );
    this.name = "FieldNotSetError";
    this.field = field;
  }
}

export function isModelError(err: unknown): err is ModelError {
  return err instanceof ModelError;
}

export function isFieldError(err: unknown): err is FieldError {
  return err instanceof FieldError;
}
