// tests/test-utils.ts
import { FieldError, ModelValidationError } from "../src/index.js";

/** Runs `fn` and returns the messages of the `FieldError` it throws. */
export function fieldMessages(fn: () => unknown): readonly string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof FieldError) return err.messages;
    throw err;
  }
  throw new Error("Expected a FieldError but nothing was thrown");
}

/** Runs `fn` and returns the per-field errors of the `ModelValidationError` it throws. */
export function constructionErrors(
  fn: () => unknown
): Readonly<Record<string, readonly string[]>> {
  try {
    fn();
  } catch (err) {
    if (err instanceof ModelValidationError) return err.errors;
    throw err;
  }
  throw new Error("Expected a ModelValidationError but nothing was thrown");
}
