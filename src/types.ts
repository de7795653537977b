import type { FieldBuilder } from "./field.builder.js";

export type FieldKind =
  | "string"
  | "integer"
  | "number"
  | "boolean"
  | "datetime"
  | "list"
  | "model";

/** Raw, untyped input keyed by field name. */
export type RawInput = Record<string, unknown>;

export type SerializedValue =
  | string
  | number
  | boolean
  | null
  | SerializedValue[]
  | { [key: string]: SerializedValue };

export type SerializedRecord = Record<string, SerializedValue>;

export type FieldShape = Record<string, FieldBuilder<unknown>>;

/** Child declarations override parent entries with the same name. */
export type MergeShapes<P extends FieldShape, C extends FieldShape> = Omit<
  P,
  keyof C
> &
  C;

export type LogFn = (msg: string) => void;

export type FieldErrors = Record<string, string[]>;

/** A field's storage slot on an instance. */
export type FieldSlot<T> =
  | { state: "unset" }
  | { state: "present"; value: T };

export interface FieldDescription {
  kind: FieldKind;
  required: boolean;
  description: string;
  hasDefault: boolean;
  minSize?: number;
  maxSize?: number;
  items?: FieldDescription;
  model?: string;
}

export interface ModelDescription {
  name: string;
  namespace: string | null;
  parent: string | null;
  roles: string[];
  fields: Record<string, FieldDescription>;
}
