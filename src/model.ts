import {
  FieldNotSetError,
  InvalidConfiguration,
  ModelValidationError,
  REQUIRED_MESSAGE,
  RequiredFieldMissing,
  StructureMismatch,
  isFieldError,
} from "./errors.js";
import type { FieldBuilder } from "./field.builder.js";
import type { FieldValue } from "./infer.js";
import { ModelOptions, type ModelOptionsInput } from "./options.js";
import type {
  FieldDescription,
  FieldErrors,
  FieldShape,
  FieldSlot,
  LogFn,
  MergeShapes,
  ModelDescription,
  RawInput,
  SerializedRecord,
} from "./types.js";

/** The part of a definition that can be shared without its field types. */
export interface AnyModelDefinition {
  readonly name: string;
  readonly options: ModelOptions;
  readonly parent: AnyModelDefinition | null;
  readonly log?: LogFn;
  describe(): ModelDescription;
}

export interface DefineModelConfig<P extends FieldShape> {
  /** Parent definition whose fields (and ancestors' fields) are inherited. */
  extends?: ModelDefinition<P>;
  options?: Omit<ModelOptionsInput, "klass">;
  log?: LogFn;
}

const globalModelRegistry = new Map<string, AnyModelDefinition>();

export function isRecord(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

function valuesEqual(a: unknown, b: unknown): boolean {
  if (a instanceof Model && b instanceof Model) return a.equals(b);
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((v, i) => valuesEqual(v, b[i]));
  }
  return a === b;
}

function copyErrors(errors: FieldErrors): FieldErrors {
  return Object.fromEntries(
    Object.entries(errors).map(([name, messages]) => [name, [...messages]])
  );
}

function cloneValue(value: unknown): unknown {
  if (value instanceof Model) return value.clone();
  if (value instanceof Date) return new Date(value.getTime());
  if (Array.isArray(value)) return value.map(cloneValue);
  return value;
}

// ──────────────────────────────────────────────────────────────────────────────
// Definition
// ──────────────────────────────────────────────────────────────────────────────

/**
 * The compiled schema of a model: an ordered, frozen field registry plus the
 * model's options. Built once by `defineModel` and shared by every instance.
 */
export class ModelDefinition<S extends FieldShape = FieldShape>
  implements AnyModelDefinition
{
  readonly name: string;
  readonly fields: Readonly<S>;
  readonly options: ModelOptions;
  readonly parent: AnyModelDefinition | null;
  readonly log?: LogFn;
  private readonly registry: Map<string, FieldBuilder<unknown>>;

  constructor(
    name: string,
    fields: S,
    config: {
      parent?: AnyModelDefinition;
      options?: Omit<ModelOptionsInput, "klass">;
      log?: LogFn;
    } = {}
  ) {
    this.name = name;
    this.fields = Object.freeze({ ...fields });
    this.registry = new Map(Object.entries(fields));
    this.parent = config.parent ?? null;
    this.log = config.log ?? config.parent?.log;

    const inherited = config.parent?.options;
    const declared = config.options ?? {};
    this.options = new ModelOptions({
      ...declared,
      klass: this,
      roles:
        declared.roles !== undefined ? declared.roles : inherited?.roles ?? null,
      namespace:
        declared.namespace !== undefined
          ? declared.namespace
          : inherited?.namespace ?? null,
    });
    Object.freeze(this);
  }

  /** Registry entries in declaration order. */
  fieldEntries(): [string, FieldBuilder<unknown>][] {
    return [...this.registry];
  }

  getField(name: string): FieldBuilder<unknown> | undefined {
    return this.registry.get(name);
  }

  create(values?: RawInput): Model<S> {
    return new Model(this, values);
  }

  isInstance(value: unknown): value is Model<S> {
    return value instanceof Model && value.definition === this;
  }

  describe(): ModelDescription {
    const fields: Record<string, FieldDescription> = {};
    for (const [name, def] of this.fieldEntries()) {
      fields[name] = def.describe();
    }
    return {
      name: this.name,
      namespace: this.options.namespace,
      parent: this.parent?.name ?? null,
      roles: this.options.roleNames(),
      fields,
    };
  }
}

/**
 * Declares a model. With `extends`, the parent's registry is copied first and
 * this model's fields are merged over it: a redeclared name replaces the
 * parent's field but keeps its position.
 */
export function defineModel<
  S extends FieldShape,
  P extends FieldShape = Record<never, never>,
>(
  name: string,
  fields: S,
  config: DefineModelConfig<P> = {}
): ModelDefinition<MergeShapes<P, S>> {
  const parent = config.extends;
  const shape = (
    parent ? { ...parent.fields, ...fields } : { ...fields }
  ) as MergeShapes<P, S>;
  const definition = new ModelDefinition(name, shape, {
    parent,
    options: config.options,
    log: config.log,
  });
  globalModelRegistry.set(name, definition);
  return definition;
}

/** Looks up a definition registered by `defineModel`. */
export function getModelDefinition(
  name: string
): AnyModelDefinition | undefined {
  return globalModelRegistry.get(name);
}

export function getAllModelDefinitions(): AnyModelDefinition[] {
  return Array.from(globalModelRegistry.values());
}

// ──────────────────────────────────────────────────────────────────────────────
// Instance
// ──────────────────────────────────────────────────────────────────────────────

/**
 * One record of a model: the converted field values that passed validation
 * and the error messages of the fields that did not.
 */
export class Model<S extends FieldShape = FieldShape> {
  private readonly values = new Map<string, unknown>();
  private fieldErrors: FieldErrors = {};

  /**
   * Unknown keys in `input` are ignored. Fields without a supplied value get
   * their default. When at least one field was supplied, every required
   * field must end up with a value or a `ModelValidationError` is thrown.
   */
  constructor(
    readonly definition: ModelDefinition<S>,
    input: RawInput = {}
  ) {
    let supplied = 0;
    for (const [name, def] of definition.fieldEntries()) {
      if (Object.hasOwn(input, name)) {
        supplied++;
        this.record(name, this.evaluate(name, def, input[name]));
      } else if (def.hasDefault()) {
        this.record(name, this.evaluate(name, def, def.getDefault()));
      }
    }
    if (supplied === 0) return;

    const missing: FieldErrors = {};
    for (const [name, def] of definition.fieldEntries()) {
      if (def.isRequired && !this.values.has(name)) {
        missing[name] = this.fieldErrors[name] ?? [REQUIRED_MESSAGE];
      }
    }
    if (Object.keys(missing).length > 0) {
      definition.log?.(
        `Rejected ${definition.name}: ${Object.keys(missing).join(", ")}`
      );
      throw new ModelValidationError(definition.name, missing);
    }
  }

  get options(): ModelOptions {
    return this.definition.options;
  }

  /** Stored values of the set fields. */
  get data(): Readonly<Record<string, unknown>> {
    return Object.freeze(Object.fromEntries(this.entries()));
  }

  get errors(): Readonly<FieldErrors> {
    return Object.freeze(copyErrors(this.fieldErrors));
  }

  /** Whether `name` currently holds a value (not merely whether it is declared). */
  has(name: string): boolean {
    return this.values.has(name);
  }

  keys(): string[] {
    return this.definition
      .fieldEntries()
      .map(([name]) => name)
      .filter((name) => this.values.has(name));
  }

  slot<K extends keyof S & string>(name: K): FieldSlot<FieldValue<S[K]>> {
    if (!this.values.has(name)) return { state: "unset" };
    // Only values produced by this field's `clean` are stored under its name.
    return {
      state: "present",
      value: this.values.get(name) as FieldValue<S[K]>,
    };
  }

  /** Reads a set field; throws `FieldNotSetError` when it has no value. */
  get<K extends keyof S & string>(name: K): FieldValue<S[K]> {
    const slot = this.slot(name);
    if (slot.state === "unset") {
      throw new FieldNotSetError(
        this.definition.name,
        name,
        this.definition.getField(name) !== undefined
      );
    }
    return slot.value;
  }

  getOr<K extends keyof S & string, D>(
    name: K,
    fallback: D
  ): FieldValue<S[K]> | D {
    const slot = this.slot(name);
    return slot.state === "present" ? slot.value : fallback;
  }

  /**
   * Converts and validates `raw`, then stores it. Field failures are thrown,
   * not recorded. `null` clears an optional field.
   */
  set<K extends keyof S & string>(name: K, raw: unknown): void {
    const def = this.requireField(name);
    if (raw === null || raw === undefined) {
      if (def.rejectsMissingValue()) throw new RequiredFieldMissing();
      this.values.delete(name);
    } else {
      this.values.set(name, def.clean(raw));
    }
    delete this.fieldErrors[name];
  }

  unset<K extends keyof S & string>(name: K): void {
    this.requireField(name);
    this.values.delete(name);
  }

  /**
   * Converts and validates `data` against the registry.
   *
   * In full mode every declared field is evaluated: a field missing from
   * `data` falls back to its current value, then to its default, and a
   * required field with none of those is reported. In partial mode only the
   * fields present in `data` are evaluated; the others keep their values and
   * their previous errors.
   *
   * A failing field never overwrites its stored value.
   * @returns `true` when no field failed during this call.
   */
  validate(data: RawInput | Model<S>, partial = false): boolean {
    const input = data instanceof Model ? data.data : data;
    if (!isRecord(input)) {
      throw new StructureMismatch("Please provide a mapping to validate.");
    }

    const errors: FieldErrors = partial ? { ...this.fieldErrors } : {};
    let failed = 0;

    for (const [name, def] of this.definition.fieldEntries()) {
      let raw: unknown;
      if (Object.hasOwn(input, name)) {
        raw = input[name];
      } else if (partial) {
        continue;
      } else if (this.values.has(name)) {
        raw = this.values.get(name);
      } else if (def.hasDefault()) {
        raw = def.getDefault();
      } else {
        if (def.isRequired) {
          errors[name] = [REQUIRED_MESSAGE];
          failed++;
        }
        continue;
      }

      const messages = this.evaluate(name, def, raw);
      if (messages) {
        errors[name] = messages;
        failed++;
      } else {
        delete errors[name];
      }
    }

    this.fieldErrors = errors;
    this.definition.log?.(
      `Validated ${this.definition.name}${partial ? " (partial)" : ""}: ${
        failed === 0 ? "ok" : `${failed} field(s) failed`
      }`
    );
    return failed === 0;
  }

  /**
   * Renders the set fields as plain values. With a role, the definition's
   * options must declare it and its filter decides which fields are emitted;
   * nested models reuse the role when they declare it too.
   */
  serialize(role?: string): SerializedRecord {
    const filter =
      role === undefined ? undefined : this.definition.options.roleFor(role);

    const out: SerializedRecord = {};
    for (const [name, def] of this.definition.fieldEntries()) {
      if (!this.values.has(name)) continue;
      out[name] = def.toPrimitive(this.values.get(name), role);
    }
    if (!filter) return out;

    this.definition.log?.(
      `Serializing ${this.definition.name} with role ${role} (${filter.kind})`
    );
    return filter.apply(out);
  }

  toJSON(): SerializedRecord {
    return this.serialize();
  }

  /**
   * Structural equality over the stored values of two instances of the same
   * definition; errors are ignored.
   */
  equals(other: unknown): boolean {
    if (!(other instanceof Model)) return false;
    if (other === this) return true;
    if (other.definition !== this.definition) return false;
    const mine = this.keys();
    const theirs = other.keys();
    if (mine.length !== theirs.length) return false;
    return mine.every(
      (name) =>
        other.has(name) &&
        valuesEqual(this.values.get(name), other.values.get(name))
    );
  }

  clone(): Model<S> {
    const copy = new Model(this.definition);
    copy.values.clear();
    for (const [name, value] of this.values) {
      copy.values.set(name, cloneValue(value));
    }
    copy.fieldErrors = copyErrors(this.fieldErrors);
    return copy;
  }

  private entries(): [string, unknown][] {
    return this.keys().map((name) => [name, this.values.get(name)]);
  }

  private requireField(name: string): FieldBuilder<unknown> {
    const def = this.definition.getField(name);
    if (!def) {
      throw new InvalidConfiguration(
        `${this.definition.name} has no field named ${name}`
      );
    }
    return def;
  }

  /**
   * Converts and validates one raw value, storing it on success.
   * @returns the failure messages, or `undefined` when nothing failed.
   */
  private evaluate(
    name: string,
    def: FieldBuilder<unknown>,
    raw: unknown
  ): string[] | undefined {
    if (raw === null || raw === undefined) {
      return def.rejectsMissingValue() ? [REQUIRED_MESSAGE] : undefined;
    }
    try {
      this.values.set(name, def.clean(raw));
      return undefined;
    } catch (err) {
      if (isFieldError(err)) return [...err.messages];
      throw err;
    }
  }

  private record(name: string, messages: string[] | undefined): void {
    if (messages) {
      this.fieldErrors[name] = messages;
    } else {
      delete this.fieldErrors[name];
    }
  }
}
