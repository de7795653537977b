import { z } from "zod";
import { InvalidConfiguration } from "./errors.js";
import { RoleFilter } from "./roles.js";

/** What a model definition exposes of itself to its options. */
export interface ModelKind {
  readonly name: string;
}

const modelKindSchema = z.custom<ModelKind>(
  (value) =>
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    typeof value.name === "string",
  { message: "Expected a model definition" }
);

const modelOptionsSchema = z
  .object({
    klass: modelKindSchema.nullable().optional(),
    roles: z.record(z.instanceof(RoleFilter)).nullable().optional(),
    namespace: z.string().nullable().optional(),
  })
  .strict();

export type ModelOptionsInput = z.input<typeof modelOptionsSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.code === z.ZodIssueCode.unrecognized_keys
        ? `Unrecognized option(s): ${issue.keys.join(", ")}`
        : `${issue.path.join(".") || "options"}: ${issue.message}`
    )
    .join("; ");
}

/**
 * Per-definition configuration. Only `klass`, `roles` and `namespace` are
 * recognized; anything else is an `InvalidConfiguration`.
 */
export class ModelOptions {
  readonly klass: ModelKind | null;
  readonly roles: Readonly<Record<string, RoleFilter>> | null;
  readonly namespace: string | null;

  constructor(input: ModelOptionsInput = {}) {
    const parsed = modelOptionsSchema.safeParse(input);
    if (!parsed.success) {
      throw new InvalidConfiguration(
        `Invalid model options: ${formatIssues(parsed.error)}`
      );
    }
    const { klass, roles, namespace } = parsed.data;
    this.klass = klass ?? null;
    this.roles = roles ? Object.freeze({ ...roles }) : null;
    this.namespace = namespace ?? null;
    Object.freeze(this);
  }

  /** Builds options from untyped input, e.g. a configuration block read at runtime. */
  static from(input: unknown): ModelOptions {
    const parsed = modelOptionsSchema.safeParse(input ?? {});
    if (!parsed.success) {
      throw new InvalidConfiguration(
        `Invalid model options: ${formatIssues(parsed.error)}`
      );
    }
    return new ModelOptions(parsed.data);
  }

  hasRole(name: string): boolean {
    return this.roles !== null && Object.hasOwn(this.roles, name);
  }

  roleNames(): string[] {
    return this.roles ? Object.keys(this.roles) : [];
  }

  roleFor(name: string): RoleFilter {
    const filter = this.roles?.[name];
    if (!filter || !this.hasRole(name)) {
      throw new InvalidConfiguration(
        `Role ${name} is not defined for ${this.klass?.name ?? "this model"}`
      );
    }
    return filter;
  }
}
