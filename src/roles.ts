export type RoleFilterKind = "whitelist" | "blacklist" | "wholelist";

/**
 * A named allow/deny rule over field names, applied to a serialized record
 * to produce the subset emitted for a role.
 */
export class RoleFilter {
  readonly fieldNames: readonly string[];

  constructor(
    readonly kind: RoleFilterKind,
    fieldNames: readonly string[] = []
  ) {
    this.fieldNames = Object.freeze([...fieldNames]);
  }

  admits(name: string): boolean {
    switch (this.kind) {
      case "whitelist":
        return this.fieldNames.includes(name);
      case "blacklist":
        return !this.fieldNames.includes(name);
      case "wholelist":
        return true;
    }
  }

  apply<V>(record: Record<string, V>): Record<string, V> {
    const out: Record<string, V> = {};
    for (const [name, value] of Object.entries(record)) {
      if (this.admits(name)) out[name] = value;
    }
    return out;
  }
}

/** Emit only the named fields. */
export const whitelist = (...names: string[]): RoleFilter =>
  new RoleFilter("whitelist", names);

/** Emit every field except the named ones. */
export const blacklist = (...names: string[]): RoleFilter =>
  new RoleFilter("blacklist", names);

export const wholelist = (): RoleFilter => new RoleFilter("wholelist");
