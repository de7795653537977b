import { describe, it, expect } from "vitest";
import {
  InvalidConfiguration,
  ModelOptions,
  RoleFilter,
  blacklist,
  defineModel,
  field,
  whitelist,
  wholelist,
} from "../src/index.js";

describe("ModelOptions", () => {
  it("accepts the recognized keys", () => {
    const mo = new ModelOptions({ klass: null, roles: null });
    expect(mo.klass).toBeNull();
    expect(mo.roles).toBeNull();
    expect(mo.namespace).toBeNull();
  });

  it("builds with no arguments", () => {
    const mo = new ModelOptions();
    expect(mo).toBeInstanceOf(ModelOptions);
    expect(mo.roleNames()).toEqual([]);
  });

  it("rejects unrecognized keys", () => {
    expect(() =>
      ModelOptions.from({ klass: null, roles: null, badkw: null })
    ).toThrow(InvalidConfiguration);
    expect(() =>
      ModelOptions.from({ klass: null, roles: null, badkw: null })
    ).toThrow("Invalid model options: Unrecognized option(s): badkw");
  });

  it("rejects values of the wrong shape", () => {
    expect(() => ModelOptions.from({ namespace: 3 })).toThrow(
      InvalidConfiguration
    );
    expect(() => ModelOptions.from({ roles: { public: ["name"] } })).toThrow(
      /roles\.public/
    );
  });

  it("is read from the model's configuration block", () => {
    const Foo = defineModel("Foo", {}, { options: { namespace: "foo", roles: {} } });
    const fo = Foo.create().options;

    expect(fo).toBeInstanceOf(ModelOptions);
    expect(fo).toBe(Foo.options);
    expect(fo.namespace).toBe("foo");
    expect(fo.roles).toEqual({});
    expect(fo.klass).toBe(Foo);
  });

  it("rejects a configuration block with unknown keys", () => {
    const options = { namespace: "users", table: "users" };
    expect(() => defineModel("BadOptions", {}, { options })).toThrow(
      "Invalid model options: Unrecognized option(s): table"
    );
  });

  it("looks up roles and rejects undefined ones", () => {
    const Account = defineModel(
      "Account",
      { name: field.string() },
      { options: { roles: { public: whitelist("name") } } }
    );
    expect(Account.options.hasRole("public")).toBe(true);
    expect(Account.options.roleFor("public").kind).toBe("whitelist");
    expect(Account.options.hasRole("toString")).toBe(false);
    expect(() => Account.options.roleFor("admin")).toThrow(
      "Role admin is not defined for Account"
    );
  });
});

describe("role filters", () => {
  const record = { name: "Joey", password: "test-secret", bio: "Genius" };

  it("whitelist keeps only the named fields", () => {
    expect(whitelist("name", "bio").apply(record)).toEqual({
      name: "Joey",
      bio: "Genius",
    });
  });

  it("blacklist drops the named fields", () => {
    expect(blacklist("password").apply(record)).toEqual({
      name: "Joey",
      bio: "Genius",
    });
  });

  it("wholelist keeps everything", () => {
    expect(wholelist().apply(record)).toEqual(record);
  });

  it("is a frozen tagged variant", () => {
    const filter = new RoleFilter("blacklist", ["password"]);
    expect(filter.kind).toBe("blacklist");
    expect(filter.fieldNames).toEqual(["password"]);
    expect(Object.isFrozen(filter.fieldNames)).toBe(true);
    expect(filter.admits("name")).toBe(true);
    expect(filter.admits("password")).toBe(false);
  });
});
