import { describe, it, expect } from "vitest";
import {
  InvalidConfiguration,
  blacklist,
  defineModel,
  field,
  whitelist,
  wholelist,
} from "../src/index.js";

describe("serialize()", () => {
  const Event = defineModel("SerializedEvent", {
    title: field.string().required(),
    at: field.dateTime(),
    seats: field.integer(),
    tags: field.list(field.string()),
  });

  it("renders set fields as plain values", () => {
    const event = Event.create({
      title: "Launch",
      at: "2024-01-02T03:04:05Z",
      tags: ["a", "b"],
    });
    expect(event.serialize()).toEqual({
      title: "Launch",
      at: "2024-01-02T03:04:05.000Z",
      tags: ["a", "b"],
    });
  });

  it("round-trips through construction", () => {
    const event = Event.create({ title: "Launch", seats: "12" });
    const again = Event.create(event.serialize());
    expect(again.equals(event)).toBe(true);
    expect(again.get("seats")).toBe(12);
  });

  it("is used by JSON.stringify", () => {
    const event = Event.create({ title: "Launch", seats: 3 });
    expect(JSON.stringify(event)).toBe('{"title":"Launch","seats":3}');
  });
});

describe("serialize() with roles", () => {
  const User = defineModel(
    "RoleUser",
    {
      name: field.string(),
      password: field.string(),
      bio: field.string(),
    },
    {
      options: {
        roles: {
          public: whitelist("name", "bio"),
          safe: blacklist("password"),
          everything: wholelist(),
        },
      },
    }
  );
  const user = User.create({ name: "Joey", password: "test-secret", bio: "Genius" });

  it("emits only whitelisted fields", () => {
    expect(user.serialize("public")).toEqual({ name: "Joey", bio: "Genius" });
  });

  it("drops blacklisted fields", () => {
    expect(user.serialize("safe")).toEqual({ name: "Joey", bio: "Genius" });
  });

  it("emits every field for a wholelist role", () => {
    expect(user.serialize("everything")).toEqual({
      name: "Joey",
      password: "test-secret",
      bio: "Genius",
    });
  });

  it("throws for a role the model does not declare", () => {
    expect(() => user.serialize("admin")).toThrow(InvalidConfiguration);
    expect(() => user.serialize("admin")).toThrow(
      "Role admin is not defined for RoleUser"
    );
  });

  it("throws for any role when the model declares none", () => {
    const Plain = defineModel("PlainModel", { name: field.string() });
    expect(() => Plain.create({ name: "a" }).serialize("public")).toThrow(
      "Role public is not defined for PlainModel"
    );
  });

  it("logs the role used", () => {
    const lines: string[] = [];
    const Logged = defineModel(
      "LoggedRoleUser",
      { name: field.string() },
      {
        options: { roles: { public: whitelist("name") } },
        log: (msg) => lines.push(msg),
      }
    );
    Logged.create({ name: "a" }).serialize("public");
    expect(lines).toEqual([
      "Serializing LoggedRoleUser with role public (whitelist)",
    ]);
  });
});

describe("serialize() with nested models", () => {
  const Address = defineModel(
    "NestedAddress",
    { city: field.string(), street: field.string() },
    { options: { roles: { public: whitelist("city") } } }
  );
  const Phone = defineModel("NestedPhone", { number: field.string() });
  const User = defineModel(
    "NestedUser",
    {
      name: field.string().required(),
      password: field.string(),
      addresses: field.list(field.model(Address)),
      phone: field.model(Phone),
    },
    {
      options: {
        roles: { public: whitelist("name", "addresses", "phone") },
      },
    }
  );

  const user = User.create({
    name: "a",
    password: "test-secret",
    addresses: [{ city: "gotham", street: "Main" }],
    phone: { number: "555" },
  });

  it("passes the role to nested models that declare it", () => {
    expect(user.serialize("public")).toEqual({
      name: "a",
      addresses: [{ city: "gotham" }],
      phone: { number: "555" },
    });
  });

  it("serializes nested models in full without a role", () => {
    expect(user.serialize()).toEqual({
      name: "a",
      password: "test-secret",
      addresses: [{ city: "gotham", street: "Main" }],
      phone: { number: "555" },
    });
  });
});
