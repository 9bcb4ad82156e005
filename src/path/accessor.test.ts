import { describe, expect, it } from "vitest";
import type { DocumentMap } from "../document.js";
import { deletePath, getPath, setPath } from "./accessor.js";
import { type ConcreteStep, parsePath, toConcrete } from "./parser.js";

function concrete(path: string): ConcreteStep[] {
  const steps = toConcrete(parsePath(path));
  if (!steps) throw new Error(`wildcard in ${path}`);
  return steps;
}

describe("getPath", () => {
  const doc: DocumentMap = {
    user: { name: "alice", tags: ["a", "b"], nothing: null },
    count: 3,
  };

  it("finds nested values", () => {
    expect(getPath(doc, parsePath("user.name"))).toEqual({
      found: true,
      value: "alice",
    });
    expect(getPath(doc, parsePath("user.tags[1]"))).toEqual({
      found: true,
      value: "b",
    });
  });

  it("distinguishes a null value from a miss", () => {
    expect(getPath(doc, parsePath("user.nothing"))).toEqual({
      found: true,
      value: null,
    });
    expect(getPath(doc, parsePath("user.missing"))).toEqual({ found: false });
  });

  it("treats wrong types and out-of-range indices as misses", () => {
    expect(getPath(doc, parsePath("count.value"))).toEqual({ found: false });
    expect(getPath(doc, parsePath("user.name[0]"))).toEqual({ found: false });
    expect(getPath(doc, parsePath("user.tags[2]"))).toEqual({ found: false });
    expect(getPath("scalar", parsePath("a"))).toEqual({ found: false });
  });

  it("never resolves a wildcard", () => {
    expect(getPath(doc, parsePath("user.tags[*]"))).toEqual({ found: false });
  });

  it("ignores inherited members", () => {
    expect(getPath({}, parsePath("toString"))).toEqual({ found: false });
  });
});

describe("setPath", () => {
  it("creates intermediate mappings", () => {
    const root: DocumentMap = {};
    setPath(root, concrete("a.b.c"), 42);
    expect(root).toEqual({ a: { b: { c: 42 } } });
  });

  it("grows arrays with null padding", () => {
    const root: DocumentMap = { items: ["x"] };
    setPath(root, concrete("items[3]"), "y");
    expect(root).toEqual({ items: ["x", null, null, "y"] });
  });

  it("never shrinks arrays", () => {
    const root: DocumentMap = { items: [1, 2, 3] };
    setPath(root, concrete("items[0]"), 9);
    expect(root).toEqual({ items: [9, 2, 3] });
  });

  it("overwrites incompatible intermediate values", () => {
    const root: DocumentMap = { a: "scalar", list: { not: "an array" } };
    setPath(root, concrete("a.b"), 1);
    setPath(root, concrete("list[1].name"), "n");
    expect(root).toEqual({ a: { b: 1 }, list: [null, { name: "n" }] });
  });

  it("is the inverse of getPath", () => {
    const root: DocumentMap = {};
    const steps = concrete("org.teams[2].members[0].name");
    setPath(root, steps, "bob");
    expect(getPath(root, steps)).toEqual({ found: true, value: "bob" });
  });

  it("writes __proto__ as an own key without touching the prototype", () => {
    const root: DocumentMap = {};
    setPath(root, concrete("__proto__.polluted"), true);
    expect(Object.keys(root)).toEqual(["__proto__"]);
    expect(Object.getPrototypeOf(root)).toBe(Object.prototype);
    expect(getPath(root, concrete("__proto__.polluted"))).toEqual({
      found: true,
      value: true,
    });
    expect(Object.prototype).not.toHaveProperty("polluted");
  });

  it("writes constructor and prototype like any other key", () => {
    const root: DocumentMap = {};
    setPath(root, concrete("item.prototype"), "v2");
    setPath(root, concrete("constructor"), "x");
    expect(root).toEqual({ item: { prototype: "v2" }, constructor: "x" });
  });
});

describe("deletePath", () => {
  it("removes a mapping key", () => {
    const root: DocumentMap = { user: { name: "alice", password: "test-secret" } };
    deletePath(root, concrete("user.password"));
    expect(root).toEqual({ user: { name: "alice" } });
  });

  it("shifts array elements left", () => {
    const root: DocumentMap = { items: ["first", "second", "third"] };
    deletePath(root, concrete("items[1]"));
    expect(root).toEqual({ items: ["first", "third"] });
  });

  it("deletes inside array elements", () => {
    const root: DocumentMap = { items: [{ id: 1, meta: "m" }, { id: 2, meta: "n" }] };
    deletePath(root, concrete("items[1].meta"));
    expect(root).toEqual({ items: [{ id: 1, meta: "m" }, { id: 2 }] });
  });

  it("is a no-op when the path misses", () => {
    const root: DocumentMap = { items: [1], user: "scalar" };
    deletePath(root, concrete("items[5]"));
    deletePath(root, concrete("user.name"));
    deletePath(root, concrete("missing.key"));
    deletePath(root, concrete("user[0]"));
    expect(root).toEqual({ items: [1], user: "scalar" });
  });
});
