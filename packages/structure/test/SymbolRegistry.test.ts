import { describe, it, expect } from "vitest";
import { SymbolRegistry } from "../src/index.js";
import { makeMethod } from "./helpers.js";

describe("SymbolRegistry", () => {
  it("indexes a method by umid, scoped identifier and short name", () => {
    const registry = new SymbolRegistry();
    const method = makeMethod("app.Util", "format", ["String"]);

    expect(registry.register(method).ok).toBe(true);

    expect(registry.lookupByUmid("app.Util#format(String)")).toBe(method);
    expect(registry.lookupByScoped("app.Util.format")).toEqual([method]);
    expect(registry.lookupByShortName("format")).toEqual([method]);
    expect(registry.methodCount).toBe(1);
  });

  it("groups overloads under one scoped identifier", () => {
    const registry = new SymbolRegistry();
    const one = makeMethod("app.Util", "foo", ["int"]);
    const two = makeMethod("app.Util", "foo", ["int", "int"]);
    const other = makeMethod("app.Other", "foo");

    registry.register(one);
    registry.register(two);
    registry.register(other);

    expect(registry.lookupByScoped("app.Util.foo")).toEqual([one, two]);
    expect(registry.lookupByShortName("foo")).toEqual([one, two, other]);
  });

  it("returns empty results for unknown keys", () => {
    const registry = new SymbolRegistry();

    expect(registry.lookupByUmid("app.Nope#x()")).toBeUndefined();
    expect(registry.lookupByScoped("app.Nope.x")).toEqual([]);
    expect(registry.lookupByShortName("x")).toEqual([]);
    expect(registry.lookupClass("app.Nope")).toBeUndefined();
  });

  it("accepts the same method twice without duplicating it", () => {
    const registry = new SymbolRegistry();
    const method = makeMethod("app.Util", "run");

    registry.register(method);
    expect(registry.register(method).ok).toBe(true);

    expect(registry.lookupByShortName("run")).toHaveLength(1);
  });

  it("refuses a different method with a registered umid", () => {
    const registry = new SymbolRegistry();
    const first = makeMethod("app.Util", "run");
    const second = makeMethod("app.Util", "run");

    registry.register(first);
    const result = registry.register(second);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBe("Duplicate method id: app.Util#run()");
    expect(registry.lookupByScoped("app.Util.run")).toEqual([first]);
    expect(registry.lookupByShortName("run")).toEqual([first]);
  });

  it("refuses registration once sealed", () => {
    const registry = new SymbolRegistry();
    registry.seal();

    const result = registry.register(makeMethod("app.Util", "late"));

    expect(registry.sealed).toBe(true);
    expect(result.ok).toBe(false);
    expect(registry.methodCount).toBe(0);
  });
});
