import { describe, it, expect } from "vitest";
import type { ClassEntity, ProjectModel } from "@codebrief/structure";
import { needsAnnotation, prepareRequest } from "../src/index.js";
import { CART, build } from "./helpers.js";

function cartOf(project: ProjectModel): ClassEntity {
  const cart = project.registry.lookupClass("shop.Cart");
  if (!cart) throw new Error("missing shop.Cart");
  return cart;
}

describe("prepareRequest", () => {
  it("sends the whole class when nothing is cached", () => {
    const cart = cartOf(build(["shop/Cart.java", CART]));

    const prepared = prepareRequest(cart, ["java.util.List"]);

    expect(prepared.request).toEqual({
      mode: "cold",
      id: "shop.Cart",
      signature: "public class Cart",
      code: cart.body,
      imports: ["java.util.List"],
      methods: { "0": "public void add(int price)", "1": "int sum(int a, int b)" },
      children: [{ signature: "static class Line", description: "" }],
    });
    expect([...prepared.requested]).toEqual([0, 1]);
    expect(prepared.slots.get(1)?.umid).toBe("shop.Cart#sum(int,int)");
  });

  it("sends only dirty method bodies once something is cached", () => {
    const cart = cartOf(build(["shop/Cart.java", CART]));
    const sum = cart.methods.get("shop.Cart#sum(int,int)");
    if (!sum) throw new Error("missing sum");
    sum.description = "Adds two numbers.";
    const add = cart.methods.get("shop.Cart#add(int)");

    const prepared = prepareRequest(cart, []);

    expect(prepared.request).toEqual({
      mode: "warm",
      id: "shop.Cart",
      signature: "public class Cart",
      fields: ["private int total"],
      cached: { "1": "Adds two numbers." },
      dirty: { "0": { signature: "public void add(int price)", body: add?.body } },
      imports: [],
      children: [{ signature: "static class Line", description: "" }],
    });
    expect([...prepared.requested]).toEqual([0]);
  });
});

describe("needsAnnotation", () => {
  it("is true while the class or any method lacks a description", () => {
    const cart = cartOf(build(["shop/Cart.java", CART]));
    expect(needsAnnotation(cart)).toBe(true);

    cart.description = "Keeps a total.";
    expect(needsAnnotation(cart)).toBe(true);

    for (const method of cart.methods.values()) {
      method.description = "Does a thing.";
    }
    expect(needsAnnotation(cart)).toBe(false);
  });
});
