import { describe, it, expect } from "vitest";
import { ANNOTATION_RESPONSE_JSON_SCHEMA, parseAnnotationResponse } from "../src/index.js";

describe("parseAnnotationResponse", () => {
  it("accepts a response that matches the schema", () => {
    const text = JSON.stringify({
      id: "shop.Cart",
      description: "Tracks a running total.",
      confidence: 85,
      methods: [{ method_index: 0, description: "Adds a price to the total.", confidence: 90 }],
    });

    const result = parseAnnotationResponse(text);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.methods[0]).toEqual({ method_index: 0, description: "Adds a price to the total.", confidence: 90 });
  });

  it("rejects text that is not JSON as a terminal failure", () => {
    const result = parseAnnotationResponse("Sure! Here is the JSON:");

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("terminal");
    expect(result.error.message).toMatch(/^Response is not JSON: /);
  });

  it("names the fields that do not match", () => {
    const result = parseAnnotationResponse(JSON.stringify({ id: "shop.Cart", description: "x", methods: [] }));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("terminal");
    expect(result.error.message).toMatch(/^Response does not match schema: confidence: /);
  });

  it("rejects confidence outside 0-100", () => {
    const text = JSON.stringify({ id: "A", description: "x", confidence: 120, methods: [] });

    expect(parseAnnotationResponse(text).ok).toBe(false);
  });
});

describe("ANNOTATION_RESPONSE_JSON_SCHEMA", () => {
  it("requires every top-level field", () => {
    expect(ANNOTATION_RESPONSE_JSON_SCHEMA.type).toBe("object");
    expect(ANNOTATION_RESPONSE_JSON_SCHEMA.required).toEqual(["id", "description", "confidence", "methods"]);
  });
});
