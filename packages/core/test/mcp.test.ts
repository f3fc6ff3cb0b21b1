import { describe, it, expect } from "vitest";
import { errorResponse, resultToStructuredResponse } from "../src/mcp.js";
import { Ok, Err, type Result } from "../src/result.js";

describe("MCP utilities", () => {
  describe("errorResponse", () => {
    it("prefixes the text and marks failure", () => {
      expect(errorResponse("Something went wrong")).toEqual({
        content: [{ type: "text", text: "Error: Something went wrong" }],
        structuredContent: { success: false, error: "Something went wrong" },
      });
    });
  });

  describe("resultToStructuredResponse", () => {
    const format = (count: number) => ({ text: `Found ${count}`, data: { count } });

    it("formats a success", () => {
      const result: Result<number, string> = Ok(3);
      expect(resultToStructuredResponse(result, format)).toEqual({
        content: [{ type: "text", text: "Found 3" }],
        structuredContent: { count: 3, success: true },
      });
    });

    it("turns a string error into an error response", () => {
      const result: Result<number, string> = Err("No project indexed");
      expect(resultToStructuredResponse(result, format)).toEqual({
        content: [{ type: "text", text: "Error: No project indexed" }],
        structuredContent: { success: false, error: "No project indexed" },
      });
    });

    it("uses the message of an Error", () => {
      const result: Result<number, Error> = Err(new Error("disk full"));
      expect(resultToStructuredResponse(result, format).structuredContent).toEqual({
        success: false,
        error: "disk full",
      });
    });
  });
});
