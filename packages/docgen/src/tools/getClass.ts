import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { resultToStructuredResponse } from "@codebrief/core";

import type { JavaService } from "./types.js";

interface GetClassInput {
  ucid: string;
}

export function registerGetClass(server: McpServer, docgen: JavaService): void {
  server.registerTool(
    "get_class",
    {
      title: "Get class",
      description: `Show a class by id: signature, fields, methods with their resolved
dependencies, nested classes and descriptions.

Class ids are dot-scoped: package, enclosing classes, name
(e.g. 'com.example.OrderService.Helper').`,
      inputSchema: {
        ucid: z.string().describe("Class id, e.g. 'com.example.OrderService'"),
      },
      outputSchema: {
        success: z.boolean(),
        error: z.string().optional(),
        class: z.record(z.string(), z.unknown()).optional(),
      },
    },
    async (input: GetClassInput) =>
      resultToStructuredResponse(docgen.getClass(input.ucid), (view) => {
        const lines = [`# ${view.signature}`];
        if (view.description) lines.push(view.description);
        for (const method of view.methods) {
          const deps = method.dependencies.map((dep) => dep.umid + (dep.ambiguous ? "?" : ""));
          lines.push(`- ${method.signature}${deps.length > 0 ? ` -> ${deps.join(", ")}` : ""}`);
        }
        for (const nested of view.classes) {
          lines.push(`- nested: ${nested.ucid}`);
        }
        return { text: lines.join("\n"), data: { class: view } };
      })
  );
}
