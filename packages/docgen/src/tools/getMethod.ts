import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { resultToStructuredResponse } from "@codebrief/core";

import type { JavaService } from "./types.js";

interface GetMethodInput {
  umid: string;
}

export function registerGetMethod(server: McpServer, docgen: JavaService): void {
  server.registerTool(
    "get_method",
    {
      title: "Get method",
      description: `Show a method by id with its description, resolved callees and the
call names that matched nothing in the project (library calls).

Method ids are '<class id>#<name>(<parameter types>)', e.g.
'com.example.OrderService#process(List<Order>,int)'. Constructors are named '<init>'.`,
      inputSchema: {
        umid: z.string().describe("Method id"),
      },
      outputSchema: {
        success: z.boolean(),
        error: z.string().optional(),
        method: z.record(z.string(), z.unknown()).optional(),
      },
    },
    async (input: GetMethodInput) =>
      resultToStructuredResponse(docgen.getMethod(input.umid), (view) => {
        const lines = [`# ${view.signature}`, `line ${view.line}`];
        if (view.description) lines.push(view.description);
        for (const dep of view.dependencies) {
          lines.push(`- calls ${dep.umid} (${dep.tier}${dep.ambiguous ? ", ambiguous" : ""})`);
        }
        if (view.unresolvedDependencies.length > 0) {
          lines.push(`- unresolved: ${view.unresolvedDependencies.join(", ")}`);
        }
        return { text: lines.join("\n"), data: { method: view } };
      })
  );
}
