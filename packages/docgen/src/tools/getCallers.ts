import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { type ToolResponse, errorResponse } from "@codebrief/core";

import type { CallerView } from "../core/services/DocgenService.js";
import type { JavaService } from "./types.js";

interface GetCallersInput {
  umid: string;
}

interface GetCallersOutput extends Record<string, unknown> {
  success: boolean;
  error?: string;
  callers?: CallerView[];
  count?: number;
}

export function registerGetCallers(server: McpServer, docgen: JavaService): void {
  server.registerTool(
    "get_callers",
    {
      title: "Get callers",
      description: `Find every method whose resolved calls include the given method.

Calls are matched by name and argument count only, so callers marked
ambiguous may have meant a different overload.`,
      inputSchema: {
        umid: z.string().describe("Method id, e.g. 'com.example.Util#format(String)'"),
      },
      outputSchema: {
        success: z.boolean(),
        error: z.string().optional(),
        callers: z
          .array(
            z.object({
              umid: z.string(),
              signature: z.string(),
              tier: z.enum(["local", "import", "global"]),
              ambiguous: z.boolean(),
            })
          )
          .optional(),
        count: z.number().optional(),
      },
    },
    async (input: GetCallersInput): Promise<ToolResponse<GetCallersOutput>> => {
      const result = docgen.getCallers(input.umid);

      if (!result.ok) {
        return errorResponse(result.error);
      }

      const callers = result.value;
      if (callers.length === 0) {
        return {
          content: [{ type: "text", text: `No callers found for: ${input.umid}` }],
          structuredContent: { success: true, callers: [], count: 0 },
        };
      }

      const lines = [`# Callers of ${input.umid} (${callers.length})`];
      for (const caller of callers) {
        lines.push(`- ${caller.umid} [${caller.tier}${caller.ambiguous ? ", ambiguous" : ""}]`);
      }

      return {
        content: [{ type: "text", text: lines.join("\n") }],
        structuredContent: { success: true, callers, count: callers.length },
      };
    }
  );
}
