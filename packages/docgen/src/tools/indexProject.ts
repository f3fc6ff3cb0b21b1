import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { type ToolResponse, errorResponse } from "@codebrief/core";

import type { IndexSummary } from "../core/services/DocgenService.js";
import type { JavaService } from "./types.js";

interface IndexProjectInput {
  root_path?: string;
}

interface IndexProjectOutput extends Record<string, unknown> {
  success: boolean;
  error?: string;
  stats?: IndexSummary;
}

export function registerIndexProject(server: McpServer, docgen: JavaService): void {
  server.registerTool(
    "index_project",
    {
      title: "Index project",
      description: `Parse every Java file under a directory and build the class/method model.

Resolves each method's calls to other methods in the project and seeds
descriptions from the cache file, so only changed methods need new ones.
Runs automatically for the working directory when the server starts.

Use cases:
- Re-index after editing sources
- Index a different project root
- Check how many methods still need descriptions`,
      inputSchema: {
        root_path: z.string().optional().describe("Project root directory (default: working directory)"),
      },
      outputSchema: {
        success: z.boolean(),
        error: z.string().optional(),
        stats: z
          .object({
            root: z.string(),
            files: z.number(),
            classes: z.number(),
            methods: z.number(),
            issues: z.number(),
            resolved: z.number(),
            ambiguous: z.number(),
            unresolved: z.number(),
            cleanMethods: z.number(),
            dirtyMethods: z.number(),
          })
          .optional(),
      },
    },
    async (input: IndexProjectInput): Promise<ToolResponse<IndexProjectOutput>> => {
      const result = await docgen.index(input.root_path ?? process.cwd());

      if (!result.ok) {
        return errorResponse(result.error);
      }

      const stats = result.value;
      const summary =
        `Indexed ${stats.files} files: ${stats.classes} classes, ${stats.methods} methods. ` +
        `Calls: ${stats.resolved} resolved (${stats.ambiguous} ambiguous), ${stats.unresolved} unresolved. ` +
        `${stats.dirtyMethods} methods need descriptions.`;

      return {
        content: [{ type: "text", text: summary }],
        structuredContent: { success: true, stats },
      };
    }
  );
}

