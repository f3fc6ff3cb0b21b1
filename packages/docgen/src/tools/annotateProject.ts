import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { resultToStructuredResponse } from "@codebrief/core";

import type { JavaService } from "./types.js";

export function registerAnnotateProject(server: McpServer, docgen: JavaService): void {
  server.registerTool(
    "annotate_project",
    {
      title: "Annotate project",
      description: `Generate descriptions for every class and method that lacks one.

Requires index_project (done on startup) and GEMINI_API_KEY. Classes are sent
concurrently, one request per class; unchanged methods keep their cached
descriptions. A class whose request fails is reported and left undescribed;
the others still complete. The cache file is rewritten afterwards.`,
      inputSchema: {},
      outputSchema: {
        success: z.boolean(),
        error: z.string().optional(),
        scheduled: z.number().optional(),
        generated: z.number().optional(),
        failed: z.number().optional(),
        skipped: z.number().optional(),
        failures: z.array(z.object({ ucid: z.string(), error: z.string() })).optional(),
        cacheSaved: z.boolean().optional(),
      },
    },
    async () => {
      const result = await docgen.annotate();

      return resultToStructuredResponse(result, (summary) => {
        const failures = summary.outcomes
          .filter((outcome) => outcome.status === "error")
          .map((outcome) => ({ ucid: outcome.ucid, error: outcome.error ?? "unknown error" }));

        const lines = [
          `Annotated ${summary.generated}/${summary.scheduled} classes; ${summary.skipped} fully cached.`,
        ];
        for (const failure of failures) {
          lines.push(`- FAILED ${failure.ucid}: ${failure.error}`);
        }
        lines.push(summary.cacheSaved ? `Cache saved to ${summary.cachePath}` : `Cache not saved: ${summary.cacheError}`);

        return {
          text: lines.join("\n"),
          data: {
            scheduled: summary.scheduled,
            generated: summary.generated,
            failed: summary.failed,
            skipped: summary.skipped,
            failures,
            cacheSaved: summary.cacheSaved,
          },
        };
      });
    }
  );
}
