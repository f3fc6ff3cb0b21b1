import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { resultToStructuredResponse } from "@codebrief/core";

import type { JavaService } from "./types.js";

interface GetSkeletonInput {
  file_path: string;
}

export function registerGetSkeleton(server: McpServer, docgen: JavaService): void {
  server.registerTool(
    "get_skeleton",
    {
      title: "Get skeleton",
      description: `Outline a file as signatures only, with each description as a trailing
comment. Cheaper to read than the source when exploring a codebase.`,
      inputSchema: {
        file_path: z.string().describe("File path relative to the project root, e.g. 'src/main/java/app/Main.java'"),
      },
      outputSchema: {
        success: z.boolean(),
        error: z.string().optional(),
        skeleton: z.string().optional(),
      },
    },
    async (input: GetSkeletonInput) =>
      resultToStructuredResponse(docgen.getSkeleton(input.file_path), (skeleton) => ({
        text: skeleton,
        data: { skeleton },
      }))
  );
}
