import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { registerAnnotateProject } from "./annotateProject.js";
import { registerGetCallers } from "./getCallers.js";
import { registerGetClass } from "./getClass.js";
import { registerGetMethod } from "./getMethod.js";
import { registerGetSkeleton } from "./getSkeleton.js";
import { registerIndexProject } from "./indexProject.js";
import type { JavaService } from "./types.js";

export interface Services {
  docgen: JavaService;
}

export function registerAllTools(server: McpServer, services: Services): void {
  // Pipeline (auto-indexed on startup)
  registerIndexProject(server, services.docgen);
  registerAnnotateProject(server, services.docgen);

  // Model lookups
  registerGetClass(server, services.docgen);
  registerGetMethod(server, services.docgen);
  registerGetCallers(server, services.docgen);
  registerGetSkeleton(server, services.docgen);
}

export type { JavaService };
