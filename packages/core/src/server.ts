/**
 * Stdio MCP server bootstrap shared by the codebrief packages.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

export interface ServerConfig {
  name: string;
  version: string;
}

export interface ServerBootstrapOptions<S> {
  config: ServerConfig;

  /** Builds the services the tools operate on */
  createServices: () => S | Promise<S>;

  registerTools: (server: McpServer, services: S) => void;

  /** Runs before the transport connects, e.g. to index the working directory */
  onStartup?: (services: S) => Promise<void> | void;

  /** Runs on SIGTERM/SIGINT before the server closes */
  onShutdown?: (services: S) => Promise<void> | void;
}

/**
 * Create services, register tools, install signal handlers, run the
 * startup hook and connect the stdio transport.
 *
 * @example
 * ```typescript
 * bootstrapServer({
 *   config: { name: "codebrief:docgen", version: "0.1.0" },
 *   createServices: () => ({ docgen: createDocgenService() }),
 *   registerTools: registerAllTools,
 *   onStartup: async ({ docgen }) => {
 *     await docgen.index(process.cwd());
 *   },
 * });
 * ```
 */
export async function bootstrapServer<S>(options: ServerBootstrapOptions<S>): Promise<void> {
  const { config, createServices, registerTools, onStartup, onShutdown } = options;

  const services = await createServices();

  const server = new McpServer({
    name: config.name,
    version: config.version,
  });

  registerTools(server, services);

  const transport = new StdioServerTransport();

  const shutdown = async (): Promise<void> => {
    await onShutdown?.(services);
    await server.close();
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      console.error(`[${config.name}] Shutdown failed:`, error);
      process.exit(1);
    });
  };

  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);

  await onStartup?.(services);

  await server.connect(transport);
}

/**
 * Entry point for server scripts: bootstrap and exit non-zero on a fatal error.
 */
export function runServer<S>(options: ServerBootstrapOptions<S>): void {
  bootstrapServer(options).catch((error: unknown) => {
    console.error(`[${options.config.name}] Fatal error:`, error);
    process.exit(1);
  });
}

export { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
