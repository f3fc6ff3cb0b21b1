export {
  type Result,
  Ok,
  Err,
  toError,
  unwrapOr,
  tryCatch,
  tryCatchAsync,
} from "./result.js";

export {
  type TextContent,
  type ToolResponse,
  type ToolFailure,
  errorResponse,
  resultToStructuredResponse,
} from "./mcp.js";

export {
  type ServerConfig,
  type ServerBootstrapOptions,
  bootstrapServer,
  runServer,
  McpServer,
} from "./server.js";
