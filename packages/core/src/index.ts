export {
  type Result,
  Ok,
  Err,
  andThen,
  tryCatchAsync,
} from "./result.js";

export {
  type TextContent,
  type ToolResponse,
  textResponse,
  errorResponse,
  resultToResponse,
} from "./mcp.js";

export {
  type ServerConfig,
  type ServerBootstrapOptions,
  bootstrapServer,
  runServer,
  protocolOutput,
  McpServer,
} from "./server.js";
