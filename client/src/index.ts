export { BridgeClient, type BridgeClientParams, type FetchLike } from "./client.js";
export {
  classifyTransportError,
  errorCodes,
  timeoutErrorMessage,
  CONNECTION_ERROR_MESSAGE,
  RESPONSE_PARSE_ERROR_MESSAGE,
} from "./classify.js";
export { loadClientConfig, defaultClientConfig, DEFAULT_TIMEOUT_MS, type BridgeClientConfig } from "./config.js";
export { createMcpServer, MCP_SERVER_NAME, MCP_SERVER_VERSION } from "./mcp/server.js";
export { registerTools, createToolHandlers, toToolResult, type ToolClient } from "./mcp/tools.js";
