import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { registerTools, type ToolClient } from "./tools.js";

export const MCP_SERVER_NAME = "cadbridge";
export const MCP_SERVER_VERSION = "0.1.0";

const INSTRUCTIONS =
  "Tools for working with a CAD application through its bridge add-in: run scripts against the " +
  "active design, read and set parameters, and capture the viewport.";

/** MCP server exposing the bridge actions as tools. Connect it to any transport. */
export function createMcpServer(params: { client: ToolClient }): McpServer {
  const server = new McpServer(
    { name: MCP_SERVER_NAME, version: MCP_SERVER_VERSION },
    { instructions: INSTRUCTIONS },
  );
  registerTools(server, params.client);
  return server;
}
