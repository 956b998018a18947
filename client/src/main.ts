/**
 * MCP server over stdio. stdout carries the protocol, so logs go to stderr.
 */

import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createNodeJSLogger } from "@cadbridge/core";
import { BridgeClient } from "./client.js";
import { loadClientConfig } from "./config.js";
import { createMcpServer } from "./mcp/server.js";

const SERVICE_NAME = "cadbridge-mcp";

async function main(): Promise<void> {
  const loggerFactory = createNodeJSLogger(SERVICE_NAME, { destination: "stderr" });
  const log = loggerFactory.get(`${SERVICE_NAME}:main`);

  const config = loadClientConfig({ log });
  const client = new BridgeClient({ config, loggerFactory });
  const server = createMcpServer({ client });

  await server.connect(new StdioServerTransport());
  log.info?.({ target: client.baseUrl, timeoutMs: config.timeoutMs }, `${SERVICE_NAME}:main - Started`);

  const shutdown = async (signal: string): Promise<void> => {
    log.info?.({ signal }, `${SERVICE_NAME}:main - Shutting down`);
    await server.close();
    process.exit(0);
  };

  const onSignal = (signal: string) => () => {
    shutdown(signal).catch((err) => {
      console.error(`${SERVICE_NAME}:main - Shutdown failed:`, err);
      process.exit(1);
    });
  };

  process.on("SIGTERM", onSignal("SIGTERM"));
  process.on("SIGINT", onSignal("SIGINT"));
}

main().catch((err) => {
  console.error(`${SERVICE_NAME}:main - Fatal:`, err);
  process.exit(1);
});
