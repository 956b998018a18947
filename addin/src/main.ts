/**
 * Development entry point: serves the bridge over HTTP on top of the
 * simulated host. A real host plug-in builds the same context around its own
 * HostApplication.
 */

import "dotenv/config";
import { createNodeJSLogger } from "@cadbridge/core";
import { createBridgeContext } from "./bridge.js";
import { loadConfig } from "./config.js";
import { SimulatedHost } from "./host/simulated-host.js";

const SERVICE_NAME = "cadbridge-addin";

async function main(): Promise<void> {
  const loggerFactory = createNodeJSLogger(SERVICE_NAME);
  const log = loggerFactory.get(`${SERVICE_NAME}:main`);

  const config = loadConfig({ log });
  const host = new SimulatedHost({ loggerFactory });
  const bridge = createBridgeContext({ config, host, loggerFactory });

  await bridge.start();
  log.info?.(
    { address: bridge.server.address(), actions: bridge.registry.names() },
    `${SERVICE_NAME}:main - Started`,
  );

  const shutdown = async (signal: string): Promise<void> => {
    log.info?.({ signal }, `${SERVICE_NAME}:main - Shutting down`);
    await bridge.stop();
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
