/**
 * Wires one bridge instance: executor → actions → registry → dispatcher →
 * HTTP app → server. Each call builds a fresh, independent context.
 */

import { type LoggerFactory, resolveLogger } from "@cadbridge/core";
import { ActionRegistry } from "./action-registry.js";
import { createDefaultActions } from "./actions/index.js";
import { type BridgeApp, createApp } from "./app.js";
import type { AddinConfig } from "./config.js";
import { Dispatcher } from "./dispatcher.js";
import { TransactionalExecutor } from "./executor/transactional-executor.js";
import type { WorkRunner } from "./executor/work-runner.js";
import type { HostApplication } from "./host/types.js";
import { BridgeServer } from "./http-server.js";

const SERVICE_NAME = "cadbridge-addin:bridge";

export interface BridgeContextParams {
  config: AddinConfig;
  host: HostApplication;
  loggerFactory?: LoggerFactory;
  runner?: WorkRunner;
}

export interface BridgeContext {
  readonly app: BridgeApp;
  readonly server: BridgeServer;
  readonly dispatcher: Dispatcher;
  readonly registry: ActionRegistry;
  readonly executor: TransactionalExecutor;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export function createBridgeContext(params: BridgeContextParams): BridgeContext {
  const { config, host, loggerFactory, runner } = params;
  const log = resolveLogger(loggerFactory, SERVICE_NAME);

  const executor = new TransactionalExecutor({ host, runner, loggerFactory });
  const registry = new ActionRegistry(createDefaultActions({ executor }));
  const dispatcher = new Dispatcher({ registry, loggerFactory });
  const app = createApp({ dispatcher, loggerFactory });
  const server = new BridgeServer({ config, app, loggerFactory });

  log.debug?.({ actions: registry.names() }, `${SERVICE_NAME}:createBridgeContext - Registered actions`);

  return {
    app,
    server,
    dispatcher,
    registry,
    executor,
    start: () => server.start(),
    stop: () => server.stop(),
  };
}
