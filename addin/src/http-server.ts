/**
 * Bridge server: owns the listening socket for the Hono app.
 *
 * Sockets are served by Node's event loop, so the host's pump only ever runs
 * when an executor drives it. start/stop are idempotent, overlapping calls are
 * serialized, and stop releases the listening socket before it resolves.
 */

import { Server } from "node:http";
import { createAdaptorServer } from "@hono/node-server";
import { type Logger, type LoggerFactory, errorMessage, resolveLogger } from "@cadbridge/core";
import type { AddinConfig } from "./config.js";
import type { BridgeApp } from "./app.js";

const LOG_PREFIX = "cadbridge-addin:server";

export interface BridgeServerParams {
  config: AddinConfig;
  app: BridgeApp;
  loggerFactory?: LoggerFactory;
}

export class BridgeServer {
  private readonly config: AddinConfig;
  private readonly app: BridgeApp;
  private readonly log: Logger;
  private server: Server | null = null;
  private boundPort: number | null = null;
  private starting: Promise<Server> | null = null;
  private stopping: Promise<void> | null = null;

  constructor(params: BridgeServerParams) {
    this.config = params.config;
    this.app = params.app;
    this.log = resolveLogger(params.loggerFactory, LOG_PREFIX);
  }

  get isRunning(): boolean {
    return this.server !== null;
  }

  /** Bound address while running (resolves port 0 to the real port). */
  address(): { host: string; port: number } | null {
    if (this.boundPort === null) return null;
    return { host: this.config.host, port: this.boundPort };
  }

  /**
   * Open the listening socket. A call made while another start is in flight
   * waits for it and then behaves as a repeated start.
   */
  async start(): Promise<void> {
    if (this.stopping) await this.settle(this.stopping, "start");
    if (this.starting) await this.starting;
    if (this.server) {
      this.log.info?.({ address: this.address() }, `${LOG_PREFIX}:start - Server is already running`);
      return;
    }

    this.starting = this.open();
    try {
      await this.starting;
    } finally {
      this.starting = null;
    }
  }

  /** Close the listening socket, including one a pending start is about to open. */
  async stop(): Promise<void> {
    if (this.starting) await this.settle(this.starting, "stop");
    if (this.stopping) await this.stopping;

    const server = this.server;
    if (!server) {
      this.log.info?.({}, `${LOG_PREFIX}:stop - Server is not running or already stopped`);
      return;
    }

    this.log.info?.({}, `${LOG_PREFIX}:stop - Stopping server`);
    this.server = null;
    this.boundPort = null;

    this.stopping = this.close(server);
    try {
      await this.stopping;
    } finally {
      this.stopping = null;
    }

    this.log.info?.({}, `${LOG_PREFIX}:stop - Server stopped`);
  }

  private async open(): Promise<Server> {
    let server: Server;
    try {
      server = await this.listen();
    } catch (err) {
      this.log.error?.(
        { host: this.config.host, port: this.config.port, error: errorMessage(err) },
        `${LOG_PREFIX}:start - Failed to start server`,
      );
      throw err;
    }

    const address = server.address();
    this.server = server;
    this.boundPort = address !== null && typeof address === "object" ? address.port : this.config.port;
    this.log.info?.({ host: this.config.host, port: this.boundPort }, `${LOG_PREFIX}:start - Server started`);
    return server;
  }

  private close(server: Server): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeIdleConnections();
    });
  }

  /** Wait for another lifecycle call; its caller reports its failure. */
  private async settle(pending: Promise<unknown>, method: string): Promise<void> {
    try {
      await pending;
    } catch (err) {
      this.log.debug?.({ error: errorMessage(err) }, `${LOG_PREFIX}:${method} - Pending lifecycle call failed`);
    }
  }

  private listen(): Promise<Server> {
    const server = createAdaptorServer({ fetch: this.app.fetch });
    if (!(server instanceof Server)) {
      return Promise.reject(new Error("Expected an HTTP/1.1 server"));
    }
    return new Promise((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.config.port, this.config.host, () => {
        server.off("error", reject);
        resolve(server);
      });
    });
  }
}
