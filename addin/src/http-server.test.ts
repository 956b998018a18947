import { describe, it, expect, vi, afterEach } from "vitest";
import { type Logger, noopLogger } from "@cadbridge/core";
import { createBridgeContext } from "./bridge.js";
import { SimulatedHost } from "./host/simulated-host.js";
import { BridgeServer } from "./http-server.js";

function listeningSockets(): number {
  return process.getActiveResourcesInfo().filter((resource) => resource === "TCPServerWrap").length;
}

function createServer(log: Logger = noopLogger, port = 0): BridgeServer {
  return createBridgeContext({
    config: { host: "127.0.0.1", port },
    host: new SimulatedHost({ loggerFactory: noopLogger }),
    loggerFactory: log,
  }).server;
}

describe("BridgeServer", () => {
  const started: BridgeServer[] = [];

  afterEach(async () => {
    await Promise.all(started.splice(0).map((server) => server.stop()));
  });

  it("should serve actions once started", async () => {
    const server = createServer();
    started.push(server);
    await server.start();

    const address = server.address();
    expect(server.isRunning).toBe(true);
    expect(address?.port).toBeGreaterThan(0);

    const res = await fetch(`http://127.0.0.1:${address?.port}/execute_code`, {
      method: "POST",
      body: JSON.stringify({ code: "print(1+1)" }),
    });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ success: true, result: "2\n" });
  });

  it("should treat stop before start as a no-op", async () => {
    const info = vi.fn();
    const server = createServer({ info });
    await expect(server.stop()).resolves.toBeUndefined();
    expect(server.isRunning).toBe(false);
    expect(info).toHaveBeenCalledWith({}, "cadbridge-addin:server:stop - Server is not running or already stopped");
  });

  it("should treat a second stop as a no-op", async () => {
    const info = vi.fn();
    const server = createServer({ info });
    await server.start();
    await server.stop();
    await expect(server.stop()).resolves.toBeUndefined();
    expect(server.address()).toBeNull();
    expect(info).toHaveBeenLastCalledWith({}, "cadbridge-addin:server:stop - Server is not running or already stopped");
  });

  it("should keep the original listener on a second start", async () => {
    const info = vi.fn();
    const server = createServer({ info });
    started.push(server);
    await server.start();
    const first = server.address();

    await server.start();
    expect(server.address()).toEqual(first);
    expect(info).toHaveBeenLastCalledWith({ address: first }, "cadbridge-addin:server:start - Server is already running");
  });

  it("should open a single listener for overlapping starts", async () => {
    const info = vi.fn();
    const server = createServer({ info });
    started.push(server);
    const before = listeningSockets();

    await Promise.all([server.start(), server.start()]);
    const address = server.address();
    expect(listeningSockets()).toBe(before + 1);
    expect(info).toHaveBeenLastCalledWith({ address }, "cadbridge-addin:server:start - Server is already running");

    await server.stop();
    expect(server.isRunning).toBe(false);
    expect(listeningSockets()).toBe(before);
    await expect(fetch(`http://127.0.0.1:${address?.port}/execute_code`, { method: "POST" })).rejects.toThrow();
  });

  it("should close a server whose start was still in flight at stop", async () => {
    const server = createServer();
    started.push(server);
    const before = listeningSockets();

    const starting = server.start();
    await server.stop();
    await starting;

    expect(server.isRunning).toBe(false);
    expect(server.address()).toBeNull();
    expect(listeningSockets()).toBe(before);
  });

  it("should start again after a stop that was still closing", async () => {
    const server = createServer();
    started.push(server);
    await server.start();

    const stopping = server.stop();
    await server.start();
    await stopping;

    expect(server.isRunning).toBe(true);
    const res = await fetch(`http://127.0.0.1:${server.address()?.port}/execute_code`, {
      method: "POST",
      body: JSON.stringify({ code: "print('again')" }),
    });
    expect(await res.json()).toEqual({ success: true, result: "again\n" });
  });

  it("should release the socket on stop", async () => {
    const server = createServer();
    await server.start();
    const port = server.address()?.port;
    await server.stop();

    await expect(fetch(`http://127.0.0.1:${port}/execute_code`, { method: "POST" })).rejects.toThrow();
  });

  it("should restart after stop", async () => {
    const server = createServer();
    started.push(server);
    await server.start();
    await server.stop();
    await server.start();

    expect(server.isRunning).toBe(true);
    const res = await fetch(`http://127.0.0.1:${server.address()?.port}/unknown_action`, { method: "POST" });
    expect(res.status).toBe(400);
  });

  it("should reject start when the port is taken and stay stopped", async () => {
    const first = createServer();
    started.push(first);
    await first.start();

    const taken = first.address();
    if (!taken) throw new Error("first server is not listening");

    const error = vi.fn();
    const second = createServer({ error }, taken.port);
    await expect(second.start()).rejects.toThrow(/EADDRINUSE/);
    expect(second.isRunning).toBe(false);
    expect(error).toHaveBeenCalledTimes(1);
  });
});
