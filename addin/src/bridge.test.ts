import { describe, it, expect } from "vitest";
import { noopLogger } from "@cadbridge/core";
import { createBridgeContext } from "./bridge.js";
import { SimulatedHost } from "./host/simulated-host.js";

function createContext() {
  return createBridgeContext({
    config: { host: "127.0.0.1", port: 0 },
    host: new SimulatedHost({ loggerFactory: noopLogger }),
    loggerFactory: noopLogger,
  });
}

describe("createBridgeContext", () => {
  it("should register the default actions", () => {
    expect(createContext().registry.names()).toEqual([
      "execute_code",
      "get_viewport_screenshot",
      "get_user_parameters",
      "set_parameter",
    ]);
  });

  it("should build independent contexts", () => {
    const a = createContext();
    const b = createContext();
    expect(a.server).not.toBe(b.server);
    expect(a.dispatcher).not.toBe(b.dispatcher);
    expect(a.executor).not.toBe(b.executor);
  });

  it("should dispatch through the executor", async () => {
    const result = await createContext().dispatcher.dispatch("execute_code", { code: "print('hi')" });
    expect(result).toEqual({ ok: true, data: "hi\n" });
  });

  it("should start and stop its server", async () => {
    const context = createContext();
    await context.start();
    expect(context.server.isRunning).toBe(true);
    await context.stop();
    expect(context.server.isRunning).toBe(false);
  });
});
