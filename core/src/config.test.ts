import { describe, it, expect, vi } from "vitest";
import { DEFAULT_HOST, DEFAULT_PORT, PortSchema, loadEndpointConfig, readEnvValue } from "./config.js";

describe("loadEndpointConfig", () => {
  it("should use defaults when nothing is set", () => {
    expect(loadEndpointConfig({ env: {}, logPrefix: "test" })).toEqual({ host: DEFAULT_HOST, port: DEFAULT_PORT });
    expect(DEFAULT_HOST).toBe("localhost");
    expect(DEFAULT_PORT).toBe(3600);
  });

  it("should read host and port from the environment", () => {
    const config = loadEndpointConfig({
      env: { CADBRIDGE_HOST: "127.0.0.1", CADBRIDGE_PORT: "4100" },
      logPrefix: "test",
    });
    expect(config).toEqual({ host: "127.0.0.1", port: 4100 });
  });

  it("should warn and fall back on an invalid port", () => {
    const warn = vi.fn();
    const config = loadEndpointConfig({ env: { CADBRIDGE_PORT: "70000" }, log: { warn }, logPrefix: "test" });
    expect(config.port).toBe(DEFAULT_PORT);
    expect(warn).toHaveBeenCalledWith(
      { name: "CADBRIDGE_PORT", value: "70000", fallback: DEFAULT_PORT },
      "test:loadConfig - Invalid value, using default",
    );
  });
});

describe("readEnvValue", () => {
  it("should treat an empty string as unset", () => {
    const value = readEnvValue({ env: { X: "" }, name: "X", schema: PortSchema, fallback: 1, logPrefix: "test" });
    expect(value).toBe(1);
  });
});
