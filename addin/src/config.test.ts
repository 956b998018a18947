import { describe, it, expect, vi } from "vitest";
import { defaultAddinConfig, loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("should bind to localhost:3600 by default", () => {
    expect(loadConfig({ env: {} })).toEqual({ host: "localhost", port: 3600 });
    expect(defaultAddinConfig).toEqual({ host: "localhost", port: 3600 });
  });

  it("should read CADBRIDGE_HOST and CADBRIDGE_PORT", () => {
    const info = vi.fn();
    const config = loadConfig({ env: { CADBRIDGE_HOST: "0.0.0.0", CADBRIDGE_PORT: "3700" }, log: { info } });
    expect(config).toEqual({ host: "0.0.0.0", port: 3700 });
    expect(info).toHaveBeenCalledWith({ host: "0.0.0.0", port: 3700 }, "cadbridge-addin:config:loadConfig - Loaded config");
  });

  it("should fall back on a non-numeric port", () => {
    const warn = vi.fn();
    expect(loadConfig({ env: { CADBRIDGE_PORT: "http" }, log: { warn } }).port).toBe(3600);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
