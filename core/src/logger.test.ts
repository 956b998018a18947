import { describe, it, expect, vi } from "vitest";
import { type Logger, noopLogger, resolveLogger } from "./logger.js";

describe("resolveLogger", () => {
  it("should return a plain logger as is", () => {
    const log: Logger = { info: vi.fn() };
    expect(resolveLogger(log, "svc")).toBe(log);
  });

  it("should ask a provider for the named logger", () => {
    const named: Logger = { warn: vi.fn() };
    const get = vi.fn().mockReturnValue(named);
    expect(resolveLogger({ get }, "cadbridge-addin:dispatcher")).toBe(named);
    expect(get).toHaveBeenCalledWith("cadbridge-addin:dispatcher");
  });

  it("noopLogger should have no methods", () => {
    expect(noopLogger.info?.({}, "x")).toBeUndefined();
  });
});
