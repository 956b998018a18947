import { describe, it, expect } from "vitest";
import { OutputCapture, VmWorkRunner, formatTrace, isThenable } from "./work-runner.js";

describe("VmWorkRunner", () => {
  it("should expose the namespace as globals", () => {
    const capture = new OutputCapture();
    new VmWorkRunner().run("print(greeting, 1 + 1)", {
      namespace: { greeting: "hi", print: capture.print },
      label: "test",
    });
    expect(capture.read()).toBe("hi 2\n");
  });

  it("should not leak globals between runs", () => {
    const runner = new VmWorkRunner();
    const capture = new OutputCapture();
    runner.run("var leaked = 1", { namespace: {}, label: "first" });
    runner.run("print(typeof leaked)", { namespace: { print: capture.print }, label: "second" });
    expect(capture.read()).toBe("undefined\n");
  });

  it("should use the label as the filename in traces", () => {
    let thrown: unknown;
    try {
      new VmWorkRunner().run("throw new Error('boom')", { namespace: {}, label: "Make Box" });
    } catch (err) {
      thrown = err;
    }
    expect(formatTrace(thrown)).toMatch(/^Error: boom\n\s+at Make Box:1:/);
  });

  it("should return the completion value of the work", () => {
    expect(new VmWorkRunner().run("const x = 20; x + 22", { namespace: {}, label: "value" })).toBe(42);
  });

  it("should return a promise started by the work as a thenable", async () => {
    const capture = new OutputCapture();
    const completion = new VmWorkRunner().run("(async () => { await null; print('late'); return 7; })()", {
      namespace: { print: capture.print },
      label: "async",
    });
    expect(capture.read()).toBe("");
    expect(isThenable(completion)).toBe(true);
    expect(await Promise.resolve(completion)).toBe(7);
    expect(capture.read()).toBe("late\n");
  });

  it("should stop runaway work after the timeout", () => {
    const runner = new VmWorkRunner({ timeoutMs: 50 });
    expect(() => runner.run("while (true) {}", { namespace: {}, label: "spin" })).toThrow(/timed out/);
  });
});

describe("OutputCapture", () => {
  it("should format print and console output line by line", () => {
    const capture = new OutputCapture();
    capture.print("a", 1);
    capture.console().log("%d mm", 5);
    capture.console().error({ ok: true });
    expect(capture.read()).toBe("a 1\n5 mm\n{ ok: true }\n");
  });

  it("should drop everything on release", () => {
    const capture = new OutputCapture();
    capture.print("x");
    capture.release();
    expect(capture.read()).toBe("");
  });
});

describe("isThenable", () => {
  it("should accept promises and objects with a then method", () => {
    expect(isThenable(Promise.resolve(1))).toBe(true);
    expect(isThenable({ then: () => undefined })).toBe(true);
  });

  it("should reject everything else", () => {
    expect(isThenable(undefined)).toBe(false);
    expect(isThenable(null)).toBe(false);
    expect(isThenable({ then: 1 })).toBe(false);
    expect(isThenable("then")).toBe(false);
  });
});

describe("formatTrace", () => {
  it("should render non-errors as uncaught values", () => {
    expect(formatTrace("plain")).toBe("Uncaught plain");
    expect(formatTrace({ code: 3 })).toBe("Uncaught { code: 3 }");
  });

  it("should use the stack of a native error", () => {
    const err = new Error("here");
    expect(formatTrace(err)).toBe(err.stack);
  });
});
