import { describe, it, expect } from "vitest";
import { invalidUserInput } from "./errors.js";
import { errorEnvelope, fail, ok, successEnvelope, toEnvelope } from "./envelope.js";
import { ActionParamsSchema, ResponseEnvelopeSchema } from "./envelope-schema.js";

describe("envelopes", () => {
  it("successEnvelope should carry null for an undefined result", () => {
    expect(successEnvelope(undefined)).toEqual({ success: true, result: null });
    expect(successEnvelope("2\n")).toEqual({ success: true, result: "2\n" });
  });

  it("errorEnvelope should nest type and message", () => {
    expect(errorEnvelope("InvalidUserInput", "bad")).toEqual({
      success: false,
      error: { type: "InvalidUserInput", message: "bad" },
    });
  });

  it("toEnvelope should convert both result branches", () => {
    expect(toEnvelope(ok({ filepath: "/tmp/a.png" }))).toEqual({
      success: true,
      result: { filepath: "/tmp/a.png" },
    });
    expect(toEnvelope(fail(invalidUserInput("Action 'x' not found.")))).toEqual({
      success: false,
      error: { type: "InvalidUserInput", message: "Action 'x' not found." },
    });
  });
});

describe("ResponseEnvelopeSchema", () => {
  it("should accept success and error envelopes", () => {
    expect(ResponseEnvelopeSchema.safeParse({ success: true, result: 1 }).success).toBe(true);
    expect(ResponseEnvelopeSchema.safeParse({ success: false, error: { type: "T", message: "m" } }).success).toBe(
      true,
    );
    expect(ResponseEnvelopeSchema.safeParse({ success: false }).success).toBe(true);
  });

  it("should reject bodies without a boolean success flag", () => {
    expect(ResponseEnvelopeSchema.safeParse({ result: 1 }).success).toBe(false);
    expect(ResponseEnvelopeSchema.safeParse({ success: "yes" }).success).toBe(false);
    expect(ResponseEnvelopeSchema.safeParse([1, 2]).success).toBe(false);
  });
});

describe("ActionParamsSchema", () => {
  it("should accept objects only", () => {
    expect(ActionParamsSchema.safeParse({ code: "x" }).success).toBe(true);
    expect(ActionParamsSchema.safeParse([]).success).toBe(false);
    expect(ActionParamsSchema.safeParse("text").success).toBe(false);
    expect(ActionParamsSchema.safeParse(null).success).toBe(false);
  });
});
