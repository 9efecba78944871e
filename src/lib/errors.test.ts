// /src/lib/errors.test.ts
import { describe, it, expect } from "vitest";
import { z } from "zod";

import {
  ContractViolationError,
  EngineParametersParseError,
  PolicyMechanicsParseError,
  formatZodIssues,
  toClientError,
} from "./errors";

describe("errors", () => {
  it("keeps the class chain and names", () => {
    const err = new PolicyMechanicsParseError("bad policy", ["a: b"]);
    expect(err).toBeInstanceOf(ContractViolationError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe("PolicyMechanicsParseError");
    expect(err.issues).toEqual(["a: b"]);
  });

  it("formats zod issues with their path", () => {
    const result = z.object({ rate: z.number().max(1) }).safeParse({ rate: 2 });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(formatZodIssues(result.error)).toEqual(["rate: Number must be less than or equal to 1"]);
  });

  it("maps boundary errors to client codes", () => {
    expect(toClientError(new PolicyMechanicsParseError("p", ["x"]))).toEqual({
      error: "INVALID_POLICY",
      message: "p",
      issues: ["x"],
    });
    expect(toClientError(new EngineParametersParseError("e", ["y"]))).toEqual({
      error: "INVALID_PARAMETERS",
      message: "e",
      issues: ["y"],
    });

    const zodErr = z.string().safeParse(1);
    if (zodErr.success) throw new Error("expected failure");
    expect(toClientError(zodErr.error)).toEqual({
      error: "INVALID_INPUT",
      message: "Input did not match the expected format.",
      issues: ["Expected string, received number"],
    });

    expect(toClientError(new Error("boom"))).toEqual({ error: "ENGINE_FAILED", message: "boom" });
    expect(toClientError("boom")).toEqual({ error: "ENGINE_FAILED", message: "Unknown error" });
  });

  it("reports other contract violations as invalid input", () => {
    expect(toClientError(new ContractViolationError("Projection input is invalid.", ["years: x"]))).toEqual({
      error: "INVALID_INPUT",
      message: "Projection input is invalid.",
      issues: ["years: x"],
    });
  });
});
