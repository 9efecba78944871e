// /src/lib/errors.ts
import { z } from "zod";

/**
 * Raised at the validation boundary when configuration reaching the engine breaks its contract.
 * The calculators themselves never throw on valid macro input.
 */
export class ContractViolationError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super(message);
    this.name = "ContractViolationError";
    this.issues = issues;
  }
}

export class PolicyMechanicsParseError extends ContractViolationError {
  constructor(message: string, issues: string[]) {
    super(message, issues);
    this.name = "PolicyMechanicsParseError";
  }
}

export class EngineParametersParseError extends ContractViolationError {
  constructor(message: string, issues: string[]) {
    super(message, issues);
    this.name = "EngineParametersParseError";
  }
}

/** "funding_mechanisms.0.percentage_gdp: Number must be less than or equal to 100" */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => {
    const where = i.path.join(".");
    return where ? `${where}: ${i.message}` : i.message;
  });
}

/**
 * Map anything thrown by the engine's boundary into a shape collaborators can display.
 */
export function toClientError(err: unknown): {
  error: string;
  message: string;
  issues?: string[];
} {
  if (err instanceof PolicyMechanicsParseError) {
    return { error: "INVALID_POLICY", message: err.message, issues: err.issues };
  }

  if (err instanceof EngineParametersParseError) {
    return { error: "INVALID_PARAMETERS", message: err.message, issues: err.issues };
  }

  if (err instanceof ContractViolationError) {
    return { error: "INVALID_INPUT", message: err.message, issues: err.issues };
  }

  if (err instanceof z.ZodError) {
    return {
      error: "INVALID_INPUT",
      message: "Input did not match the expected format.",
      issues: formatZodIssues(err),
    };
  }

  if (err instanceof Error) {
    return { error: "ENGINE_FAILED", message: err.message };
  }

  return { error: "ENGINE_FAILED", message: "Unknown error" };
}
