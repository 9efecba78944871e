// /src/contracts/diagnostics.ts
/**
 * Diagnostics channel contract.
 *
 * Every guard in the engine reports what it corrected or detected as a structured
 * diagnostic. The engine never decides how these are transported; callers pass a sink.
 */

/**
 * - "user-warning": must be surfaced to end users (e.g. a GDP growth cap was applied).
 * - "warning": operator-facing log entry.
 */
export type DiagnosticSeverity = "debug" | "info" | "warning" | "user-warning" | "error";

export type DiagnosticCode =
  | "DIVISION_BY_ZERO"
  | "NON_FINITE_RESULT"
  | "GDP_FLOOR_APPLIED"
  | "POPULATION_FLOOR_APPLIED"
  | "VALUE_CLAMPED"
  | "PERCENTAGE_OUT_OF_RANGE"
  | "EXTREME_GDP_CONTRACTION"
  | "EXTREME_GDP_GROWTH"
  | "NON_FINITE_GDP_GROWTH"
  | "NEGATIVE_GROWTH_FLOORED"
  | "GDP_GROWTH_ADJUSTED"
  | "EXTREME_DEBT"
  | "EXTREME_DEFLATION"
  | "HYPERINFLATION"
  | "EXTREME_INTEREST_RATE"
  | "REFERENCE_DATA_MISSING"
  | "REFERENCE_DATA_RESOLVED";

export interface Diagnostic {
  severity: DiagnosticSeverity;
  code: DiagnosticCode;
  message: string;
  /** Free-form tag naming the calculation that raised it, e.g. "debt-to-GDP ratio". */
  context: string;
  /** Simulation year, when the caller supplied one. */
  year?: number;
}

export type DiagnosticSink = (diagnostic: Diagnostic) => void;

/** Minimum severity a console sink prints. "silent" prints nothing. */
export type LogLevel = "debug" | "info" | "warning" | "error" | "silent";
