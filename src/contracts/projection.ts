// /src/contracts/projection.ts
/**
 * Multi-year projection contract.
 *
 * The projection driver calls the orchestrator once per year and carries debt and
 * reserve balances forward. Growth paths are supplied by the caller; the driver only
 * guards them.
 */

import type { Diagnostic } from "./diagnostics";
import type { PolicyMechanics } from "./mechanics";
import type { MechanismOutcome } from "./outcome";

export interface ProjectionInput {
  mechanics: PolicyMechanics | null;
  baseGdp: number;
  initialDebt: number;
  years: number;
  population: number;
  startYear: number;
  /** Constant annual growth (0.02 = 2%). Ignored for years covered by growthPath. */
  gdpGrowth?: number;
  /** Growth applied going into year index 1, 2, ...; shorter paths fall back to gdpGrowth. */
  growthPath?: ReadonlyArray<number>;
  /** Reject contraction years by flooring growth at zero. Defaults to true (contractions allowed). */
  allowNegativeGrowth?: boolean;
  baselineSpendingPctGdp?: number;
  /** Average interest rate on outstanding debt. Defaults to 0.035. */
  interestRate?: number;
}

export interface ProjectionRow {
  year: number;
  gdp: number;
  /** Growth actually applied going into this year (0 for the first year). */
  gdpGrowthApplied: number;
  gdpGrowthAdjusted: boolean;

  revenue: number;
  spending: number;
  baselineSpending: number;
  savingsVsBaseline: number;
  surplus: number;
  surplusPctGdp: number;
  spendingPctGdp: number;

  debt: number;
  debtPctGdp: number;
  interestSpending: number;
  contingencyReserveBalance: number;
  debtReduction: number;
  infrastructureAllocation: number;
  dividendPool: number;
  dividendPerCapita: number;
  innovationFund: number;
  perCapitaSpending: number;

  circuitBreakerTriggered: boolean;
  /** Messages of every breaker that fired, joined with "; ". */
  circuitBreakerMessage: string;
  extremeDebt: boolean;

  outcome: MechanismOutcome;
}

export interface ProjectionResult {
  rows: ReadonlyArray<ProjectionRow>;
  /** Warnings about the inputs themselves (e.g. an extreme interest rate) plus every row's diagnostics. */
  diagnostics: ReadonlyArray<Diagnostic>;
}
