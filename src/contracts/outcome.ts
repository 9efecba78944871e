// /src/contracts/outcome.ts
/**
 * Orchestrator contract: one simulated year in, one composite outcome record out.
 */

import type { RevenueBreakdown, SpendingBreakdown, SurplusBreakdown } from "./breakdowns";
import type { Diagnostic } from "./diagnostics";
import type { CircuitBreakerTriggerType, PolicyMechanics } from "./mechanics";

export interface MechanismOutcomeInput {
  /** Null or omitted mechanics yields zero revenue and baseline spending. */
  mechanics: PolicyMechanics | null;
  gdp: number;
  year: number;
  startYear: number;
  /** Baseline spending as a share of GDP (0.185 = 18.5%). Defaults to the engine parameter. */
  baselineSpendingPctGdp?: number;
  /** When supplied, per-capita spending is reported. */
  population?: number;
}

/** Result of checking one trigger type. */
export interface CircuitBreakerCheck {
  triggered: boolean;
  message: string | null;
}

export type CircuitBreakerHit = readonly [triggerType: CircuitBreakerTriggerType, message: string];

export interface MechanismOutcome {
  readonly year: number;
  /** GDP after the floor was applied; every figure below is computed against it. */
  readonly gdp: number;
  readonly revenue: RevenueBreakdown;
  readonly spending: SpendingBreakdown;
  /** revenue.total - spending.net_spending */
  readonly surplus: number;
  /** Null when the policy declares no allocation rules. */
  readonly surplus_allocation: SurplusBreakdown | null;
  /** At most one hit per trigger type, spending_cap first. */
  readonly circuit_breakers: ReadonlyArray<CircuitBreakerHit>;
  readonly per_capita_spending: number | null;
  /** Everything the guards reported while computing this year. */
  readonly diagnostics: ReadonlyArray<Diagnostic>;
}
