// /src/lib/mechanics/outcomes.ts

import type { MechanismOutcome, MechanismOutcomeInput, PolicyMechanics, SpendingBreakdown } from "../../contracts";
import { DiagnosticCollector } from "../safety/diagnostics";
import { makeSpendingBreakdown } from "./breakdowns";
import { evaluateCircuitBreakers } from "./circuitBreakers";
import { DEFAULT_ENGINE_CONTEXT, observeEngine, type EngineContext } from "./engine";
import { calculateRevenueFromMechanics } from "./revenue";
import { calculateBaselineSpending, calculateSpendingFromTarget } from "./spending";
import { allocateSurplus } from "./surplus";

function spendingFor(
  mechanics: PolicyMechanics | null,
  baselinePctGdp: number,
  gdp: number,
  year: number,
  startYear: number,
  engine: EngineContext,
): SpendingBreakdown {
  const targetPct = mechanics?.target_spending_pct_gdp ?? null;
  const targetYear = mechanics?.target_spending_year ?? null;

  // A target of 0% is still a target.
  if (targetPct !== null && targetYear !== null) {
    return calculateSpendingFromTarget(
      { targetPctGdp: targetPct / 100, targetYear, baselinePctGdp, gdp, year, startYear },
      engine,
    );
  }

  const baseline = engine.safety.ensureFinite(
    calculateBaselineSpending(baselinePctGdp, gdp),
    0,
    "spending.baseline_spending",
  );
  return makeSpendingBreakdown({ baseline_spending: baseline, net_spending: baseline });
}

/**
 * One simulated year: revenue, spending (target path when configured, else baseline),
 * surplus, its allocation and both circuit-breaker checks.
 *
 * GDP is floored once up front and every figure, including the breaker percentages,
 * is computed against the floored value. Diagnostics raised along the way go to the
 * engine's sink and are also returned on the outcome.
 */
export function calculateMechanismBasedOutcomes(
  input: MechanismOutcomeInput,
  engine: EngineContext = DEFAULT_ENGINE_CONTEXT,
): MechanismOutcome {
  const collector = new DiagnosticCollector();
  const ctx = observeEngine(engine, collector.sink);
  const { safety } = ctx;

  const { mechanics, year, startYear } = input;
  const gdp = safety.validateGdp(input.gdp, year);
  const baselinePctGdp = input.baselineSpendingPctGdp ?? ctx.parameters.spending.defaultBaselinePctGdp;

  const revenue = calculateRevenueFromMechanics(mechanics, gdp, year, startYear, ctx);
  const spending = spendingFor(mechanics, baselinePctGdp, gdp, year, startYear, ctx);

  const surplus = safety.ensureFinite(revenue.total - spending.net_spending, 0, "surplus");
  const surplus_allocation = mechanics?.surplus_allocation
    ? allocateSurplus(surplus, mechanics.surplus_allocation, ctx)
    : null;

  const spendingPct = safety.safePercentageOfGdp(spending.net_spending, gdp, "spending % of GDP") * 100;
  const surplusPct = safety.safePercentageOfGdp(surplus, gdp, "surplus % of GDP") * 100;
  const circuit_breakers = evaluateCircuitBreakers(spendingPct, surplusPct, mechanics?.circuit_breakers);

  const per_capita_spending =
    input.population === undefined
      ? null
      : safety.safePerCapita(spending.net_spending, input.population, "per-capita spending");

  return Object.freeze({
    year,
    gdp,
    revenue,
    spending,
    surplus,
    surplus_allocation,
    circuit_breakers,
    per_capita_spending,
    diagnostics: collector.diagnostics,
  });
}
