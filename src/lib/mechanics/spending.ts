// /src/lib/mechanics/spending.ts

import type { SectorSavingsParameters, SpendingBreakdown } from "../../contracts";
import { makeSpendingBreakdown } from "./breakdowns";
import { DEFAULT_ENGINE_CONTEXT, type EngineContext } from "./engine";
import { linearProgress } from "./ramp";

/** What would be spent without the policy. */
export function calculateBaselineSpending(baselinePctGdp: number, gdp: number): number {
  return baselinePctGdp * gdp;
}

export type TargetSpendingInput = {
  /** Decimal share of GDP, e.g. 0.07. */
  targetPctGdp: number;
  targetYear: number;
  /** Decimal share of GDP, e.g. 0.185. */
  baselinePctGdp: number;
  gdp: number;
  year: number;
  startYear: number;
};

/**
 * Default spending path: interpolate spending/GDP linearly from the baseline at the start year
 * to the target at the target year, then hold it.
 *
 * Total savings (baseline minus interpolated) are split across the four buckets by the
 * configured attribution weights. The split is an accounting convention, not a separate
 * estimate; see calculateSpendingFromMechanisms for the per-mechanism path.
 */
export function calculateSpendingFromTarget(
  input: TargetSpendingInput,
  engine: EngineContext = DEFAULT_ENGINE_CONTEXT,
): SpendingBreakdown {
  const { attribution } = engine.parameters.spending;
  const { safety } = engine;

  const baseline_spending = safety.ensureFinite(
    calculateBaselineSpending(input.baselinePctGdp, input.gdp),
    0,
    "spending.baseline_spending",
  );

  // A target year at or before the start year is reached immediately.
  const progress = linearProgress(input.year - input.startYear, input.targetYear - input.startYear);

  const currentPct =
    progress >= 1
      ? input.targetPctGdp
      : input.baselinePctGdp + (input.targetPctGdp - input.baselinePctGdp) * progress;

  const net_spending = safety.ensureFinite(currentPct * input.gdp, baseline_spending, "spending.net_spending");
  const totalSavings = baseline_spending - net_spending;

  return makeSpendingBreakdown({
    baseline_spending,
    administrative_savings: totalSavings * attribution.administrative,
    drug_pricing_savings: totalSavings * attribution.drugPricing,
    preventive_care_savings: totalSavings * attribution.preventiveCare,
    other_savings: totalSavings * attribution.other,
    net_spending,
    target_progress: progress,
  });
}

function sectorSavings(
  baselineSpending: number,
  yearsSinceStart: number,
  sector: SectorSavingsParameters,
): number {
  return baselineSpending * sector.sectorShare * sector.reductionPct * linearProgress(yearsSinceStart, sector.rampYears);
}

/** Administrative overhead (27.5% of spending) cut by 30% over five years, by default. */
export function calculateAdministrativeSavings(
  baselineSpending: number,
  yearsSinceStart: number,
  overrides: Partial<SectorSavingsParameters> = {},
  engine: EngineContext = DEFAULT_ENGINE_CONTEXT,
): number {
  return sectorSavings(baselineSpending, yearsSinceStart, {
    ...engine.parameters.spending.administrative,
    ...overrides,
  });
}

/** Drug spending (11%) cut by half over three years, by default. */
export function calculateDrugPricingSavings(
  baselineSpending: number,
  yearsSinceStart: number,
  overrides: Partial<SectorSavingsParameters> = {},
  engine: EngineContext = DEFAULT_ENGINE_CONTEXT,
): number {
  return sectorSavings(baselineSpending, yearsSinceStart, {
    ...engine.parameters.spending.drugPricing,
    ...overrides,
  });
}

/** Treatment costs reduced 15% through prevention; slow, ten-year ramp. */
export function calculatePreventiveCareSavings(
  baselineSpending: number,
  yearsSinceStart: number,
  overrides: Partial<SectorSavingsParameters> = {},
  engine: EngineContext = DEFAULT_ENGINE_CONTEXT,
): number {
  return sectorSavings(baselineSpending, yearsSinceStart, {
    ...engine.parameters.spending.preventiveCare,
    ...overrides,
  });
}

export type MechanismSpendingInput = {
  baselinePctGdp: number;
  gdp: number;
  year: number;
  startYear: number;
};

/**
 * Alternative spending path built from the standalone sector formulas, each on its own ramp.
 * The orchestrator does not call this; it uses calculateSpendingFromTarget.
 */
export function calculateSpendingFromMechanisms(
  input: MechanismSpendingInput,
  engine: EngineContext = DEFAULT_ENGINE_CONTEXT,
): SpendingBreakdown {
  const baseline_spending = calculateBaselineSpending(input.baselinePctGdp, input.gdp);
  const yearsSinceStart = input.year - input.startYear;

  const breakdown = makeSpendingBreakdown({
    baseline_spending,
    administrative_savings: calculateAdministrativeSavings(baseline_spending, yearsSinceStart, {}, engine),
    drug_pricing_savings: calculateDrugPricingSavings(baseline_spending, yearsSinceStart, {}, engine),
    preventive_care_savings: calculatePreventiveCareSavings(baseline_spending, yearsSinceStart, {}, engine),
  });

  if (Number.isFinite(breakdown.net_spending)) return breakdown;

  return makeSpendingBreakdown({
    baseline_spending,
    net_spending: engine.safety.ensureFinite(breakdown.net_spending, 0, "spending.net_spending"),
  });
}
