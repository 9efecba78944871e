// /src/lib/mechanics/revenue.ts
// Mechanism-based revenue: one component per funding source kind, summed into a total.

import type { FundingMechanism, PolicyMechanics, RampCurve, RevenueBreakdown } from "../../contracts";
import { DEFAULT_ENGINE_PARAMETERS } from "../config/engineParameters";
import { makeRevenueBreakdown, zeroRevenueBreakdown } from "./breakdowns";
import { DEFAULT_ENGINE_CONTEXT, type EngineContext } from "./engine";
import { linearProgress, rampProgress } from "./ramp";

const DEFAULT_REVENUE = DEFAULT_ENGINE_PARAMETERS.revenue;

/** rate (decimal) x wage base, where the wage base is GDP x wage share. No ramp. */
export function calculatePayrollRevenue(
  rate: number,
  gdp: number,
  wageShareOfGdp: number = DEFAULT_REVENUE.wageShareOfGdp,
): number {
  return rate * (gdp * wageShareOfGdp);
}

export function calculateRedirectedFederal(pctGdp: number, gdp: number): number {
  return pctGdp * gdp;
}

export type ConvertedPremiumsOptions = {
  conversionRate?: number;
  rampYears?: number;
};

/** Linear phase-in of converted private premiums. */
export function calculateConvertedPremiums(
  pctGdp: number,
  gdp: number,
  yearsSinceStart: number,
  options: ConvertedPremiumsOptions = {},
): number {
  const conversionRate = options.conversionRate ?? DEFAULT_REVENUE.conversionRate;
  const rampYears = options.rampYears ?? DEFAULT_REVENUE.convertedPremiumsRampYears;
  return pctGdp * gdp * conversionRate * linearProgress(yearsSinceStart, rampYears);
}

export type EfficiencyGainsOptions = {
  rampYears?: number;
  curve?: RampCurve;
};

/** Efficiency gains phase in along a curve, sigmoid unless told otherwise. */
export function calculateEfficiencyGains(
  pctGdp: number,
  gdp: number,
  yearsSinceStart: number,
  options: EfficiencyGainsOptions = {},
): number {
  const rampYears = options.rampYears ?? DEFAULT_REVENUE.efficiencyGainsRampYears;
  const curve = options.curve ?? DEFAULT_REVENUE.efficiencyGainsCurve;
  return pctGdp * gdp * rampProgress(curve, yearsSinceStart, rampYears);
}

type Totals = {
  payroll_tax: number;
  redirected_federal: number;
  converted_premiums: number;
  efficiency_gains: number;
  other: Map<string, number>;
};

function applyMechanism(
  totals: Totals,
  mechanism: FundingMechanism,
  gdp: number,
  yearsSinceStart: number,
  engine: EngineContext,
): void {
  const params = engine.parameters.revenue;

  switch (mechanism.source_type) {
    case "payroll_tax":
      totals.payroll_tax += calculatePayrollRevenue(mechanism.percentage_rate / 100, gdp, params.wageShareOfGdp);
      return;

    case "redirected_federal":
      totals.redirected_federal += calculateRedirectedFederal(mechanism.percentage_gdp / 100, gdp);
      return;

    case "converted_premiums":
      totals.converted_premiums += calculateConvertedPremiums(mechanism.percentage_gdp / 100, gdp, yearsSinceStart, {
        conversionRate: mechanism.conversion_rate ?? params.conversionRate,
        rampYears: mechanism.ramp_years ?? params.convertedPremiumsRampYears,
      });
      return;

    case "efficiency_gains":
      totals.efficiency_gains += calculateEfficiencyGains(mechanism.percentage_gdp / 100, gdp, yearsSinceStart, {
        rampYears: mechanism.ramp_years ?? params.efficiencyGainsRampYears,
        curve: mechanism.ramp_curve ?? params.efficiencyGainsCurve,
      });
      return;

    // Any source without a dedicated formula: raw share of GDP, unramped, kept per label.
    case "other": {
      const amount = (mechanism.percentage_gdp / 100) * gdp;
      totals.other.set(mechanism.label, (totals.other.get(mechanism.label) ?? 0) + amount);
      return;
    }

    default: {
      const _exhaustive: never = mechanism;
      return _exhaustive;
    }
  }
}

/**
 * Revenue for one year. Declaring a kind twice adds both contributions to the same component.
 * A null policy or an empty mechanism list yields an all-zero breakdown.
 */
export function calculateRevenueFromMechanics(
  mechanics: PolicyMechanics | null | undefined,
  gdp: number,
  year: number,
  startYear: number,
  engine: EngineContext = DEFAULT_ENGINE_CONTEXT,
): RevenueBreakdown {
  if (!mechanics || mechanics.funding_mechanisms.length === 0) return zeroRevenueBreakdown();

  const yearsSinceStart = year - startYear;
  const totals: Totals = {
    payroll_tax: 0,
    redirected_federal: 0,
    converted_premiums: 0,
    efficiency_gains: 0,
    other: new Map(),
  };

  for (const mechanism of mechanics.funding_mechanisms) {
    applyMechanism(totals, mechanism, gdp, yearsSinceStart, engine);
  }

  const { safety } = engine;
  const other = new Map<string, number>();
  for (const [label, amount] of totals.other) {
    other.set(label, safety.ensureFinite(amount, 0, `revenue.other_sources.${label}`));
  }

  const breakdown = makeRevenueBreakdown({
    payroll_tax: safety.ensureFinite(totals.payroll_tax, 0, "revenue.payroll_tax"),
    redirected_federal: safety.ensureFinite(totals.redirected_federal, 0, "revenue.redirected_federal"),
    converted_premiums: safety.ensureFinite(totals.converted_premiums, 0, "revenue.converted_premiums"),
    efficiency_gains: safety.ensureFinite(totals.efficiency_gains, 0, "revenue.efficiency_gains"),
    other_source_detail: other,
  });

  // Finite components can still overflow when summed.
  if (!Number.isFinite(breakdown.total)) {
    safety.ensureFinite(breakdown.total, 0, "revenue.total");
    return zeroRevenueBreakdown();
  }

  return breakdown;
}
