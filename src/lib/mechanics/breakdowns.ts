// /src/lib/mechanics/breakdowns.ts
// Builders for the per-year breakdown records. Derived fields are computed here and nowhere else.

import type { RevenueBreakdown, SpendingBreakdown, SurplusBreakdown } from "../../contracts";

export type RevenueComponents = {
  payroll_tax: number;
  redirected_federal: number;
  converted_premiums: number;
  efficiency_gains: number;
  other_source_detail?: ReadonlyMap<string, number>;
};

function sumValues(map: ReadonlyMap<string, number>): number {
  let total = 0;
  for (const v of map.values()) total += v;
  return total;
}

export function makeRevenueBreakdown(components: RevenueComponents): RevenueBreakdown {
  const detail = new Map(components.other_source_detail ?? []);
  const other_sources = sumValues(detail);

  return Object.freeze({
    payroll_tax: components.payroll_tax,
    redirected_federal: components.redirected_federal,
    converted_premiums: components.converted_premiums,
    efficiency_gains: components.efficiency_gains,
    other_sources,
    other_source_detail: detail,
    total:
      components.payroll_tax +
      components.redirected_federal +
      components.converted_premiums +
      components.efficiency_gains +
      other_sources,
  });
}

export function zeroRevenueBreakdown(): RevenueBreakdown {
  return makeRevenueBreakdown({ payroll_tax: 0, redirected_federal: 0, converted_premiums: 0, efficiency_gains: 0 });
}

export type SpendingComponents = {
  baseline_spending: number;
  administrative_savings?: number;
  drug_pricing_savings?: number;
  preventive_care_savings?: number;
  other_savings?: number;
  /** When omitted, net = baseline - savings. The target path passes the interpolated figure. */
  net_spending?: number;
  target_progress?: number;
};

export function makeSpendingBreakdown(components: SpendingComponents): SpendingBreakdown {
  const administrative_savings = components.administrative_savings ?? 0;
  const drug_pricing_savings = components.drug_pricing_savings ?? 0;
  const preventive_care_savings = components.preventive_care_savings ?? 0;
  const other_savings = components.other_savings ?? 0;

  const net_spending =
    components.net_spending ??
    components.baseline_spending -
      (administrative_savings + drug_pricing_savings + preventive_care_savings + other_savings);

  return Object.freeze({
    baseline_spending: components.baseline_spending,
    administrative_savings,
    drug_pricing_savings,
    preventive_care_savings,
    other_savings,
    net_spending,
    target_progress: components.target_progress ?? 0,
  });
}

export type SurplusComponents = {
  total_surplus: number;
  contingency_reserve?: number;
  debt_reduction?: number;
  infrastructure?: number;
  dividends?: number;
  other_allocations?: ReadonlyMap<string, number>;
};

export function makeSurplusBreakdown(components: SurplusComponents): SurplusBreakdown {
  const contingency_reserve = components.contingency_reserve ?? 0;
  const debt_reduction = components.debt_reduction ?? 0;
  const infrastructure = components.infrastructure ?? 0;
  const dividends = components.dividends ?? 0;
  const other_allocations = new Map(components.other_allocations ?? []);

  const allocated = contingency_reserve + debt_reduction + infrastructure + dividends + sumValues(other_allocations);
  // Non-positive surpluses are never allocated, so nothing is left over either.
  const unallocated = components.total_surplus > 0 ? components.total_surplus - allocated : 0;

  return Object.freeze({
    total_surplus: components.total_surplus,
    contingency_reserve,
    debt_reduction,
    infrastructure,
    dividends,
    other_allocations,
    unallocated,
  });
}
