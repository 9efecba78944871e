// /src/lib/mechanics/serialize.ts
// Flat Record<string, number> views of the breakdowns, for exporters and tables.
// Key order is stable: standard fields first, then caller-defined entries in insertion order.

import type { MechanismOutcome, RevenueBreakdown, SpendingBreakdown, SurplusBreakdown } from "../../contracts";

export type FlatRecord = Record<string, number>;

/** other_source_detail is flattened as `other_sources.<label>`. */
export function revenueToRecord(revenue: RevenueBreakdown): FlatRecord {
  const record: FlatRecord = {
    payroll_tax: revenue.payroll_tax,
    redirected_federal: revenue.redirected_federal,
    converted_premiums: revenue.converted_premiums,
    efficiency_gains: revenue.efficiency_gains,
    other_sources: revenue.other_sources,
    total: revenue.total,
  };
  for (const [label, amount] of revenue.other_source_detail) record[`other_sources.${label}`] = amount;
  return record;
}

export function spendingToRecord(spending: SpendingBreakdown): FlatRecord {
  return {
    baseline_spending: spending.baseline_spending,
    administrative_savings: spending.administrative_savings,
    drug_pricing_savings: spending.drug_pricing_savings,
    preventive_care_savings: spending.preventive_care_savings,
    other_savings: spending.other_savings,
    net_spending: spending.net_spending,
    target_progress: spending.target_progress,
  };
}

/** Extras are merged at the top level; their names cannot collide with the standard keys. */
export function surplusToRecord(surplus: SurplusBreakdown): FlatRecord {
  const record: FlatRecord = {
    total_surplus: surplus.total_surplus,
    contingency_reserve: surplus.contingency_reserve,
    debt_reduction: surplus.debt_reduction,
    infrastructure: surplus.infrastructure,
    dividends: surplus.dividends,
  };
  for (const [name, amount] of surplus.other_allocations) record[name] = amount;
  record.unallocated = surplus.unallocated;
  return record;
}

function prefixed(prefix: string, record: FlatRecord): FlatRecord {
  const out: FlatRecord = {};
  for (const [key, value] of Object.entries(record)) out[`${prefix}.${key}`] = value;
  return out;
}

/**
 * One export row per year: `revenue.*`, `spending.*`, `surplus`, `allocation.*`
 * and the number of circuit breakers that fired.
 */
export function outcomeToRecord(outcome: MechanismOutcome): FlatRecord {
  return {
    year: outcome.year,
    gdp: outcome.gdp,
    ...prefixed("revenue", revenueToRecord(outcome.revenue)),
    ...prefixed("spending", spendingToRecord(outcome.spending)),
    surplus: outcome.surplus,
    ...(outcome.surplus_allocation ? prefixed("allocation", surplusToRecord(outcome.surplus_allocation)) : {}),
    ...(outcome.per_capita_spending === null ? {} : { per_capita_spending: outcome.per_capita_spending }),
    circuit_breakers_triggered: outcome.circuit_breakers.length,
  };
}
