// /src/lib/mechanics/surplus.ts

import type { SurplusAllocationRules, SurplusBreakdown } from "../../contracts";
import { makeSurplusBreakdown } from "./breakdowns";
import { DEFAULT_ENGINE_CONTEXT, type EngineContext } from "./engine";

/**
 * Split a positive surplus across the declared buckets, surplus x pct / 100 each.
 *
 * Percentages are applied as declared: rules summing below 100 leave `unallocated` positive,
 * rules summing above 100 drive it negative. A non-positive surplus (or no rules) allocates nothing;
 * caller-defined buckets are still listed, at 0, so the set of keys is stable year to year.
 */
export function allocateSurplus(
  surplus: number,
  rules: SurplusAllocationRules | null | undefined,
  engine: EngineContext = DEFAULT_ENGINE_CONTEXT,
): SurplusBreakdown {
  const total = engine.safety.ensureFinite(surplus, 0, "surplus");

  if (!rules || total <= 0) {
    const zeroed = new Map<string, number>();
    for (const name of rules?.other_allocations.keys() ?? []) zeroed.set(name, 0);
    return makeSurplusBreakdown({ total_surplus: total, other_allocations: zeroed });
  }

  const share = (pct: number): number => total * (pct / 100);

  const other = new Map<string, number>();
  for (const [name, pct] of rules.other_allocations) other.set(name, share(pct));

  return makeSurplusBreakdown({
    total_surplus: total,
    contingency_reserve: share(rules.contingency_reserve_pct),
    debt_reduction: share(rules.debt_reduction_pct),
    infrastructure: share(rules.infrastructure_pct),
    dividends: share(rules.dividends_pct),
    other_allocations: other,
  });
}
