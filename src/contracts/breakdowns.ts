// /src/contracts/breakdowns.ts
/**
 * Per-year breakdown records produced by the calculators.
 *
 * Derived fields (`total`, `net_spending`, `unallocated`) are computed when a record is built
 * (see lib/mechanics/breakdowns.ts) and are never set independently.
 * Records are frozen; consumers read them once and discard them.
 */

export interface RevenueBreakdown {
  readonly payroll_tax: number;
  readonly redirected_federal: number;
  readonly converted_premiums: number;
  readonly efficiency_gains: number;
  /** Sum of every "other" mechanism. */
  readonly other_sources: number;
  /** Per-label detail of other_sources, in declaration order. */
  readonly other_source_detail: ReadonlyMap<string, number>;
  /** payroll_tax + redirected_federal + converted_premiums + efficiency_gains + other_sources */
  readonly total: number;
}

export interface SpendingBreakdown {
  readonly baseline_spending: number;
  readonly administrative_savings: number;
  readonly drug_pricing_savings: number;
  readonly preventive_care_savings: number;
  readonly other_savings: number;
  /**
   * Spending after the policy. NOT clamped at zero, and a target above baseline
   * legitimately yields negative savings.
   */
  readonly net_spending: number;
  /** Progress (0-1) along the target trajectory; 0 when no target trajectory applies. */
  readonly target_progress: number;
}

export interface SurplusBreakdown {
  /** The surplus handed to the allocator, allocated or not. */
  readonly total_surplus: number;
  readonly contingency_reserve: number;
  readonly debt_reduction: number;
  readonly infrastructure: number;
  readonly dividends: number;
  /** Caller-defined buckets, in declaration order. */
  readonly other_allocations: ReadonlyMap<string, number>;
  /** Positive surplus left outside the buckets; negative when rules declare more than 100%. */
  readonly unallocated: number;
}
