// /src/lib/mechanics/outcomes.test.ts
import { describe, it, expect } from "vitest";

import { PolicyMechanicsSchema } from "../../contracts";
import { DiagnosticCollector } from "../safety/diagnostics";
import { createEngineContext } from "./engine";
import { calculateMechanismBasedOutcomes } from "./outcomes";

function quietEngine() {
  const collector = new DiagnosticCollector();
  return { engine: createEngineContext({ sink: collector.sink }), collector };
}

const universal = PolicyMechanicsSchema.parse({
  policy_name: "Universal Coverage Test",
  funding_mechanisms: [
    { source_type: "payroll_tax", percentage_rate: 10 },
    { source_type: "redirected_federal", percentage_gdp: 15 },
  ],
  target_spending_pct_gdp: 7,
  target_spending_year: 2045,
  surplus_allocation: { debt_reduction_pct: 50, other_allocations: { research: 10 } },
  circuit_breakers: [
    { trigger_type: "spending_cap", threshold_value: 5, action: "cut_admin" },
    { trigger_type: "surplus_trigger", threshold_value: 10, action: "issue_dividends" },
  ],
});

describe("calculateMechanismBasedOutcomes", () => {
  it("falls back to baseline spending without a policy", () => {
    const { engine } = quietEngine();
    const outcome = calculateMechanismBasedOutcomes({ mechanics: null, gdp: 1000, year: 2030, startYear: 2025 }, engine);

    expect(outcome.revenue.total).toBe(0);
    expect(outcome.spending.net_spending).toBe(outcome.spending.baseline_spending);
    expect(outcome.spending.net_spending).toBeCloseTo(185, 10);
    expect(outcome.surplus).toBe(-outcome.spending.net_spending);
    expect(outcome.surplus_allocation).toBeNull();
    expect(outcome.circuit_breakers).toEqual([]);
    expect(outcome.per_capita_spending).toBeNull();
    expect(outcome.diagnostics).toEqual([]);
  });

  it("composes revenue, target spending, allocation and breakers", () => {
    const { engine } = quietEngine();
    const outcome = calculateMechanismBasedOutcomes(
      { mechanics: universal, gdp: 1000, year: 2045, startYear: 2025 },
      engine,
    );

    expect(outcome.revenue.total).toBeCloseTo(203, 10);
    expect(outcome.spending.net_spending).toBe(0.07 * 1000);
    expect(outcome.spending.target_progress).toBe(1);
    expect(outcome.surplus).toBe(outcome.revenue.total - outcome.spending.net_spending);
    expect(outcome.surplus_allocation?.debt_reduction).toBeCloseTo(66.5, 10);
    expect(outcome.surplus_allocation?.other_allocations.get("research")).toBeCloseTo(13.3, 10);
    expect(outcome.circuit_breakers).toEqual([
      ["spending_cap", "Spending 7.0% GDP exceeds 5.0% cap - cut_admin"],
      ["surplus_trigger", "Surplus 13.3% GDP exceeds 10.0% - issue_dividends"],
    ]);
  });

  it("uses the caller's baseline share", () => {
    const { engine } = quietEngine();
    const outcome = calculateMechanismBasedOutcomes(
      { mechanics: null, gdp: 1000, year: 2030, startYear: 2025, baselineSpendingPctGdp: 0.1 },
      engine,
    );
    expect(outcome.spending.baseline_spending).toBeCloseTo(100, 10);
  });

  it("honours a 0% target", () => {
    const { engine } = quietEngine();
    const mechanics = PolicyMechanicsSchema.parse({ target_spending_pct_gdp: 0, target_spending_year: 2030 });
    const outcome = calculateMechanismBasedOutcomes({ mechanics, gdp: 1000, year: 2030, startYear: 2025 }, engine);
    expect(outcome.spending.net_spending).toBe(0);
  });

  it("needs both target fields to leave the baseline path", () => {
    const { engine } = quietEngine();
    const mechanics = PolicyMechanicsSchema.parse({ target_spending_pct_gdp: 7 });
    const outcome = calculateMechanismBasedOutcomes({ mechanics, gdp: 1000, year: 2030, startYear: 2025 }, engine);
    expect(outcome.spending.net_spending).toBe(outcome.spending.baseline_spending);
    expect(outcome.spending.target_progress).toBe(0);
  });

  it("floors GDP once and computes every figure against it", () => {
    const { engine, collector } = quietEngine();
    const outcome = calculateMechanismBasedOutcomes({ mechanics: universal, gdp: 0, year: 2030, startYear: 2025 }, engine);

    expect(outcome.gdp).toBe(1);
    expect(outcome.revenue.redirected_federal).toBeCloseTo(0.15, 12);
    expect(Number.isFinite(outcome.surplus)).toBe(true);
    expect(outcome.diagnostics.map((d) => d.code)).toEqual(["GDP_FLOOR_APPLIED"]);
    expect(outcome.diagnostics[0].year).toBe(2030);
    // Also delivered to the engine's own sink.
    expect(collector.hasCode("GDP_FLOOR_APPLIED")).toBe(true);
  });

  it("keeps baseline spending finite for an infinite GDP", () => {
    const { engine, collector } = quietEngine();
    const outcome = calculateMechanismBasedOutcomes({ mechanics: null, gdp: Infinity, year: 2030, startYear: 2025 }, engine);

    expect(outcome.spending.baseline_spending).toBe(0);
    expect(outcome.spending.net_spending).toBe(0);
    expect(outcome.surplus).toBe(0);
    expect(collector.hasCode("NON_FINITE_RESULT")).toBe(true);
  });

  it("keeps baseline spending finite when the product overflows", () => {
    const { engine } = quietEngine();
    const outcome = calculateMechanismBasedOutcomes(
      { mechanics: null, gdp: 1e308, year: 2030, startYear: 2025, baselineSpendingPctGdp: 2 },
      engine,
    );

    expect(Number.isFinite(outcome.spending.net_spending)).toBe(true);
    expect(outcome.spending.net_spending).toBe(0);
    expect(outcome.circuit_breakers).toEqual([]);
  });

  it("reports per-capita spending when a population is given", () => {
    const { engine } = quietEngine();
    const outcome = calculateMechanismBasedOutcomes(
      { mechanics: null, gdp: 1000, year: 2030, startYear: 2025, population: 2_000_000 },
      engine,
    );
    expect(outcome.per_capita_spending).toBeCloseTo(0.0000925, 12);
  });

  it("returns a frozen record", () => {
    const { engine } = quietEngine();
    const outcome = calculateMechanismBasedOutcomes({ mechanics: universal, gdp: 1000, year: 2030, startYear: 2025 }, engine);
    expect(Object.isFrozen(outcome)).toBe(true);
    expect(Object.isFrozen(outcome.revenue)).toBe(true);
    expect(Object.isFrozen(outcome.spending)).toBe(true);
  });
});
