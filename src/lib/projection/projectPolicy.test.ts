// /src/lib/projection/projectPolicy.test.ts
import { describe, it, expect } from "vitest";

import type { ProjectionInput } from "../../contracts";
import { ContractViolationError } from "../errors";
import { createEngineContext } from "../mechanics/engine";
import { parsePolicyMechanics } from "../policy/parsePolicyMechanics";
import { DiagnosticCollector } from "../safety/diagnostics";
import { projectPolicy } from "./projectPolicy";

const engine = createEngineContext({ sink: new DiagnosticCollector().sink });

const base: ProjectionInput = {
  mechanics: null,
  baseGdp: 1000,
  initialDebt: 100,
  years: 3,
  population: 2_000_000,
  startYear: 2025,
  gdpGrowth: 0,
};

describe("projectPolicy", () => {
  it("compounds GDP and adds deficits to debt", () => {
    const { rows } = projectPolicy({ ...base, gdpGrowth: 0.1 }, engine);

    expect(rows.map((r) => r.year)).toEqual([2025, 2026, 2027]);
    expect(rows.map((r) => r.gdpGrowthApplied)).toEqual([0, 0.1, 0.1]);
    expect(rows[1].gdp).toBeCloseTo(1100, 9);
    expect(rows[2].gdp).toBeCloseTo(1210, 9);

    expect(rows[0].surplus).toBeCloseTo(-185, 9);
    expect(rows[0].debt).toBeCloseTo(285, 9);
    expect(rows[0].interestSpending).toBeCloseTo(9.975, 9);
    expect(rows[1].debt).toBeCloseTo(488.5, 9);
    expect(rows[2].debt).toBeCloseTo(712.35, 9);
    expect(rows[2].debtPctGdp).toBeCloseTo((712.35 / 1210) * 100, 9);
  });

  it("builds the reserve from surpluses and draws it down in a covered deficit", () => {
    const mechanics = parsePolicyMechanics({
      funding_mechanisms: [{ source_type: "redirected_federal", percentage_gdp: 30 }],
      target_spending_pct_gdp: 33,
      target_spending_year: 2027,
      surplus_allocation: { contingency_reserve_pct: 50, debt_reduction_pct: 50 },
    });

    const { rows } = projectPolicy({ ...base, mechanics }, engine);

    expect(rows[0].surplus).toBeCloseTo(115, 9);
    expect(rows[0].contingencyReserveBalance).toBeCloseTo(57.5, 9);
    expect(rows[0].debtReduction).toBeCloseTo(57.5, 9);
    expect(rows[0].debt).toBeCloseTo(42.5, 9);

    expect(rows[1].surplus).toBeCloseTo(42.5, 9);
    expect(rows[1].contingencyReserveBalance).toBeCloseTo(78.75, 9);
    expect(rows[1].debt).toBeCloseTo(21.25, 9);

    expect(rows[2].surplus).toBeCloseTo(-30, 9);
    expect(rows[2].contingencyReserveBalance).toBeCloseTo(48.75, 9);
    expect(rows[2].debt).toBeCloseTo(21.25, 9);
    expect(rows[2].debtReduction).toBe(0);
    expect(rows[2].interestSpending).toBeCloseTo(0.74375, 9);
  });

  it("funds innovation from savings, capped by the surplus", () => {
    const policy = {
      funding_mechanisms: [{ source_type: "redirected_federal", percentage_gdp: 10 }],
      target_spending_pct_gdp: 7,
      target_spending_year: 2025,
      surplus_allocation: { dividends_pct: 50 },
    };

    const capped = projectPolicy(
      {
        ...base,
        years: 1,
        mechanics: parsePolicyMechanics({ ...policy, innovation_fund: { funding_min_pct: 10, annual_cap_pct: 20 } }),
      },
      engine,
    ).rows[0];

    expect(capped.savingsVsBaseline).toBeCloseTo(115, 9);
    expect(capped.surplus).toBeCloseTo(30, 9);
    expect(capped.innovationFund).toBeCloseTo(6, 9);
    expect(capped.dividendPool).toBeCloseTo(15, 9);
    expect(capped.dividendPerCapita).toBeCloseTo(0.0000075, 12);
    expect(capped.perCapitaSpending).toBeCloseTo(0.000035, 12);

    const uncapped = projectPolicy(
      { ...base, years: 1, mechanics: parsePolicyMechanics({ ...policy, innovation_fund: { funding_min_pct: 10 } }) },
      engine,
    ).rows[0];
    expect(uncapped.innovationFund).toBeCloseTo(11.5, 9);
  });

  it("routes every growth value through the recession guard", () => {
    const collector = new DiagnosticCollector();
    const observed = createEngineContext({ sink: collector.sink });

    const { rows, diagnostics } = projectPolicy(
      { ...base, years: 4, growthPath: [-0.25, 0.02], gdpGrowth: 0.01 },
      observed,
    );

    expect(rows.map((r) => r.gdpGrowthApplied)).toEqual([0, -0.15, 0.02, 0.01]);
    expect(rows.map((r) => r.gdpGrowthAdjusted)).toEqual([false, true, false, false]);
    expect(rows[1].gdp).toBeCloseTo(850, 9);

    const contraction = diagnostics.find((d) => d.code === "EXTREME_GDP_CONTRACTION");
    expect(contraction?.year).toBe(2026);
    expect(contraction?.severity).toBe("user-warning");
    expect(collector.hasCode("EXTREME_GDP_CONTRACTION")).toBe(true);
  });

  it("floors contractions at zero when negative growth is disallowed", () => {
    const { rows } = projectPolicy({ ...base, gdpGrowth: -0.05, allowNegativeGrowth: false }, engine);
    expect(rows.map((r) => r.gdpGrowthApplied)).toEqual([0, 0, 0]);
    expect(rows.map((r) => r.gdp)).toEqual([1000, 1000, 1000]);
  });

  it("flags extreme debt and an extreme interest rate", () => {
    const { rows, diagnostics } = projectPolicy({ ...base, years: 1, initialDebt: 3000, interestRate: 0.3 }, engine);
    expect(rows[0].extremeDebt).toBe(true);
    expect(diagnostics.map((d) => d.code)).toEqual(["EXTREME_INTEREST_RATE", "EXTREME_DEBT"]);
  });

  it("joins the messages of every breaker that fired", () => {
    const mechanics = parsePolicyMechanics({
      circuit_breakers: [
        { trigger_type: "spending_cap", threshold_value: 10, action: "review" },
        { trigger_type: "surplus_trigger", threshold_value: -50, action: "rebalance" },
      ],
    });
    const [row] = projectPolicy({ ...base, years: 1, mechanics }, engine).rows;

    expect(row.circuitBreakerTriggered).toBe(true);
    expect(row.circuitBreakerMessage).toBe(
      "Spending 18.5% GDP exceeds 10.0% cap - review; Surplus -18.5% GDP exceeds -50.0% - rebalance",
    );
  });

  it("returns no rows for a zero-year horizon", () => {
    expect(projectPolicy({ ...base, years: 0 }, engine).rows).toEqual([]);
  });

  it("rejects malformed horizons", () => {
    expect(() => projectPolicy({ ...base, years: 2.5 }, engine)).toThrow(ContractViolationError);
    expect(() => projectPolicy({ ...base, baseGdp: Number.NaN }, engine)).toThrow(ContractViolationError);
  });
});
