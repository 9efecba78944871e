// /src/lib/projection/projectPolicy.ts
// Multi-year driver around the per-year orchestrator: compounds GDP, carries debt and
// the contingency reserve forward, and derives interest, innovation-fund and per-capita figures.

import type { ProjectionInput, ProjectionResult, ProjectionRow } from "../../contracts";
import { ContractViolationError } from "../errors";
import { DiagnosticCollector } from "../safety/diagnostics";
import { DEFAULT_ENGINE_CONTEXT, observeEngine, type EngineContext } from "../mechanics/engine";
import { calculateMechanismBasedOutcomes } from "../mechanics/outcomes";

export const DEFAULT_INTEREST_RATE = 0.035;

function growthFor(index: number, input: ProjectionInput): number {
  const path = input.growthPath ?? [];
  // Index 1 is the first year that grows; path[0] applies to it.
  return index - 1 < path.length ? path[index - 1] : input.gdpGrowth ?? 0;
}

function assertProjectionInput(input: ProjectionInput): void {
  const issues: string[] = [];
  if (!Number.isInteger(input.years) || input.years < 0) issues.push("years: must be a non-negative integer");
  if (!Number.isInteger(input.startYear)) issues.push("startYear: must be an integer");
  if (!Number.isFinite(input.baseGdp)) issues.push("baseGdp: must be a finite number");
  if (!Number.isFinite(input.initialDebt)) issues.push("initialDebt: must be a finite number");
  if (input.interestRate !== undefined && !Number.isFinite(input.interestRate)) {
    issues.push("interestRate: must be a finite number");
  }
  if (issues.length > 0) throw new ContractViolationError("Projection input is invalid.", issues);
}

/**
 * Project a policy year by year.
 *
 * - Surplus years: the contingency share is added to the reserve and the debt-reduction share
 *   paid down (debt never goes below 0).
 * - Deficit years: the reserve covers the deficit only if it exceeds it; otherwise the whole
 *   deficit is added to debt.
 * - Interest is reported on end-of-year debt; it is not capitalized.
 * - Innovation funding is funding_min_pct of positive savings vs baseline, capped at
 *   annual_cap_pct of the surplus when a cap is set and the year is in surplus.
 *
 * Every growth value passes through handleRecessionGdpGrowth; GDP carried into the next year
 * is the floored figure the orchestrator computed with.
 */
export function projectPolicy(
  input: ProjectionInput,
  engine: EngineContext = DEFAULT_ENGINE_CONTEXT,
): ProjectionResult {
  assertProjectionInput(input);

  const collector = new DiagnosticCollector();
  const ctx = observeEngine(engine, collector.sink);
  const { safety } = ctx;

  const { mechanics, population, startYear } = input;
  const interestRate = input.interestRate ?? DEFAULT_INTEREST_RATE;
  const allowNegativeGrowth = input.allowNegativeGrowth ?? true;
  const innovation = mechanics?.innovation_fund ?? null;

  safety.checkExtremeInterestRate(interestRate, startYear);

  const rows: ProjectionRow[] = [];
  let gdp = input.baseGdp;
  let debt = input.initialDebt;
  let reserve = 0;

  for (let i = 0; i < input.years; i++) {
    const year = startYear + i;

    let gdpGrowthApplied = 0;
    let gdpGrowthAdjusted = false;
    if (i > 0) {
      const adjustment = safety.handleRecessionGdpGrowth(growthFor(i, input), year, allowNegativeGrowth);
      gdpGrowthApplied = adjustment.growth;
      gdpGrowthAdjusted = adjustment.wasAdjusted;
      gdp = gdp * (1 + gdpGrowthApplied);
    }

    const outcome = calculateMechanismBasedOutcomes(
      {
        mechanics,
        gdp,
        year,
        startYear,
        baselineSpendingPctGdp: input.baselineSpendingPctGdp,
        population,
      },
      ctx,
    );
    gdp = outcome.gdp;

    const { spending, surplus } = outcome;
    const allocation = outcome.surplus_allocation;
    const baselineSpending = spending.baseline_spending;
    const savingsVsBaseline = baselineSpending - spending.net_spending;

    let debtReduction = 0;
    let infrastructureAllocation = 0;
    let dividendPool = 0;

    if (surplus > 0 && allocation) {
      debtReduction = allocation.debt_reduction;
      infrastructureAllocation = allocation.infrastructure;
      dividendPool = allocation.dividends;
      reserve += allocation.contingency_reserve;
      debt = Math.max(0, debt - debtReduction);
    } else if (surplus < 0) {
      const deficit = -surplus;
      if (reserve > deficit) reserve -= deficit;
      else debt += deficit;
    }

    const interestSpending = debt * interestRate;

    let innovationFund = 0;
    if (innovation && savingsVsBaseline > 0) {
      innovationFund = savingsVsBaseline * (innovation.funding_min_pct / 100);
      if (innovation.annual_cap_pct > 0 && surplus > 0) {
        innovationFund = Math.min(innovationFund, surplus * (innovation.annual_cap_pct / 100));
      }
    }

    const perCapitaSpending =
      outcome.per_capita_spending ?? safety.safePerCapita(spending.net_spending, population, "per-capita spending");
    const dividendPerCapita =
      dividendPool > 0 ? safety.safePerCapita(dividendPool, population, "dividend per capita") : 0;

    const extremeDebt = safety.checkExtremeDebt(debt, gdp, year).isExtreme;

    rows.push(
      Object.freeze({
        year,
        gdp,
        gdpGrowthApplied,
        gdpGrowthAdjusted,

        revenue: outcome.revenue.total,
        spending: spending.net_spending,
        baselineSpending,
        savingsVsBaseline,
        surplus,
        surplusPctGdp: safety.safePercentageOfGdp(surplus, gdp, "surplus % of GDP") * 100,
        spendingPctGdp: safety.safePercentageOfGdp(spending.net_spending, gdp, "spending % of GDP") * 100,

        debt,
        debtPctGdp: safety.safePercentageOfGdp(debt, gdp, "debt % of GDP") * 100,
        interestSpending,
        contingencyReserveBalance: reserve,
        debtReduction,
        infrastructureAllocation,
        dividendPool,
        dividendPerCapita,
        innovationFund,
        perCapitaSpending,

        circuitBreakerTriggered: outcome.circuit_breakers.length > 0,
        circuitBreakerMessage: outcome.circuit_breakers.map(([, message]) => message).join("; "),
        extremeDebt,

        outcome,
      }),
    );
  }

  return Object.freeze({ rows, diagnostics: collector.diagnostics });
}
