/**
 * Local projection harness:
 *   npx tsx scripts/runProjection.ts [policy.json] [years]
 *
 * Without a policy file a built-in sample policy is projected.
 *
 * Env:
 * - POLICY_ENGINE_PARAMETERS optional JSON file of engine parameter overrides
 * - POLICY_ENGINE_LOG_LEVEL optional (defaults to warning)
 */

import { readFile } from "node:fs/promises";

import {
  createConsoleSink,
  createEngineContext,
  loadEngineParametersFromEnv,
  parsePolicyMechanics,
  projectPolicy,
  readLogLevel,
  toClientError,
  type PolicyMechanics,
  type ProjectionRow,
} from "../src";

// Trillions of dollars, CBO-style baseline.
const BASE_GDP = 28;
const INITIAL_DEBT = 36;
const POPULATION = 335_000_000;
const START_YEAR = 2025;
const GDP_GROWTH = 0.02;

const SAMPLE_POLICY = {
  policy_name: "Sample single-payer plan",
  policy_type: "healthcare",
  funding_mechanisms: [
    { source_type: "payroll_tax", percentage_rate: 10 },
    { source_type: "redirected_federal", percentage_gdp: 6.5 },
    { source_type: "converted_premiums", percentage_gdp: 4, ramp_years: 5 },
    { source_type: "efficiency_gains", percentage_gdp: 1.5, ramp_curve: "sigmoid" },
    { source_type: "transaction_tax", percentage_gdp: 0.3, description: "0.1% on trades" },
  ],
  target_spending_pct_gdp: 15,
  target_spending_year: 2035,
  surplus_allocation: {
    contingency_reserve_pct: 10,
    debt_reduction_pct: 50,
    infrastructure_pct: 20,
    dividends_pct: 20,
  },
  circuit_breakers: [
    { trigger_type: "spending_cap", threshold_value: 18, action: "freeze_new_benefits" },
    { trigger_type: "surplus_trigger", threshold_value: 3, action: "cut_payroll_rate" },
  ],
  innovation_fund: { funding_min_pct: 5, annual_cap_pct: 10 },
};

async function loadPolicy(filePath: string | undefined): Promise<PolicyMechanics> {
  if (!filePath) return parsePolicyMechanics(SAMPLE_POLICY);
  const text = await readFile(filePath, "utf8");
  return parsePolicyMechanics(JSON.parse(text));
}

function parseYears(raw: string | undefined): number {
  if (!raw) return 10;
  const years = Number(raw);
  if (!Number.isInteger(years) || years < 1) throw new Error(`years must be a positive integer, got "${raw}"`);
  return years;
}

function formatRow(row: ProjectionRow): string {
  const cols = [
    String(row.year),
    row.gdp.toFixed(2),
    row.revenue.toFixed(2),
    row.spending.toFixed(2),
    row.surplus.toFixed(2),
    `${row.debtPctGdp.toFixed(1)}%`,
    row.contingencyReserveBalance.toFixed(2),
    row.innovationFund.toFixed(3),
    row.circuitBreakerMessage || "-",
  ];
  return cols.join("\t");
}

async function main() {
  const [policyPath, yearsArg] = process.argv.slice(2);

  const parameters = await loadEngineParametersFromEnv();
  const engine = createEngineContext({ parameters, sink: createConsoleSink(readLogLevel()) });

  const mechanics = await loadPolicy(policyPath);
  const { rows, diagnostics } = projectPolicy(
    {
      mechanics,
      baseGdp: BASE_GDP,
      initialDebt: INITIAL_DEBT,
      years: parseYears(yearsArg),
      population: POPULATION,
      startYear: START_YEAR,
      gdpGrowth: GDP_GROWTH,
    },
    engine,
  );

  console.log(`Policy: ${mechanics.policy_name} (${mechanics.policy_type})`);
  console.log(["year", "gdp", "revenue", "spending", "surplus", "debt/gdp", "reserve", "innovation", "breakers"].join("\t"));
  for (const row of rows) console.log(formatRow(row));
  console.log("----");
  console.log("Diagnostics:", diagnostics.length);
}

main().catch((err: unknown) => {
  console.error("Projection failed:", toClientError(err));
  process.exitCode = 1;
});
