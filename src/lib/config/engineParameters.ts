// /src/lib/config/engineParameters.ts

import { readFile } from "node:fs/promises";
import path from "node:path";
import {
  EngineParameterOverridesSchema,
  EngineParametersSchema,
  type EngineParameterOverrides,
  type EngineParameters,
} from "../../contracts";
import { deepFreeze } from "../deepFreeze";
import { EngineParametersParseError, formatZodIssues } from "../errors";

/**
 * Engine parameters, version 1.
 *
 * Sources for the defaults:
 * - Wage share of GDP (~53%) and employment rate (~63%): BEA/BLS aggregates.
 * - Administrative share of US health spending (~27.5%), drug share (~11%): CMS NHE.
 * - Extreme-value thresholds: historical crises (Great Depression -12.9% GDP in 1932,
 *   Japan's ~240% debt/GDP peak, Volcker-era 20% rates).
 * - Reference defaults: CBO baseline, trillions of dollars.
 */
export const DEFAULT_ENGINE_PARAMETERS: EngineParameters = deepFreeze({
  version: "1",
  safety: {
    minGdp: 1.0,
    minPopulation: 1_000_000,
    divisionEpsilon: 1e-10,
    extremeGdpGrowthMin: -0.15,
    extremeGdpGrowthMax: 0.2,
    extremeInflationMin: -0.05,
    extremeInflationMax: 0.25,
    extremeDebtGdpRatio: 2.5,
    extremeInterestRateMax: 0.25,
  },
  revenue: {
    wageShareOfGdp: 0.53,
    employmentRate: 0.63,
    conversionRate: 0.95,
    convertedPremiumsRampYears: 8,
    efficiencyGainsRampYears: 8,
    efficiencyGainsCurve: "sigmoid",
  },
  spending: {
    defaultBaselinePctGdp: 0.185,
    attribution: {
      administrative: 0.4,
      drugPricing: 0.25,
      preventiveCare: 0.2,
      other: 0.15,
    },
    administrative: { sectorShare: 0.275, reductionPct: 0.3, rampYears: 5 },
    drugPricing: { sectorShare: 0.11, reductionPct: 0.5, rampYears: 3 },
    preventiveCare: { sectorShare: 1, reductionPct: 0.15, rampYears: 10 },
  },
  referenceDefaults: {
    gdp: { value: 28.0, growth: 0.02, source: "hardcoded_default" },
    revenues: {
      income_tax: 2.4,
      payroll_tax: 1.6,
      corporate_tax: 0.5,
      other: 0.7,
      total: 5.2,
      source: "hardcoded_default",
    },
    spending: {
      social_security: 1.4,
      medicare: 0.9,
      medicaid: 0.6,
      defense: 0.8,
      interest_debt: 0.7,
      other_mandatory: 0.8,
      other_discretionary: 1.0,
      total: 6.2,
      source: "hardcoded_default",
    },
    debt: { value: 36.0, source: "hardcoded_default" },
    interest_rate: { value: 0.04, source: "hardcoded_default" },
  },
});

/**
 * Merge partial overrides over a base parameter set, section by section,
 * and validate the result. Throws EngineParametersParseError when the merge is invalid.
 */
export function resolveEngineParameters(
  overrides: EngineParameterOverrides = {},
  base: EngineParameters = DEFAULT_ENGINE_PARAMETERS,
): EngineParameters {
  const spending = overrides.spending ?? {};

  const merged = {
    version: overrides.version ?? base.version,
    safety: { ...base.safety, ...overrides.safety },
    revenue: { ...base.revenue, ...overrides.revenue },
    spending: {
      defaultBaselinePctGdp: spending.defaultBaselinePctGdp ?? base.spending.defaultBaselinePctGdp,
      attribution: { ...base.spending.attribution, ...spending.attribution },
      administrative: { ...base.spending.administrative, ...spending.administrative },
      drugPricing: { ...base.spending.drugPricing, ...spending.drugPricing },
      preventiveCare: { ...base.spending.preventiveCare, ...spending.preventiveCare },
    },
    referenceDefaults: { ...base.referenceDefaults, ...overrides.referenceDefaults },
  };

  const result = EngineParametersSchema.safeParse(merged);
  if (!result.success) {
    throw new EngineParametersParseError(
      "Engine parameters failed validation.",
      formatZodIssues(result.error),
    );
  }

  return deepFreeze(result.data);
}

/**
 * Validate untyped overrides (e.g. parsed JSON) and merge them over the defaults.
 */
export function parseEngineParameterOverrides(raw: unknown): EngineParameters {
  const result = EngineParameterOverridesSchema.safeParse(raw);
  if (!result.success) {
    throw new EngineParametersParseError(
      "Engine parameter overrides failed validation.",
      formatZodIssues(result.error),
    );
  }
  return resolveEngineParameters(result.data);
}

/**
 * Node runtime loader. Relative paths resolve against the working directory.
 */
export async function loadEngineParametersFromFile(filePath: string): Promise<EngineParameters> {
  const absolute = path.isAbsolute(filePath) ? filePath : path.join(process.cwd(), filePath);

  const text = await readFile(absolute, "utf8");

  let raw: unknown;
  try {
    raw = JSON.parse(text) as unknown;
  } catch (e) {
    const msg = e instanceof Error ? e.message : "Unknown JSON parse error";
    throw new EngineParametersParseError("Failed to parse engine parameters JSON.", [msg]);
  }

  return parseEngineParameterOverrides(raw);
}
