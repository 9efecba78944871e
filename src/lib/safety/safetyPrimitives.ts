// /src/lib/safety/safetyPrimitives.ts
// Guarded arithmetic, macro-input validators and extreme-value detectors.
// Every calculator routes its divisions and GDP/population inputs through here.

import {
  REFERENCE_DATA_KEYS,
  type DiagnosticCode,
  type DiagnosticSeverity,
  type DiagnosticSink,
  type EngineParameters,
  type ReferenceDataKey,
  type ReferenceDataRecord,
  type ResolvedReferenceData,
  type SafetyThresholds,
} from "../../contracts";
import { DEFAULT_ENGINE_PARAMETERS } from "../config/engineParameters";
import { readLogLevel } from "../config/env";
import { createConsoleSink, teeSinks } from "./diagnostics";

export type ClampResult = { value: number; wasClamped: boolean };
export type GrowthAdjustment = { growth: number; wasAdjusted: boolean };
export type ExtremeCheck = { isExtreme: boolean; message: string | null };

export type PercentageValidationOptions = {
  /** Permit values down to -1 (-100%). */
  allowNegative?: boolean;
  /** Drop the upper bound of 1 (100%). */
  allowOver100?: boolean;
  context?: string;
};

export type SafetyPrimitivesOptions = {
  parameters?: EngineParameters;
  sink?: DiagnosticSink;
};

const UNKNOWN_REFERENCE_DATA: Readonly<ReferenceDataRecord> = Object.freeze({
  error: "Unknown data type",
  source: "error",
});

function isReferenceDataKey(key: string): key is ReferenceDataKey {
  return REFERENCE_DATA_KEYS.some((k) => k === key);
}

function pct(x: number, digits = 1): string {
  return (x * 100).toFixed(digits);
}

function yearLabel(year: number | undefined): string {
  return year === undefined ? "unknown" : String(year);
}

export class SafetyPrimitives {
  readonly parameters: EngineParameters;
  readonly sink: DiagnosticSink;

  constructor(options: SafetyPrimitivesOptions = {}) {
    this.parameters = options.parameters ?? DEFAULT_ENGINE_PARAMETERS;
    this.sink = options.sink ?? createConsoleSink(readLogLevel());
  }

  get thresholds(): SafetyThresholds {
    return this.parameters.safety;
  }

  /** Same parameters; diagnostics go to the existing sink and then to `observer`. */
  withObserver(observer: DiagnosticSink): SafetyPrimitives {
    return new SafetyPrimitives({
      parameters: this.parameters,
      sink: teeSinks(this.sink, observer),
    });
  }

  private report(
    severity: DiagnosticSeverity,
    code: DiagnosticCode,
    message: string,
    context: string,
    year?: number,
  ): void {
    this.sink(year === undefined ? { severity, code, message, context } : { severity, code, message, context, year });
  }

  /**
   * numerator / denominator, or `fallback` when the denominator is effectively zero
   * or the quotient is not finite. A non-finite fallback is replaced by 0.
   */
  safeDivide(numerator: number, denominator: number, fallback = 0, context = ""): number {
    const safeFallback = Number.isFinite(fallback) ? fallback : 0;
    const where = context ? ` in ${context}` : "";

    if (Math.abs(denominator) < this.thresholds.divisionEpsilon) {
      this.report(
        "warning",
        "DIVISION_BY_ZERO",
        `Division by zero${where}: ${numerator}/${denominator} = ${safeFallback} (default)`,
        context,
      );
      return safeFallback;
    }

    const result = numerator / denominator;
    if (!Number.isFinite(result)) {
      this.report(
        "warning",
        "NON_FINITE_RESULT",
        `Non-finite result${where}: ${numerator}/${denominator} = ${result}, returning ${safeFallback}`,
        context,
      );
      return safeFallback;
    }

    return result;
  }

  /** Pass finite values through; replace NaN/Infinity with `fallback`. */
  ensureFinite(value: number, fallback = 0, context = ""): number {
    if (Number.isFinite(value)) return value;
    const safeFallback = Number.isFinite(fallback) ? fallback : 0;
    this.report(
      "warning",
      "NON_FINITE_RESULT",
      `Non-finite value in ${context || "calculation"}: ${value}, returning ${safeFallback}`,
      context,
    );
    return safeFallback;
  }

  /** max(gdp, minGdp). NaN is floored as well. */
  validateGdp(gdp: number, year?: number): number {
    const { minGdp } = this.thresholds;
    if (gdp >= minGdp) return gdp;

    this.report(
      "warning",
      "GDP_FLOOR_APPLIED",
      `GDP ${gdp.toFixed(3)} (year ${yearLabel(year)}) is below minimum ${minGdp}. ` +
        `Using minimum to prevent division by zero.`,
      "gdp",
      year,
    );
    return minGdp;
  }

  validatePopulation(population: number, year?: number): number {
    const { minPopulation } = this.thresholds;
    if (population >= minPopulation) return population;

    this.report(
      "warning",
      "POPULATION_FLOOR_APPLIED",
      `Population ${population.toLocaleString("en-US", { maximumFractionDigits: 0 })} ` +
        `(year ${yearLabel(year)}) is below minimum ${minPopulation.toLocaleString("en-US")}. ` +
        `Using minimum to prevent division by zero.`,
      "population",
      year,
    );
    return minPopulation;
  }

  /** Clamp into [min, max]. NaN clamps to `min`. */
  clampValue(value: number, min: number, max: number, name = "value"): ClampResult {
    let clamped = value;
    if (Number.isNaN(value) || value < min) clamped = min;
    else if (value > max) clamped = max;

    if (Object.is(clamped, value)) return { value, wasClamped: false };

    this.report(
      "warning",
      "VALUE_CLAMPED",
      `${name} clamped: ${value} -> ${clamped} (range: [${min}, ${max}])`,
      name,
    );
    return { value: clamped, wasClamped: true };
  }

  /**
   * Range-check decimal percentages. Stops at the first value out of range and reports it.
   * Default range [0, 1]; allowNegative lowers the floor to -1; allowOver100 drops the ceiling.
   */
  validatePercentages(
    percentages: ReadonlyArray<number>,
    options: PercentageValidationOptions = {},
  ): boolean {
    const min = options.allowNegative ? -1 : 0;
    const max = options.allowOver100 ? Number.POSITIVE_INFINITY : 1;
    const context = options.context ?? "";

    for (const [i, p] of percentages.entries()) {
      if (p >= min && p <= max) continue;

      const range = Number.isFinite(max)
        ? `between ${min * 100}% and ${max * 100}%`
        : `at least ${min * 100}%`;
      this.report(
        "error",
        "PERCENTAGE_OUT_OF_RANGE",
        `Invalid percentage in ${context || "input"}: ${pct(p)}% (index ${i}). Must be ${range}.`,
        context,
      );
      return false;
    }

    return true;
  }

  /**
   * Cap GDP growth to the extreme-growth band and, when negative growth is not allowed,
   * floor it at 0 (growth of exactly 0 counts as adjusted). Caps are user-facing warnings.
   */
  handleRecessionGdpGrowth(growth: number, year?: number, allowNegative = true): GrowthAdjustment {
    const { extremeGdpGrowthMin, extremeGdpGrowthMax } = this.thresholds;
    const original = growth;
    let adjusted = growth;
    let wasAdjusted = false;

    if (Number.isNaN(adjusted)) {
      this.report(
        "user-warning",
        "NON_FINITE_GDP_GROWTH",
        `GDP growth is not a number (year ${yearLabel(year)}). Using 0.0%.`,
        "gdp growth",
        year,
      );
      adjusted = 0;
      wasAdjusted = true;
    }

    if (adjusted < extremeGdpGrowthMin) {
      this.report(
        "user-warning",
        "EXTREME_GDP_CONTRACTION",
        `Extreme GDP contraction detected: ${pct(adjusted)}% (year ${yearLabel(year)}). ` +
          `This is worse than the Great Depression (-12.9% in 1932). ` +
          `Capping at ${pct(extremeGdpGrowthMin)}%.`,
        "gdp growth",
        year,
      );
      adjusted = extremeGdpGrowthMin;
      wasAdjusted = true;
    }

    if (adjusted > extremeGdpGrowthMax) {
      this.report(
        "user-warning",
        "EXTREME_GDP_GROWTH",
        `Extreme GDP growth detected: ${pct(adjusted)}% (year ${yearLabel(year)}). ` +
          `Sustained growth above 10% is historically rare. ` +
          `Capping at ${pct(extremeGdpGrowthMax)}%.`,
        "gdp growth",
        year,
      );
      adjusted = extremeGdpGrowthMax;
      wasAdjusted = true;
    }

    if (!allowNegative && adjusted <= 0) {
      this.report(
        "warning",
        "NEGATIVE_GROWTH_FLOORED",
        `Negative GDP growth ${pct(adjusted, 2)}% (year ${yearLabel(year)}) ` +
          `not allowed in this context. Flooring at 0%.`,
        "gdp growth",
        year,
      );
      adjusted = 0;
      wasAdjusted = true;
    }

    if (wasAdjusted) {
      this.report(
        "info",
        "GDP_GROWTH_ADJUSTED",
        `GDP growth adjusted: ${pct(original, 2)}% -> ${pct(adjusted, 2)}% (year ${yearLabel(year)})`,
        "gdp growth",
        year,
      );
    }

    return { growth: adjusted, wasAdjusted };
  }

  /** Flags debt/GDP above the extreme ratio. Zero GDP gives a ratio of 0, which is not extreme. */
  checkExtremeDebt(debt: number, gdp: number, year?: number): ExtremeCheck {
    const ratio = this.safeDivide(debt, gdp, 0, "debt-to-GDP ratio");
    if (!(ratio > this.thresholds.extremeDebtGdpRatio)) return { isExtreme: false, message: null };

    const message =
      `Extreme debt-to-GDP ratio detected: ${pct(ratio)}% (year ${yearLabel(year)}). ` +
      `This exceeds Japan's peak of ~240%. ` +
      `Model predictions may be unreliable at these extreme levels.`;
    this.report("warning", "EXTREME_DEBT", message, "debt-to-GDP ratio", year);
    return { isExtreme: true, message };
  }

  checkExtremeInflation(inflation: number, year?: number): ExtremeCheck {
    const { extremeInflationMin, extremeInflationMax } = this.thresholds;

    if (inflation < extremeInflationMin) {
      const message =
        `Severe deflation detected: ${pct(inflation)}% (year ${yearLabel(year)}). ` +
        `This may indicate economic crisis.`;
      this.report("warning", "EXTREME_DEFLATION", message, "inflation", year);
      return { isExtreme: true, message };
    }

    if (inflation > extremeInflationMax) {
      const message =
        `Hyperinflation detected: ${pct(inflation)}% (year ${yearLabel(year)}). ` +
        `Model assumptions may not hold in hyperinflation scenarios.`;
      this.report("warning", "HYPERINFLATION", message, "inflation", year);
      return { isExtreme: true, message };
    }

    return { isExtreme: false, message: null };
  }

  checkExtremeInterestRate(rate: number, year?: number): ExtremeCheck {
    if (!(rate > this.thresholds.extremeInterestRateMax)) return { isExtreme: false, message: null };

    const message =
      `Extreme interest rate detected: ${pct(rate)}% (year ${yearLabel(year)}). ` +
      `This exceeds typical crisis levels (Paul Volcker's peak was 20%).`;
    this.report("warning", "EXTREME_INTEREST_RATE", message, "interest rate", year);
    return { isExtreme: true, message };
  }

  /**
   * Resolve reference data when the upstream source has nothing for `key`:
   * non-empty fallback, then cached[key], then the hardcoded default, then an "unknown" record.
   */
  handleMissingReferenceData(
    key: string,
    fallback?: Readonly<ReferenceDataRecord> | null,
    cached?: Readonly<Record<string, Readonly<ReferenceDataRecord>>> | null,
  ): ResolvedReferenceData {
    const context = "reference data";
    this.report(
      "warning",
      "REFERENCE_DATA_MISSING",
      `Reference data unavailable for '${key}'. Using fallback data.`,
      context,
    );

    if (fallback && Object.keys(fallback).length > 0) {
      this.report("info", "REFERENCE_DATA_RESOLVED", `Using provided fallback data for '${key}'`, context);
      return { key, tier: "fallback", data: fallback };
    }

    const hit = cached && Object.hasOwn(cached, key) ? cached[key] : undefined;
    if (hit) {
      this.report("info", "REFERENCE_DATA_RESOLVED", `Using cached data for '${key}'`, context);
      return { key, tier: "cached", data: hit };
    }

    if (isReferenceDataKey(key)) {
      this.report(
        "warning",
        "REFERENCE_DATA_RESOLVED",
        `No fallback or cached data available. Using hardcoded defaults for '${key}'`,
        context,
      );
      return { key, tier: "default", data: this.parameters.referenceDefaults[key] };
    }

    this.report("warning", "REFERENCE_DATA_MISSING", `No reference data of any tier for '${key}'`, context);
    return { key, tier: "unknown", data: UNKNOWN_REFERENCE_DATA };
  }

  /** amount / validated GDP, as a decimal. */
  safePercentageOfGdp(amount: number, gdp: number, context = ""): number {
    return this.safeDivide(amount, this.validateGdp(gdp), 0, context);
  }

  safePerCapita(total: number, population: number, context = ""): number {
    return this.safeDivide(total, this.validatePopulation(population), 0, context);
  }
}

/** Default parameters, console sink at POLICY_ENGINE_LOG_LEVEL. */
export const defaultSafety = new SafetyPrimitives();

export const safeDivide = defaultSafety.safeDivide.bind(defaultSafety);
export const ensureFinite = defaultSafety.ensureFinite.bind(defaultSafety);
export const validateGdp = defaultSafety.validateGdp.bind(defaultSafety);
export const validatePopulation = defaultSafety.validatePopulation.bind(defaultSafety);
export const clampValue = defaultSafety.clampValue.bind(defaultSafety);
export const validatePercentages = defaultSafety.validatePercentages.bind(defaultSafety);
export const handleRecessionGdpGrowth = defaultSafety.handleRecessionGdpGrowth.bind(defaultSafety);
export const checkExtremeDebt = defaultSafety.checkExtremeDebt.bind(defaultSafety);
export const checkExtremeInflation = defaultSafety.checkExtremeInflation.bind(defaultSafety);
export const checkExtremeInterestRate = defaultSafety.checkExtremeInterestRate.bind(defaultSafety);
export const handleMissingReferenceData = defaultSafety.handleMissingReferenceData.bind(defaultSafety);
export const safePercentageOfGdp = defaultSafety.safePercentageOfGdp.bind(defaultSafety);
export const safePerCapita = defaultSafety.safePerCapita.bind(defaultSafety);
