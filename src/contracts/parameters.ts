// /src/contracts/parameters.ts
/**
 * Engine parameter set contract.
 *
 * Every threshold, floor, sector share and hardcoded default the engine uses lives here,
 * versioned, so tests and callers can override them without touching module constants.
 * Rates and shares are decimals (0.53 = 53%).
 */

import { z } from "zod";
import { RampCurveSchema } from "./mechanics";
import { ReferenceDefaultsSchema } from "./referenceData";

const Positive = z.number().finite().positive();
const Fraction = z.number().finite().min(0).max(1);
const RampYears = z.number().finite().min(0);

const SafetyThresholdsObject = z
  .object({
    /** Floor applied to GDP before it is used as a divisor (same units as GDP inputs). */
    minGdp: Positive,
    minPopulation: Positive,
    /** |denominator| below this counts as zero. */
    divisionEpsilon: Positive,
    extremeGdpGrowthMin: z.number().finite(),
    extremeGdpGrowthMax: z.number().finite(),
    extremeInflationMin: z.number().finite(),
    extremeInflationMax: z.number().finite(),
    extremeDebtGdpRatio: Positive,
    extremeInterestRateMax: Positive,
  })
  .strict();

export const SafetyThresholdsSchema = SafetyThresholdsObject
  .refine((t) => t.extremeGdpGrowthMin < t.extremeGdpGrowthMax, {
    message: "extremeGdpGrowthMin must be below extremeGdpGrowthMax.",
    path: ["extremeGdpGrowthMin"],
  })
  .refine((t) => t.extremeInflationMin < t.extremeInflationMax, {
    message: "extremeInflationMin must be below extremeInflationMax.",
    path: ["extremeInflationMin"],
  });

export type SafetyThresholds = z.infer<typeof SafetyThresholdsSchema>;

export const RevenueParametersSchema = z
  .object({
    /** Wages as a share of GDP; the payroll tax base. */
    wageShareOfGdp: Fraction,
    /** Share of the population employed. Recorded for calibration; not applied to the wage base. */
    employmentRate: Fraction,
    /** Default share of premiums converted when a mechanism does not declare one. */
    conversionRate: Fraction,
    convertedPremiumsRampYears: RampYears,
    efficiencyGainsRampYears: RampYears,
    efficiencyGainsCurve: RampCurveSchema,
  })
  .strict();

export type RevenueParameters = z.infer<typeof RevenueParametersSchema>;

/** How total savings on the target path are attributed across buckets. Must sum to 1. */
const SavingsAttributionObject = z
  .object({
    administrative: Fraction,
    drugPricing: Fraction,
    preventiveCare: Fraction,
    other: Fraction,
  })
  .strict();

export const SavingsAttributionSchema = SavingsAttributionObject.refine(
  (w) => Math.abs(w.administrative + w.drugPricing + w.preventiveCare + w.other - 1) < 1e-9,
  { message: "Savings attribution weights must sum to 1." },
);

export type SavingsAttribution = z.infer<typeof SavingsAttributionSchema>;

export const SectorSavingsParametersSchema = z
  .object({
    /** Share of baseline spending the sector represents. */
    sectorShare: Fraction,
    /** Reduction achieved inside the sector at full effect. */
    reductionPct: Fraction,
    rampYears: RampYears,
  })
  .strict();

export type SectorSavingsParameters = z.infer<typeof SectorSavingsParametersSchema>;

export const SpendingParametersSchema = z
  .object({
    /** Baseline spending as a share of GDP when the caller does not provide one. */
    defaultBaselinePctGdp: Fraction,
    attribution: SavingsAttributionSchema,
    administrative: SectorSavingsParametersSchema,
    drugPricing: SectorSavingsParametersSchema,
    /** Preventive care applies to all of baseline spending; sectorShare is normally 1. */
    preventiveCare: SectorSavingsParametersSchema,
  })
  .strict();

export type SpendingParameters = z.infer<typeof SpendingParametersSchema>;

export const EngineParametersSchema = z
  .object({
    version: z.string().min(1),
    safety: SafetyThresholdsSchema,
    revenue: RevenueParametersSchema,
    spending: SpendingParametersSchema,
    referenceDefaults: ReferenceDefaultsSchema,
  })
  .strict();

export type EngineParameters = z.infer<typeof EngineParametersSchema>;

/**
 * Partial overrides, merged section by section over a base parameter set.
 * The merged result is validated against EngineParametersSchema.
 */
export const EngineParameterOverridesSchema = z
  .object({
    version: z.string().min(1).optional(),
    safety: SafetyThresholdsObject.partial().optional(),
    revenue: RevenueParametersSchema.partial().optional(),
    spending: z
      .object({
        defaultBaselinePctGdp: Fraction,
        attribution: SavingsAttributionObject.partial(),
        administrative: SectorSavingsParametersSchema.partial(),
        drugPricing: SectorSavingsParametersSchema.partial(),
        preventiveCare: SectorSavingsParametersSchema.partial(),
      })
      .partial()
      .strict()
      .optional(),
    referenceDefaults: ReferenceDefaultsSchema.partial().optional(),
  })
  .strict();

export type EngineParameterOverrides = z.infer<typeof EngineParameterOverridesSchema>;
