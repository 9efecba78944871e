// /src/contracts/mechanics.ts
/**
 * Policy mechanics contract - LOCKED
 *
 * Declarative description of how a policy raises revenue, reduces spending,
 * allocates surplus and guards itself with circuit breakers.
 *
 * Field names stay snake_case: these records arrive from outside the engine
 * (scenario builders, UI forms) and are echoed back in exports.
 *
 * Percentages in this contract are expressed 0-100 unless a field says otherwise.
 */

import { z } from "zod";

/** Percentage expressed 0-100. */
const Percent100Schema = z.number().finite().min(0).max(100);

/** Fraction expressed 0-1. */
const FractionSchema = z.number().finite().min(0).max(1);

/** Ramp length in years. Negative ramps are a contract violation. */
const RampYearsSchema = z.number().finite().min(0);

export const RampCurveSchema = z.enum(["linear", "sigmoid"]);
export type RampCurve = z.infer<typeof RampCurveSchema>;

/**
 * Canonical funding source kinds. Anything else is normalized to "other"
 * at the validation boundary (see lib/policy/parsePolicyMechanics.ts).
 */
export const FUNDING_SOURCE_TYPES = [
  "payroll_tax",
  "redirected_federal",
  "converted_premiums",
  "efficiency_gains",
  "other",
] as const;

export type FundingSourceType = typeof FUNDING_SOURCE_TYPES[number];

/** Informational metadata carried by every mechanism; never used in math. */
const MechanismMetadataShape = {
  description: z.string().optional(),
  phase_in_start: z.number().int().optional(),
  phase_in_end: z.number().int().optional(),
  conditions: z.array(z.string()).optional(),
};

export const PayrollTaxMechanismSchema = z
  .object({
    source_type: z.literal("payroll_tax"),
    /** Flat rate applied to the wage base, e.g. 15 for 15%. */
    percentage_rate: Percent100Schema.default(0),
    ...MechanismMetadataShape,
  })
  .strict();

export const RedirectedFederalMechanismSchema = z
  .object({
    source_type: z.literal("redirected_federal"),
    percentage_gdp: Percent100Schema.default(0),
    ...MechanismMetadataShape,
  })
  .strict();

export const ConvertedPremiumsMechanismSchema = z
  .object({
    source_type: z.literal("converted_premiums"),
    percentage_gdp: Percent100Schema.default(0),
    /** Share of premiums successfully converted (0-1). */
    conversion_rate: FractionSchema.optional(),
    ramp_years: RampYearsSchema.optional(),
    ...MechanismMetadataShape,
  })
  .strict();

export const EfficiencyGainsMechanismSchema = z
  .object({
    source_type: z.literal("efficiency_gains"),
    percentage_gdp: Percent100Schema.default(0),
    ramp_years: RampYearsSchema.optional(),
    ramp_curve: RampCurveSchema.optional(),
    ...MechanismMetadataShape,
  })
  .strict();

export const OtherFundingMechanismSchema = z
  .object({
    source_type: z.literal("other"),
    /** Caller-facing name of the source, e.g. "transaction_tax". */
    label: z.string().min(1),
    percentage_gdp: Percent100Schema.default(0),
    ...MechanismMetadataShape,
  })
  .strict();

export const FundingMechanismSchema = z.discriminatedUnion("source_type", [
  PayrollTaxMechanismSchema,
  RedirectedFederalMechanismSchema,
  ConvertedPremiumsMechanismSchema,
  EfficiencyGainsMechanismSchema,
  OtherFundingMechanismSchema,
]);

export type FundingMechanism = z.infer<typeof FundingMechanismSchema>;

/** Keys the standard allocation buckets occupy when a breakdown is flattened. */
export const RESERVED_ALLOCATION_NAMES = [
  "total_surplus",
  "contingency_reserve",
  "debt_reduction",
  "infrastructure",
  "dividends",
  "unallocated",
] as const;

const RESERVED_ALLOCATION_NAME_SET: ReadonlySet<string> = new Set(RESERVED_ALLOCATION_NAMES);

/**
 * Surplus allocation rules.
 * Percentages are NOT required to sum to 100: anything left over stays outside the breakdown,
 * and anything over 100 is allocated as declared.
 */
export const SurplusAllocationRulesSchema = z
  .object({
    contingency_reserve_pct: z.number().finite().min(0).default(0),
    debt_reduction_pct: z.number().finite().min(0).default(0),
    infrastructure_pct: z.number().finite().min(0).default(0),
    dividends_pct: z.number().finite().min(0).default(0),
    other_allocations: z
      .record(z.string().min(1), z.number().finite().min(0))
      .default({})
      .superRefine((allocations, ctx) => {
        for (const name of Object.keys(allocations)) {
          if (RESERVED_ALLOCATION_NAME_SET.has(name)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              message: `"${name}" is reserved for a standard allocation bucket.`,
              path: [name],
            });
          }
        }
      })
      .transform((allocations) => new Map<string, number>(Object.entries(allocations))),
    trigger_conditions: z.array(z.string()).optional(),
  })
  .strict();

export type SurplusAllocationRules = z.output<typeof SurplusAllocationRulesSchema>;
export type SurplusAllocationRulesInput = z.input<typeof SurplusAllocationRulesSchema>;

export const CircuitBreakerTriggerTypeSchema = z.enum(["spending_cap", "surplus_trigger"]);
export type CircuitBreakerTriggerType = z.infer<typeof CircuitBreakerTriggerTypeSchema>;

export const CircuitBreakerRuleSchema = z
  .object({
    trigger_type: CircuitBreakerTriggerTypeSchema,
    /** Threshold as a percentage of GDP, e.g. 18 for 18%. */
    threshold_value: z.number().finite(),
    /** Informational; thresholds are always compared as percent of GDP. */
    threshold_unit: z.string().optional(),
    /** Free-text directive reported when the breaker fires, e.g. "freeze_taxes". */
    action: z.string(),
    description: z.string().optional(),
  })
  .strict();

export type CircuitBreakerRule = z.infer<typeof CircuitBreakerRuleSchema>;

/**
 * Innovation fund rules: a share of savings-vs-baseline is set aside,
 * capped at a share of a positive surplus.
 */
export const InnovationFundRulesSchema = z
  .object({
    funding_min_pct: Percent100Schema.default(0),
    funding_max_pct: Percent100Schema.default(0),
    annual_cap_pct: Percent100Schema.default(0),
    eligible_categories: z.array(z.string()).default([]),
  })
  .strict();

export type InnovationFundRules = z.output<typeof InnovationFundRulesSchema>;

export const TimelineMilestoneSchema = z
  .object({
    year: z.number().int(),
    description: z.string(),
    metric_type: z.string().optional(),
    target_value: z.number().finite().optional(),
  })
  .strict();

export type TimelineMilestone = z.infer<typeof TimelineMilestoneSchema>;

export const PolicyTypeSchema = z.enum(["healthcare", "tax_reform", "spending_reform", "combined"]);
export type PolicyType = z.infer<typeof PolicyTypeSchema>;

export const PolicyMechanicsSchema = z
  .object({
    policy_name: z.string().min(1).default("Uploaded Policy"),
    policy_type: PolicyTypeSchema.default("healthcare"),

    funding_mechanisms: z.array(FundingMechanismSchema).default([]),

    /** Target spending as a percentage of GDP (0-100). Used only together with target_spending_year. */
    target_spending_pct_gdp: Percent100Schema.nullable().default(null),
    target_spending_year: z.number().int().nullable().default(null),

    surplus_allocation: SurplusAllocationRulesSchema.nullable().default(null),
    circuit_breakers: z.array(CircuitBreakerRuleSchema).default([]),
    innovation_fund: InnovationFundRulesSchema.nullable().default(null),
    timeline_milestones: z.array(TimelineMilestoneSchema).default([]),
  })
  .strict();

export type PolicyMechanics = z.output<typeof PolicyMechanicsSchema>;
export type PolicyMechanicsInput = z.input<typeof PolicyMechanicsSchema>;
