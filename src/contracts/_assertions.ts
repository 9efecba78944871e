// src/contracts/_assertions.ts

/**
 * Compile-time guard to detect contract drift.
 *
 * If any of these contracts are renamed or structurally changed,
 * TypeScript will fail the type-check. The runtime export below is read by
 * the contracts test so the module is loaded at least once.
 */

import type {
  PolicyMechanics,
  FundingMechanism,
  FundingSourceType,
  SurplusAllocationRules,
  CircuitBreakerRule,

  EngineParameters,
  EngineParameterOverrides,

  RevenueBreakdown,
  SpendingBreakdown,
  SurplusBreakdown,

  MechanismOutcomeInput,
  MechanismOutcome,

  ProjectionInput,
  ProjectionResult,

  Diagnostic,
  ResolvedReferenceData,
} from "./index";

export type __contracts_assertions = {
  mechanics: PolicyMechanics;
  mechanism: FundingMechanism;
  allocation: SurplusAllocationRules;
  breaker: CircuitBreakerRule;

  parameters: EngineParameters;
  overrides: EngineParameterOverrides;

  revenue: RevenueBreakdown;
  spending: SpendingBreakdown;
  surplus: SurplusBreakdown;

  outcomeInput: MechanismOutcomeInput;
  outcome: MechanismOutcome;

  projectionInput: ProjectionInput;
  projectionResult: ProjectionResult;

  diagnostic: Diagnostic;
  referenceData: ResolvedReferenceData;
};

/** Every source_type in the closed union must be listed in FUNDING_SOURCE_TYPES, and vice versa. */
type _SourceTypesMatch = FundingMechanism["source_type"] extends FundingSourceType
  ? FundingSourceType extends FundingMechanism["source_type"]
    ? true
    : never
  : never;

export const __contracts_assertions__ok: _SourceTypesMatch = true;
