// /src/contracts/index.ts
/**
 * Contracts - Single Source of Truth
 *
 * Calculators, the orchestrator and the projection driver import shapes from here.
 * DO NOT define duplicate types in lib modules.
 */

// Policy mechanics (input configuration)
export * from "./mechanics";

// Engine parameter set (thresholds, floors, sector shares, defaults)
export * from "./parameters";

// Reference data fallback tiers
export * from "./referenceData";

// Diagnostics channel
export * from "./diagnostics";

// Per-year breakdown records
export * from "./breakdowns";

// Orchestrator input/output
export * from "./outcome";

// Multi-year projection
export * from "./projection";
