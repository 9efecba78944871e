// /src/lib/mechanics/index.ts
export * from "./engine";
export * from "./ramp";
export * from "./breakdowns";
export * from "./revenue";
export * from "./spending";
export * from "./surplus";
export * from "./circuitBreakers";
export * from "./outcomes";
export * from "./serialize";
