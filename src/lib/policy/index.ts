// /src/lib/policy/index.ts
export * from "./parsePolicyMechanics";
