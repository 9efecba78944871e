// /src/lib/safety/index.ts
export * from "./diagnostics";
export * from "./safetyPrimitives";
