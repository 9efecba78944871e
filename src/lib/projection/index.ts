// /src/lib/projection/index.ts
export * from "./projectPolicy";
