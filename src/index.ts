// /src/index.ts
// Public surface of the engine. Internal modules import each other directly, not through here.

export * from "./contracts";

export * from "./lib/errors";
export * from "./lib/config/engineParameters";
export * from "./lib/config/env";

export * from "./lib/safety";
export * from "./lib/mechanics";
export * from "./lib/policy";
export * from "./lib/projection";
