// /src/lib/mechanics/engine.ts

import type { DiagnosticSink, EngineParameterOverrides, EngineParameters } from "../../contracts";
import { resolveEngineParameters } from "../config/engineParameters";
import { SafetyPrimitives, defaultSafety } from "../safety/safetyPrimitives";

/**
 * What every calculator runs against: one parameter set and the safety layer bound to it.
 * Passed explicitly as the last argument; the default uses the v1 parameters and the console sink.
 */
export interface EngineContext {
  readonly parameters: EngineParameters;
  readonly safety: SafetyPrimitives;
}

export type CreateEngineContextOptions = {
  parameters?: EngineParameters;
  /** Merged over `parameters` (or the defaults) and validated. */
  overrides?: EngineParameterOverrides;
  sink?: DiagnosticSink;
};

export function createEngineContext(options: CreateEngineContextOptions = {}): EngineContext {
  const parameters = options.overrides
    ? resolveEngineParameters(options.overrides, options.parameters)
    : options.parameters ?? defaultSafety.parameters;

  const safety = new SafetyPrimitives({ parameters, sink: options.sink ?? defaultSafety.sink });
  return Object.freeze({ parameters, safety });
}

/** Same parameters, diagnostics additionally delivered to `observer`. */
export function observeEngine(engine: EngineContext, observer: DiagnosticSink): EngineContext {
  return Object.freeze({ parameters: engine.parameters, safety: engine.safety.withObserver(observer) });
}

export const DEFAULT_ENGINE_CONTEXT: EngineContext = Object.freeze({
  parameters: defaultSafety.parameters,
  safety: defaultSafety,
});
