// /src/lib/config/env.ts
import { z } from "zod";
import type { EngineParameters, LogLevel } from "../../contracts";
import { DEFAULT_ENGINE_PARAMETERS, loadEngineParametersFromFile } from "./engineParameters";

/**
 * Env:
 * - POLICY_ENGINE_LOG_LEVEL: debug | info | warn | warning | error | silent (default warning)
 * - POLICY_ENGINE_PARAMETERS: path to a JSON file of parameter overrides (optional)
 */
export const LOG_LEVEL_ENV = "POLICY_ENGINE_LOG_LEVEL";
export const PARAMETERS_PATH_ENV = "POLICY_ENGINE_PARAMETERS";

type Env = Readonly<Record<string, string | undefined>>;

const LogLevelEnvSchema = z
  .enum(["debug", "info", "warn", "warning", "error", "silent"])
  .transform((level): LogLevel => (level === "warn" ? "warning" : level));

export function readLogLevel(env: Env = process.env): LogLevel {
  const raw = env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  if (!raw) return "warning";

  const parsed = LogLevelEnvSchema.safeParse(raw);
  if (!parsed.success) {
    console.warn(`[CONFIG] Ignoring unknown ${LOG_LEVEL_ENV}="${raw}", using "warning"`);
    return "warning";
  }
  return parsed.data;
}

export async function loadEngineParametersFromEnv(env: Env = process.env): Promise<EngineParameters> {
  const filePath = env[PARAMETERS_PATH_ENV]?.trim();
  if (!filePath) return DEFAULT_ENGINE_PARAMETERS;
  return loadEngineParametersFromFile(filePath);
}
