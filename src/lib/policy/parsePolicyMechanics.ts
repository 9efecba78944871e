// /src/lib/policy/parsePolicyMechanics.ts

import {
  FUNDING_SOURCE_TYPES,
  PolicyMechanicsSchema,
  type PolicyMechanics,
} from "../../contracts";
import { deepFreeze } from "../deepFreeze";
import { PolicyMechanicsParseError, formatZodIssues } from "../errors";

const KNOWN_SOURCE_TYPES: ReadonlySet<string> = new Set<string>(FUNDING_SOURCE_TYPES);

/** Fields an "other" mechanism keeps when an unrecognized kind is folded into it. */
const OTHER_MECHANISM_FIELDS = ["percentage_gdp", "description", "phase_in_start", "phase_in_end", "conditions"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Unrecognized source kinds (e.g. "transaction_tax") become `other` mechanisms labelled
 * with the original kind. Anything that is not a mechanism-shaped object is left for the
 * schema to reject.
 */
function normalizeMechanism(raw: unknown): unknown {
  if (!isRecord(raw)) return raw;

  const sourceType = raw.source_type;
  if (typeof sourceType !== "string" || KNOWN_SOURCE_TYPES.has(sourceType)) return raw;

  const other: Record<string, unknown> = {
    source_type: "other",
    label: typeof raw.label === "string" && raw.label.trim() ? raw.label : sourceType,
  };
  for (const field of OTHER_MECHANISM_FIELDS) {
    if (raw[field] !== undefined) other[field] = raw[field];
  }
  return other;
}

function normalizePolicy(raw: unknown): unknown {
  if (!isRecord(raw) || !Array.isArray(raw.funding_mechanisms)) return raw;
  return { ...raw, funding_mechanisms: raw.funding_mechanisms.map(normalizeMechanism) };
}

/**
 * Validation boundary for policy configuration. Returns a frozen, fully-defaulted
 * PolicyMechanics or throws PolicyMechanicsParseError listing every issue.
 */
export function parsePolicyMechanics(raw: unknown): PolicyMechanics {
  const result = PolicyMechanicsSchema.safeParse(normalizePolicy(raw));

  if (!result.success) {
    throw new PolicyMechanicsParseError("Policy mechanics failed validation.", formatZodIssues(result.error));
  }

  return deepFreeze(result.data);
}

/** Non-throwing variant for callers that render issues inline. */
export function safeParsePolicyMechanics(
  raw: unknown,
): { ok: true; mechanics: PolicyMechanics } | { ok: false; issues: string[] } {
  const result = PolicyMechanicsSchema.safeParse(normalizePolicy(raw));
  if (!result.success) return { ok: false, issues: formatZodIssues(result.error) };
  return { ok: true, mechanics: deepFreeze(result.data) };
}
