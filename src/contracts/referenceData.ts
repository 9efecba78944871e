// /src/contracts/referenceData.ts
/**
 * Reference (baseline budget) data used when an upstream source has nothing for a key.
 */

import { z } from "zod";

export const REFERENCE_DATA_KEYS = ["gdp", "revenues", "spending", "debt", "interest_rate"] as const;
export type ReferenceDataKey = typeof REFERENCE_DATA_KEYS[number];

/** Flat record of figures plus string tags such as `source`. */
export const ReferenceDataRecordSchema = z.record(z.string(), z.union([z.number().finite(), z.string()]));
export type ReferenceDataRecord = z.infer<typeof ReferenceDataRecordSchema>;

export const ReferenceDefaultsSchema = z
  .object({
    gdp: ReferenceDataRecordSchema,
    revenues: ReferenceDataRecordSchema,
    spending: ReferenceDataRecordSchema,
    debt: ReferenceDataRecordSchema,
    interest_rate: ReferenceDataRecordSchema,
  })
  .strict();

export type ReferenceDefaults = z.infer<typeof ReferenceDefaultsSchema>;

/**
 * Which tier produced the data:
 * fallback (caller-supplied) > cached > default (hardcoded) > unknown (no tier had the key).
 */
export type ReferenceDataTier = "fallback" | "cached" | "default" | "unknown";

export interface ResolvedReferenceData {
  key: string;
  tier: ReferenceDataTier;
  data: Readonly<ReferenceDataRecord>;
}
