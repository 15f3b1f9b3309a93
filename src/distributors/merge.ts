/**
 * Helpers for combining distributor result lists.
 */

import type { NormalizedPart } from "../types.js";

/**
 * Keep the first part per manufacturer part number (case-insensitive).
 * Parts without an MPN are never merged.
 */
export const dedupeByMpn = (parts: readonly NormalizedPart[]): NormalizedPart[] => {
  const seen = new Set<string>();
  const unique: NormalizedPart[] = [];
  for (const part of parts) {
    const key = part.mfr_part_number.trim().toUpperCase();
    if (key) {
      if (seen.has(key)) continue;
      seen.add(key);
    }
    unique.push(part);
  }
  return unique;
};
