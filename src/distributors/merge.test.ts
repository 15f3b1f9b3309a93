/**
 * Result merging tests
 */

import { describe, it, expect } from "vitest";
import { dedupeByMpn } from "./merge.js";
import { normalizeDigiKeyProduct } from "./digikey/normalizer.js";

const part = (mpn: string, dk: string) =>
  normalizeDigiKeyProduct(
    { ManufacturerProductNumber: mpn, ProductVariations: [{ DigiKeyProductNumber: dk }] },
    "USD",
  );

describe("dedupeByMpn", () => {
  it("should keep the first part per MPN ignoring case", () => {
    const result = dedupeByMpn([part("LM358", "a"), part("lm358", "b"), part("NE555", "c")]);
    expect(result.map((p) => p.part_number)).toEqual(["a", "c"]);
  });

  it("should never merge parts without an MPN", () => {
    const result = dedupeByMpn([part("", "a"), part("", "b")]);
    expect(result).toHaveLength(2);
  });
});
