/**
 * MPN normalization and detection tests
 */

import { describe, it, expect } from "vitest";
import { normalizeMpn, looksLikeMpn } from "./mpn.js";

describe("looksLikeMpn", () => {
  it("should accept IC-style part numbers", () => {
    expect(looksLikeMpn("STM32F103C8T6")).toBe(true);
    expect(looksLikeMpn("MCP73831-2ACI/MC")).toBe(true);
    expect(looksLikeMpn("ESP32-C3")).toBe(true);
    expect(looksLikeMpn("NE555")).toBe(true);
  });

  it("should accept part numbers carrying ordering suffixes", () => {
    expect(looksLikeMpn("STM32F103C8T6-TR")).toBe(true);
    expect(looksLikeMpn("LM1117-3.3#PBF")).toBe(true);
  });

  it("should accept discrete-style part numbers", () => {
    expect(looksLikeMpn("1N4148")).toBe(true);
    expect(looksLikeMpn("2N2222")).toBe(true);
  });

  it("should be case-insensitive", () => {
    expect(looksLikeMpn("stm32f103c8t6")).toBe(true);
    expect(looksLikeMpn("mcp73831-2aci/mc")).toBe(true);
  });

  it("should reject descriptive queries", () => {
    expect(looksLikeMpn("resistor")).toBe(false);
    expect(looksLikeMpn("10k")).toBe(false);
    expect(looksLikeMpn("abc")).toBe(false);
    expect(looksLikeMpn("")).toBe(false);
  });

  it("should reject queries outside the length bounds", () => {
    expect(looksLikeMpn("A1")).toBe(false);
    expect(looksLikeMpn(`STM32${"X".repeat(40)}`)).toBe(false);
  });

  it("should reject mixed queries without an MPN shape", () => {
    // letters and digits, but neither prefix shape nor a separator
    expect(looksLikeMpn("100nF cap")).toBe(false);
  });
});

describe("normalizeMpn", () => {
  it("should return only the original when nothing applies", () => {
    expect(normalizeMpn("LM1117-3.3")).toEqual(["LM1117-3.3"]);
  });

  it("should strip a tape-and-reel suffix", () => {
    expect(normalizeMpn("STM32F103C8T6-TR")).toEqual([
      "STM32F103C8T6-TR",
      "STM32F103C8T6",
    ]);
  });

  it("should strip a lead-free suffix", () => {
    expect(normalizeMpn("LM1117-3.3#PBF")).toEqual([
      "LM1117-3.3#PBF",
      "LM1117-3.3",
    ]);
  });

  it("should insert T for the Microchip tape-and-reel convention", () => {
    expect(normalizeMpn("MCP73831-2ACI/MC")).toEqual([
      "MCP73831-2ACI/MC",
      "MCP73831T-2ACI/MC",
    ]);
  });

  it("should not insert a second T", () => {
    const result = normalizeMpn("MCP73831T-2ACI/MC");
    expect(result).not.toContain("MCP73831TT-2ACI/MC");
    expect(result).toEqual(["MCP73831T-2ACI/MC"]);
  });

  it("should combine suffix stripping and T insertion", () => {
    expect(normalizeMpn("MCP73831-2ACI-TR")).toEqual([
      "MCP73831-2ACI-TR",
      "MCP73831-2ACI",
      "MCP73831T-2ACI-TR",
      "MCP73831T-2ACI",
    ]);
  });

  it("should preserve the caller's case for the first variant only", () => {
    expect(normalizeMpn("stm32f103c8t6-tr")).toEqual([
      "stm32f103c8t6-tr",
      "STM32F103C8T6",
    ]);
  });

  it("should strip only one suffix", () => {
    expect(normalizeMpn("ABC-CT-TR")).toEqual(["ABC-CT-TR", "ABC-CT"]);
  });

  it("should never emit case-insensitive duplicates", () => {
    for (const input of ["stm32f103c8t6-tr", "Mcp73831-2aci/mc", "LM358"]) {
      const upper = normalizeMpn(input).map((v) => v.toUpperCase());
      expect(new Set(upper).size).toBe(upper.length);
    }
  });
});
