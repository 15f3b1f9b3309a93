/**
 * Connector series detection and maker-ecosystem brand expansion.
 *
 * Brand names (Qwiic, STEMMA QT, easyC, Grove) map to fixed connector specs;
 * JST series codes map to their pitch.
 */

import type { ConnectorSpec } from "../types.js";

/** JST series code (lowercase) to pitch in mm. */
export const JST_SERIES_PITCH: Readonly<Record<string, number>> = {
  sh: 1.0,
  sr: 1.0,
  gh: 1.25,
  zh: 1.5,
  pa: 2.0,
  ph: 2.0,
  eh: 2.5,
  xh: 2.5,
  vh: 3.96,
  vl: 6.2,
  bm: 1.0,
};

const SH_4PIN: ConnectorSpec = Object.freeze({
  series: "SH",
  pitch_mm: 1.0,
  pin_count: 4,
  search_term: "SH",
});

/**
 * Brand aliases checked in order by substring containment, so longer
 * phrases that share a prefix ("qwiic connector") sit after the short form
 * and "stemma qt" sits before "stemma".
 */
export const BRAND_CONNECTOR_SPECS: ReadonlyArray<readonly [string, ConnectorSpec]> = [
  ["qwiic", SH_4PIN],
  ["qwiic connector", SH_4PIN],
  ["stemma qt", SH_4PIN],
  ["stemmaqt", SH_4PIN],
  // original STEMMA: JST PH, 3 or 4 pins
  ["stemma", Object.freeze({ series: "PH", pitch_mm: 2.0, search_term: "PH" })],
  ["easyc", SH_4PIN],
  ["easy c", SH_4PIN],
  // Grove is HY2.0-4P, not JST
  ["grove", Object.freeze({ pitch_mm: 2.0, pin_count: 4, search_term: "HY2.0" })],
];

const SERIES_CODES = "sh|sr|gh|zh|pa|ph|eh|xh|vh|vl|bm";

const JST_SERIES_PATTERN = new RegExp(
  `\\bjst[\\s-]*(${SERIES_CODES})\\b|\\b(${SERIES_CODES})\\s*(?:series|connector|plug|socket|receptacle)\\b`,
  "i",
);

const STANDALONE_SERIES_PATTERN = /\b(sh|gh|zh|ph|xh|vh|eh|pa)\b/i;

const escapeRegExp = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const collapseWhitespace = (value: string): string =>
  value.replace(/\s+/g, " ").trim();

/**
 * Get the pitch (mm) for a JST series code, or undefined for unknown series.
 */
export const getPitchForSeries = (series: string): number | undefined =>
  JST_SERIES_PITCH[series.toLowerCase()];

const seriesSpec = (code: string): ConnectorSpec => {
  const series = code.toUpperCase();
  const pitch = getPitchForSeries(code);
  return pitch === undefined
    ? { series, search_term: series }
    : { series, pitch_mm: pitch, search_term: series };
};

export interface ConnectorExtraction {
  spec: ConnectorSpec | null;
  remaining: string;
}

/**
 * Extract a connector spec from a query, removing the matched text.
 */
export const extractConnectorSeries = (query: string): ConnectorExtraction => {
  const queryLower = query.toLowerCase();

  for (const [brand, spec] of BRAND_CONNECTOR_SPECS) {
    if (queryLower.includes(brand)) {
      const remaining = query.replace(new RegExp(escapeRegExp(brand), "gi"), "");
      return { spec, remaining: collapseWhitespace(remaining) };
    }
  }

  const match = JST_SERIES_PATTERN.exec(query);
  if (match) {
    const code = match[1] ?? match[2];
    const remaining =
      query.slice(0, match.index) + query.slice(match.index + match[0].length);
    return { spec: seriesSpec(code), remaining: collapseWhitespace(remaining) };
  }

  if (queryLower.includes("jst")) {
    const seriesMatch = STANDALONE_SERIES_PATTERN.exec(query);
    if (seriesMatch) {
      const withoutCode =
        query.slice(0, seriesMatch.index) +
        query.slice(seriesMatch.index + seriesMatch[0].length);
      const remaining = withoutCode.replace(/\bjst\b/gi, "");
      return {
        spec: seriesSpec(seriesMatch[1]),
        remaining: collapseWhitespace(remaining),
      };
    }
  }

  return { spec: null, remaining: query };
};
