/**
 * Free-text query parsing for the local catalog.
 *
 * A query such as "10k 0402 resistor" or "jst ph 2 pin" is split into
 * structured hints (connector, package, model, subcategory) plus leftover
 * words used as full-text terms.
 */

import type { ConnectorSpec } from "../types.js";
import { extractConnectorSeries } from "./connectors.js";
import { extractModelNumber } from "./models.js";
import { resolveSubcategoryName } from "./subcategories.js";

export interface ParsedQuery {
  original: string;
  model: string | null;
  connector: ConnectorSpec | null;
  /** Normalized package name, e.g. "0402", "SOT-23", "LQFP-48". */
  package: string | null;
  subcategoryId: number | null;
  /** Words not consumed by any extractor. */
  terms: string[];
  /** Text left after connector, package and model extraction. */
  remaining: string;
}

// imperial chip sizes
const CHIP_SIZE_PATTERN = /\b(0201|0402|0603|0805|1206|1210|1812|2010|2512)\b/;

const PACKAGE_PATTERN =
  /\b(SOT|SOD|SOIC|SOP|SSOP|TSSOP|MSOP|QFN|DFN|LQFP|TQFP|QFP|DIP|TO)-?(\d{1,3})(-\d{1,2})?\b/i;

const collapseWhitespace = (value: string): string =>
  value.replace(/\s+/g, " ").trim();

const removeMatch = (text: string, match: RegExpExecArray): string =>
  collapseWhitespace(text.slice(0, match.index) + text.slice(match.index + match[0].length));

export interface PackageExtraction {
  package: string | null;
  remaining: string;
}

/**
 * Extract a package designator, normalized to the hyphenated form the
 * catalog stores ("sot23" -> "SOT-23").
 */
export const extractPackage = (query: string): PackageExtraction => {
  const chip = CHIP_SIZE_PATTERN.exec(query);
  if (chip) {
    return { package: chip[1], remaining: removeMatch(query, chip) };
  }

  const match = PACKAGE_PATTERN.exec(query);
  if (match) {
    const [, family, size, variant] = match;
    return {
      package: `${family.toUpperCase()}-${size}${variant ?? ""}`,
      remaining: removeMatch(query, match),
    };
  }

  return { package: null, remaining: query };
};

/**
 * Find the longest run of words that resolves to a subcategory. Words
 * containing digits are values ("10k", "3.3v"), never category names.
 */
const findSubcategoryRun = (
  words: readonly string[],
  nameToId: ReadonlyMap<string, number>,
): { id: number; start: number; end: number } | null => {
  for (let length = words.length; length >= 1; length--) {
    for (let start = 0; start + length <= words.length; start++) {
      const run = words.slice(start, start + length);
      if (run.some((word) => /\d/.test(word) || word.length < 3)) continue;
      const id = resolveSubcategoryName(run.join(" "), nameToId);
      if (id !== null) return { id, start, end: start + length };
    }
  }
  return null;
};

/**
 * Parse a free-text query into catalog search hints.
 *
 * @param nameToId - lowercase subcategory name to id; an empty map disables
 *   subcategory detection
 */
export const parseQuery = (
  query: string,
  nameToId: ReadonlyMap<string, number>,
): ParsedQuery => {
  const original = query.trim();

  const connector = extractConnectorSeries(original);
  const pkg = extractPackage(connector.remaining);
  const model = extractModelNumber(pkg.remaining);

  const remaining = collapseWhitespace(model.remaining);
  const words = remaining ? remaining.split(" ") : [];

  const run = nameToId.size > 0 ? findSubcategoryRun(words, nameToId) : null;
  const terms = run ? [...words.slice(0, run.start), ...words.slice(run.end)] : words;

  return {
    original,
    model: model.model,
    connector: connector.spec,
    package: pkg.package,
    subcategoryId: run ? run.id : null,
    terms,
    remaining,
  };
};
