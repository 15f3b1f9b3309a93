/**
 * Manufacturer part number normalization and detection.
 *
 * Variants produced here are a fallback: they are tried only when the
 * original query returns nothing.
 */

/**
 * Packaging/ordering suffixes that distributors append but BOMs usually omit.
 * Checked in order; at most one is stripped.
 */
export const MPN_TRAILING_SUFFIXES: readonly string[] = [
  "-TR", // tape & reel
  "/TR",
  "-T",
  "-CT", // cut tape
  "-ND", // DigiKey ordering code
  "-DK",
  "#PBF", // lead-free
  "-PBF",
  "#PBFREE",
  "-PBFREE",
  "+T",
  "+TR",
];

// Microchip tape & reel convention: MCP73831-2ACI/MC -> MCP73831T-2ACI/MC
const INSERT_T_PATTERN = /^([A-Z]{2,5}\d{2,5})(-[A-Z0-9/]+)$/i;

const IC_STYLE_PATTERN = /^[A-Z]{1,5}\d{2,}/i;
const DISCRETE_STYLE_PATTERN = /^\d[A-Z]\d{3,}/i;

const stripTrailingSuffix = (upper: string): string => {
  const suffix = MPN_TRAILING_SUFFIXES.find((s) => upper.endsWith(s));
  return suffix ? upper.slice(0, -suffix.length) : upper;
};

const withInsertedT = (value: string): string | null => {
  const match = INSERT_T_PATTERN.exec(value);
  if (!match) return null;
  const [, base, suffix] = match;
  return base.endsWith("T") ? null : `${base}T${suffix}`;
};

/**
 * Generate query variants for an MPN, in order of preference.
 *
 * The first element is always the query unchanged; generated variants are
 * uppercase. No two variants compare equal case-insensitively.
 *
 * @example
 * normalizeMpn("STM32F103C8T6-TR") // ["STM32F103C8T6-TR", "STM32F103C8T6"]
 * normalizeMpn("MCP73831-2ACI/MC") // ["MCP73831-2ACI/MC", "MCP73831T-2ACI/MC"]
 */
export const normalizeMpn = (query: string): string[] => {
  const variants = [query];
  const seen = new Set([query.toUpperCase()]);

  const add = (variant: string | null): void => {
    if (variant === null) return;
    const key = variant.toUpperCase();
    if (seen.has(key)) return;
    seen.add(key);
    variants.push(variant);
  };

  const working = query.toUpperCase();
  const stripped = stripTrailingSuffix(working);

  add(stripped);
  add(withInsertedT(working));
  add(withInsertedT(stripped));

  return variants;
};

/**
 * Heuristic check for whether a query looks like a manufacturer part number
 * rather than a descriptive search ("resistor", "10k").
 */
export const looksLikeMpn = (query: string): boolean => {
  if (!query || query.length < 4 || query.length > 40) {
    return false;
  }

  const hasLetter = /\p{L}/u.test(query);
  const hasDigit = /\d/.test(query);
  if (!hasLetter || !hasDigit) {
    return false;
  }

  return (
    IC_STYLE_PATTERN.test(query) ||
    DISCRETE_STYLE_PATTERN.test(query) ||
    query.includes("-") ||
    query.includes("/")
  );
};
