/**
 * Free-text to top-level category matching.
 */

/**
 * Minimal category shape the matcher needs.
 */
export interface NamedCategory {
  id: number;
  name: string;
}

/**
 * Common abbreviations mapped to a substring of the category name they stand
 * for. Resolved against whatever categories are loaded at call time.
 */
export const CATEGORY_ABBREVIATIONS: Readonly<Record<string, string>> = {
  led: "optoelectronics",
  esd: "circuit protection",
  tvs: "circuit protection",
  ptc: "circuit protection",
  adc: "data acquisition",
  dac: "data acquisition",
  bjt: "transistors",
  fet: "transistors",
  mosfet: "transistors",
  igbt: "transistors",
  jfet: "transistors",
  mcu: "embedded processors",
  fpga: "embedded processors",
  ldo: "power management",
  pmic: "power management",
  opamp: "amplifiers",
  xtal: "crystals",
  rf: "rf and radios",
  emi: "filters",
};

const PREFIX_MIN_LENGTH = 4;

const lookupAbbreviation = (
  key: string,
  categories: readonly NamedCategory[],
): number | null => {
  const target = CATEGORY_ABBREVIATIONS[key];
  if (target === undefined) return null;
  const category = categories.find((c) => c.name.toLowerCase().includes(target));
  return category ? category.id : null;
};

/**
 * Match a query against category names.
 *
 * Tries the abbreviation table (also with a trailing plural "s" dropped),
 * then an exact name, then the query plus "s", then a prefix of at least four
 * characters. Returns null when nothing matches or no categories are loaded.
 */
export const matchCategoryByName = (
  query: string | null | undefined,
  categories: readonly NamedCategory[],
): number | null => {
  if (!query || categories.length === 0) return null;

  const q = query.trim().toLowerCase();
  if (!q) return null;

  const abbreviated =
    lookupAbbreviation(q, categories) ??
    (q.length > 1 && q.endsWith("s") ? lookupAbbreviation(q.slice(0, -1), categories) : null);
  if (abbreviated !== null) return abbreviated;

  const exact = categories.find((c) => c.name.toLowerCase() === q);
  if (exact) return exact.id;

  const plural = categories.find((c) => c.name.toLowerCase() === `${q}s`);
  if (plural) return plural.id;

  if (q.length >= PREFIX_MIN_LENGTH) {
    const prefixed = categories.find((c) => c.name.toLowerCase().startsWith(q));
    if (prefixed) return prefixed.id;
  }

  return null;
};
