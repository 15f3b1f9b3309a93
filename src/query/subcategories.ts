/**
 * Subcategory name resolution: alias table, exact name, shortest containing name.
 */

import { createRequire } from "node:module";
import { z } from "zod";
import type { SubcategoryInfo, SubcategorySuggestion } from "../types.js";

const AliasTableSchema = z.record(z.string(), z.string());

const loadAliases = (): Readonly<Record<string, string>> => {
  const require = createRequire(import.meta.url);
  return AliasTableSchema.parse(require("../../data/subcategory-aliases.json"));
};

/**
 * Common shorthand ("mlcc", "ldo", "usb-c") mapped to the lowercase canonical
 * subcategory name it stands for.
 */
export const SUBCATEGORY_ALIASES: Readonly<Record<string, string>> = loadAliases();

/**
 * Resolve a subcategory name or alias to its id.
 *
 * Order: alias table, exact case-insensitive name, then the shortest known
 * name containing the input. Names of equal length keep the iteration order
 * of `nameToId`.
 *
 * @param nameToId - lowercase subcategory name to id
 */
export const resolveSubcategoryName = (
  name: string,
  nameToId: ReadonlyMap<string, number>,
  aliases: Readonly<Record<string, string>> = SUBCATEGORY_ALIASES,
): number | null => {
  if (!name) return null;

  const lower = name.toLowerCase();

  const aliasTarget = Object.hasOwn(aliases, lower) ? aliases[lower] : undefined;
  if (aliasTarget !== undefined) {
    const id = nameToId.get(aliasTarget);
    if (id !== undefined) return id;
  }

  const exact = nameToId.get(lower);
  if (exact !== undefined) return exact;

  let best: { name: string; id: number } | null = null;
  for (const [subName, id] of nameToId) {
    if (!subName.includes(lower)) continue;
    // strict comparison keeps the first of equal-length names
    if (best === null || subName.length < best.name.length) {
      best = { name: subName, id };
    }
  }
  return best ? best.id : null;
};

/**
 * Suggest subcategories sharing a word (three characters or longer) with the
 * input. Used for did-you-mean hints when resolution fails.
 */
export const findSimilarSubcategories = (
  name: string,
  nameToId: ReadonlyMap<string, number>,
  info: ReadonlyMap<number, SubcategoryInfo>,
  limit = 5,
): SubcategorySuggestion[] => {
  const words = name
    .toLowerCase()
    .split(/\s+/)
    .filter((word) => word.length >= 3);
  if (words.length === 0 || limit <= 0) return [];

  const seen = new Set<number>();
  const suggestions: SubcategorySuggestion[] = [];

  for (const [subName, id] of nameToId) {
    if (seen.has(id)) continue;
    if (!words.some((word) => subName.includes(word))) continue;

    seen.add(id);
    const meta = info.get(id);
    suggestions.push({
      id,
      name: meta?.name ?? subName,
      category: meta?.category_name ?? "",
    });
    if (suggestions.length >= limit) break;
  }

  return suggestions;
};
