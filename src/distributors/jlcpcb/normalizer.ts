/**
 * JLCPCB component items to part records.
 */

import type { JlcComponentItem, JlcPart, JlcPartDetail } from "./types.js";

const round4 = (value: number): number => Math.round(value * 10_000) / 10_000;

const libraryTypeName = (raw: string | undefined): string => {
  if (raw === "base") return "basic";
  if (raw === "expand") return "extended";
  return raw ?? "";
};

/**
 * Slim record used in search results. Price is the first tier's unit price.
 */
export const transformPart = (item: JlcComponentItem): JlcPart => {
  const firstPrice = item.componentPrices?.[0]?.productPrice;
  return {
    lcsc: item.componentCode ?? "",
    model: item.componentModelEn ?? null,
    manufacturer: item.componentBrandEn ?? null,
    package: item.componentSpecificationEn ?? null,
    stock: item.stockCount ?? 0,
    price: firstPrice ? round4(firstPrice) : null,
    library_type: libraryTypeName(item.componentLibraryType),
    preferred: item.preferredComponentFlag ?? false,
    category: item.secondSortName ?? null,
  };
};

/**
 * Full record for part detail lookups.
 */
export const transformPartDetail = (item: JlcComponentItem): JlcPartDetail => ({
  ...transformPart(item),
  subcategory: item.firstSortName ?? null,
  description: item.describe ?? null,
  min_order: item.minPurchaseNum ?? null,
  reel_qty: item.encapsulationNumber ?? null,
  datasheet: item.dataManualUrl ?? null,
  lcsc_url: item.lcscGoodsUrl ?? null,
  prices: (item.componentPrices ?? []).map((tier) => ({
    qty: `${tier.startNumber}+`,
    price: round4(tier.productPrice),
  })),
  attributes: (item.attributes ?? []).flatMap((attribute) =>
    attribute.attribute_name_en
      ? [{ name: attribute.attribute_name_en, value: attribute.attribute_value_name ?? "" }]
      : [],
  ),
});
