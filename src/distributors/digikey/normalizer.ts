/**
 * DigiKey products to the common part shape.
 */

import type { NormalizedPart, PriceBreak } from "../../types.js";
import type { DigiKeyProduct } from "./types.js";

export const normalizeDigiKeyProduct = (
  product: DigiKeyProduct,
  currency: string,
): NormalizedPart => {
  const variation = product.ProductVariations?.[0];

  const priceBreaks: PriceBreak[] = (variation?.StandardPricing ?? []).map((tier) => ({
    qty: tier.BreakQuantity ?? 0,
    price: tier.UnitPrice ?? 0,
    currency,
  }));

  const parameters: Record<string, string> = {};
  for (const parameter of product.Parameters ?? []) {
    if (parameter.ParameterText && parameter.ValueText) {
      parameters[parameter.ParameterText] = parameter.ValueText;
    }
  }

  const lifecycle = product.Discontinued
    ? "Discontinued"
    : product.ProductStatus?.Status || "Active";

  return {
    source: "digikey",
    part_number: variation?.DigiKeyProductNumber ?? "",
    mfr_part_number: product.ManufacturerProductNumber ?? "",
    manufacturer: product.Manufacturer?.Name ?? "",
    description: product.Description?.ProductDescription ?? "",
    category: product.Category?.Name ?? "",
    stock: product.QuantityAvailable ?? 0,
    price: product.UnitPrice || (priceBreaks[0]?.price ?? null),
    price_breaks: priceBreaks,
    datasheet_url: product.DatasheetUrl || null,
    product_url: product.ProductUrl || null,
    rohs: product.Classifications?.RohsStatus ?? "",
    lifecycle,
    parameters,
    min_qty: variation?.MinimumOrderQuantity || 1,
    currency,
  };
};
