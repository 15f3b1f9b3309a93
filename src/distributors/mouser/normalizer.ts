/**
 * Mouser part records to the common part shape.
 */

import type { NormalizedPart, PriceBreak } from "../../types.js";
import type { MouserPart } from "./types.js";

const STOCK_PATTERN = /(\d[\d,]*)\s+In Stock/i;
const NON_PRICE_CHARS = /[^\d.]/g;

/**
 * Stock count from availability text such as "16,563 In Stock"; 0 when absent.
 */
export const parseStock = (availability: string | null | undefined): number => {
  if (!availability) return 0;
  const match = STOCK_PATTERN.exec(availability);
  return match ? Number.parseInt(match[1].replace(/,/g, ""), 10) : 0;
};

/**
 * Unit price from a currency-formatted string; null when it does not parse.
 */
export const parsePrice = (price: string | null | undefined): number | null => {
  if (!price) return null;
  const cleaned = price.replace(NON_PRICE_CHARS, "");
  // "" and "1.2.3" are malformed
  if (!/^\d*\.?\d+$|^\d+\.$/.test(cleaned)) return null;
  return Number.parseFloat(cleaned);
};

const parseExplicitStock = (value: string | number | null | undefined): number | null => {
  if (value === null || value === undefined || value === "") return null;
  if (typeof value === "number") return Number.isInteger(value) ? value : null;
  const digits = value.replace(/,/g, "").trim();
  return /^\d+$/.test(digits) ? Number.parseInt(digits, 10) : null;
};

const parseMinQty = (value: string | number | undefined): number => {
  if (value === undefined || value === "") return 1;
  const parsed = typeof value === "number" ? value : Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : 1;
};

const lifecycleOf = (part: MouserPart): string => {
  if (part.LifecycleStatus) return part.LifecycleStatus;
  if (part.IsDiscontinued === "Yes") return "Discontinued";
  return "Active";
};

export const normalizeMouserPart = (part: MouserPart): NormalizedPart => {
  const priceBreaks: PriceBreak[] = (part.PriceBreaks ?? []).flatMap((entry) => {
    const price = parsePrice(entry.Price);
    return price === null
      ? []
      : [{ qty: entry.Quantity ?? 0, price, currency: entry.Currency ?? "USD" }];
  });

  const parameters: Record<string, string> = {};
  for (const attribute of part.ProductAttributes ?? []) {
    if (attribute.AttributeName && attribute.AttributeValue) {
      parameters[attribute.AttributeName] = attribute.AttributeValue;
    }
  }

  return {
    source: "mouser",
    part_number: part.MouserPartNumber ?? "",
    mfr_part_number: part.ManufacturerPartNumber ?? "",
    manufacturer: part.Manufacturer ?? "",
    description: part.Description ?? "",
    category: part.Category ?? "",
    stock: parseExplicitStock(part.AvailabilityInStock) ?? parseStock(part.Availability),
    price: priceBreaks[0]?.price ?? null,
    price_breaks: priceBreaks,
    datasheet_url: part.DataSheetUrl || null,
    product_url: part.ProductDetailUrl || null,
    rohs: part.ROHSStatus ?? "",
    lifecycle: lifecycleOf(part),
    parameters,
    min_qty: parseMinQty(part.Min),
    currency: priceBreaks[0]?.currency ?? "USD",
  };
};
