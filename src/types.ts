/**
 * Shared type definitions for part search, normalization and pinout data
 */

/**
 * Error result structure returned across the tool boundary
 */
export interface ErrorResult {
  error: string;
  suggestions?: SubcategorySuggestion[];
}

/**
 * Check whether a service result is an error.
 */
export const isErrorResult = (result: unknown): result is ErrorResult =>
  typeof result === "object" && result !== null && "error" in result;

// =============================================================================
// Categories
// =============================================================================

export interface Subcategory {
  id: number;
  name: string;
  count: number;
}

export interface Category {
  id: number;
  name: string;
  count: number;
  subcategories: Subcategory[];
}

/**
 * Subcategory metadata used for did-you-mean suggestions.
 */
export interface SubcategoryInfo {
  name: string;
  category_name: string;
}

export interface SubcategorySuggestion {
  id: number;
  name: string;
  category: string;
}

// =============================================================================
// Connector hints
// =============================================================================

/**
 * Connector specification extracted from a free-text query.
 */
export interface ConnectorSpec {
  readonly series?: string;
  readonly pitch_mm?: number;
  readonly pin_count?: number;
  readonly search_term?: string;
}

// =============================================================================
// Distributor parts
// =============================================================================

export type PartSource = "mouser" | "digikey";

export interface PriceBreak {
  qty: number;
  price: number;
  currency: string;
}

/**
 * One distributor result item in the common shape.
 */
export interface NormalizedPart {
  source: PartSource;
  part_number: string;
  mfr_part_number: string;
  manufacturer: string;
  description: string;
  category: string;
  stock: number;
  price: number | null;
  price_breaks: PriceBreak[];
  datasheet_url: string | null;
  product_url: string | null;
  rohs: string;
  lifecycle: string;
  parameters: Record<string, string>;
  min_qty: number;
  currency: string;
}

export interface DistributorSearchResult {
  results: NormalizedPart[];
  total: number;
  page?: number;
  offset?: number;
  /** Query variant that produced the results when it differs from the input. */
  matched_query?: string;
}

export interface DistributorLookupResult {
  results: NormalizedPart[];
  total: number;
}

// =============================================================================
// Pinout
// =============================================================================

export type PinType = "power" | "ground" | "passive" | "io";

export interface Pin {
  number: string;
  name: string;
  functions: string[];
  type: PinType;
  /** First color code found on the pin element, kept as a hint only. */
  color?: string;
}

export interface InterfaceInstances {
  count: number;
  instances: string[];
}

export interface PinoutSummary {
  power: string[];
  ground: string[];
  interfaces?: Record<string, true | InterfaceInstances>;
}

export interface PinoutResult {
  lcsc?: string;
  uuid: string | null;
  title: string | null;
  pin_count: number;
  pins: Pin[];
  summary?: PinoutSummary;
}

// =============================================================================
// Tool results
// =============================================================================

export interface CategorySummary {
  id: number;
  name: string;
  count: number;
  subcategory_count: number;
}

export interface ListCategoriesResult {
  categories: CategorySummary[];
}

export interface SubcategoriesResult {
  category_id: number;
  category_name: string;
  subcategories: Subcategory[];
}

export interface ResolvedSubcategory {
  id: number;
  name: string;
  category_id: number;
  category: string;
}

/** Outcome of one distributor within a combined search. */
export type SourceStatus = { total: number; matched_query?: string } | { error: string };

export interface CombinedSearchResult {
  results: NormalizedPart[];
  total: number;
  sources: Partial<Record<PartSource, SourceStatus>>;
}

export interface VersionResult {
  service: string;
  version: string;
  status: "healthy";
  sources: {
    jlcpcb: true;
    mouser: boolean;
    digikey: boolean;
    catalog: boolean;
  };
}
