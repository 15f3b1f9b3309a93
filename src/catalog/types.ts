/**
 * Local catalog records.
 */

import type { ConnectorSpec } from "../types.js";

/** Stored grade: basic, preferred, extended. */
export type Grade = "b" | "p" | "e";

export type GradeName = "basic" | "preferred" | "extended";

export interface ComponentRow {
  lcsc: string;
  mpn: string | null;
  manufacturer: string | null;
  package: string | null;
  stock: number | null;
  library_type: Grade | null;
  subcategory_id: number | null;
  price: number | null;
  description: string | null;
  attributes: string | null;
}

export interface SubcategoryRow {
  id: number;
  name: string;
  category_id: number;
  category_name: string;
}

export interface CatalogPart {
  lcsc: string;
  mpn: string | null;
  manufacturer: string | null;
  package: string | null;
  stock: number;
  library_type: GradeName | null;
  price: number | null;
  description: string | null;
  subcategory_id: number | null;
  subcategory: string | null;
  category: string | null;
  attributes: Record<string, string>;
}

export type CatalogSort = "stock" | "price";

export interface CatalogSearchFilters {
  subcategoryId?: number;
  package?: string;
  manufacturer?: string;
  libraryType?: "basic" | "preferred" | "extended" | "no_fee" | "all";
  minStock?: number;
  maxPrice?: number;
  sortBy?: CatalogSort;
  limit?: number;
  offset?: number;
}

/** Hints the query parser contributed to a search. */
export interface AppliedHints {
  model: string | null;
  package: string | null;
  connector: ConnectorSpec | null;
  subcategory_id: number | null;
  subcategory: string | null;
  terms: string[];
}

export interface CatalogSearchResult {
  results: CatalogPart[];
  total: number;
  limit: number;
  offset: number;
  parsed: AppliedHints;
}

export interface BuildStats {
  total_parts: number;
  categories: number;
  category_counts: Record<string, number>;
  db_size_bytes: number;
  db_size_mb: number;
  build_time_seconds: number;
}
