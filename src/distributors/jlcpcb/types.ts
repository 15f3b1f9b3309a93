/**
 * JLCPCB component search API shapes and the part records built from them.
 */

// =============================================================================
// API Responses
// =============================================================================

export interface JlcPriceTier {
  startNumber: number;
  endNumber?: number;
  productPrice: number;
}

export interface JlcAttribute {
  attribute_name_en?: string;
  attribute_value_name?: string;
}

/**
 * One entry of `componentPageInfo.list`.
 *
 * The API reports the subcategory in `firstSortName` and the top-level
 * category in `secondSortName`.
 */
export interface JlcComponentItem {
  componentCode?: string;
  componentModelEn?: string;
  componentBrandEn?: string;
  componentSpecificationEn?: string;
  stockCount?: number;
  componentLibraryType?: string;
  preferredComponentFlag?: boolean;
  firstSortName?: string;
  secondSortName?: string;
  describe?: string;
  minPurchaseNum?: number;
  encapsulationNumber?: number;
  dataManualUrl?: string;
  lcscGoodsUrl?: string;
  componentPrices?: JlcPriceTier[];
  attributes?: JlcAttribute[];
}

export interface JlcSortNode {
  componentSortKeyId: number;
  sortName: string;
  componentCount?: number;
  childSortList?: JlcSortNode[] | null;
}

export interface JlcSearchResponse {
  code: number;
  message?: string | null;
  data?: {
    componentPageInfo?: {
      list?: JlcComponentItem[] | null;
      total?: number | null;
    } | null;
    sortAndCountVoList?: JlcSortNode[] | null;
  } | null;
}

// =============================================================================
// Request
// =============================================================================

export type LibraryType = "basic" | "extended" | "preferred" | "no_fee" | "all";

export type SortBy = "quantity" | "price";

/**
 * Search filters as accepted by the search tool.
 */
export interface SearchFilters {
  query?: string;
  categoryId?: number;
  subcategoryId?: number;
  minStock?: number;
  libraryType?: LibraryType;
  package?: string;
  /** OR-filter; takes precedence over `package` when non-empty. */
  packages?: string[];
  manufacturer?: string;
  /** OR-filter; takes precedence over `manufacturer` when non-empty. */
  manufacturers?: string[];
  /** Unrecognized values fall back to relevance order. */
  sortBy?: string;
  page?: number;
  limit?: number;
}

/**
 * Request body of the component list endpoint.
 */
export interface JlcSearchParams {
  currentPage: number;
  pageSize: number;
  searchSource: "search";
  keyword?: string;
  searchType?: 3;
  firstSortId?: number;
  firstSortName?: string;
  secondSortId?: number;
  secondSortName?: string;
  startStockNumber?: number;
  componentLibraryType?: "base" | "expand";
  preferredComponentFlag?: boolean;
  componentSpecification?: string;
  componentSpecificationList?: string[];
  componentBrand?: string;
  componentBrandList?: string[];
  sortMode?: "STOCK_SORT" | "PRICE_SORT";
  sortASC?: "ASC" | "DESC";
}

// =============================================================================
// Results
// =============================================================================

export interface JlcPart {
  lcsc: string;
  model: string | null;
  manufacturer: string | null;
  package: string | null;
  stock: number;
  price: number | null;
  /** "basic", "extended", or the raw API value when unrecognized. */
  library_type: string;
  preferred: boolean;
  category: string | null;
}

export interface JlcPriceBreak {
  /** Lower bound of the tier, e.g. "10+". */
  qty: string;
  price: number;
}

export interface JlcPartDetail extends JlcPart {
  subcategory: string | null;
  description: string | null;
  min_order: number | null;
  reel_qty: number | null;
  datasheet: string | null;
  lcsc_url: string | null;
  prices: JlcPriceBreak[];
  attributes: Array<{ name: string; value: string }>;
}

export interface JlcSearchResult {
  results: JlcPart[];
  page: number;
  per_page: number;
  total: number;
  has_more: boolean;
}
