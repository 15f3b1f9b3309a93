/**
 * Translate search tool filters into a JLCPCB component list request.
 */

import { matchCategoryByName } from "../../query/categories.js";
import type { CategoryCache } from "./category-cache.js";
import type { JlcSearchParams, LibraryType, SearchFilters } from "./types.js";

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

const SORT_MODES: Readonly<Record<string, Pick<JlcSearchParams, "sortMode" | "sortASC">>> = {
  quantity: { sortMode: "STOCK_SORT", sortASC: "DESC" },
  price: { sortMode: "PRICE_SORT", sortASC: "ASC" },
};

const LIBRARY_FLAGS: Readonly<
  Record<LibraryType, Pick<JlcSearchParams, "componentLibraryType" | "preferredComponentFlag">>
> = {
  basic: { componentLibraryType: "base" },
  extended: { componentLibraryType: "expand" },
  preferred: { preferredComponentFlag: true },
  no_fee: { componentLibraryType: "base", preferredComponentFlag: true },
  all: {},
};

/**
 * Clamp a requested page size to [1, MAX_PAGE_SIZE].
 */
export const clampPageSize = (limit: number | undefined): number => {
  if (limit === undefined || !Number.isFinite(limit)) return DEFAULT_PAGE_SIZE;
  return Math.max(1, Math.min(Math.trunc(limit), MAX_PAGE_SIZE));
};

/**
 * True when building a request for these filters needs the category tree.
 */
export const needsCategories = (filters: SearchFilters): boolean =>
  filters.categoryId !== undefined ||
  filters.subcategoryId !== undefined ||
  Boolean(filters.query?.trim());

const setCategory = (
  params: JlcSearchParams,
  id: number,
  cache: CategoryCache,
): void => {
  const category = cache.getCategory(id);
  if (!category) return;
  params.firstSortId = id;
  params.firstSortName = category.name;
  params.searchType = 3;
};

/**
 * Build the request body. The cache should already be loaded when
 * `needsCategories(filters)` is true; unknown ids are dropped.
 */
export const buildSearchParams = (
  filters: SearchFilters,
  cache: CategoryCache,
): JlcSearchParams => {
  const params: JlcSearchParams = {
    currentPage: Math.max(1, Math.trunc(filters.page ?? 1)),
    pageSize: clampPageSize(filters.limit),
    searchSource: "search",
  };

  const query = filters.query?.trim();
  if (query) {
    params.keyword = query;
  }

  if (filters.categoryId !== undefined) {
    setCategory(params, filters.categoryId, cache);
  }

  if (filters.subcategoryId !== undefined) {
    const entry = cache.getSubcategory(filters.subcategoryId);
    if (entry) {
      if (filters.categoryId === undefined) {
        setCategory(params, entry.parentId, cache);
      }
      params.secondSortId = filters.subcategoryId;
      params.secondSortName = entry.subcategory.name;
    }
  }

  // a category-name query filters more precisely than the same text as keyword
  if (query && filters.categoryId === undefined && filters.subcategoryId === undefined) {
    const matched = matchCategoryByName(query, cache.list());
    if (matched !== null) {
      setCategory(params, matched, cache);
      delete params.keyword;
    }
  }

  if (filters.minStock !== undefined) {
    params.startStockNumber = filters.minStock;
  }

  if (filters.libraryType) {
    Object.assign(params, LIBRARY_FLAGS[filters.libraryType]);
  }

  if (filters.packages && filters.packages.length > 0) {
    params.componentSpecificationList = [...filters.packages];
  } else if (filters.package) {
    params.componentSpecification = filters.package;
  }

  if (filters.manufacturers && filters.manufacturers.length > 0) {
    params.componentBrandList = [...filters.manufacturers];
  } else if (filters.manufacturer) {
    params.componentBrand = filters.manufacturer;
  }

  const sort =
    filters.sortBy && Object.hasOwn(SORT_MODES, filters.sortBy)
      ? SORT_MODES[filters.sortBy]
      : undefined;
  if (sort) {
    Object.assign(params, sort);
  }

  return params;
};
