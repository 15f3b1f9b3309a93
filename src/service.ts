/**
 * Parts Service
 *
 * Query methods behind the MCP tools. Every method returns either its result
 * or an `ErrorResult`; nothing is thrown across the tool boundary.
 */

import { CatalogLookup } from "./catalog/lookup.js";
import type { CatalogPart, CatalogSearchFilters, CatalogSearchResult } from "./catalog/types.js";
import type { Config } from "./config.js";
import { DigiKeyClient, type DigiKeySearchOptions } from "./distributors/digikey/client.js";
import { JlcpcbClient } from "./distributors/jlcpcb/client.js";
import type { JlcPartDetail, JlcSearchResult, SearchFilters } from "./distributors/jlcpcb/types.js";
import { dedupeByMpn } from "./distributors/merge.js";
import { MouserClient, type MouserSearchOptions } from "./distributors/mouser/client.js";
import { EasyedaClient } from "./easyeda/client.js";
import { generatePinoutSummary, parseEasyedaPins } from "./easyeda/pinout.js";
import type { EasyedaComponent } from "./easyeda/types.js";
import { errorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { looksLikeMpn, normalizeMpn } from "./query/mpn.js";
import { findSimilarSubcategories, resolveSubcategoryName } from "./query/subcategories.js";
import type {
  CombinedSearchResult,
  DistributorLookupResult,
  DistributorSearchResult,
  ErrorResult,
  ListCategoriesResult,
  PartSource,
  PinoutResult,
  ResolvedSubcategory,
  SourceStatus,
  SubcategoriesResult,
  SubcategoryInfo,
  VersionResult,
} from "./types.js";
import { SERVICE_NAME, VERSION } from "./version.js";

const MOUSER_NOT_CONFIGURED = "Mouser is not configured. Set MOUSER_API_KEY.";
const DIGIKEY_NOT_CONFIGURED =
  "DigiKey is not configured. Set DIGIKEY_CLIENT_ID and DIGIKEY_CLIENT_SECRET.";
const CATALOG_NOT_CONFIGURED = "Local catalog is not available. Set PARTS_CATALOG_DB.";

export interface PartsServiceDeps {
  jlcpcb: JlcpcbClient;
  easyeda: EasyedaClient;
  mouser?: MouserClient;
  digikey?: DigiKeyClient;
  catalog?: CatalogLookup;
  logger?: Logger;
}

export interface SearchPartsInput extends SearchFilters {
  /** Subcategory name or alias, resolved when `subcategoryId` is absent. */
  subcategory?: string;
}

export interface CatalogSearchInput extends CatalogSearchFilters {
  query?: string;
  subcategory?: string;
}

export interface CatalogLookupInput {
  lcsc?: string[];
  mpn?: string;
}

export type CatalogLookupResult =
  | { parts: Record<string, CatalogPart | null> }
  | { mpn: string; results: CatalogPart[] };

export interface DistributorSearchInput {
  inStockOnly?: boolean;
  limit?: number;
}

/**
 * Retry a distributor keyword search with normalized MPN variants when the
 * query looks like a part number and found nothing.
 */
export const searchWithMpnFallback = async (
  query: string,
  run: (keyword: string) => Promise<DistributorSearchResult>,
): Promise<DistributorSearchResult> => {
  const first = await run(query);
  if (first.results.length > 0 || !looksLikeMpn(query)) {
    return first;
  }

  for (const variant of normalizeMpn(query).slice(1)) {
    const next = await run(variant);
    if (next.results.length > 0) {
      return { ...next, matched_query: variant };
    }
  }
  return first;
};

export class PartsService {
  private readonly jlcpcb: JlcpcbClient;
  private readonly easyeda: EasyedaClient;
  private readonly mouser?: MouserClient;
  private readonly digikey?: DigiKeyClient;
  private readonly catalog?: CatalogLookup;
  private readonly logger: Logger;

  constructor(deps: PartsServiceDeps) {
    this.jlcpcb = deps.jlcpcb;
    this.easyeda = deps.easyeda;
    this.mouser = deps.mouser;
    this.digikey = deps.digikey;
    this.catalog = deps.catalog;
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * Wire every client from configuration. Distributors without credentials
   * and a catalog that cannot be opened stay disabled.
   */
  static fromConfig(config: Config, logger: Logger = silentLogger): PartsService {
    const shared = { timeoutMs: config.requestTimeoutMs, retry: config.retry };

    let catalog: CatalogLookup | undefined;
    if (config.catalogPath) {
      try {
        catalog = CatalogLookup.open(config.catalogPath, logger.child({ component: "catalog" }));
      } catch (error) {
        logger.error({ path: config.catalogPath, err: errorMessage(error) }, "catalog unavailable");
      }
    }

    return new PartsService({
      jlcpcb: new JlcpcbClient({
        ...shared,
        noFeeMode: config.noFeeMode,
        defaultMinStock: config.defaultMinStock,
        logger: logger.child({ component: "jlcpcb" }),
      }),
      easyeda: new EasyedaClient({ ...shared, logger: logger.child({ component: "easyeda" }) }),
      mouser: config.mouser
        ? new MouserClient({
            ...shared,
            settings: config.mouser,
            logger: logger.child({ component: "mouser" }),
          })
        : undefined,
      digikey: config.digikey
        ? new DigiKeyClient({
            ...shared,
            settings: config.digikey,
            logger: logger.child({ component: "digikey" }),
          })
        : undefined,
      catalog,
      logger,
    });
  }

  /**
   * Load the category tree at start-up. Failure is logged; the tree is
   * loaded again on first use.
   */
  async init(): Promise<void> {
    try {
      await this.jlcpcb.ensureCategories();
    } catch (error) {
      this.logger.warn({ err: errorMessage(error) }, "category preload failed");
    }
  }

  close(): void {
    this.catalog?.close();
  }

  private async guard<T>(
    operation: string,
    task: () => Promise<T | ErrorResult>,
  ): Promise<T | ErrorResult> {
    try {
      return await task();
    } catch (error) {
      this.logger.warn({ operation, err: errorMessage(error) }, "tool call failed");
      return { error: errorMessage(error) };
    }
  }

  private unknownSubcategory(
    name: string,
    nameToId: ReadonlyMap<string, number>,
    info: ReadonlyMap<number, SubcategoryInfo>,
  ): ErrorResult {
    const suggestions = findSimilarSubcategories(name, nameToId, info);
    return suggestions.length > 0
      ? { error: `Unknown subcategory: ${name}`, suggestions }
      : { error: `Unknown subcategory: ${name}` };
  }

  // ===========================================================================
  // JLCPCB
  // ===========================================================================

  async searchParts(input: SearchPartsInput): Promise<JlcSearchResult | ErrorResult> {
    return this.guard("search_parts", async () => {
      const { subcategory, ...filters } = input;

      if (subcategory && filters.subcategoryId === undefined) {
        await this.jlcpcb.ensureCategories();
        const cache = this.jlcpcb.categories;
        const nameToId = cache.subcategoryNameMap();
        const id = resolveSubcategoryName(subcategory, nameToId);
        if (id === null) {
          return this.unknownSubcategory(subcategory, nameToId, cache.subcategoryInfo());
        }
        filters.subcategoryId = id;
      }

      return this.jlcpcb.search(filters);
    });
  }

  async getPart(lcsc: string): Promise<JlcPartDetail | ErrorResult> {
    return this.guard("get_part", async () => {
      const part = await this.jlcpcb.getPart(lcsc);
      return part ?? { error: `Part ${lcsc} not found` };
    });
  }

  async listCategories(): Promise<ListCategoriesResult | ErrorResult> {
    return this.guard("list_categories", async () => {
      const categories = await this.jlcpcb.ensureCategories();
      return {
        categories: categories.map((category) => ({
          id: category.id,
          name: category.name,
          count: category.count,
          subcategory_count: category.subcategories.length,
        })),
      };
    });
  }

  async getSubcategories(categoryId: number): Promise<SubcategoriesResult | ErrorResult> {
    return this.guard("get_subcategories", async () => {
      await this.jlcpcb.ensureCategories();
      const category = this.jlcpcb.categories.getCategory(categoryId);
      if (!category) {
        return { error: `Category ${categoryId} not found` };
      }
      return {
        category_id: category.id,
        category_name: category.name,
        subcategories: category.subcategories.map(({ id, name, count }) => ({ id, name, count })),
      };
    });
  }

  async resolveSubcategory(name: string): Promise<ResolvedSubcategory | ErrorResult> {
    return this.guard("resolve_subcategory", async () => {
      await this.jlcpcb.ensureCategories();
      const cache = this.jlcpcb.categories;
      const nameToId = cache.subcategoryNameMap();

      const id = resolveSubcategoryName(name.trim(), nameToId);
      const entry = id === null ? undefined : cache.getSubcategory(id);
      if (!entry) {
        return this.unknownSubcategory(name, nameToId, cache.subcategoryInfo());
      }

      return {
        id: entry.subcategory.id,
        name: entry.subcategory.name,
        category_id: entry.parentId,
        category: cache.getCategory(entry.parentId)?.name ?? "",
      };
    });
  }

  // ===========================================================================
  // EasyEDA
  // ===========================================================================

  async getPinout(input: { lcsc?: string; uuid?: string }): Promise<PinoutResult | ErrorResult> {
    return this.guard("get_pinout", async () => {
      const lcsc = input.lcsc?.trim().toUpperCase();
      let component: EasyedaComponent | null;
      if (input.uuid) {
        component = await this.easyeda.getComponent(input.uuid);
      } else if (lcsc) {
        component = await this.easyeda.getComponentByLcsc(lcsc);
        if (!component) {
          return { error: `No EasyEDA symbol found for ${lcsc}` };
        }
      } else {
        return { error: "Provide an LCSC code or an EasyEDA symbol UUID" };
      }

      const pins = parseEasyedaPins(component);
      const result: PinoutResult = {
        uuid: component.uuid ?? input.uuid ?? null,
        title: component.title ?? null,
        pin_count: pins.length,
        pins,
      };
      if (lcsc) result.lcsc = lcsc;

      const summary = generatePinoutSummary(pins);
      if (summary) result.summary = summary;
      return result;
    });
  }

  // ===========================================================================
  // Local catalog
  // ===========================================================================

  async catalogLookup(input: CatalogLookupInput): Promise<CatalogLookupResult | ErrorResult> {
    return this.guard("catalog_lookup", async () => {
      const catalog = this.catalog;
      if (!catalog) return { error: CATALOG_NOT_CONFIGURED };

      if (input.lcsc && input.lcsc.length > 0) {
        return { parts: catalog.getByLcscBatch(input.lcsc) };
      }
      if (input.mpn?.trim()) {
        return { mpn: input.mpn.trim(), results: catalog.getByMpn(input.mpn) };
      }
      return { error: "Provide LCSC codes or an MPN" };
    });
  }

  async catalogSearch(input: CatalogSearchInput): Promise<CatalogSearchResult | ErrorResult> {
    return this.guard("catalog_search", async () => {
      const catalog = this.catalog;
      if (!catalog) return { error: CATALOG_NOT_CONFIGURED };

      const { query, subcategory, ...filters } = input;
      if (subcategory && filters.subcategoryId === undefined) {
        const nameToId = catalog.subcategoryNameMap();
        const id = resolveSubcategoryName(subcategory, nameToId);
        if (id === null) {
          return this.unknownSubcategory(subcategory, nameToId, catalog.subcategoryInfo());
        }
        filters.subcategoryId = id;
      }

      return catalog.search(query ?? "", filters);
    });
  }

  // ===========================================================================
  // Mouser and DigiKey
  // ===========================================================================

  async mouserSearch(
    keyword: string,
    options: MouserSearchOptions = {},
  ): Promise<DistributorSearchResult | ErrorResult> {
    return this.guard("mouser_search", async () => {
      const mouser = this.mouser;
      if (!mouser) return { error: MOUSER_NOT_CONFIGURED };
      return searchWithMpnFallback(keyword.trim(), (query) => mouser.search(query, options));
    });
  }

  async mouserGetPart(partNumber: string): Promise<DistributorLookupResult | ErrorResult> {
    return this.guard("mouser_get_part", async () => {
      if (!this.mouser) return { error: MOUSER_NOT_CONFIGURED };
      return this.mouser.getPart(partNumber);
    });
  }

  async digikeySearch(
    keyword: string,
    options: DigiKeySearchOptions = {},
  ): Promise<DistributorSearchResult | ErrorResult> {
    return this.guard("digikey_search", async () => {
      const digikey = this.digikey;
      if (!digikey) return { error: DIGIKEY_NOT_CONFIGURED };
      return searchWithMpnFallback(keyword.trim(), (query) => digikey.search(query, options));
    });
  }

  async digikeyGetPart(partNumber: string): Promise<DistributorLookupResult | ErrorResult> {
    return this.guard("digikey_get_part", async () => {
      if (!this.digikey) return { error: DIGIKEY_NOT_CONFIGURED };
      const result = await this.digikey.getPart(partNumber);
      return result ?? { error: `Part not found: ${partNumber.trim()}` };
    });
  }

  /**
   * Search every configured distributor in parallel and merge by MPN. A
   * failing source is reported in `sources` without failing the call.
   */
  async searchDistributors(
    keyword: string,
    input: DistributorSearchInput = {},
  ): Promise<CombinedSearchResult | ErrorResult> {
    const query = keyword.trim();
    const runs: Array<[PartSource, () => Promise<DistributorSearchResult>]> = [];

    const mouser = this.mouser;
    if (mouser) {
      runs.push([
        "mouser",
        () =>
          searchWithMpnFallback(query, (q) =>
            mouser.search(q, { inStockOnly: input.inStockOnly, records: input.limit }),
          ),
      ]);
    }
    const digikey = this.digikey;
    if (digikey) {
      runs.push([
        "digikey",
        () =>
          searchWithMpnFallback(query, (q) =>
            digikey.search(q, { inStockOnly: input.inStockOnly, limit: input.limit }),
          ),
      ]);
    }

    if (runs.length === 0) {
      return { error: `${MOUSER_NOT_CONFIGURED} ${DIGIKEY_NOT_CONFIGURED}` };
    }

    const settled = await Promise.allSettled(runs.map(([, run]) => run()));

    const sources: Partial<Record<PartSource, SourceStatus>> = {};
    const collected: DistributorSearchResult["results"] = [];
    let total = 0;

    settled.forEach((outcome, index) => {
      const [source] = runs[index];
      if (outcome.status === "fulfilled") {
        const { results, total: sourceTotal, matched_query } = outcome.value;
        collected.push(...results);
        total += sourceTotal;
        sources[source] = matched_query ? { total: sourceTotal, matched_query } : { total: sourceTotal };
      } else {
        this.logger.warn({ source, err: errorMessage(outcome.reason) }, "distributor search failed");
        sources[source] = { error: errorMessage(outcome.reason) };
      }
    });

    return { results: dedupeByMpn(collected), total, sources };
  }

  getVersion(): VersionResult {
    return {
      service: SERVICE_NAME,
      version: VERSION,
      status: "healthy",
      sources: {
        jlcpcb: true,
        mouser: this.mouser !== undefined,
        digikey: this.digikey !== undefined,
        catalog: this.catalog !== undefined,
      },
    };
  }
}
