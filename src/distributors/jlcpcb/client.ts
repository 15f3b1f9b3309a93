/**
 * JLCPCB component search client.
 *
 * The search endpoint is the one the JLCPCB parts library page uses. It needs
 * browser-like headers, so every retry switches to a fresh identity.
 */

import type { NoFeeMode, RetrySettings } from "../../config.js";
import { ApiError } from "../../errors.js";
import { fetchJson, type FetchFn } from "../../http/fetch.js";
import { IdentityPool } from "../../http/identity-pool.js";
import { withRetry } from "../../http/retry.js";
import { silentLogger, type Logger } from "../../logger.js";
import type { Category } from "../../types.js";
import { CategoryCache } from "./category-cache.js";
import { transformPart, transformPartDetail } from "./normalizer.js";
import { buildSearchParams, clampPageSize, needsCategories } from "./query-filters.js";
import type {
  JlcComponentItem,
  JlcPartDetail,
  JlcSearchResponse,
  JlcSearchResult,
  SearchFilters,
} from "./types.js";

export const JLCPCB_SEARCH_URL =
  "https://jlcpcb.com/api/overseas-pcb-order/v1/shoppingCart/smtGood/selectSmtComponentList";

const SOURCE = "JLCPCB";

export interface JlcpcbClientOptions {
  fetch?: FetchFn;
  searchUrl?: string;
  timeoutMs: number;
  retry: RetrySettings;
  noFeeMode: NoFeeMode;
  defaultMinStock: number;
  cache?: CategoryCache;
  identities?: IdentityPool;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

const pageItems = (response: JlcSearchResponse): JlcComponentItem[] =>
  response.data?.componentPageInfo?.list ?? [];

export class JlcpcbClient {
  readonly categories: CategoryCache;
  private readonly fetchFn: FetchFn;
  private readonly searchUrl: string;
  private readonly identities: IdentityPool;
  private readonly logger: Logger;

  constructor(private readonly options: JlcpcbClientOptions) {
    this.fetchFn = options.fetch ?? fetch;
    this.searchUrl = options.searchUrl ?? JLCPCB_SEARCH_URL;
    this.identities = options.identities ?? new IdentityPool();
    this.logger = options.logger ?? silentLogger;
    this.categories = options.cache ?? new CategoryCache(this.logger);
  }

  /**
   * POST a search body, retrying with a fresh identity and failing on any
   * envelope whose code is not 200.
   */
  private async request(body: object): Promise<JlcSearchResponse> {
    let identity = this.identities.current();

    return withRetry(
      async () => {
        const response = await fetchJson<JlcSearchResponse>(this.fetchFn, SOURCE, this.searchUrl, {
          method: "POST",
          headers: {
            ...identity.headers,
            Origin: "https://jlcpcb.com",
            Referer: "https://jlcpcb.com/parts",
          },
          body,
          timeoutMs: this.options.timeoutMs,
        });
        if (response.code !== 200) {
          throw new ApiError(SOURCE, `JLCPCB API error: ${response.message ?? "Unknown API error"}`);
        }
        return response;
      },
      {
        ...this.options.retry,
        label: SOURCE,
        logger: this.logger,
        sleep: this.options.sleep,
        onRetry: () => {
          identity = this.identities.acquireFresh();
        },
      },
    );
  }

  /**
   * Load the category tree once; concurrent first callers share the request.
   */
  async ensureCategories(): Promise<readonly Category[]> {
    return this.categories.ensure(() => this.fetchCategories());
  }

  async search(filters: SearchFilters): Promise<JlcSearchResult> {
    if (needsCategories(filters)) {
      await this.ensureCategories();
    }

    const effective: SearchFilters = {
      ...filters,
      minStock: filters.minStock ?? this.options.defaultMinStock,
      libraryType: filters.libraryType === "all" ? undefined : filters.libraryType,
    };
    const page = Math.max(1, Math.trunc(effective.page ?? 1));
    const limit = clampPageSize(effective.limit);

    if (effective.libraryType === "no_fee" && this.options.noFeeMode === "merged") {
      return this.searchNoFeeMerged(effective, page, limit);
    }

    const response = await this.request(buildSearchParams(effective, this.categories));
    const total = response.data?.componentPageInfo?.total ?? 0;

    return {
      results: pageItems(response).map(transformPart),
      page,
      per_page: limit,
      total,
      has_more: page * limit < total,
    };
  }

  /**
   * Basic and preferred searches in parallel, merged by LCSC code.
   */
  private async searchNoFeeMerged(
    filters: SearchFilters,
    page: number,
    limit: number,
  ): Promise<JlcSearchResult> {
    const [basic, preferred] = await Promise.all([
      this.request(buildSearchParams({ ...filters, libraryType: "basic" }, this.categories)),
      this.request(buildSearchParams({ ...filters, libraryType: "preferred" }, this.categories)),
    ]);

    const seen = new Set<string>();
    const merged = [...pageItems(basic), ...pageItems(preferred)].flatMap((item) => {
      const code = item.componentCode;
      if (!code || seen.has(code)) return [];
      seen.add(code);
      return [transformPart(item)];
    });

    return {
      results: merged.slice(0, limit),
      page,
      per_page: limit,
      total: merged.length,
      has_more: merged.length > limit,
    };
  }

  /**
   * Full details for one LCSC code, or null when the search has no exact match.
   */
  async getPart(lcsc: string): Promise<JlcPartDetail | null> {
    const code = lcsc.trim().toUpperCase();
    const response = await this.request({
      keyword: code,
      currentPage: 1,
      pageSize: 10,
      searchSource: "search",
    });
    const item = pageItems(response).find((candidate) => candidate.componentCode === code);
    return item ? transformPartDetail(item) : null;
  }

  /**
   * Fetch the live category tree.
   */
  async fetchCategories(): Promise<Category[]> {
    const response = await this.request({
      currentPage: 1,
      pageSize: 1,
      searchSource: "search",
      searchType: 3,
    });

    return (response.data?.sortAndCountVoList ?? []).map((node) => ({
      id: node.componentSortKeyId,
      name: node.sortName,
      count: node.componentCount ?? 0,
      subcategories: (node.childSortList ?? []).map((child) => ({
        id: child.componentSortKeyId,
        name: child.sortName,
        count: child.componentCount ?? 0,
      })),
    }));
  }
}
