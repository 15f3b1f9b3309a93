/**
 * Mouser Search API v2 client.
 */

import type { MouserSettings, RetrySettings } from "../../config.js";
import { ApiError, ValidationError } from "../../errors.js";
import { fetchJson, type FetchFn } from "../../http/fetch.js";
import { withRetry } from "../../http/retry.js";
import { Semaphore } from "../../http/semaphore.js";
import { TTLCache } from "../../http/ttl-cache.js";
import { silentLogger, type Logger } from "../../logger.js";
import type { DistributorLookupResult, DistributorSearchResult } from "../../types.js";
import { normalizeMouserPart } from "./normalizer.js";
import type { MouserKeywordRequest, MouserSearchResponse } from "./types.js";

export const MOUSER_BASE_URL = "https://api.mouser.com/api/v2";

export const MOUSER_MAX_RECORDS = 50;
export const MOUSER_MAX_BATCH = 10;

const SOURCE = "Mouser";

export interface MouserClientOptions {
  settings: MouserSettings;
  timeoutMs: number;
  retry: RetrySettings;
  fetch?: FetchFn;
  baseUrl?: string;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export interface MouserSearchOptions {
  manufacturer?: string;
  inStockOnly?: boolean;
  records?: number;
  page?: number;
}

export class MouserClient {
  private readonly fetchFn: FetchFn;
  private readonly baseUrl: string;
  private readonly gate: Semaphore;
  private readonly cache: TTLCache<DistributorLookupResult>;
  private readonly logger: Logger;

  constructor(private readonly options: MouserClientOptions) {
    this.fetchFn = options.fetch ?? fetch;
    this.baseUrl = options.baseUrl ?? MOUSER_BASE_URL;
    this.gate = new Semaphore(options.settings.concurrentLimit);
    this.cache = new TTLCache(options.settings.cacheTtlMs);
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * POST to an endpoint. The API key travels in the query string, so HTTP
   * errors are reported by status only.
   */
  private async post(path: string, body: object): Promise<MouserSearchResponse> {
    const url = `${this.baseUrl}${path}?apiKey=${encodeURIComponent(this.options.settings.apiKey)}`;

    return withRetry(
      async () => {
        const data = await this.gate.run(() =>
          fetchJson<MouserSearchResponse>(this.fetchFn, SOURCE, url, {
            method: "POST",
            body,
            timeoutMs: this.options.timeoutMs,
          }),
        );

        const first = data.Errors?.[0];
        if (first) {
          throw new ApiError(SOURCE, `Mouser API error: ${first.Message ?? "Unknown Mouser API error"}`);
        }
        return data;
      },
      { ...this.options.retry, label: SOURCE, logger: this.logger, sleep: this.options.sleep },
    );
  }

  /**
   * Keyword search, optionally restricted to one manufacturer.
   */
  async search(keyword: string, options: MouserSearchOptions = {}): Promise<DistributorSearchResult> {
    const records = Math.max(1, Math.min(Math.trunc(options.records ?? 20), MOUSER_MAX_RECORDS));
    const page = Math.max(1, Math.trunc(options.page ?? 1));

    const request: MouserKeywordRequest = {
      keyword,
      records,
      pageNumber: page,
      searchOptions: options.inStockOnly ? "InStock" : "None",
      searchWithYourSignUpLanguage: "false",
    };

    // the manufacturer endpoint rejects an empty manufacturerName
    const data = options.manufacturer
      ? await this.post("/search/keywordandmanufacturer", {
          SearchByKeywordMfrNameRequest: { ...request, manufacturerName: options.manufacturer },
        })
      : await this.post("/search/keyword", { SearchByKeywordRequest: request });

    const parts = data.SearchResults?.Parts ?? [];
    return {
      results: parts.map(normalizeMouserPart),
      total: data.SearchResults?.NumberOfResult ?? 0,
      page,
    };
  }

  /**
   * Look up a Mouser part number or MPN. Up to ten numbers may be joined
   * with "|"; single lookups are cached.
   */
  async getPart(partNumber: string): Promise<DistributorLookupResult> {
    const query = partNumber.trim();
    if (!query) {
      throw new ValidationError("Part number is required");
    }

    const isBatch = query.includes("|");
    if (isBatch && query.split("|").length > MOUSER_MAX_BATCH) {
      throw new ValidationError(
        `Mouser accepts at most ${MOUSER_MAX_BATCH} part numbers per lookup`,
      );
    }

    const cacheKey = `mouser:${query}`;
    if (!isBatch) {
      const cached = this.cache.get(cacheKey);
      if (cached) {
        this.logger.debug({ partNumber: query }, "mouser cache hit");
        return cached;
      }
    }

    const data = await this.post("/search/partnumber", {
      SearchByPartRequest: { mouserPartNumber: query, partSearchOptions: "None" },
    });
    const parts = data.SearchResults?.Parts ?? [];
    const result: DistributorLookupResult = {
      results: parts.map(normalizeMouserPart),
      total: parts.length,
    };

    if (!isBatch) {
      this.cache.set(cacheKey, result);
    }
    return result;
  }
}
