/**
 * DigiKey Product Information API v4 client.
 */

import type { DigiKeySettings, RetrySettings } from "../../config.js";
import { ApiError, ValidationError } from "../../errors.js";
import { readJson, sendRequest, type FetchFn, type JsonRequest } from "../../http/fetch.js";
import { withRetry } from "../../http/retry.js";
import { Semaphore } from "../../http/semaphore.js";
import { TTLCache } from "../../http/ttl-cache.js";
import { silentLogger, type Logger } from "../../logger.js";
import type { DistributorLookupResult, DistributorSearchResult, NormalizedPart } from "../../types.js";
import { dedupeByMpn } from "../merge.js";
import { DigiKeyTokenProvider } from "./auth.js";
import { normalizeDigiKeyProduct } from "./normalizer.js";
import type { DigiKeyDetailsResponse, DigiKeySearchRequest, DigiKeySearchResponse } from "./types.js";

export const DIGIKEY_BASE_URL = "https://api.digikey.com/products/v4";
export const DIGIKEY_MAX_LIMIT = 50;

const SOURCE = "DigiKey";

export interface DigiKeyClientOptions {
  settings: DigiKeySettings;
  timeoutMs: number;
  retry: RetrySettings;
  fetch?: FetchFn;
  baseUrl?: string;
  tokenUrl?: string;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface DigiKeySearchOptions {
  manufacturer?: string;
  inStockOnly?: boolean;
  limit?: number;
  offset?: number;
}

export class DigiKeyClient {
  readonly auth: DigiKeyTokenProvider;
  private readonly fetchFn: FetchFn;
  private readonly baseUrl: string;
  private readonly gate: Semaphore;
  private readonly cache: TTLCache<DistributorLookupResult>;
  private readonly logger: Logger;

  constructor(private readonly options: DigiKeyClientOptions) {
    this.fetchFn = options.fetch ?? fetch;
    this.baseUrl = options.baseUrl ?? DIGIKEY_BASE_URL;
    this.gate = new Semaphore(options.settings.concurrentLimit);
    this.cache = new TTLCache(options.settings.cacheTtlMs);
    this.logger = options.logger ?? silentLogger;
    this.auth = new DigiKeyTokenProvider({
      clientId: options.settings.clientId,
      clientSecret: options.settings.clientSecret,
      timeoutMs: options.timeoutMs,
      fetch: this.fetchFn,
      tokenUrl: options.tokenUrl,
      logger: this.logger,
      now: options.now,
    });
  }

  private get currency(): string {
    return this.options.settings.localeCurrency;
  }

  private headers(token: string): Record<string, string> {
    const { settings } = this.options;
    return {
      Authorization: `Bearer ${token}`,
      "X-DIGIKEY-Client-Id": settings.clientId,
      "X-DIGIKEY-Locale-Site": settings.localeSite,
      "X-DIGIKEY-Locale-Language": settings.localeLanguage,
      "X-DIGIKEY-Locale-Currency": settings.localeCurrency,
    };
  }

  /**
   * Authenticated request. The first 401 drops the token and the request is
   * sent once more with a fresh one; a second 401 is final.
   */
  private async request<T>(path: string, init: Omit<JsonRequest, "headers" | "timeoutMs">): Promise<T> {
    const url = `${this.baseUrl}${path}`;
    const send = (token: string) =>
      sendRequest(this.fetchFn, url, {
        ...init,
        headers: this.headers(token),
        timeoutMs: this.options.timeoutMs,
      });

    let refreshed = false;
    return withRetry(
      async () => {
        let response = await this.gate.run(async () => send(await this.auth.getToken()));
        if (response.status === 401 && !refreshed) {
          refreshed = true;
          this.logger.info("digikey token rejected, refreshing");
          this.auth.invalidate();
          response = await send(await this.auth.getToken());
        }
        return readJson<T>(response, SOURCE);
      },
      { ...this.options.retry, label: SOURCE, logger: this.logger, sleep: this.options.sleep },
    );
  }

  /**
   * Keyword search. Exact MPN matches come first; the combined list is
   * deduplicated by manufacturer part number and capped at the limit.
   */
  async search(keyword: string, options: DigiKeySearchOptions = {}): Promise<DistributorSearchResult> {
    const limit = Math.max(1, Math.min(Math.trunc(options.limit ?? 20), DIGIKEY_MAX_LIMIT));
    const offset = Math.max(0, Math.trunc(options.offset ?? 0));

    const body: DigiKeySearchRequest = {
      Keywords: options.manufacturer ? `${keyword} ${options.manufacturer}` : keyword,
      Limit: limit,
      Offset: offset,
    };
    if (options.inStockOnly) {
      body.FilterOptionsRequest = { SearchOptions: ["InStock"] };
    }

    const data = await this.request<DigiKeySearchResponse>("/search/keyword", {
      method: "POST",
      body,
    });

    const products = [...(data.ExactMatches ?? []), ...(data.Products ?? [])];
    const parts: NormalizedPart[] = dedupeByMpn(
      products.map((product) => normalizeDigiKeyProduct(product, this.currency)),
    ).slice(0, limit);

    return { results: parts, total: data.ProductsCount ?? parts.length, offset };
  }

  /**
   * Product details for a DigiKey part number or MPN. Null when DigiKey
   * answers 404 or returns no product.
   */
  async getPart(partNumber: string): Promise<DistributorLookupResult | null> {
    const query = partNumber.trim();
    if (!query) {
      throw new ValidationError("Part number is required");
    }

    const cacheKey = `digikey:${query}`;
    const cached = this.cache.get(cacheKey);
    if (cached) {
      this.logger.debug({ partNumber: query }, "digikey cache hit");
      return cached;
    }

    let data: DigiKeyDetailsResponse;
    try {
      data = await this.request<DigiKeyDetailsResponse>(
        `/search/${encodeURIComponent(query)}/productdetails`,
        { method: "GET" },
      );
    } catch (error) {
      if (error instanceof ApiError && error.status === 404) {
        return null;
      }
      throw error;
    }
    if (!data.Product) {
      return null;
    }

    const result: DistributorLookupResult = {
      results: [normalizeDigiKeyProduct(data.Product, this.currency)],
      total: 1,
    };
    this.cache.set(cacheKey, result);
    return result;
  }
}
