/**
 * EasyEDA symbol fetcher.
 */

import type { RetrySettings } from "../config.js";
import { ApiError, FetchError, ValidationError, errorMessage } from "../errors.js";
import { fetchJson, type FetchFn } from "../http/fetch.js";
import { withRetry } from "../http/retry.js";
import { silentLogger, type Logger } from "../logger.js";
import type { EasyedaComponent, EasyedaResponse } from "./types.js";

export const EASYEDA_BASE_URL = "https://easyeda.com/api";
/** Editor version the products endpoint expects. */
const EASYEDA_VERSION = "6.4.19.5";

const SOURCE = "EasyEDA";
const UUID_PATTERN = /^[0-9a-f]{32}$/i;
const LCSC_PATTERN = /^C\d+$/;

export interface EasyedaClientOptions {
  timeoutMs: number;
  retry: RetrySettings;
  fetch?: FetchFn;
  baseUrl?: string;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export class EasyedaClient {
  private readonly fetchFn: FetchFn;
  private readonly baseUrl: string;
  private readonly logger: Logger;

  constructor(private readonly options: EasyedaClientOptions) {
    this.fetchFn = options.fetch ?? fetch;
    this.baseUrl = options.baseUrl ?? EASYEDA_BASE_URL;
    this.logger = options.logger ?? silentLogger;
  }

  private get(url: string): Promise<EasyedaResponse> {
    return withRetry(
      () => fetchJson<EasyedaResponse>(this.fetchFn, SOURCE, url, { timeoutMs: this.options.timeoutMs }),
      { ...this.options.retry, label: SOURCE, logger: this.logger, sleep: this.options.sleep },
    );
  }

  /**
   * Fetch a symbol by its 32-character UUID.
   */
  async getComponent(uuid: string): Promise<EasyedaComponent> {
    const id = uuid.trim();
    if (!id) {
      throw new ValidationError("UUID is required");
    }
    if (!UUID_PATTERN.test(id)) {
      throw new ValidationError("Invalid UUID format");
    }

    let data: EasyedaResponse;
    try {
      data = await this.get(`${this.baseUrl}/components/${id}`);
    } catch (error) {
      throw new FetchError(`Failed to fetch EasyEDA component ${id}: ${errorMessage(error)}`);
    }

    if (!data.success || !data.result) {
      throw new FetchError(
        `Failed to fetch EasyEDA component ${id}: ${data.message || "component not found"}`,
      );
    }
    return data.result;
  }

  /**
   * Symbol for an LCSC part code, or null when EasyEDA has none.
   */
  async getComponentByLcsc(lcsc: string): Promise<EasyedaComponent | null> {
    const code = lcsc.trim().toUpperCase();
    if (!LCSC_PATTERN.test(code)) {
      throw new ValidationError(`Invalid LCSC part number: ${lcsc}`);
    }

    let data: EasyedaResponse;
    try {
      data = await this.get(
        `${this.baseUrl}/products/${code}/components?version=${EASYEDA_VERSION}`,
      );
    } catch (error) {
      if (error instanceof ApiError && error.status === 404) {
        return null;
      }
      throw new FetchError(`Failed to fetch EasyEDA symbol for ${code}: ${errorMessage(error)}`);
    }

    return data.success && data.result ? data.result : null;
  }
}
