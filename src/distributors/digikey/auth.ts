/**
 * OAuth2 client-credentials tokens for the DigiKey API.
 */

import { ApiError } from "../../errors.js";
import { fetchJson, type FetchFn } from "../../http/fetch.js";
import { Semaphore } from "../../http/semaphore.js";
import { silentLogger, type Logger } from "../../logger.js";
import type { DigiKeyTokenResponse } from "./types.js";

export const DIGIKEY_TOKEN_URL = "https://api.digikey.com/v1/oauth2/token";

/** Tokens are refreshed this long before they expire. */
const EXPIRY_MARGIN_MS = 100_000;
const DEFAULT_EXPIRES_IN_S = 599;

export interface TokenProviderOptions {
  clientId: string;
  clientSecret: string;
  timeoutMs: number;
  fetch?: FetchFn;
  tokenUrl?: string;
  logger?: Logger;
  now?: () => number;
}

export class DigiKeyTokenProvider {
  private token: string | null = null;
  private expiresAt = 0;
  private readonly mutex = new Semaphore(1);
  private readonly fetchFn: FetchFn;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(private readonly options: TokenProviderOptions) {
    this.fetchFn = options.fetch ?? fetch;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  private valid(): string | null {
    return this.token && this.now() < this.expiresAt - EXPIRY_MARGIN_MS ? this.token : null;
  }

  /**
   * Current access token, fetching a new one when missing or near expiry.
   * Concurrent callers share one refresh.
   */
  async getToken(): Promise<string> {
    const cached = this.valid();
    if (cached) return cached;

    return this.mutex.run(async () => {
      const current = this.valid();
      if (current) return current;
      return this.refresh();
    });
  }

  /** Drop the cached token, e.g. after the API answered 401. */
  invalidate(): void {
    this.token = null;
    this.expiresAt = 0;
  }

  private async refresh(): Promise<string> {
    const form = new URLSearchParams({
      client_id: this.options.clientId,
      client_secret: this.options.clientSecret,
      grant_type: "client_credentials",
    });

    const data = await fetchJson<DigiKeyTokenResponse>(
      this.fetchFn,
      "DigiKey",
      this.options.tokenUrl ?? DIGIKEY_TOKEN_URL,
      { method: "POST", body: form, timeoutMs: this.options.timeoutMs },
    );

    if (data.error || !data.access_token) {
      throw new ApiError(
        "DigiKey",
        `DigiKey OAuth error: ${data.error_description || data.error || "no access token returned"}`,
      );
    }

    const expiresIn = data.expires_in ?? DEFAULT_EXPIRES_IN_S;
    this.token = data.access_token;
    this.expiresAt = this.now() + expiresIn * 1000;
    this.logger.debug({ expiresIn }, "digikey token refreshed");
    return this.token;
  }
}
