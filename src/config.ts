/**
 * Environment configuration.
 *
 * All settings come from environment variables, validated once at start-up.
 * Distributors without credentials stay disabled instead of failing the server.
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const EnvSchema = z.object({
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info"),
  PARTS_CATALOG_DB: optionalString,

  MOUSER_API_KEY: optionalString,
  MOUSER_CONCURRENT_LIMIT: z.coerce.number().int().positive().default(5),
  MOUSER_CACHE_TTL_SECONDS: z.coerce.number().nonnegative().default(3600),

  DIGIKEY_CLIENT_ID: optionalString,
  DIGIKEY_CLIENT_SECRET: optionalString,
  DIGIKEY_CONCURRENT_LIMIT: z.coerce.number().int().positive().default(5),
  DIGIKEY_CACHE_TTL_SECONDS: z.coerce.number().nonnegative().default(3600),
  DIGIKEY_LOCALE_SITE: z.string().default("US"),
  DIGIKEY_LOCALE_LANGUAGE: z.string().default("en"),
  DIGIKEY_LOCALE_CURRENCY: z.string().default("USD"),

  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  RETRY_BACKOFF_MS: z.coerce.number().int().min(0).default(300),
  JLCPCB_NO_FEE_MODE: z.enum(["combined", "merged"]).default("combined"),
  DEFAULT_MIN_STOCK: z.coerce.number().int().min(0).default(50),
});

export type LogLevel = z.infer<typeof EnvSchema>["LOG_LEVEL"];
export type NoFeeMode = z.infer<typeof EnvSchema>["JLCPCB_NO_FEE_MODE"];

export interface RetrySettings {
  retries: number;
  backoffMs: number;
}

export interface MouserSettings {
  apiKey: string;
  concurrentLimit: number;
  cacheTtlMs: number;
}

export interface DigiKeySettings {
  clientId: string;
  clientSecret: string;
  concurrentLimit: number;
  cacheTtlMs: number;
  localeSite: string;
  localeLanguage: string;
  localeCurrency: string;
}

export interface Config {
  logLevel: LogLevel;
  catalogPath?: string;
  requestTimeoutMs: number;
  retry: RetrySettings;
  noFeeMode: NoFeeMode;
  defaultMinStock: number;
  /** Undefined when MOUSER_API_KEY is not set. */
  mouser?: MouserSettings;
  /** Undefined when DigiKey client credentials are not set. */
  digikey?: DigiKeySettings;
}

/**
 * Parse and validate configuration from an environment map.
 */
export const loadConfig = (
  env: Record<string, string | undefined> = process.env,
): Config => {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid environment configuration: ${problems}`);
  }

  const e = parsed.data;

  return {
    logLevel: e.LOG_LEVEL,
    catalogPath: e.PARTS_CATALOG_DB,
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    retry: { retries: e.MAX_RETRIES, backoffMs: e.RETRY_BACKOFF_MS },
    noFeeMode: e.JLCPCB_NO_FEE_MODE,
    defaultMinStock: e.DEFAULT_MIN_STOCK,
    mouser: e.MOUSER_API_KEY
      ? {
          apiKey: e.MOUSER_API_KEY,
          concurrentLimit: e.MOUSER_CONCURRENT_LIMIT,
          cacheTtlMs: e.MOUSER_CACHE_TTL_SECONDS * 1000,
        }
      : undefined,
    digikey:
      e.DIGIKEY_CLIENT_ID && e.DIGIKEY_CLIENT_SECRET
        ? {
            clientId: e.DIGIKEY_CLIENT_ID,
            clientSecret: e.DIGIKEY_CLIENT_SECRET,
            concurrentLimit: e.DIGIKEY_CONCURRENT_LIMIT,
            cacheTtlMs: e.DIGIKEY_CACHE_TTL_SECONDS * 1000,
            localeSite: e.DIGIKEY_LOCALE_SITE,
            localeLanguage: e.DIGIKEY_LOCALE_LANGUAGE,
            localeCurrency: e.DIGIKEY_LOCALE_CURRENCY,
          }
        : undefined,
  };
};
