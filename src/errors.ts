/**
 * Error types shared across clients and the service layer.
 */

/**
 * Bad input detected before any I/O. Never retried.
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * Transport failure or non-success API envelope from a distributor.
 */
export class ApiError extends Error {
  readonly source: string;
  readonly status?: number;

  constructor(source: string, message: string, status?: number) {
    super(message);
    this.name = "ApiError";
    this.source = source;
    this.status = status;
  }
}

/**
 * EasyEDA symbol could not be fetched (as opposed to a malformed request).
 */
export class FetchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FetchError";
  }
}

/**
 * Environment configuration failed validation.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Extract a human-readable message from an unknown thrown value.
 */
export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
