/**
 * JSON over the global fetch.
 */

import { ApiError } from "../errors.js";

/** Subset of the global `fetch` the clients use; injectable for tests. */
export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface JsonRequest {
  method?: "GET" | "POST";
  headers?: Record<string, string>;
  /** Serialized as JSON unless already a URLSearchParams form. */
  body?: unknown;
  timeoutMs: number;
}

/**
 * Send a request without interpreting the response status.
 */
export const sendRequest = (
  fetchFn: FetchFn,
  url: string,
  request: JsonRequest,
): Promise<Response> => {
  const headers: Record<string, string> = { Accept: "application/json", ...request.headers };
  let body: string | URLSearchParams | undefined;
  if (request.body instanceof URLSearchParams) {
    body = request.body;
  } else if (request.body !== undefined) {
    body = JSON.stringify(request.body);
    headers["Content-Type"] = "application/json";
  }

  return fetchFn(url, {
    method: request.method ?? (body === undefined ? "GET" : "POST"),
    headers,
    body,
    signal: AbortSignal.timeout(request.timeoutMs),
  });
};

/**
 * Decode a JSON response. Non-2xx statuses raise `ApiError` carrying the
 * status; the URL is left out of the message since it may hold credentials.
 */
export const readJson = async <T>(response: Response, source: string): Promise<T> => {
  if (!response.ok) {
    throw new ApiError(
      source,
      `${source} API error: ${response.status} ${response.statusText}`.trim(),
      response.status,
    );
  }
  return response.json() as Promise<T>;
};

/**
 * Send a request and decode the JSON response.
 */
export const fetchJson = async <T>(
  fetchFn: FetchFn,
  source: string,
  url: string,
  request: JsonRequest,
): Promise<T> => readJson<T>(await sendRequest(fetchFn, url, request), source);
