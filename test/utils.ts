/**
 * Shared test helpers: canned HTTP responses and a sample category tree.
 */

import { vi, type Mock } from "vitest";
import type { FetchFn } from "../src/http/fetch.js";
import type { Category } from "../src/types.js";

/**
 * JSON response with the given status.
 */
export const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });

/**
 * fetch stub answering each call with the next body in order. Calls beyond
 * the list repeat the last response.
 */
export const queuedFetch = (
  ...responses: Array<Response | (() => Response)>
): Mock<FetchFn> => {
  let index = 0;
  return vi.fn<FetchFn>(async () => {
    const next = responses[Math.min(index, responses.length - 1)];
    index++;
    return typeof next === "function" ? next() : next.clone();
  });
};

/**
 * Decode the JSON body sent with the nth call of a fetch stub.
 */
export const sentJson = (fetchMock: Mock<FetchFn>, call = 0): unknown => {
  const init = fetchMock.mock.calls[call]?.[1];
  return typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
};

/**
 * URL requested by the nth call of a fetch stub.
 */
export const sentUrl = (fetchMock: Mock<FetchFn>, call = 0): URL =>
  new URL(fetchMock.mock.calls[call]?.[0] ?? "about:blank");

/**
 * Category tree used across JLCPCB tests.
 */
export const sampleCategories = (): Category[] => [
  {
    id: 1,
    name: "Resistors",
    count: 1_000_000,
    subcategories: [{ id: 2980, name: "Chip Resistor - Surface Mount", count: 500_000 }],
  },
  { id: 5, name: "Transistors/Thyristors", count: 110_000, subcategories: [] },
  { id: 11, name: "Circuit Protection", count: 159_000, subcategories: [] },
  { id: 16, name: "Optoelectronics", count: 83_000, subcategories: [] },
  { id: 29, name: "Data Acquisition", count: 25_000, subcategories: [] },
];
