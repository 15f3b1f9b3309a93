/**
 * Service Unit Tests - tool results over stubbed clients
 */

import { describe, it, expect, afterEach } from "vitest";
import { PartsService, searchWithMpnFallback } from "./service.js";
import { CatalogLookup } from "./catalog/lookup.js";
import { loadConfig } from "./config.js";
import { DigiKeyClient } from "./distributors/digikey/client.js";
import { CategoryCache } from "./distributors/jlcpcb/category-cache.js";
import { JlcpcbClient } from "./distributors/jlcpcb/client.js";
import { MouserClient } from "./distributors/mouser/client.js";
import { EasyedaClient } from "./easyeda/client.js";
import type { FetchFn } from "./http/fetch.js";
import { isErrorResult } from "./types.js";
import { VERSION } from "./version.js";
import { jsonResponse, queuedFetch, sampleCategories, sentJson, sentUrl } from "../test/utils.js";
import { createFixtureDb } from "../test/catalog-fixture.js";

const NO_RETRY = { retries: 0, backoffMs: 0 };
const noSleep = async (): Promise<void> => {};

/**
 * Fetch stub for clients a test never expects to call.
 */
const unreachable = (): FetchFn => queuedFetch(jsonResponse({ error: "unexpected request" }, 500));

const jlcpcb = (fetchFn: FetchFn = unreachable()) => {
  const cache = new CategoryCache();
  cache.set(sampleCategories());
  return new JlcpcbClient({
    fetch: fetchFn,
    timeoutMs: 1000,
    retry: NO_RETRY,
    noFeeMode: "combined",
    defaultMinStock: 50,
    cache,
    sleep: noSleep,
  });
};

const easyeda = (fetchFn: FetchFn = unreachable()) =>
  new EasyedaClient({ fetch: fetchFn, timeoutMs: 1000, retry: NO_RETRY, sleep: noSleep });

const mouser = (fetchFn: FetchFn) =>
  new MouserClient({
    settings: { apiKey: "test-key", concurrentLimit: 2, cacheTtlMs: 60_000 },
    fetch: fetchFn,
    timeoutMs: 1000,
    retry: NO_RETRY,
    sleep: noSleep,
  });

const digikey = (fetchFn: FetchFn, retries = 0) =>
  new DigiKeyClient({
    settings: {
      clientId: "test-client",
      clientSecret: "test-secret",
      concurrentLimit: 2,
      cacheTtlMs: 60_000,
      localeSite: "US",
      localeLanguage: "en",
      localeCurrency: "USD",
    },
    fetch: fetchFn,
    timeoutMs: 1000,
    retry: { retries, backoffMs: 0 },
    sleep: noSleep,
    now: () => 0,
  });

const mouserResults = (parts: object[]) =>
  jsonResponse({ Errors: [], SearchResults: { NumberOfResult: parts.length, Parts: parts } });

const jlcResults = (list: object[]) =>
  jsonResponse({ code: 200, data: { componentPageInfo: { list, total: list.length } } });

const DIGIKEY_TOKEN = jsonResponse({ access_token: "token-1", expires_in: 600 });

let service: PartsService | undefined;

afterEach(() => {
  service?.close();
  service = undefined;
});

describe("categories", () => {
  it("should summarize the cached category tree", async () => {
    service = new PartsService({ jlcpcb: jlcpcb(), easyeda: easyeda() });
    const result = await service.listCategories();

    if (isErrorResult(result)) throw new Error(result.error);
    expect(result.categories).toHaveLength(5);
    expect(result.categories[0]).toEqual({
      id: 1,
      name: "Resistors",
      count: 1_000_000,
      subcategory_count: 1,
    });
  });

  it("should list subcategories of a known category", async () => {
    service = new PartsService({ jlcpcb: jlcpcb(), easyeda: easyeda() });

    expect(await service.getSubcategories(1)).toEqual({
      category_id: 1,
      category_name: "Resistors",
      subcategories: [{ id: 2980, name: "Chip Resistor - Surface Mount", count: 500_000 }],
    });
    expect(await service.getSubcategories(99)).toEqual({ error: "Category 99 not found" });
  });

  it("should resolve aliases to a subcategory with its parent", async () => {
    service = new PartsService({ jlcpcb: jlcpcb(), easyeda: easyeda() });

    expect(await service.resolveSubcategory(" Resistor ")).toEqual({
      id: 2980,
      name: "Chip Resistor - Surface Mount",
      category_id: 1,
      category: "Resistors",
    });
  });

  it("should suggest close names for unknown subcategories", async () => {
    service = new PartsService({ jlcpcb: jlcpcb(), easyeda: easyeda() });

    expect(await service.resolveSubcategory("chip fuse")).toEqual({
      error: "Unknown subcategory: chip fuse",
      suggestions: [{ id: 2980, name: "Chip Resistor - Surface Mount", category: "Resistors" }],
    });
    expect(await service.resolveSubcategory("gizmo")).toEqual({
      error: "Unknown subcategory: gizmo",
    });
  });
});

describe("searchParts", () => {
  it("should resolve a subcategory name into the request", async () => {
    const fetchMock = queuedFetch(
      jlcResults([
        {
          componentCode: "C25744",
          componentModelEn: "0402WGF1002TCE",
          componentLibraryType: "base",
          stockCount: 3_000_000,
        },
      ]),
    );
    service = new PartsService({ jlcpcb: jlcpcb(fetchMock), easyeda: easyeda() });

    const result = await service.searchParts({ subcategory: "resistor" });

    expect(sentJson(fetchMock)).toEqual({
      currentPage: 1,
      pageSize: 20,
      searchSource: "search",
      firstSortId: 1,
      firstSortName: "Resistors",
      searchType: 3,
      secondSortId: 2980,
      secondSortName: "Chip Resistor - Surface Mount",
      startStockNumber: 50,
    });
    if (isErrorResult(result)) throw new Error(result.error);
    expect(result.total).toBe(1);
    expect(result.has_more).toBe(false);
    expect(result.results[0]).toMatchObject({ lcsc: "C25744", library_type: "basic" });
  });

  it("should not search when the subcategory is unknown", async () => {
    const fetchMock = queuedFetch(jlcResults([]));
    service = new PartsService({ jlcpcb: jlcpcb(fetchMock), easyeda: easyeda() });

    expect(await service.searchParts({ subcategory: "gizmo" })).toEqual({
      error: "Unknown subcategory: gizmo",
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("should return API failures as error results", async () => {
    const fetchMock = queuedFetch(jsonResponse({ code: 500, message: "busy" }));
    service = new PartsService({ jlcpcb: jlcpcb(fetchMock), easyeda: easyeda() });

    expect(await service.searchParts({ query: "ESP32" })).toEqual({
      error: "JLCPCB API error: busy",
    });
  });
});

describe("getPart", () => {
  it("should report parts without an exact match", async () => {
    const fetchMock = queuedFetch(jlcResults([{ componentCode: "C12" }]));
    service = new PartsService({ jlcpcb: jlcpcb(fetchMock), easyeda: easyeda() });

    expect(await service.getPart("C1")).toEqual({ error: "Part C1 not found" });
  });
});

describe("getPinout", () => {
  const UUID = "0123456789abcdef0123456789abcdef";

  it("should require an LCSC code or a UUID", async () => {
    service = new PartsService({ jlcpcb: jlcpcb(), easyeda: easyeda() });

    expect(await service.getPinout({})).toEqual({
      error: "Provide an LCSC code or an EasyEDA symbol UUID",
    });
  });

  it("should report parts without a symbol", async () => {
    const fetchMock = queuedFetch(jsonResponse({ success: false }));
    service = new PartsService({ jlcpcb: jlcpcb(), easyeda: easyeda(fetchMock) });

    expect(await service.getPinout({ lcsc: "c8304" })).toEqual({
      error: "No EasyEDA symbol found for C8304",
    });
    expect(sentUrl(fetchMock).pathname).toBe("/api/products/C8304/components");
  });

  it("should return the parsed symbol", async () => {
    const fetchMock = queuedFetch(
      jsonResponse({ success: true, result: { uuid: UUID, title: "AO3400A", dataStr: { shape: [] } } }),
    );
    service = new PartsService({ jlcpcb: jlcpcb(), easyeda: easyeda(fetchMock) });

    expect(await service.getPinout({ uuid: UUID })).toEqual({
      uuid: UUID,
      title: "AO3400A",
      pin_count: 0,
      pins: [],
    });
  });
});

describe("local catalog", () => {
  const withCatalog = (): PartsService =>
    new PartsService({
      jlcpcb: jlcpcb(),
      easyeda: easyeda(),
      catalog: new CatalogLookup(createFixtureDb()),
    });

  it("should report a missing catalog", async () => {
    service = new PartsService({ jlcpcb: jlcpcb(), easyeda: easyeda() });

    expect(await service.catalogLookup({ mpn: "LM358" })).toEqual({
      error: "Local catalog is not available. Set PARTS_CATALOG_DB.",
    });
    expect(await service.catalogSearch({ query: "resistor" })).toEqual({
      error: "Local catalog is not available. Set PARTS_CATALOG_DB.",
    });
  });

  it("should answer every requested LCSC code", async () => {
    service = withCatalog();
    const result = await service.catalogLookup({ lcsc: ["c1525", "C999"] });

    if (isErrorResult(result) || !("parts" in result)) throw new Error("expected parts");
    expect(Object.keys(result.parts)).toEqual(["C1525", "C999"]);
    expect(result.parts.C1525?.mpn).toBe("CL05B104KO5NNNC");
    expect(result.parts.C999).toBeNull();
  });

  it("should look up by MPN", async () => {
    service = withCatalog();
    const result = await service.catalogLookup({ mpn: " STM32F103C8T6 " });

    if (isErrorResult(result) || !("results" in result)) throw new Error("expected results");
    expect(result.mpn).toBe("STM32F103C8T6");
    expect(result.results.map((part) => part.lcsc)).toEqual(["C8734"]);
  });

  it("should reject lookups without input", async () => {
    service = withCatalog();
    expect(await service.catalogLookup({ lcsc: [] })).toEqual({
      error: "Provide LCSC codes or an MPN",
    });
  });

  it("should resolve subcategory aliases against the catalog", async () => {
    service = withCatalog();
    const result = await service.catalogSearch({ subcategory: "mlcc" });

    if (isErrorResult(result)) throw new Error(result.error);
    expect(result.results.map((part) => part.lcsc)).toEqual(["C1525"]);
  });

  it("should suggest catalog subcategories for unknown names", async () => {
    service = withCatalog();

    expect(await service.catalogSearch({ subcategory: "ceramic thing" })).toEqual({
      error: "Unknown subcategory: ceramic thing",
      suggestions: [
        { id: 2, name: "Multilayer Ceramic Capacitors MLCC - SMD/SMT", category: "Capacitors" },
      ],
    });
  });
});

describe("searchWithMpnFallback", () => {
  it("should return the first result when no variant matches", async () => {
    const queries: string[] = [];
    const result = await searchWithMpnFallback("LM358P-TR", async (query) => {
      queries.push(query);
      return { results: [], total: queries.length };
    });

    expect(queries).toEqual(["LM358P-TR", "LM358P"]);
    expect(result).toEqual({ results: [], total: 1 });
  });

  it("should not retry descriptive keywords", async () => {
    const queries: string[] = [];
    await searchWithMpnFallback("resistor", async (query) => {
      queries.push(query);
      return { results: [], total: 0 };
    });

    expect(queries).toEqual(["resistor"]);
  });
});

describe("distributors", () => {
  it("should report unconfigured distributors", async () => {
    service = new PartsService({ jlcpcb: jlcpcb(), easyeda: easyeda() });

    expect(await service.mouserSearch("LM358")).toEqual({
      error: "Mouser is not configured. Set MOUSER_API_KEY.",
    });
    expect(await service.digikeyGetPart("LM358")).toEqual({
      error: "DigiKey is not configured. Set DIGIKEY_CLIENT_ID and DIGIKEY_CLIENT_SECRET.",
    });
    expect(await service.searchDistributors("LM358")).toEqual({
      error:
        "Mouser is not configured. Set MOUSER_API_KEY. " +
        "DigiKey is not configured. Set DIGIKEY_CLIENT_ID and DIGIKEY_CLIENT_SECRET.",
    });
  });

  it("should record the variant that matched on Mouser", async () => {
    const fetchMock = queuedFetch(
      mouserResults([]),
      mouserResults([{ MouserPartNumber: "595-LM358P", ManufacturerPartNumber: "LM358P" }]),
    );
    service = new PartsService({ jlcpcb: jlcpcb(), easyeda: easyeda(), mouser: mouser(fetchMock) });

    const result = await service.mouserSearch(" LM358P-TR ");

    expect(sentJson(fetchMock, 0)).toMatchObject({ SearchByKeywordRequest: { keyword: "LM358P-TR" } });
    expect(sentJson(fetchMock, 1)).toMatchObject({ SearchByKeywordRequest: { keyword: "LM358P" } });
    if (isErrorResult(result)) throw new Error(result.error);
    expect(result.matched_query).toBe("LM358P");
    expect(result.results[0].part_number).toBe("595-LM358P");
  });

  it("should return validation failures as error results", async () => {
    service = new PartsService({
      jlcpcb: jlcpcb(),
      easyeda: easyeda(),
      mouser: mouser(unreachable()),
    });

    expect(await service.mouserGetPart("  ")).toEqual({ error: "Part number is required" });
  });

  it("should report DigiKey parts that are not found", async () => {
    const fetchMock = queuedFetch(DIGIKEY_TOKEN, jsonResponse({}));
    service = new PartsService({ jlcpcb: jlcpcb(), easyeda: easyeda(), digikey: digikey(fetchMock) });

    expect(await service.digikeyGetPart("NOPE-123")).toEqual({ error: "Part not found: NOPE-123" });
  });

  it("should treat a DigiKey 404 as not found", async () => {
    const fetchMock = queuedFetch(DIGIKEY_TOKEN, new Response("", { status: 404 }));
    service = new PartsService({
      jlcpcb: jlcpcb(),
      easyeda: easyeda(),
      digikey: digikey(fetchMock, 2),
    });

    expect(await service.digikeyGetPart("NOPE-404")).toEqual({ error: "Part not found: NOPE-404" });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("should merge distributors by MPN keeping Mouser first", async () => {
    const mouserFetch = queuedFetch(
      mouserResults([{ MouserPartNumber: "595-LM358P", ManufacturerPartNumber: "LM358P" }]),
    );
    const digikeyFetch = queuedFetch(
      DIGIKEY_TOKEN,
      jsonResponse({
        Products: [
          {
            ManufacturerProductNumber: "lm358p",
            ProductVariations: [{ DigiKeyProductNumber: "296-1395-5-ND" }],
          },
        ],
        ProductsCount: 3,
      }),
    );
    service = new PartsService({
      jlcpcb: jlcpcb(),
      easyeda: easyeda(),
      mouser: mouser(mouserFetch),
      digikey: digikey(digikeyFetch),
    });

    const result = await service.searchDistributors("LM358P");

    if (isErrorResult(result)) throw new Error(result.error);
    expect(result.results.map((part) => part.source)).toEqual(["mouser"]);
    expect(result.total).toBe(4);
    expect(result.sources).toEqual({ mouser: { total: 1 }, digikey: { total: 3 } });
  });

  it("should keep results when one distributor fails", async () => {
    const mouserFetch = queuedFetch(
      mouserResults([{ MouserPartNumber: "595-LM358P", ManufacturerPartNumber: "LM358P" }]),
    );
    const digikeyFetch = queuedFetch(jsonResponse({ error: "invalid_client" }));
    service = new PartsService({
      jlcpcb: jlcpcb(),
      easyeda: easyeda(),
      mouser: mouser(mouserFetch),
      digikey: digikey(digikeyFetch),
    });

    const result = await service.searchDistributors("LM358P");

    if (isErrorResult(result)) throw new Error(result.error);
    expect(result.results).toHaveLength(1);
    expect(result.sources).toEqual({
      mouser: { total: 1 },
      digikey: { error: "DigiKey OAuth error: invalid_client" },
    });
  });
});

describe("fromConfig", () => {
  it("should enable only configured sources", () => {
    service = PartsService.fromConfig(
      loadConfig({ MOUSER_API_KEY: "test-key", PARTS_CATALOG_DB: "/nonexistent/parts.db" }),
    );

    expect(service.getVersion()).toEqual({
      service: "parts-search-mcp",
      version: VERSION,
      status: "healthy",
      sources: { jlcpcb: true, mouser: true, digikey: false, catalog: false },
    });
  });
});
