/**
 * MCP tool surface, exercised through an in-memory client.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { CatalogLookup } from "../../src/catalog/lookup.js";
import { CategoryCache } from "../../src/distributors/jlcpcb/category-cache.js";
import { JlcpcbClient } from "../../src/distributors/jlcpcb/client.js";
import { EasyedaClient } from "../../src/easyeda/client.js";
import { createServer } from "../../src/server.js";
import { PartsService } from "../../src/service.js";
import { createFixtureDb } from "../catalog-fixture.js";
import { jsonResponse, queuedFetch, sampleCategories } from "../utils.js";

const TextResult = z.object({
  content: z.array(z.object({ type: z.literal("text"), text: z.string() })).min(1),
});

let service: PartsService;
let server: McpServer;
let client: Client;

const call = async (name: string, args: Record<string, unknown> = {}): Promise<unknown> => {
  const result = TextResult.parse(await client.callTool({ name, arguments: args }));
  return JSON.parse(result.content[0].text);
};

beforeEach(async () => {
  const offline = queuedFetch(jsonResponse({ error: "offline" }, 503));
  const cache = new CategoryCache();
  cache.set(sampleCategories());

  service = new PartsService({
    jlcpcb: new JlcpcbClient({
      fetch: offline,
      timeoutMs: 1000,
      retry: { retries: 0, backoffMs: 0 },
      noFeeMode: "combined",
      defaultMinStock: 50,
      cache,
    }),
    easyeda: new EasyedaClient({
      fetch: offline,
      timeoutMs: 1000,
      retry: { retries: 0, backoffMs: 0 },
    }),
    catalog: new CatalogLookup(createFixtureDb()),
  });

  server = createServer(service);
  client = new Client({ name: "test-client", version: "1.0.0" });

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  await client.connect(clientTransport);
});

afterEach(async () => {
  await client.close();
  await server.close();
  service.close();
});

describe("tool surface", () => {
  it("should register every tool", async () => {
    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual([
      "catalog_lookup",
      "catalog_search",
      "digikey_get_part",
      "digikey_search",
      "get_part",
      "get_pinout",
      "get_subcategories",
      "get_version",
      "list_categories",
      "mouser_get_part",
      "mouser_search",
      "resolve_subcategory",
      "search_distributors",
      "search_parts",
    ]);
  });

  it("should report configured sources", async () => {
    expect(await call("get_version")).toMatchObject({
      service: "parts-search-mcp",
      status: "healthy",
      sources: { jlcpcb: true, mouser: false, digikey: false, catalog: true },
    });
  });

  it("should answer category tools from the cache", async () => {
    expect(await call("get_subcategories", { category_id: 1 })).toEqual({
      category_id: 1,
      category_name: "Resistors",
      subcategories: [{ id: 2980, name: "Chip Resistor - Surface Mount", count: 500_000 }],
    });
    expect(await call("resolve_subcategory", { name: "smd resistor" })).toEqual({
      id: 2980,
      name: "Chip Resistor - Surface Mount",
      category_id: 1,
      category: "Resistors",
    });
  });

  it("should look up catalog parts by LCSC code", async () => {
    const result = await call("catalog_lookup", { lcsc: ["C7593"] });

    expect(result).toMatchObject({
      parts: { C7593: { lcsc: "C7593", mpn: "LM358DR2G", subcategory: "Operational Amplifier" } },
    });
  });

  it("should return distributor configuration errors as results", async () => {
    expect(await call("mouser_search", { keyword: "LM358" })).toEqual({
      error: "Mouser is not configured. Set MOUSER_API_KEY.",
    });
  });

  it("should return upstream failures as results", async () => {
    expect(await call("get_part", { lcsc: "C1525" })).toEqual({
      error: "JLCPCB API error: 503",
    });
  });
});
