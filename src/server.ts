/**
 * Parts Search MCP Server
 *
 * Model Context Protocol server for finding electronic components across
 * JLCPCB, Mouser, DigiKey and a local SQLite catalog.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { PartsService } from "./service.js";
import { SERVICE_NAME, VERSION } from "./version.js";

// =============================================================================
// Server Instructions
// =============================================================================

const SERVER_INSTRUCTIONS = `
# Parts Search MCP Server

Search electronic components for PCB assembly and sourcing.

## Workflow Guidance

1. Use \`search_parts\` for JLCPCB assembly parts; pass a category name as the query ("capacitor", "LED") or a part number ("ESP32-C3")
2. Use \`list_categories\` and \`get_subcategories\` (or \`resolve_subcategory\` for names like "mlcc", "ldo") to narrow a search
3. Use \`get_part\` with an LCSC code for pricing tiers, datasheet and attributes
4. Use \`get_pinout\` with an LCSC code to read the schematic symbol's pins and interfaces
5. Use \`search_distributors\`, or the \`mouser_*\` and \`digikey_*\` tools, to compare stock and pricing

## Tool Usage Tips

- \`library_type="no_fee"\` returns basic and preferred parts, which carry no extended-part setup fee
- \`min_stock\` defaults to 50; set 0 to include out-of-stock parts
- Distributor searches retry with normalized part numbers ("-TR" stripped, Microchip "T" inserted) when a part number finds nothing
- \`catalog_search\` understands packages ("0402", "SOT-23"), connector series ("JST PH", "Qwiic") and subcategory words in the query

## Error Handling

Results with an \`error\` field indicate a problem:
- Part not found: check the code, or search by MPN instead
- Unknown subcategory: see \`suggestions\` for close matches
- Distributor not configured: the named environment variables are missing
`.trim();

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Format a result as MCP tool response content.
 */
const formatResult = (
  result: unknown,
): { content: { type: "text"; text: string }[] } => ({
  content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
});

const libraryType = z
  .enum(["basic", "extended", "preferred", "no_fee", "all"])
  .optional()
  .describe('"basic", "preferred", "no_fee" (basic + preferred), "extended" or "all"');

// =============================================================================
// Server Setup
// =============================================================================

/**
 * Create and configure the MCP server.
 */
export const createServer = (service: PartsService): McpServer => {
  const server = new McpServer(
    {
      name: SERVICE_NAME,
      version: VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
      instructions: SERVER_INSTRUCTIONS,
    },
  );

  // -------------------------------------------------------------------------
  // Tool: search_parts
  // -------------------------------------------------------------------------
  server.registerTool(
    "search_parts",
    {
      description: "Search JLCPCB components for PCB assembly",
      inputSchema: {
        query: z
          .string()
          .optional()
          .describe('Keyword, part number or category name (e.g. "ESP32", "capacitor", "LED")'),
        category_id: z.number().int().optional().describe("Category ID from list_categories"),
        subcategory_id: z.number().int().optional().describe("Subcategory ID from get_subcategories"),
        subcategory: z
          .string()
          .optional()
          .describe('Subcategory name or alias (e.g. "mlcc"), used when subcategory_id is absent'),
        min_stock: z
          .number()
          .int()
          .min(0)
          .optional()
          .describe("Minimum stock (default 50); 0 includes out-of-stock parts"),
        library_type: libraryType,
        package: z.string().optional().describe('Package (e.g. "0402", "LQFP48")'),
        packages: z.array(z.string()).optional().describe("Any of these packages"),
        manufacturer: z.string().optional().describe("Exact manufacturer name"),
        manufacturers: z.array(z.string()).optional().describe("Any of these manufacturers"),
        sort_by: z.enum(["quantity", "price"]).optional().describe("Sort by stock or price"),
        page: z.number().int().min(1).optional().default(1).describe("Page number"),
        limit: z.number().int().optional().default(20).describe("Results per page (max 100)"),
      },
    },
    async (args) => {
      const result = await service.searchParts({
        query: args.query,
        categoryId: args.category_id,
        subcategoryId: args.subcategory_id,
        subcategory: args.subcategory,
        minStock: args.min_stock,
        libraryType: args.library_type,
        package: args.package,
        packages: args.packages,
        manufacturer: args.manufacturer,
        manufacturers: args.manufacturers,
        sortBy: args.sort_by,
        page: args.page,
        limit: args.limit,
      });
      return formatResult(result);
    },
  );

  // -------------------------------------------------------------------------
  // Tool: get_part
  // -------------------------------------------------------------------------
  server.registerTool(
    "get_part",
    {
      description: "Get full details for a JLCPCB part: pricing tiers, datasheet, attributes",
      inputSchema: {
        lcsc: z.string().describe('LCSC part code (e.g. "C82899")'),
      },
    },
    async ({ lcsc }) => {
      const result = await service.getPart(lcsc);
      return formatResult(result);
    },
  );

  // -------------------------------------------------------------------------
  // Tool: list_categories
  // -------------------------------------------------------------------------
  server.registerTool(
    "list_categories",
    {
      description: "List primary component categories with their IDs and part counts",
      inputSchema: {},
    },
    async () => {
      const result = await service.listCategories();
      return formatResult(result);
    },
  );

  // -------------------------------------------------------------------------
  // Tool: get_subcategories
  // -------------------------------------------------------------------------
  server.registerTool(
    "get_subcategories",
    {
      description: "List subcategories of a category",
      inputSchema: {
        category_id: z.number().int().describe("Primary category ID"),
      },
    },
    async ({ category_id }) => {
      const result = await service.getSubcategories(category_id);
      return formatResult(result);
    },
  );

  // -------------------------------------------------------------------------
  // Tool: resolve_subcategory
  // -------------------------------------------------------------------------
  server.registerTool(
    "resolve_subcategory",
    {
      description: "Resolve a subcategory name or common alias to its ID",
      inputSchema: {
        name: z.string().describe('Name or alias (e.g. "mlcc", "ldo", "usb-c")'),
      },
    },
    async ({ name }) => {
      const result = await service.resolveSubcategory(name);
      return formatResult(result);
    },
  );

  // -------------------------------------------------------------------------
  // Tool: get_pinout
  // -------------------------------------------------------------------------
  server.registerTool(
    "get_pinout",
    {
      description: "Get pin names, types and alternate functions from a part's EasyEDA symbol",
      inputSchema: {
        lcsc: z.string().optional().describe('LCSC part code (e.g. "C8304")'),
        uuid: z.string().optional().describe("EasyEDA symbol UUID (32 hex characters)"),
      },
    },
    async ({ lcsc, uuid }) => {
      const result = await service.getPinout({ lcsc, uuid });
      return formatResult(result);
    },
  );

  // -------------------------------------------------------------------------
  // Tool: catalog_lookup
  // -------------------------------------------------------------------------
  server.registerTool(
    "catalog_lookup",
    {
      description: "Look up parts in the local catalog by LCSC codes (up to 1000) or by MPN",
      inputSchema: {
        lcsc: z.array(z.string()).optional().describe("LCSC codes; every code is answered"),
        mpn: z.string().optional().describe("Manufacturer part number"),
      },
    },
    async ({ lcsc, mpn }) => {
      const result = await service.catalogLookup({ lcsc, mpn });
      return formatResult(result);
    },
  );

  // -------------------------------------------------------------------------
  // Tool: catalog_search
  // -------------------------------------------------------------------------
  server.registerTool(
    "catalog_search",
    {
      description: "Search the local catalog with free text and filters",
      inputSchema: {
        query: z
          .string()
          .optional()
          .describe('Free text (e.g. "10k 0402 resistor", "jst ph 2 pin")'),
        subcategory_id: z.number().int().optional().describe("Subcategory ID"),
        subcategory: z.string().optional().describe("Subcategory name or alias"),
        package: z.string().optional().describe("Package prefix"),
        manufacturer: z.string().optional().describe("Manufacturer name (partial match)"),
        library_type: libraryType,
        min_stock: z.number().int().min(0).optional().describe("Minimum stock"),
        max_price: z.number().min(0).optional().describe("Maximum unit price"),
        sort_by: z.enum(["stock", "price"]).optional().describe("Sort by stock or price"),
        limit: z.number().int().optional().default(20).describe("Results (max 100)"),
        offset: z.number().int().min(0).optional().default(0).describe("Results to skip"),
      },
    },
    async (args) => {
      const result = await service.catalogSearch({
        query: args.query,
        subcategoryId: args.subcategory_id,
        subcategory: args.subcategory,
        package: args.package,
        manufacturer: args.manufacturer,
        libraryType: args.library_type,
        minStock: args.min_stock,
        maxPrice: args.max_price,
        sortBy: args.sort_by,
        limit: args.limit,
        offset: args.offset,
      });
      return formatResult(result);
    },
  );

  // -------------------------------------------------------------------------
  // Tool: mouser_search
  // -------------------------------------------------------------------------
  server.registerTool(
    "mouser_search",
    {
      description: "Search Mouser by keyword or part number",
      inputSchema: {
        keyword: z.string().describe("Keyword or part number"),
        manufacturer: z.string().optional().describe("Restrict to one manufacturer"),
        in_stock_only: z.boolean().optional().default(false).describe("Only parts in stock"),
        records: z.number().int().optional().default(20).describe("Results (max 50)"),
        page: z.number().int().min(1).optional().default(1).describe("Page number"),
      },
    },
    async ({ keyword, manufacturer, in_stock_only, records, page }) => {
      const result = await service.mouserSearch(keyword, {
        manufacturer,
        inStockOnly: in_stock_only,
        records,
        page,
      });
      return formatResult(result);
    },
  );

  // -------------------------------------------------------------------------
  // Tool: mouser_get_part
  // -------------------------------------------------------------------------
  server.registerTool(
    "mouser_get_part",
    {
      description: 'Look up Mouser part numbers or MPNs; join up to 10 with "|"',
      inputSchema: {
        part_number: z.string().describe('Part number, or several joined with "|"'),
      },
    },
    async ({ part_number }) => {
      const result = await service.mouserGetPart(part_number);
      return formatResult(result);
    },
  );

  // -------------------------------------------------------------------------
  // Tool: digikey_search
  // -------------------------------------------------------------------------
  server.registerTool(
    "digikey_search",
    {
      description: "Search DigiKey by keyword or part number",
      inputSchema: {
        keyword: z.string().describe("Keyword or part number"),
        manufacturer: z.string().optional().describe("Manufacturer added to the keywords"),
        in_stock_only: z.boolean().optional().default(false).describe("Only parts in stock"),
        limit: z.number().int().optional().default(20).describe("Results (max 50)"),
        offset: z.number().int().min(0).optional().default(0).describe("Results to skip"),
      },
    },
    async ({ keyword, manufacturer, in_stock_only, limit, offset }) => {
      const result = await service.digikeySearch(keyword, {
        manufacturer,
        inStockOnly: in_stock_only,
        limit,
        offset,
      });
      return formatResult(result);
    },
  );

  // -------------------------------------------------------------------------
  // Tool: digikey_get_part
  // -------------------------------------------------------------------------
  server.registerTool(
    "digikey_get_part",
    {
      description: "Get DigiKey product details by DigiKey part number or MPN",
      inputSchema: {
        part_number: z.string().describe("DigiKey part number or MPN"),
      },
    },
    async ({ part_number }) => {
      const result = await service.digikeyGetPart(part_number);
      return formatResult(result);
    },
  );

  // -------------------------------------------------------------------------
  // Tool: search_distributors
  // -------------------------------------------------------------------------
  server.registerTool(
    "search_distributors",
    {
      description: "Search every configured distributor at once and merge results by MPN",
      inputSchema: {
        keyword: z.string().describe("Keyword or part number"),
        in_stock_only: z.boolean().optional().default(false).describe("Only parts in stock"),
        limit: z.number().int().optional().default(20).describe("Results per distributor"),
      },
    },
    async ({ keyword, in_stock_only, limit }) => {
      const result = await service.searchDistributors(keyword, {
        inStockOnly: in_stock_only,
        limit,
      });
      return formatResult(result);
    },
  );

  // -------------------------------------------------------------------------
  // Tool: get_version
  // -------------------------------------------------------------------------
  server.registerTool(
    "get_version",
    {
      description: "Get server version and which sources are configured",
      inputSchema: {},
    },
    async () => formatResult(service.getVersion()),
  );

  return server;
};

/**
 * Run the MCP server with stdio transport.
 */
export const runServer = async (): Promise<void> => {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  const service = PartsService.fromConfig(config, logger);
  await service.init();

  const server = createServer(service);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ version: VERSION }, "server listening on stdio");
};
