/**
 * Version information for the parts search MCP server.
 */

import { createRequire } from "node:module";

/** Current version of the server. */
export const VERSION = (() => {
  try {
    const require = createRequire(import.meta.url);
    const pkg = require("../package.json") as { version: string };
    return pkg.version;
  } catch {
    return "0.0.0-dev";
  }
})();

/** Service name reported by the server and the version tool. */
export const SERVICE_NAME = "parts-search-mcp";
