/**
 * CLI command handlers for --version, --help, and --build-catalog.
 */

import { buildCatalog } from "../catalog/build.js";
import { createLogger } from "../logger.js";
import { SERVICE_NAME, VERSION } from "../version.js";

/**
 * Print version information.
 */
export const printVersion = (): void => {
  console.log(`${SERVICE_NAME} v${VERSION}`);
};

/**
 * Print help message.
 */
export const printHelp = (): void => {
  console.log(
    `
${SERVICE_NAME} v${VERSION}

MCP server for searching electronic components on JLCPCB, Mouser and DigiKey,
with an optional local SQLite catalog.

USAGE:
  ${SERVICE_NAME} [OPTIONS]

OPTIONS:
  --version, -v                          Print version and exit
  --help, -h                             Show this help message
  --build-catalog <dataDir> <dbPath>     Build the SQLite catalog from category dumps

ENVIRONMENT:
  PARTS_CATALOG_DB                       Path to a built catalog database
  MOUSER_API_KEY                         Enables the Mouser tools
  DIGIKEY_CLIENT_ID, DIGIKEY_CLIENT_SECRET
                                         Enable the DigiKey tools
  LOG_LEVEL                              trace|debug|info|warn|error|fatal|silent
`.trim(),
  );
};

/**
 * Handle --build-catalog. Returns the process exit code.
 */
export const handleBuildCatalog = async (args: string[]): Promise<number> => {
  const index = args.indexOf("--build-catalog");
  const dataDir = args[index + 1];
  const dbPath = args[index + 2];

  if (!dataDir || !dbPath || dataDir.startsWith("-") || dbPath.startsWith("-")) {
    console.error("Usage: --build-catalog <dataDir> <dbPath>");
    return 1;
  }

  const stats = await buildCatalog(dataDir, dbPath, { logger: createLogger("info") });
  console.log(
    `Built ${dbPath}: ${stats.total_parts} parts from ${stats.categories} categories ` +
      `(${stats.db_size_mb} MB, ${stats.build_time_seconds}s)`,
  );
  return 0;
};
