/**
 * Build the local catalog database.
 *
 * Usage: tsx scripts/build-catalog.ts [dataDir] [dbPath]
 * Defaults to ./data/scraped and ./data/components.db.
 */

import path from "node:path";
import { buildCatalog } from "../src/catalog/build.js";
import { createLogger } from "../src/logger.js";

const [dataDir = "data/scraped", dbPath = "data/components.db"] = process.argv.slice(2);

const logger = createLogger("info");

buildCatalog(path.resolve(dataDir), path.resolve(dbPath), { logger })
  .then((stats) => {
    for (const [category, count] of Object.entries(stats.category_counts)) {
      console.log(`  ${category.padEnd(40)} ${count}`);
    }
    console.log(`Total: ${stats.total_parts} parts, ${stats.db_size_mb} MB`);
  })
  .catch((error: unknown) => {
    logger.error({ err: error }, "catalog build failed");
    process.exitCode = 1;
  });
