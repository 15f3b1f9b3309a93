/**
 * Build the SQLite catalog from scraped category dumps.
 *
 * Input layout:
 *   subcategories.json        { "<id>": { name, category_id, category_name } }
 *   manifest.json             { categories: { "<slug>": { id, name } } }
 *   categories/<slug>.jsonl.gz  one compact part record per line
 */

import fs from "node:fs";
import path from "node:path";
import readline from "node:readline";
import zlib from "node:zlib";
import Database from "better-sqlite3";
import { z } from "zod";
import { silentLogger, type Logger } from "../logger.js";
import { INSERT_COMPONENT_SQL, createTables, finalizeSchema } from "./schema.js";
import type { BuildStats, ComponentRow } from "./types.js";

export const BATCH_SIZE = 1000;

const SubcategoriesFileSchema = z.record(
  z.string(),
  z.object({
    name: z.string(),
    category_id: z.number().int(),
    category_name: z.string(),
  }),
);

const ManifestSchema = z.object({
  categories: z
    .record(z.string(), z.object({ id: z.number().int(), name: z.string() }))
    .default({}),
});

/** Compact record keys: lcsc, mpn, manufacturer, package, stock, grade, subcategory, price, description, attributes. */
const PartRecordSchema = z.object({
  l: z.string().min(1),
  m: z.string().nullish(),
  f: z.string().nullish(),
  p: z.string().nullish(),
  s: z.number().nullish(),
  t: z.enum(["b", "p", "e"]).nullish(),
  c: z.number().int().nullish(),
  $: z.number().nullish(),
  d: z.string().nullish(),
  a: z.unknown().optional(),
});

export type PartRecord = z.infer<typeof PartRecordSchema>;

export const toComponentRow = (record: PartRecord): ComponentRow => ({
  lcsc: record.l,
  mpn: record.m ?? null,
  manufacturer: record.f ?? null,
  package: record.p ?? null,
  stock: record.s ?? null,
  library_type: record.t ?? null,
  subcategory_id: record.c ?? null,
  price: record.$ ?? null,
  description: record.d ?? null,
  attributes: JSON.stringify(record.a ?? []),
});

const readJsonFile = async (file: string): Promise<unknown | undefined> => {
  try {
    return JSON.parse(await fs.promises.readFile(file, "utf-8"));
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return undefined;
    }
    throw error;
  }
};

/**
 * Stream compact part records from a gzipped JSONL file.
 */
export async function* readPartRecords(file: string): AsyncGenerator<PartRecord> {
  const lines = readline.createInterface({
    input: fs.createReadStream(file).pipe(zlib.createGunzip()),
    crlfDelay: Infinity,
  });

  let lineNumber = 0;
  for await (const line of lines) {
    lineNumber++;
    if (!line.trim()) continue;
    const parsed = PartRecordSchema.safeParse(JSON.parse(line));
    if (!parsed.success) {
      throw new Error(`${path.basename(file)}:${lineNumber}: ${parsed.error.issues[0]?.message}`);
    }
    yield parsed.data;
  }
}

export interface BuildOptions {
  logger?: Logger;
}

/**
 * Build a fresh catalog at `dbPath`, replacing any existing file.
 */
export const buildCatalog = async (
  dataDir: string,
  dbPath: string,
  options: BuildOptions = {},
): Promise<BuildStats> => {
  const logger = options.logger ?? silentLogger;
  const started = performance.now();

  const categoriesDir = path.join(dataDir, "categories");
  const dumps = (await fs.promises.readdir(categoriesDir))
    .filter((name) => name.endsWith(".jsonl.gz"))
    .sort();

  await fs.promises.rm(dbPath, { force: true });
  await fs.promises.mkdir(path.dirname(dbPath), { recursive: true });

  const db = new Database(dbPath);
  try {
    db.pragma("journal_mode = WAL");
    db.pragma("synchronous = NORMAL");
    createTables(db);

    const subcategories = await readJsonFile(path.join(dataDir, "subcategories.json"));
    if (subcategories !== undefined) {
      const entries = Object.entries(SubcategoriesFileSchema.parse(subcategories));
      const insert = db.prepare("INSERT INTO subcategories VALUES (?, ?, ?, ?)");
      db.transaction(() => {
        for (const [id, info] of entries) {
          insert.run(Number(id), info.name, info.category_id, info.category_name);
        }
      })();
      logger.info({ count: entries.length }, "subcategories loaded");
    }

    const manifest = await readJsonFile(path.join(dataDir, "manifest.json"));
    if (manifest !== undefined) {
      const insert = db.prepare("INSERT OR REPLACE INTO categories VALUES (?, ?, ?)");
      db.transaction(() => {
        for (const [slug, info] of Object.entries(ManifestSchema.parse(manifest).categories)) {
          insert.run(info.id, info.name, slug);
        }
      })();
    }

    const insertComponent = db.prepare<ComponentRow>(INSERT_COMPONENT_SQL);
    const insertBatch = db.transaction((rows: ComponentRow[]) => {
      for (const row of rows) insertComponent.run(row);
    });

    const categoryCounts: Record<string, number> = {};
    for (const dump of dumps) {
      const slug = dump.slice(0, -".jsonl.gz".length);
      let count = 0;
      let batch: ComponentRow[] = [];

      for await (const record of readPartRecords(path.join(categoriesDir, dump))) {
        batch.push(toComponentRow(record));
        count++;
        if (batch.length >= BATCH_SIZE) {
          insertBatch(batch);
          batch = [];
        }
      }
      if (batch.length > 0) {
        insertBatch(batch);
      }

      categoryCounts[slug] = count;
      logger.info({ category: slug, count }, "category loaded");
    }

    finalizeSchema(db);
    db.exec("ANALYZE");
    db.exec("VACUUM");

    const total = db.prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM components").get();
    const size = db
      .prepare<[], { size: number }>(
        "SELECT page_count * page_size AS size FROM pragma_page_count(), pragma_page_size()",
      )
      .get();

    const dbSize = size?.size ?? 0;
    const stats: BuildStats = {
      total_parts: total?.count ?? 0,
      categories: dumps.length,
      category_counts: categoryCounts,
      db_size_bytes: dbSize,
      db_size_mb: Math.round((dbSize / (1024 * 1024)) * 100) / 100,
      build_time_seconds: Math.round((performance.now() - started) / 10) / 100,
    };
    logger.info({ parts: stats.total_parts, sizeMb: stats.db_size_mb }, "catalog built");
    return stats;
  } finally {
    db.close();
  }
};
