/**
 * Catalog build tests (temp directory)
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import zlib from "node:zlib";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { buildCatalog } from "./build.js";
import { CatalogLookup } from "./lookup.js";
import { PART_RECORDS, SUBCATEGORIES } from "../../test/catalog-fixture.js";

let dataDir: string;

const writeDump = async (slug: string, lines: string[]): Promise<void> => {
  await fs.writeFile(
    path.join(dataDir, "categories", `${slug}.jsonl.gz`),
    zlib.gzipSync(lines.join("\n")),
  );
};

beforeEach(async () => {
  dataDir = await fs.mkdtemp(path.join(os.tmpdir(), "parts-catalog-"));
  await fs.mkdir(path.join(dataDir, "categories"));
  await fs.writeFile(path.join(dataDir, "subcategories.json"), JSON.stringify(SUBCATEGORIES));
  await fs.writeFile(
    path.join(dataDir, "manifest.json"),
    JSON.stringify({ categories: { passives: { id: 1, name: "Passives" } } }),
  );
});

afterEach(async () => {
  await fs.rm(dataDir, { recursive: true, force: true });
});

describe("buildCatalog", () => {
  it("should load every dump and report counts", async () => {
    const [first, second, ...rest] = PART_RECORDS;
    await writeDump("passives", [JSON.stringify(first), "", JSON.stringify(second)]);
    await writeDump("actives", rest.map((record) => JSON.stringify(record)));
    await fs.writeFile(path.join(dataDir, "categories", "notes.txt"), "ignored");

    const dbPath = path.join(dataDir, "out", "catalog.db");
    const stats = await buildCatalog(dataDir, dbPath);

    expect(stats.total_parts).toBe(6);
    expect(stats.categories).toBe(2);
    expect(stats.category_counts).toEqual({ actives: 4, passives: 2 });
    expect(stats.db_size_bytes).toBeGreaterThan(0);

    const catalog = CatalogLookup.open(dbPath);
    try {
      expect(catalog.getByLcsc("C25744")?.attributes).toEqual({ Resistance: "10kΩ" });
      expect(catalog.getByLcsc("C8734")?.category).toBe("Embedded Processors & Controllers");
      expect(catalog.getByMpn("LM358DR").map((p) => p.lcsc)).toEqual(["C7593"]);
    } finally {
      catalog.close();
    }
  });

  it("should replace an existing database", async () => {
    const dbPath = path.join(dataDir, "catalog.db");
    await writeDump("passives", [JSON.stringify(PART_RECORDS[0])]);
    await buildCatalog(dataDir, dbPath);

    await writeDump("passives", [JSON.stringify(PART_RECORDS[1])]);
    const stats = await buildCatalog(dataDir, dbPath);

    expect(stats.total_parts).toBe(1);
  });

  it("should name the file and line of an invalid record", async () => {
    await writeDump("broken", [JSON.stringify({ m: "NO-CODE" })]);
    await expect(buildCatalog(dataDir, path.join(dataDir, "catalog.db"))).rejects.toThrow(
      "broken.jsonl.gz:1:",
    );
  });
});
