/**
 * Read-side queries against the local catalog.
 */

import Database from "better-sqlite3";
import { ValidationError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { normalizeMpn } from "../query/mpn.js";
import { parseQuery } from "../query/smart-parser.js";
import type { SubcategoryInfo } from "../types.js";
import type {
  CatalogPart,
  CatalogSearchFilters,
  CatalogSearchResult,
  ComponentRow,
  Grade,
  GradeName,
  SubcategoryRow,
} from "./types.js";

export const MAX_BATCH_SIZE = 1000;
export const DEFAULT_SEARCH_LIMIT = 20;
export const MAX_SEARCH_LIMIT = 100;
const FTS_LIMIT = 10;

const GRADE_NAMES: Readonly<Record<Grade, GradeName>> = {
  b: "basic",
  p: "preferred",
  e: "extended",
};

const LIBRARY_GRADES: Readonly<Record<string, readonly Grade[]>> = {
  basic: ["b"],
  preferred: ["p"],
  extended: ["e"],
  no_fee: ["b", "p"],
};

/**
 * Decode the stored attribute list. Entries are `[name, value]` pairs or
 * `{ name, value }` objects; anything else is skipped.
 */
export const parseAttributes = (raw: string | null): Record<string, string> => {
  if (!raw) return {};

  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch {
    return {};
  }

  const attributes: Record<string, string> = {};
  const entries: unknown[] = Array.isArray(decoded)
    ? decoded
    : typeof decoded === "object" && decoded !== null
      ? Object.entries(decoded)
      : [];

  for (const entry of entries) {
    if (Array.isArray(entry) && entry.length >= 2 && typeof entry[0] === "string") {
      attributes[entry[0]] = String(entry[1]);
    } else if (
      typeof entry === "object" &&
      entry !== null &&
      "name" in entry &&
      "value" in entry &&
      typeof entry.name === "string"
    ) {
      attributes[entry.name] = String(entry.value);
    }
  }
  return attributes;
};

/** Quote a term for FTS5 and match it as a prefix. */
export const ftsPrefix = (term: string): string => `"${term.replace(/"/g, '""')}"*`;

const escapeLike = (value: string): string => value.replace(/[\\%_]/g, (c) => `\\${c}`);

export class CatalogLookup {
  private readonly subcategories = new Map<number, SubcategoryRow>();

  constructor(
    private readonly db: Database.Database,
    private readonly logger: Logger = silentLogger,
  ) {
    const rows = db
      .prepare<[], SubcategoryRow>("SELECT id, name, category_id, category_name FROM subcategories")
      .all();
    for (const row of rows) {
      this.subcategories.set(row.id, row);
    }
  }

  /**
   * Open an existing catalog file read-only.
   */
  static open(dbPath: string, logger: Logger = silentLogger): CatalogLookup {
    const db = new Database(dbPath, { readonly: true, fileMustExist: true });
    const lookup = new CatalogLookup(db, logger);
    logger.info({ path: dbPath, subcategories: lookup.subcategories.size }, "catalog opened");
    return lookup;
  }

  close(): void {
    this.db.close();
  }

  /** Lowercase subcategory name to id. */
  subcategoryNameMap(): Map<string, number> {
    const map = new Map<string, number>();
    for (const row of this.subcategories.values()) {
      const key = row.name.toLowerCase();
      if (!map.has(key)) map.set(key, row.id);
    }
    return map;
  }

  subcategoryInfo(): Map<number, SubcategoryInfo> {
    const info = new Map<number, SubcategoryInfo>();
    for (const row of this.subcategories.values()) {
      info.set(row.id, { name: row.name, category_name: row.category_name });
    }
    return info;
  }

  private toPart(row: ComponentRow): CatalogPart {
    const subcategory =
      row.subcategory_id === null ? undefined : this.subcategories.get(row.subcategory_id);
    return {
      lcsc: row.lcsc,
      mpn: row.mpn,
      manufacturer: row.manufacturer,
      package: row.package,
      stock: row.stock ?? 0,
      library_type: row.library_type ? GRADE_NAMES[row.library_type] : null,
      price: row.price,
      description: row.description,
      subcategory_id: row.subcategory_id,
      subcategory: subcategory?.name ?? null,
      category: subcategory?.category_name ?? null,
      attributes: parseAttributes(row.attributes),
    };
  }

  getByLcsc(lcsc: string): CatalogPart | null {
    const row = this.db
      .prepare<[string], ComponentRow>("SELECT * FROM components WHERE lcsc = ?")
      .get(lcsc.trim().toUpperCase());
    return row ? this.toPart(row) : null;
  }

  /**
   * Look up many codes in one query. Codes are uppercased and deduplicated;
   * every requested code maps to its part or null.
   */
  getByLcscBatch(codes: readonly string[]): Record<string, CatalogPart | null> {
    if (codes.length === 0) return {};
    if (codes.length > MAX_BATCH_SIZE) {
      throw new ValidationError(
        `Batch size ${codes.length} exceeds maximum of ${MAX_BATCH_SIZE}. Split into smaller batches.`,
      );
    }

    const normalized = [...new Set(codes.map((code) => code.trim().toUpperCase()))];
    const results: Record<string, CatalogPart | null> = {};
    for (const code of normalized) results[code] = null;

    const placeholders = normalized.map(() => "?").join(",");
    const rows = this.db
      .prepare<string[], ComponentRow>(`SELECT * FROM components WHERE lcsc IN (${placeholders})`)
      .all(...normalized);
    for (const row of rows) {
      results[row.lcsc] = this.toPart(row);
    }
    return results;
  }

  /**
   * Find parts by manufacturer part number: exact case-insensitive match,
   * then normalized variants, then a full-text prefix match.
   */
  getByMpn(mpn: string): CatalogPart[] {
    const query = mpn.trim();
    if (!query) return [];

    const exact = this.db.prepare<[string], ComponentRow>(
      "SELECT * FROM components WHERE LOWER(mpn) = LOWER(?) ORDER BY stock DESC",
    );

    const direct = exact.all(query);
    if (direct.length > 0) return direct.map((row) => this.toPart(row));

    const variants = normalizeMpn(query);
    for (const variant of variants) {
      const rows = exact.all(variant);
      if (rows.length > 0) return rows.map((row) => this.toPart(row));
    }

    const fts = this.db.prepare<[string, number], ComponentRow>(
      `SELECT c.* FROM components c
       JOIN components_fts ON components_fts.lcsc = c.lcsc
       WHERE components_fts MATCH ?
       ORDER BY c.stock DESC
       LIMIT ?`,
    );
    for (const variant of variants) {
      const rows = fts.all(ftsPrefix(variant), FTS_LIMIT);
      if (rows.length > 0) {
        this.logger.debug({ mpn: query, variant }, "mpn matched by full-text prefix");
        return rows.map((row) => this.toPart(row));
      }
    }
    return [];
  }

  /**
   * Free-text search. The query is parsed into subcategory, package, model
   * and connector hints; explicit filters take precedence over hints.
   */
  search(query: string, filters: CatalogSearchFilters = {}): CatalogSearchResult {
    const parsed = parseQuery(query, this.subcategoryNameMap());

    const where: string[] = [];
    const params: Array<string | number> = [];

    const subcategoryId = filters.subcategoryId ?? parsed.subcategoryId;
    if (subcategoryId !== null) {
      where.push("c.subcategory_id = ?");
      params.push(subcategoryId);
    }

    const pkg = filters.package ?? parsed.package;
    if (pkg) {
      where.push("c.package LIKE ? ESCAPE '\\'");
      params.push(`${escapeLike(pkg)}%`);
    }

    if (parsed.model) {
      where.push("c.mpn LIKE ? ESCAPE '\\'");
      params.push(`${escapeLike(parsed.model)}%`);
    }

    if (filters.manufacturer) {
      where.push("c.manufacturer LIKE ? ESCAPE '\\'");
      params.push(`%${escapeLike(filters.manufacturer)}%`);
    }

    const grades =
      filters.libraryType && Object.hasOwn(LIBRARY_GRADES, filters.libraryType)
        ? LIBRARY_GRADES[filters.libraryType]
        : undefined;
    if (grades) {
      where.push(`c.library_type IN (${grades.map(() => "?").join(",")})`);
      params.push(...grades);
    }

    if (filters.minStock !== undefined) {
      where.push("c.stock >= ?");
      params.push(filters.minStock);
    }
    if (filters.maxPrice !== undefined) {
      where.push("c.price <= ?");
      params.push(filters.maxPrice);
    }

    const terms = [...parsed.terms];
    const connectorTerm = parsed.connector?.search_term ?? parsed.connector?.series;
    if (connectorTerm) terms.push(connectorTerm);

    let from = "components c";
    if (terms.length > 0) {
      from += " JOIN components_fts ON components_fts.lcsc = c.lcsc";
      where.push("components_fts MATCH ?");
      params.push(terms.map(ftsPrefix).join(" "));
    }

    const whereSql = where.length > 0 ? `WHERE ${where.join(" AND ")}` : "";
    const orderSql =
      filters.sortBy === "price"
        ? "ORDER BY c.price IS NULL, c.price ASC, c.stock DESC"
        : "ORDER BY c.stock DESC";

    const limit = Math.max(1, Math.min(Math.trunc(filters.limit ?? DEFAULT_SEARCH_LIMIT), MAX_SEARCH_LIMIT));
    const offset = Math.max(0, Math.trunc(filters.offset ?? 0));

    const total =
      this.db
        .prepare<Array<string | number>, { count: number }>(
          `SELECT COUNT(*) AS count FROM ${from} ${whereSql}`,
        )
        .get(...params)?.count ?? 0;

    const rows = this.db
      .prepare<Array<string | number>, ComponentRow>(
        `SELECT c.* FROM ${from} ${whereSql} ${orderSql} LIMIT ? OFFSET ?`,
      )
      .all(...params, limit, offset);

    return {
      results: rows.map((row) => this.toPart(row)),
      total,
      limit,
      offset,
      parsed: {
        model: parsed.model,
        package: parsed.package,
        connector: parsed.connector,
        subcategory_id: subcategoryId,
        subcategory:
          subcategoryId === null ? null : (this.subcategories.get(subcategoryId)?.name ?? null),
        terms,
      },
    };
  }
}
