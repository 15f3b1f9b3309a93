/**
 * Catalog database schema.
 */

import type Database from "better-sqlite3";

export const TABLES_DDL = `
CREATE TABLE components (
  lcsc TEXT PRIMARY KEY,
  mpn TEXT,
  manufacturer TEXT,
  package TEXT,
  stock INTEGER,
  library_type TEXT CHECK(library_type IN ('b', 'p', 'e')),
  subcategory_id INTEGER,
  price REAL,
  description TEXT,
  attributes TEXT
);

CREATE TABLE subcategories (
  id INTEGER PRIMARY KEY,
  name TEXT NOT NULL,
  category_id INTEGER NOT NULL,
  category_name TEXT NOT NULL
);

CREATE TABLE categories (
  id INTEGER PRIMARY KEY,
  name TEXT NOT NULL,
  slug TEXT NOT NULL
);
`;

// created after the bulk insert
export const INDEXES_DDL = `
CREATE INDEX idx_subcategory ON components(subcategory_id);
CREATE INDEX idx_stock ON components(stock);
CREATE INDEX idx_library_type ON components(library_type);
CREATE INDEX idx_package ON components(package);
CREATE INDEX idx_manufacturer ON components(manufacturer);
CREATE INDEX idx_price ON components(price);
CREATE INDEX idx_subcat_stock ON components(subcategory_id, stock);
CREATE INDEX idx_subcat_libtype ON components(subcategory_id, library_type);
`;

export const FTS_DDL = `
CREATE VIRTUAL TABLE components_fts USING fts5(lcsc, mpn, manufacturer, description);
INSERT INTO components_fts(lcsc, mpn, manufacturer, description)
  SELECT lcsc, mpn, manufacturer, description FROM components;
`;

export const INSERT_COMPONENT_SQL = `
INSERT INTO components
  (lcsc, mpn, manufacturer, package, stock, library_type, subcategory_id, price, description, attributes)
VALUES
  (@lcsc, @mpn, @manufacturer, @package, @stock, @library_type, @subcategory_id, @price, @description, @attributes)
`;

export const createTables = (db: Database.Database): void => {
  db.exec(TABLES_DDL);
};

/**
 * Build secondary indexes and the full-text index over loaded rows.
 */
export const finalizeSchema = (db: Database.Database): void => {
  db.exec(INDEXES_DDL);
  db.exec(FTS_DDL);
};
