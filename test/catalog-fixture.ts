/**
 * In-memory catalog seeded with a handful of parts.
 */

import Database from "better-sqlite3";
import { toComponentRow, type PartRecord } from "../src/catalog/build.js";
import { INSERT_COMPONENT_SQL, createTables, finalizeSchema } from "../src/catalog/schema.js";
import type { ComponentRow } from "../src/catalog/types.js";

export const SUBCATEGORIES = {
  "1": { name: "Chip Resistor - Surface Mount", category_id: 1, category_name: "Resistors" },
  "2": {
    name: "Multilayer Ceramic Capacitors MLCC - SMD/SMT",
    category_id: 2,
    category_name: "Capacitors",
  },
  "3": {
    name: "Microcontroller Units (MCUs/MPUs/SOCs)",
    category_id: 3,
    category_name: "Embedded Processors & Controllers",
  },
  "4": { name: "Operational Amplifier", category_id: 4, category_name: "Amplifiers" },
  "5": { name: "Wire To Board Connector", category_id: 5, category_name: "Connectors" },
};

export const PART_RECORDS: PartRecord[] = [
  {
    l: "C1525",
    m: "CL05B104KO5NNNC",
    f: "Samsung Electro-Mechanics",
    p: "0402",
    s: 5_000_000,
    t: "b",
    c: 2,
    $: 0.0012,
    d: "100nF 16V X7R 0402 MLCC",
    a: [
      ["Capacitance", "100nF"],
      ["Voltage Rated", "16V"],
    ],
  },
  {
    l: "C25744",
    m: "0402WGF1002TCE",
    f: "UNI-ROYAL",
    p: "0402",
    s: 3_000_000,
    t: "b",
    c: 1,
    $: 0.0007,
    d: "10k 1% 62.5mW thick film resistor",
    a: [{ name: "Resistance", value: "10kΩ" }],
  },
  {
    l: "C8734",
    m: "STM32F103C8T6",
    f: "STMicroelectronics",
    p: "LQFP-48",
    s: 20_000,
    t: "e",
    c: 3,
    $: 1.6,
    d: "ARM Cortex-M3 MCU 64KB flash",
  },
  {
    l: "C77794",
    m: "STM32F103C8T6TR",
    f: "STMicroelectronics",
    p: "LQFP-48",
    s: 500,
    t: "e",
    c: 3,
    $: 1.7,
    d: "ARM Cortex-M3 MCU tape and reel",
  },
  {
    l: "C7593",
    m: "LM358DR2G",
    f: "onsemi",
    p: "SOIC-8",
    s: 100_000,
    t: "p",
    c: 4,
    $: 0.05,
    d: "Dual op amp",
  },
  {
    l: "C160404",
    m: "S2B-PH-K-S(LF)(SN)",
    f: "JST",
    p: "Plugin,P=2mm",
    s: 40_000,
    t: "e",
    c: 5,
    $: 0.03,
    d: "PH 2 pin 2mm connector",
  },
];

/**
 * Fresh in-memory database holding the fixture parts.
 */
export const createFixtureDb = (): Database.Database => {
  const db = new Database(":memory:");
  createTables(db);

  const insertSubcategory = db.prepare("INSERT INTO subcategories VALUES (?, ?, ?, ?)");
  for (const [id, info] of Object.entries(SUBCATEGORIES)) {
    insertSubcategory.run(Number(id), info.name, info.category_id, info.category_name);
  }

  const insert = db.prepare<ComponentRow>(INSERT_COMPONENT_SQL);
  for (const record of PART_RECORDS) {
    insert.run(toComponentRow(record));
  }

  finalizeSchema(db);
  return db;
};
