/**
 * Model number detection for free-text part queries.
 */

/**
 * Patterns in priority order: known families, then discretes and diodes, then
 * the generic alphanumeric shape. The first pattern whose first match
 * survives the stopword and package checks wins.
 */
export const MODEL_PATTERNS: readonly RegExp[] = [
  /\b(ESP32-[A-Z0-9]+|STM32[A-Z]\d+[A-Z0-9]*|RP2040|ATMEGA\d+[A-Z]*|PIC\d+[A-Z0-9]*)\b/i,
  /\b(TP[45]\d{3}|AMS\d{4}|LM\d{4}|NE555|TL\d{3}|LMV?\d{3,4}|TPS\d{4,5})\b/i,
  /\b(AO\d{4}|SI\d{4}|IRF\d{3,4}|IRLZ?\d{2,4}|2N\d{4}|BC\d{3})\b/i,
  /\b(WS2812[A-Z]*|SK6812|APA102|TLC5940)\b/i,
  /\b(1N\d{4}[A-Z]*|1SS\d{3}[A-Z]*|BAT\d{2}[A-Z]*|BAS\d{2}[A-Z]*|BAV\d{2}[A-Z]*)\b/i,
  /\b([A-Z]{2,5}\d{2,5}[A-Z]?\d*(?:-[A-Z0-9]+)?)\b/i,
];

/** Generic acronyms that match the model shape but are never part numbers. */
const MODEL_STOPWORDS = new Set([
  "LED",
  "LCD",
  "USB",
  "SPI",
  "I2C",
  "ADC",
  "DAC",
  "MCU",
  "CPU",
  "GPU",
]);

/** Package families that look like model numbers when written without a hyphen. */
export const PACKAGE_PREFIXES: readonly string[] = [
  "SOT",
  "SOD",
  "SOP",
  "SOIC",
  "SSOP",
  "TSSOP",
  "MSOP",
  "QSOP",
  "QFN",
  "DFN",
  "QFP",
  "LQFP",
  "TQFP",
  "BGA",
  "DIP",
  "SIP",
];

/**
 * True when the candidate is a package designator such as SOT23, QFN32 or
 * SOD323L rather than a model number.
 */
export const isPackageDesignator = (candidate: string): boolean => {
  const upper = candidate.toUpperCase();
  return PACKAGE_PREFIXES.some((prefix) => {
    if (!upper.startsWith(prefix) || upper.length === prefix.length) {
      return false;
    }
    // digits, optionally followed by L suffixes (SOD323L)
    return /^\d[\dL]*$/.test(upper.slice(prefix.length));
  });
};

export interface ModelExtraction {
  model: string | null;
  remaining: string;
}

/**
 * Pull the most likely model number out of a query.
 */
export const extractModelNumber = (query: string): ModelExtraction => {
  for (const pattern of MODEL_PATTERNS) {
    const match = pattern.exec(query);
    if (!match) continue;

    const model = match[1];
    if (MODEL_STOPWORDS.has(model.toUpperCase())) continue;
    if (isPackageDesignator(model)) continue;

    const remaining = (
      query.slice(0, match.index) + query.slice(match.index + match[0].length)
    )
      .replace(/\s+/g, " ")
      .trim();
    return { model, remaining };
  }

  return { model: null, remaining: query };
};
