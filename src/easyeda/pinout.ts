/**
 * EasyEDA symbol pin extraction.
 *
 * Pin elements in a symbol's `shape` array look like
 * `P~show~0~<num>~x~y~...~<label>~start~~~...~<label>~end~~~...`. Which end
 * carries the pin name depends on the side of the symbol the pin sits on,
 * so both labels are read and the non-numeric one wins.
 */

import type { InterfaceInstances, Pin, PinType, PinoutSummary } from "../types.js";
import type { EasyedaComponent } from "./types.js";

// Ground is checked first: "VSS" would otherwise match power keywords.
const GROUND_KEYWORDS = ["GND", "VSS", "AGND", "DGND", "VEE", "V-", "EP", "PGND"];
const POWER_KEYWORDS = [
  "VCC", "VDD", "VBAT", "3V3", "5V", "3.3V", "VBUS", "VIN", "VOUT", "V+", "AVCC", "DVCC",
];

const PERIPHERAL_PREFIXES = [
  "USART", "UART", "SPI", "I2C", "ADC", "DAC", "TIM", "CAN",
  "USB", "COMP", "OPAMP", "WKUP", "JTAG", "SWD", "ETH", "SDIO",
  "FSMC", "RTC", "MCO", "TRACECLK", "TAMPER", "OSC", "BOOT",
];

const START_LABEL = /~([^~]+)~start~~~/;
const END_LABEL = /~([^~]+)~end~~~/;
const COLOR = /#[0-9A-Fa-f]{6}/g;
const GPIO_UNDERSCORE = /^(P[A-K]\d+)_(.+)$/;
const GPIO_CONCATENATED = /^(P[A-K]\d+)([A-Z].*)$/;
const PERIPHERAL = new RegExp(`(${PERIPHERAL_PREFIXES.join("|")})`, "g");

const DIGITS = /^\d+$/;

/** Interface name and the pattern capturing its instance number. */
const INTERFACE_PATTERNS: ReadonlyArray<readonly [string, RegExp]> = [
  ["i2c", /I2C(\d*)/],
  ["spi", /SPI(\d*)/],
  ["usart", /USART(\d*)/],
  ["uart", /UART(\d*)/],
  ["can", /CAN(\d*)/],
  ["usb", /USB/],
  ["adc", /ADC\d*_IN(\d+)/],
  ["dac", /DAC(\d*)/],
  ["timer", /TIM(\d+)/],
  ["eth", /ETH/],
  ["sdio", /SDIO/],
  ["i2s", /I2S(\d*)/],
];

const BOOLEAN_INTERFACES = new Set(["usb", "eth", "sdio"]);

/**
 * Classify a pin by name.
 */
export const detectPinType = (name: string | null | undefined): PinType => {
  const upper = (name ?? "").toUpperCase();
  if (GROUND_KEYWORDS.some((keyword) => upper.includes(keyword))) return "ground";
  if (POWER_KEYWORDS.some((keyword) => upper.includes(keyword))) return "power";
  if (name && DIGITS.test(name)) return "passive";
  return "io";
};

/**
 * Split concatenated peripheral functions, e.g. "WKUPUSART2_CTSADC12_IN0"
 * into ["WKUP", "USART2_CTS", "ADC12_IN0"]. Text before the first known
 * prefix is a function of its own; text after a prefix belongs to it.
 */
const splitConcatenated = (remainder: string): string[] => {
  const functions: string[] = [];
  let lastEnd = 0;

  for (const match of remainder.matchAll(PERIPHERAL)) {
    const start = match.index ?? 0;
    if (start > lastEnd) {
      const gap = remainder.slice(lastEnd, start);
      if (functions.length > 0) {
        functions[functions.length - 1] += gap;
      } else {
        functions.push(gap);
      }
    }
    functions.push(match[1]);
    lastEnd = start + match[0].length;
  }

  if (functions.length === 0) {
    return remainder ? [remainder] : [];
  }
  if (lastEnd < remainder.length) {
    functions[functions.length - 1] += remainder.slice(lastEnd);
  }
  return functions;
};

/**
 * Split an MCU pin name into its base name and alternate functions.
 *
 * "PC13-TAMPER-RTC" gives ["PC13", ["TAMPER", "RTC"]];
 * "PA0_WKUPUSART2_CTSADC12_IN0" gives ["PA0", ["WKUP", "USART2_CTS", "ADC12_IN0"]].
 */
export const splitPinFunctions = (
  rawName: string | null | undefined,
): [base: string, functions: string[]] => {
  if (!rawName) return [rawName ?? "", []];

  if (rawName.includes("-")) {
    const [base, ...functions] = rawName.split("-");
    return [base, functions];
  }

  const gpio = GPIO_UNDERSCORE.exec(rawName) ?? GPIO_CONCATENATED.exec(rawName);
  if (gpio) {
    return [gpio[1], splitConcatenated(gpio[2])];
  }

  return [rawName, []];
};

const shapeOf = (dataStr: unknown): unknown[] => {
  let decoded = dataStr;
  if (typeof decoded === "string") {
    try {
      decoded = JSON.parse(decoded);
    } catch {
      return [];
    }
  }
  if (typeof decoded !== "object" || decoded === null || !("shape" in decoded)) {
    return [];
  }
  return Array.isArray(decoded.shape) ? decoded.shape : [];
};

const comparePinNumbers = (a: string, b: string): number => {
  const aNumeric = DIGITS.test(a);
  const bNumeric = DIGITS.test(b);
  if (aNumeric && bNumeric) return Number(a) - Number(b);
  if (aNumeric) return -1;
  if (bNumeric) return 1;
  return a < b ? -1 : a > b ? 1 : 0;
};

/**
 * Extract pins from a symbol payload, sorted by pin number. Missing or
 * malformed shape data yields an empty list. Duplicate pin numbers are kept.
 */
export const parseEasyedaPins = (component: EasyedaComponent): Pin[] => {
  const pins: Pin[] = [];

  for (const element of shapeOf(component.dataStr)) {
    if (typeof element !== "string" || !element.startsWith("P~")) continue;

    const number = element.split("~")[3] ?? "";
    const startLabel = START_LABEL.exec(element)?.[1];
    const endLabel = END_LABEL.exec(element)?.[1];

    let rawName = number;
    if (startLabel && !DIGITS.test(startLabel)) {
      rawName = startLabel;
    } else if (endLabel && !DIGITS.test(endLabel)) {
      rawName = endLabel;
    }

    const [name, functions] = splitPinFunctions(rawName);
    const pin: Pin = { number, name, functions, type: detectPinType(rawName) };

    const color = element.match(COLOR)?.[0];
    if (color) {
      pin.color = color.toUpperCase();
    }
    pins.push(pin);
  }

  return pins.sort((a, b) => comparePinNumbers(a.number, b.number));
};

/**
 * Group alternate pin functions into interfaces. Returns null for simple
 * parts with neither power pins nor recognizable interfaces.
 */
export const generatePinoutSummary = (pins: readonly Pin[]): PinoutSummary | null => {
  const power = pins.filter((pin) => pin.type === "power").map((pin) => pin.name);
  const ground = pins.filter((pin) => pin.type === "ground").map((pin) => pin.name);

  const found = new Map<string, Set<string>>();
  for (const pin of pins) {
    for (const fn of pin.functions) {
      for (const [iface, pattern] of INTERFACE_PATTERNS) {
        const match = pattern.exec(fn);
        if (!match) continue;
        const instances = found.get(iface) ?? new Set<string>();
        instances.add(match[1] ? `${iface.toUpperCase()}${match[1]}` : iface.toUpperCase());
        found.set(iface, instances);
      }
    }
  }

  const interfaces: Record<string, true | InterfaceInstances> = {};
  for (const [iface, set] of found) {
    const instances = [...set].sort();
    interfaces[iface] =
      BOOLEAN_INTERFACES.has(iface) && instances.length === 1
        ? true
        : { count: instances.length, instances };
  }

  if (found.size === 0 && power.length === 0) {
    return null;
  }

  const summary: PinoutSummary = { power, ground };
  if (found.size > 0) {
    summary.interfaces = interfaces;
  }
  return summary;
};
