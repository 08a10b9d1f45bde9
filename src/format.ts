/**
 * Price and size formatting for the exchange's tick and lot rules.
 *
 * - Prices: at most 5 significant figures and at most
 *   `6 - szDecimals` (perp) or `8 - szDecimals` (spot) decimals.
 *   Integer prices are always accepted as-is.
 * - Sizes: truncated to `szDecimals` decimals.
 *
 * All arithmetic is done on decimal strings; nothing is rounded, only
 * truncated.
 *
 * @module
 */

import { randomBytes } from "@noble/hashes/utils.js";
import { bytesToHex } from "./encoding.js";
import { ParseError } from "./errors.js";

const DECIMAL_RE = /^-?(\d+\.?\d*|\.\d+)$/;
const INTEGER_RE = /^-?\d+$/;

/** Spot asset ids occupy 10000–99999. */
const SPOT_ASSET_MIN = 10_000;
const SPOT_ASSET_MAX = 100_000;

const MAX_SIG_FIGS = 5;

function toDecimalString(value: string | number): string {
  if (typeof value === "number") {
    if (!Number.isFinite(value)) throw new ParseError(`not a finite number: ${value}`);
    return value.toLocaleString("en-US", { useGrouping: false, maximumFractionDigits: 20 });
  }
  const trimmed = value.trim();
  if (!DECIMAL_RE.test(trimmed)) throw new ParseError(`not a decimal number: ${JSON.stringify(value)}`);
  return trimmed;
}

/** Drop redundant leading and trailing zeros (`"007.50"` → `"7.5"`, `"-0.0"` → `"0"`). */
export function trimZeros(value: string): string {
  const s = value
    .replace(/^(-?)0+(?=\d)/, "$1")
    .replace(/\.0*$|(\.\d+?)0+$/, "$1")
    .replace(/^(-?)\./, (_match, sign: string) => `${sign}0.`);
  if (s === "" || s === "-" || s === "-0") return "0";
  return s;
}

/**
 * Truncate to `decimals` decimal places.
 *
 * @example
 * ```ts
 * toFixedTruncate("100.999", 2); // "100.99"
 * ```
 */
export function toFixedTruncate(value: string, decimals: number): string {
  const [int, dec] = value.split(".");
  if (dec === undefined || decimals <= 0) return trimZeros(int);
  return trimZeros(`${int}.${dec.slice(0, decimals)}`);
}

/**
 * Truncate to `precision` significant figures.
 *
 * @example
 * ```ts
 * toPrecisionTruncate("123456", 5);     // "123450"
 * toPrecisionTruncate("0.00012345", 3); // "0.000123"
 * ```
 */
export function toPrecisionTruncate(value: string, precision: number): string {
  const negative = value.startsWith("-");
  const [rawInt, dec = ""] = (negative ? value.slice(1) : value).split(".");
  const int = rawInt === "" ? "0" : rawInt;
  const digits = `${int}${dec}`;
  const first = digits.search(/[1-9]/);
  if (first === -1) return "0";
  const kept = digits.slice(0, first + precision).padEnd(digits.length, "0");
  const body = dec === "" ? kept : `${kept.slice(0, int.length)}.${kept.slice(int.length)}`;
  return trimZeros(negative ? `-${body}` : body);
}

export interface FormatPriceOptions {
  /** `false` for spot markets. */
  perp?: boolean;
}

/**
 * Format a price for an order.
 *
 * @example
 * ```ts
 * formatPrice("50000.123456", 5);                       // "50000"
 * formatPrice("0.0000123456789", 0, { perp: false });  // "0.00001234"
 * ```
 */
export function formatPrice(
  price: string | number,
  szDecimals: number,
  options: FormatPriceOptions = {},
): string {
  const value = toDecimalString(price);
  if (INTEGER_RE.test(value)) return trimZeros(value);
  const maxDecimals = Math.max(((options.perp ?? true) ? 6 : 8) - szDecimals, 0);
  return toPrecisionTruncate(toFixedTruncate(value, maxDecimals), MAX_SIG_FIGS);
}

/** Truncate a size to the asset's `szDecimals`. */
export function formatSize(size: string | number, szDecimals: number): string {
  return toFixedTruncate(toDecimalString(size), szDecimals);
}

/** Maximum price decimals for an asset id. */
export function maxPriceDecimals(assetId: number, szDecimals: number): number {
  const isSpot = assetId >= SPOT_ASSET_MIN && assetId < SPOT_ASSET_MAX;
  return Math.max((isSpot ? 8 : 6) - szDecimals, 0);
}

/** Random 16-byte client order id, `0x`-prefixed. */
export function makeCloid(): string {
  return bytesToHex(randomBytes(16));
}
