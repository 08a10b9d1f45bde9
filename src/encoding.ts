/**
 * Byte-level primitives shared by the hashing and signing modules.
 *
 * - u64 big-endian encoding (nonces, expiries)
 * - hex ⇄ bytes conversion
 * - concatenation and 32-byte word padding
 */

const HEX_RE = /^[0-9a-fA-F]*$/;

export const U64_MAX = (1n << 64n) - 1n;

// ── Primitives ──────────────────────────────────────────────────────

/**
 * Encode a number or bigint as 8 bytes big-endian (u64).
 *
 * @throws RangeError if the value is negative, fractional or above 2^64 - 1.
 */
export function u64BE(value: number | bigint): Uint8Array {
  const v = toU64(value);
  const buf = new Uint8Array(8);
  const view = new DataView(buf.buffer);
  view.setBigUint64(0, v, false);
  return buf;
}

/** Coerce a number or bigint to a u64 bigint, or throw a RangeError. */
export function toU64(value: number | bigint): bigint {
  if (typeof value === "number" && !Number.isSafeInteger(value)) {
    throw new RangeError(`not a safe integer: ${value}`);
  }
  const v = BigInt(value);
  if (v < 0n || v > U64_MAX) {
    throw new RangeError(`out of u64 range: ${v}`);
  }
  return v;
}

export function concat(arrays: Uint8Array[]): Uint8Array {
  let total = 0;
  for (const a of arrays) total += a.length;
  const result = new Uint8Array(total);
  let offset = 0;
  for (const a of arrays) {
    result.set(a, offset);
    offset += a.length;
  }
  return result;
}

/** Left-pad to a 32-byte word. */
export function padLeft32(bytes: Uint8Array): Uint8Array {
  if (bytes.length > 32) throw new RangeError(`word overflow: ${bytes.length} bytes`);
  const word = new Uint8Array(32);
  word.set(bytes, 32 - bytes.length);
  return word;
}

/** Right-pad to a 32-byte word. */
export function padRight32(bytes: Uint8Array): Uint8Array {
  if (bytes.length > 32) throw new RangeError(`word overflow: ${bytes.length} bytes`);
  const word = new Uint8Array(32);
  word.set(bytes, 0);
  return word;
}

// ── Hex ─────────────────────────────────────────────────────────────

/** Convert bytes to 0x-prefixed lowercase hex string. */
export function bytesToHex(bytes: Uint8Array): string {
  let hex = "0x";
  for (let i = 0; i < bytes.length; i++) {
    hex += bytes[i].toString(16).padStart(2, "0");
  }
  return hex;
}

/** Drop a leading `0x` / `0X`. */
export function strip0x(hex: string): string {
  return hex.startsWith("0x") || hex.startsWith("0X") ? hex.slice(2) : hex;
}

/** True if `hex` (optional `0x`) is an even-length run of hex digits. */
export function isHex(hex: string): boolean {
  const clean = strip0x(hex);
  return clean.length % 2 === 0 && HEX_RE.test(clean);
}

/**
 * Decode a hex string (optional `0x` prefix).
 *
 * @throws TypeError on odd length or non-hex characters.
 */
export function hexToBytes(hex: string): Uint8Array {
  if (!isHex(hex)) {
    throw new TypeError(`invalid hex string: ${JSON.stringify(hex)}`);
  }
  const clean = strip0x(hex);
  const bytes = new Uint8Array(clean.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = Number.parseInt(clean.substring(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}
