/**
 * Ethereum address parsing and EIP-55 mixed-case checksum formatting.
 *
 * @module
 */

import { keccak_256 } from "@noble/hashes/sha3.js";
import { hexToBytes, strip0x } from "./encoding.js";
import { InvalidAddressFormat } from "./errors.js";

const ADDRESS_BODY_RE = /^[0-9a-fA-F]{40}$/;

/** The all-zero address used as `verifyingContract` in every signing domain. */
export const ZERO_ADDRESS = "0x0000000000000000000000000000000000000000";

function addressBody(input: string): string {
  const body = strip0x(input.trim());
  if (!ADDRESS_BODY_RE.test(body)) {
    throw new InvalidAddressFormat(input);
  }
  return body.toLowerCase();
}

/**
 * Format an address with its EIP-55 checksum.
 *
 * Accepts 40 hex characters with or without a `0x`/`0X` prefix, in any case,
 * surrounded by optional whitespace. Idempotent.
 *
 * @throws {InvalidAddressFormat} if the body is not exactly 40 hex characters.
 *
 * @example
 * ```ts
 * toChecksumAddress("0x5aaeb6053f3e94c9b9a09f33669435e7ef1beaed");
 * // "0x5aAeb6053F3E94C9b9A09f33669435E7Ef1BeAed"
 * ```
 */
export function toChecksumAddress(input: string): string {
  const lower = addressBody(input);
  const hash = keccak_256(new TextEncoder().encode(lower));
  let out = "0x";
  for (let i = 0; i < lower.length; i++) {
    const byte = hash[i >> 1];
    const nibble = i % 2 === 0 ? byte >> 4 : byte & 0x0f;
    out += nibble >= 8 ? lower[i].toUpperCase() : lower[i];
  }
  return out;
}

/** Lowercase `0x`-prefixed form of an address. */
export function normalizeAddress(input: string): string {
  return `0x${addressBody(input)}`;
}

/** Decode an address into its 20 raw bytes. */
export function parseAddress(input: string): Uint8Array {
  return hexToBytes(addressBody(input));
}
