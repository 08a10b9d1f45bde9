/**
 * Independent reference computations used to cross-check the library:
 * connection ids built directly from `@msgpack/msgpack` + viem's keccak,
 * and typed-data signatures produced by viem's local account.
 */

import { encode } from "@msgpack/msgpack";
import { type Hex, keccak256 } from "viem";

/** Placeholder keys; not used anywhere outside these tests. */
export const TEST_KEY: Hex = "0x1111111111111111111111111111111111111111111111111111111111111111";
export const OTHER_KEY: Hex = "0x2222222222222222222222222222222222222222222222222222222222222222";
/** Private key 1; its address is a well-known vector. */
export const KEY_ONE: Hex = "0x0000000000000000000000000000000000000000000000000000000000000001";
export const KEY_ONE_ADDRESS = "0x7E5F4552091A69125d5DfCb7b8C2659029395Bdf";

export const ZERO: Hex = "0x0000000000000000000000000000000000000000";
export const VAULT: Hex = "0x1234567890abcdef1234567890abcdef12345678";

function addressBytes(address: string): Uint8Array {
  const hex = address.startsWith("0x") ? address.substring(2) : address;
  return Uint8Array.from(Buffer.from(hex, "hex"));
}

/** keccak256(msgpack(action) ‖ nonce ‖ vault marker ‖ expiry marker). */
export function referenceActionHash(
  action: unknown,
  vaultAddress: string | null,
  nonce: number,
  expiresAfter?: number,
): Hex {
  const msgPackBytes = encode(action);
  const vaultLength = vaultAddress === null ? 1 : 21;
  const expiryLength = expiresAfter === undefined ? 0 : 9;
  const data = new Uint8Array(msgPackBytes.length + 8 + vaultLength + expiryLength);
  data.set(msgPackBytes);
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  view.setBigUint64(msgPackBytes.length, BigInt(nonce));
  let offset = msgPackBytes.length + 8;
  if (vaultAddress === null) {
    view.setUint8(offset, 0);
  } else {
    view.setUint8(offset, 1);
    data.set(addressBytes(vaultAddress), offset + 1);
  }
  offset += vaultLength;
  if (expiresAfter !== undefined) {
    view.setUint8(offset, 0);
    view.setBigUint64(offset + 1, BigInt(expiresAfter));
  }
  return keccak256(data);
}

export const AGENT_DOMAIN = {
  name: "Exchange",
  version: "1",
  chainId: 1337,
  verifyingContract: ZERO,
} as const;

export function transactionDomain(chainId: number) {
  return {
    name: "HyperliquidSignTransaction",
    version: "1",
    chainId,
    verifyingContract: ZERO,
  } as const;
}
