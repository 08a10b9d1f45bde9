/**
 * Result types returned by the signing operations.
 *
 * @module
 */

import { bytesToHex } from "./encoding.js";
import { type EcdsaSignature, serializeSignature } from "./crypto.js";

/** Ethereum `v`: recovery id + 27. */
export type RecoveryV = 27 | 28;

/**
 * A formatted secp256k1 signature.
 *
 * @example
 * ```ts
 * const { r, s, v } = signUsdSend(key, destination, "1", Date.now(), true);
 * const payload = { action, nonce, signature: { r, s, v } };
 * ```
 */
export interface SignatureResult {
  /** `0x` ‖ r ‖ s ‖ v, 130 hex characters. */
  signature: string;
  /** `0x` + 64 hex characters, zero-padded. */
  r: string;
  /** `0x` + 64 hex characters, zero-padded, low-s. */
  s: string;
  v: RecoveryV;
  /** Action hash that was signed (L1 actions only). */
  connectionId?: string;
}

/** Format raw signature components, attaching the connection id when given. */
export function toSignatureResult(
  signature: EcdsaSignature,
  connectionId?: Uint8Array,
): SignatureResult {
  const v: RecoveryV = signature.recoveryId === 0 ? 27 : 28;
  const r = bytesToHex(signature.r);
  const s = bytesToHex(signature.s);
  const result: SignatureResult = {
    signature: bytesToHex(serializeSignature(signature)),
    r,
    s,
    v,
  };
  if (connectionId !== undefined) {
    result.connectionId = bytesToHex(connectionId);
  }
  return result;
}
