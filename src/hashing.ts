/**
 * Action hashing (connection ids).
 *
 * Layout of the hashed preimage:
 *
 * ```
 * canonical(action)
 * u64_be(nonce)
 * 0x00                        // no vault
 *   | 0x01 ‖ vault[20]        // vault
 * (nothing)                   // no expiry
 *   | 0x00 ‖ u64_be(expiry)   // expiry
 * ```
 *
 * The vault marker is always written; the expiry marker only when an expiry
 * is given.
 *
 * @module
 */

import { keccak_256 } from "@noble/hashes/sha3.js";
import { type Action, actionToWire } from "./actions.js";
import { normalizeAddress, parseAddress } from "./address.js";
import { type CanonicalMap, type CanonicalValue, encodeCanonical } from "./canonical.js";
import { concat, u64BE } from "./encoding.js";
import { EncodingError } from "./errors.js";

/** Optional vault and expiry bound into a connection id. */
export interface ActionHashOptions {
  /** Vault or sub-account the action is performed for. */
  vaultAddress?: string;
  /** Millisecond timestamp after which the action is rejected. */
  expiresAfter?: number | bigint;
}

function u64Field(value: number | bigint, name: string): Uint8Array {
  try {
    return u64BE(value);
  } catch (error) {
    throw new EncodingError(`${name} must be an unsigned 64-bit integer`, name, { cause: error });
  }
}

/**
 * Bytes hashed into a connection id.
 *
 * @throws {EncodingError} if nonce or expiry is not a u64.
 * @throws {InvalidAddressFormat} if the vault address is malformed.
 */
export function actionHashPreimage(
  encodedAction: Uint8Array,
  nonce: number | bigint,
  options: ActionHashOptions = {},
): Uint8Array {
  const parts: Uint8Array[] = [encodedAction, u64Field(nonce, "nonce")];
  if (options.vaultAddress === undefined) {
    parts.push(Uint8Array.of(0x00));
  } else {
    parts.push(Uint8Array.of(0x01), parseAddress(options.vaultAddress));
  }
  if (options.expiresAfter !== undefined) {
    parts.push(Uint8Array.of(0x00), u64Field(options.expiresAfter, "expiresAfter"));
  }
  return concat(parts);
}

/** keccak256 of the preimage of an already-encoded action. */
export function hashEncodedAction(
  encodedAction: Uint8Array,
  nonce: number | bigint,
  options: ActionHashOptions = {},
): Uint8Array {
  return keccak_256(actionHashPreimage(encodedAction, nonce, options));
}

/** Connection id of a generic value tree, encoded in its own key order. */
export function hashValue(
  value: CanonicalValue,
  nonce: number | bigint,
  options: ActionHashOptions = {},
): Uint8Array {
  return hashEncodedAction(encodeCanonical(value), nonce, options);
}

/** Connection id of a typed action. */
export function hashAction(
  action: Action,
  nonce: number | bigint,
  options: ActionHashOptions = {},
): Uint8Array {
  return hashValue(actionToWire(action), nonce, options);
}

// ── Multi-sig ───────────────────────────────────────────────────────

/** The inner action a multi-sig user authorizes. */
export interface MultiSigEnvelope {
  multiSigUser: string;
  outerSigner: string;
  action: { type: string; time: number | bigint };
}

/** A co-signer's signature as carried in a multi-sig body. */
export interface MultiSigSignature {
  r: string;
  s: string;
  v: number;
}

/**
 * Multi-sig action body: `{signatureChainId, signatures, payload}` with
 * lowercase addresses. This is the value hashed into `multiSigActionHash`.
 *
 * @throws {InvalidAddressFormat} if either address is malformed.
 */
export function multiSigActionBody(
  envelope: MultiSigEnvelope,
  signatures: MultiSigSignature[],
  signatureChainId: number | bigint,
): CanonicalMap {
  return {
    signatureChainId: `0x${signatureChainId.toString(16)}`,
    signatures: signatures.map((sig) => ({ r: sig.r, s: sig.s, v: sig.v })),
    payload: {
      multiSigUser: normalizeAddress(envelope.multiSigUser),
      outerSigner: normalizeAddress(envelope.outerSigner),
      action: { type: envelope.action.type, time: envelope.action.time },
    },
  };
}
