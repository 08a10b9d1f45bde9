/**
 * secp256k1 key handling and digest signing.
 *
 * Signatures are deterministic (RFC 6979) with low-s normalization and a
 * recovery id, formatted the Ethereum way: `r ‖ s ‖ v` with
 * `v = recoveryId + 27`. Addresses are the last 20 bytes of
 * `keccak256(uncompressedPublicKey[1:65])`.
 *
 * @remarks
 * Uses `@noble/secp256k1` v3 with `prehash:false` since every digest is
 * computed beforehand (EIP-712). The `hmacSha256` configuration is required
 * for synchronous signing.
 *
 * @module
 */

import { hmac } from "@noble/hashes/hmac.js";
import { sha256 } from "@noble/hashes/sha2.js";
import { keccak_256 } from "@noble/hashes/sha3.js";
import * as secp from "@noble/secp256k1";
import { toChecksumAddress } from "./address.js";
import { bytesToHex, hexToBytes, isHex } from "./encoding.js";
import { SignatureFailure, WalletError } from "./errors.js";

// Configure @noble/secp256k1 v3 for synchronous signing.
// v3 requires manual hash configuration via secp.hashes.
secp.hashes.hmacSha256 = (key: Uint8Array, ...msgs: Uint8Array[]) => {
  const h = hmac.create(sha256, key);
  for (const msg of msgs) h.update(msg);
  return h.digest();
};
secp.hashes.sha256 = (...msgs: Uint8Array[]) => {
  const h = sha256.create();
  for (const msg of msgs) h.update(msg);
  return h.digest();
};

const CURVE_ORDER = 0xfffffffffffffffffffffffffffffffebaaedce6af48a03bbfd25e8cd0364141n;

// ── Types ───────────────────────────────────────────────────────────

/** Raw ECDSA signature components. */
export interface EcdsaSignature {
  /** 32-byte r. */
  r: Uint8Array;
  /** 32-byte low-s. */
  s: Uint8Array;
  /** Parity of the ephemeral point's y coordinate. */
  recoveryId: 0 | 1;
}

/** A secp256k1 key pair with its Ethereum address. */
export interface EvmWallet {
  /** The 32-byte private key. */
  privateKey: Uint8Array;
  /** The 65-byte uncompressed public key (with `0x04` prefix). */
  publicKey: Uint8Array;
  /** EIP-55 checksummed address. */
  address: string;
}

// ── Keys ────────────────────────────────────────────────────────────

/**
 * Decode a hex private key, with or without `0x`.
 *
 * @throws {WalletError} unless the input is exactly 32 bytes of hex.
 */
export function parsePrivateKey(privateKeyHex: string): Uint8Array {
  if (!isHex(privateKeyHex)) {
    throw new WalletError("Private key is not valid hex");
  }
  const bytes = hexToBytes(privateKeyHex);
  if (bytes.length !== 32) {
    throw new WalletError(`Private key must be 32 bytes, got ${bytes.length}`);
  }
  const scalar = BigInt(bytesToHex(bytes));
  if (scalar === 0n || scalar >= CURVE_ORDER) {
    throw new WalletError("Private key is not a valid secp256k1 scalar");
  }
  return bytes;
}

/** Address bytes for an uncompressed public key. */
export function publicKeyToAddressBytes(publicKey: Uint8Array): Uint8Array {
  return keccak_256(publicKey.slice(1)).slice(12);
}

/**
 * Load a wallet from a private key (hex string or bytes).
 *
 * @throws {WalletError} for malformed keys and scalars outside `[1, n)`.
 */
export function walletFromPrivateKey(privateKeyInput: Uint8Array | string): EvmWallet {
  const privateKey =
    typeof privateKeyInput === "string" ? parsePrivateKey(privateKeyInput) : privateKeyInput;
  if (privateKey.length !== 32) {
    throw new WalletError(`Private key must be 32 bytes, got ${privateKey.length}`);
  }
  let publicKey: Uint8Array;
  try {
    publicKey = secp.getPublicKey(privateKey, false); // uncompressed 65 bytes
  } catch (error) {
    throw new WalletError("Private key is not a valid secp256k1 scalar", { cause: error });
  }
  return {
    privateKey,
    publicKey,
    address: toChecksumAddress(bytesToHex(publicKeyToAddressBytes(publicKey))),
  };
}

// ── Signing ─────────────────────────────────────────────────────────

/**
 * Sign a 32-byte digest.
 *
 * @throws {SignatureFailure} if the underlying primitive fails.
 */
export function signDigest(privateKey: Uint8Array, digest: Uint8Array): EcdsaSignature {
  if (digest.length !== 32) {
    throw new SignatureFailure(`Digest must be 32 bytes, got ${digest.length}`);
  }
  let recovered: Uint8Array;
  try {
    // 65 bytes: [recovery(1), r(32), s(32)]
    recovered = secp.sign(digest, privateKey, {
      prehash: false,
      format: "recovered",
    } as Parameters<typeof secp.sign>[2]);
  } catch (error) {
    throw new SignatureFailure("secp256k1 signing failed", { cause: error });
  }
  const recoveryId = recovered[0];
  if (recoveryId !== 0 && recoveryId !== 1) {
    throw new SignatureFailure(`Unexpected recovery id ${recoveryId}`);
  }
  return {
    r: recovered.slice(1, 33),
    s: recovered.slice(33, 65),
    recoveryId,
  };
}

/** `r ‖ s ‖ v` with `v = recoveryId + 27`. */
export function serializeSignature(signature: EcdsaSignature): Uint8Array {
  const out = new Uint8Array(65);
  out.set(signature.r, 0);
  out.set(signature.s, 32);
  out[64] = signature.recoveryId + 27;
  return out;
}
