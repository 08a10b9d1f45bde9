/**
 * Signing operations.
 *
 * Every operation is a pure function of its arguments: parse → (L1 actions)
 * canonical encoding and connection id → EIP-712 digest → ECDSA → formatted
 * {@link SignatureResult}. Failures are thrown as {@link SignerError}
 * subclasses from the step that detects them.
 *
 * L1 actions (orders, cancels, transfers between own accounts, …) are signed
 * as an `Agent` message over their connection id. User-signed transactions
 * (`UsdSend`, `Withdraw`, `SpotSend`, `ApproveBuilderFee`, `ApproveAgent`,
 * `SendMultiSig`) are signed directly as typed data.
 *
 * @example
 * ```ts
 * const result = signExchangeAction(
 *   privateKey,
 *   JSON.stringify(orderAction([limitOrder(0, true, "50000", "0.01")])),
 *   Date.now(),
 *   false,
 * );
 * console.log(result.connectionId, result.signature);
 * ```
 *
 * @module
 */

import { type Action, parseAction } from "./actions.js";
import { toChecksumAddress } from "./address.js";
import { type CanonicalObject, isCanonicalObject, objectField, parseJson } from "./canonical.js";
import { networkFromFlag } from "./config.js";
import { parsePrivateKey, signDigest, walletFromPrivateKey } from "./crypto.js";
import { type TypedData, hashTypedData, typedDataFromJson } from "./eip712.js";
import { bytesToHex, hexToBytes, isHex } from "./encoding.js";
import { ParseError } from "./errors.js";
import { type ActionHashOptions, hashAction, hashValue } from "./hashing.js";
import { logger } from "./logger.js";
import { type SignatureResult, toSignatureResult } from "./models.js";
import {
  agentTypedData,
  approveAgentTypedData,
  approveBuilderFeeTypedData,
  sendMultiSigTypedData,
  spotSendTypedData,
  usdSendTypedData,
  withdrawTypedData,
} from "./schemas.js";

const log = logger.child({ module: "signing" });

const HEX_CHAIN_ID_RE = /^0[xX][0-9a-fA-F]+$/;

function signTyped(privateKeyHex: string, data: TypedData, connectionId?: Uint8Array): SignatureResult {
  const privateKey = parsePrivateKey(privateKeyHex);
  const digest = hashTypedData(data);
  const result = toSignatureResult(signDigest(privateKey, digest), connectionId);
  log.debug(
    { primaryType: data.primaryType, digest: bytesToHex(digest), connectionId: result.connectionId },
    "signed typed data",
  );
  return result;
}

function hashOptions(vaultAddress?: string, expiresAfter?: number | bigint): ActionHashOptions {
  return { vaultAddress, expiresAfter };
}

// ── Addresses ───────────────────────────────────────────────────────

/**
 * EIP-55 address of a private key.
 *
 * @throws {WalletError} if the key is not 32 bytes of hex or not a valid scalar.
 */
export function deriveAddress(privateKeyHex: string): string {
  return walletFromPrivateKey(privateKeyHex).address;
}

/**
 * EIP-55 checksummed form of an address.
 *
 * @throws {InvalidAddressFormat} unless the body is exactly 40 hex characters.
 */
export function checksumAddress(address: string): string {
  return toChecksumAddress(address);
}

// ── L1 actions ──────────────────────────────────────────────────────

/**
 * Connection id of an action given as JSON, hashed exactly as written
 * (document key order, integer/float distinction preserved).
 *
 * @returns `0x`-prefixed lowercase hex of the 32-byte hash.
 * @throws {ParseError} on malformed JSON.
 * @throws {EncodingError} if a value has no canonical encoding or nonce/expiry is not a u64.
 */
export function computeActionHash(
  actionJson: string,
  nonce: number | bigint,
  vaultAddress?: string,
  expiresAfter?: number | bigint,
): string {
  const hash = hashValue(parseJson(actionJson), nonce, hashOptions(vaultAddress, expiresAfter));
  const connectionId = bytesToHex(hash);
  log.debug(
    { connectionId, nonce: nonce.toString(), vaultAddress, expiresAfter: expiresAfter?.toString() },
    "computed action hash",
  );
  return connectionId;
}

/**
 * Sign a precomputed connection id as an `Agent` message.
 *
 * @throws {ParseError} unless `connectionIdHex` is 32 bytes of hex.
 */
export function signL1Action(
  privateKeyHex: string,
  connectionIdHex: string,
  isMainnet: boolean,
): SignatureResult {
  if (!isHex(connectionIdHex)) {
    throw new ParseError("connection id is not valid hex");
  }
  const connectionId = hexToBytes(connectionIdHex);
  if (connectionId.length !== 32) {
    throw new ParseError(`connection id must be 32 bytes, got ${connectionId.length}`);
  }
  return signTyped(privateKeyHex, agentTypedData(connectionId, networkFromFlag(isMainnet)), connectionId);
}

/**
 * Hash and sign a typed action.
 *
 * @throws {WalletError} for a malformed key.
 * @throws {EncodingError} if the action has no canonical encoding.
 */
export function signAction(
  privateKeyHex: string,
  action: Action,
  nonce: number | bigint,
  isMainnet: boolean,
  options: ActionHashOptions = {},
): SignatureResult {
  const privateKey = parsePrivateKey(privateKeyHex);
  const connectionId = hashAction(action, nonce, options);
  const data = agentTypedData(connectionId, networkFromFlag(isMainnet));
  const result = toSignatureResult(signDigest(privateKey, hashTypedData(data)), connectionId);
  log.debug(
    { connectionId: result.connectionId, nonce: nonce.toString(), vaultAddress: options.vaultAddress },
    "signed L1 action",
  );
  return result;
}

/**
 * Parse an exchange action from JSON, then hash and sign it.
 *
 * Known action types are validated and re-encoded in their declared field
 * order; unknown types are hashed as written.
 *
 * @throws {ParseError} on malformed JSON or a malformed known action.
 */
export function signExchangeAction(
  privateKeyHex: string,
  actionJson: string,
  nonce: number | bigint,
  isMainnet: boolean,
  vaultAddress?: string,
  expiresAfter?: number | bigint,
): SignatureResult {
  const action = parseAction(parseJson(actionJson));
  return signAction(privateKeyHex, action, nonce, isMainnet, hashOptions(vaultAddress, expiresAfter));
}

// ── Multi-sig ───────────────────────────────────────────────────────

/**
 * `signatureChainId` of a multi-sig body: a `0x` hex string or a JSON number.
 *
 * @throws {ParseError} when absent or malformed.
 */
export function readSignatureChainId(body: CanonicalObject): bigint {
  const raw = objectField(body, "signatureChainId");
  if (raw === undefined) {
    throw new ParseError("missing signatureChainId");
  }
  if (typeof raw === "string" && HEX_CHAIN_ID_RE.test(raw)) {
    return BigInt(raw);
  }
  if (typeof raw === "number" && Number.isSafeInteger(raw) && raw >= 0) {
    return BigInt(raw);
  }
  if (typeof raw === "bigint" && raw >= 0n) {
    return raw;
  }
  throw new ParseError("signatureChainId must be a 0x hex string or a non-negative integer", "$.signatureChainId");
}

/**
 * Sign a multi-sig action body as `HyperliquidTransaction:SendMultiSig`.
 *
 * The whole body is hashed as written into `multiSigActionHash`; the domain
 * chain id is the body's `signatureChainId`.
 *
 * @throws {ParseError} if the JSON is malformed, not an object, or lacks a
 * usable `signatureChainId`.
 */
export function signMultiSigAction(
  privateKeyHex: string,
  actionJson: string,
  nonce: number | bigint,
  isMainnet: boolean,
  vaultAddress?: string,
  expiresAfter?: number | bigint,
): SignatureResult {
  const body = parseJson(actionJson);
  if (!isCanonicalObject(body)) {
    throw new ParseError("action must be a JSON object");
  }
  const signatureChainId = readSignatureChainId(body);
  const multiSigActionHash = hashValue(body, nonce, hashOptions(vaultAddress, expiresAfter));
  log.debug(
    { multiSigActionHash: bytesToHex(multiSigActionHash), signatureChainId: signatureChainId.toString() },
    "computed multi-sig action hash",
  );
  return signTyped(
    privateKeyHex,
    sendMultiSigTypedData({ multiSigActionHash, nonce }, networkFromFlag(isMainnet), signatureChainId),
  );
}

// ── Typed data ──────────────────────────────────────────────────────

/**
 * Sign caller-supplied EIP-712 typed data given as JSON components.
 *
 * @throws {ParseError} on malformed JSON.
 * @throws {TypedDataError} naming the offending field when the schema or
 * message is invalid.
 */
export function signTypedData(
  privateKeyHex: string,
  domainJson: string,
  typesJson: string,
  messageJson: string,
  primaryType: string,
): SignatureResult {
  const data = typedDataFromJson(
    parseJson(domainJson),
    parseJson(typesJson),
    parseJson(messageJson),
    primaryType,
  );
  return signTyped(privateKeyHex, data);
}

// ── User-signed transactions ────────────────────────────────────────

/** Sign a USDC transfer to another user. */
export function signUsdSend(
  privateKeyHex: string,
  destination: string,
  amount: string,
  time: number | bigint,
  isMainnet: boolean,
): SignatureResult {
  return signTyped(
    privateKeyHex,
    usdSendTypedData({ destination, amount, time }, networkFromFlag(isMainnet)),
  );
}

/** Sign a withdrawal to the bridge. */
export function signWithdraw(
  privateKeyHex: string,
  destination: string,
  amount: string,
  time: number | bigint,
  isMainnet: boolean,
): SignatureResult {
  return signTyped(
    privateKeyHex,
    withdrawTypedData({ destination, amount, time }, networkFromFlag(isMainnet)),
  );
}

/** Sign a spot token transfer; `token` is `"NAME:0x<tokenId>"`. */
export function signSpotSend(
  privateKeyHex: string,
  destination: string,
  token: string,
  amount: string,
  time: number | bigint,
  isMainnet: boolean,
): SignatureResult {
  return signTyped(
    privateKeyHex,
    spotSendTypedData({ destination, token, amount, time }, networkFromFlag(isMainnet)),
  );
}

/**
 * Sign approval of a builder fee (e.g. `maxFeeRate` `"0.001%"`).
 *
 * @throws {InvalidAddressFormat} if `builder` is malformed.
 */
export function signApproveBuilderFee(
  privateKeyHex: string,
  builder: string,
  maxFeeRate: string,
  nonce: number | bigint,
  isMainnet: boolean,
): SignatureResult {
  return signTyped(
    privateKeyHex,
    approveBuilderFeeTypedData({ builder, maxFeeRate, nonce }, networkFromFlag(isMainnet)),
  );
}

/**
 * Sign approval of an agent (API wallet). An absent name is signed as `""`.
 *
 * @throws {InvalidAddressFormat} if `agentAddress` is malformed.
 */
export function signApproveAgent(
  privateKeyHex: string,
  agentAddress: string,
  agentName: string | undefined,
  nonce: number | bigint,
  isMainnet: boolean,
): SignatureResult {
  return signTyped(
    privateKeyHex,
    approveAgentTypedData({ agentAddress, agentName, nonce }, networkFromFlag(isMainnet)),
  );
}
