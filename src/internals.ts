/**
 * Low-level encoding and crypto primitives.
 *
 * Import from the `internals` entry point only if you need direct access to
 * the connection-id preimage, EIP-712 struct hashing or raw digest signing.
 *
 * @module
 */

// ── Crypto ────────────────────────────────────────────────────────
export {
  type EcdsaSignature,
  parsePrivateKey,
  publicKeyToAddressBytes,
  serializeSignature,
  signDigest,
} from "./crypto.js";
export { normalizeAddress, parseAddress, ZERO_ADDRESS } from "./address.js";
export { toSignatureResult } from "./models.js";
// ── Encoding ──────────────────────────────────────────────────────
export {
  bytesToHex,
  concat,
  hexToBytes,
  isHex,
  padLeft32,
  padRight32,
  strip0x,
  toU64,
  U64_MAX,
  u64BE,
} from "./encoding.js";
export {
  isCanonicalMap,
  isCanonicalObject,
  objectEntries,
  objectField,
  toPlainValue,
} from "./canonical.js";
export { actionHashPreimage, hashEncodedAction } from "./hashing.js";
// ── EIP-712 ───────────────────────────────────────────────────────
export {
  domainFields,
  encodeData,
  encodeType,
  hashDomain,
  hashStruct,
  typeHash,
  typedDataFromJson,
} from "./eip712.js";
export {
  AGENT_DOMAIN,
  AGENT_FIELDS,
  agentTypedData,
  approveAgentTypedData,
  approveBuilderFeeTypedData,
  sendMultiSigTypedData,
  spotSendTypedData,
  TRANSACTION_FIELDS,
  type TransactionKind,
  transactionDomain,
  transactionTypedData,
  usdSendTypedData,
  withdrawTypedData,
} from "./schemas.js";
export { toFixedTruncate, toPrecisionTruncate, trimZeros } from "./format.js";
