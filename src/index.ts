/**
 * Exchange action signing library
 *
 * Public API exports: signing operations, action model, typed-data schemas
 * and formatting helpers.
 */

// ── Operations ────────────────────────────────────────────────────
export {
  checksumAddress,
  computeActionHash,
  deriveAddress,
  readSignatureChainId,
  signAction,
  signApproveAgent,
  signApproveBuilderFee,
  signExchangeAction,
  signL1Action,
  signMultiSigAction,
  signSpotSend,
  signTypedData,
  signUsdSend,
  signWithdraw,
} from "./signing.js";
export { type RecoveryV, type SignatureResult } from "./models.js";

// ── Actions ───────────────────────────────────────────────────────
export {
  type Action,
  actionToWire,
  batchModifyAction,
  type BuilderFee,
  cancelAction,
  cancelByCloidAction,
  type Grouping,
  isOpaqueAction,
  KNOWN_ACTION_TYPES,
  type KnownAction,
  type KnownActionType,
  limitOrder,
  type LimitOrderOptions,
  type OpaqueAction,
  orderAction,
  type OrderTypeWire,
  type OrderWire,
  parseAction,
  scheduleCancelAction,
  type Tif,
  type Tpsl,
  triggerOrder,
  type TriggerOrderOptions,
  updateIsolatedMarginAction,
  updateLeverageAction,
  vaultTransferAction,
} from "./actions.js";

// ── Hashing ───────────────────────────────────────────────────────
export {
  type ActionHashOptions,
  hashAction,
  hashValue,
  type MultiSigEnvelope,
  type MultiSigSignature,
  multiSigActionBody,
} from "./hashing.js";
export {
  type CanonicalMap,
  type CanonicalObject,
  type CanonicalValue,
  encodeCanonical,
  Float64,
  type OrderedMap,
  parseJson,
  toCanonical,
} from "./canonical.js";

// ── Typed data ────────────────────────────────────────────────────
export {
  hashTypedData,
  type TypedData,
  type TypedDataDomain,
  type TypedDataField,
  type TypedDataMessage,
  type TypedDataTypes,
} from "./eip712.js";

// ── Config ────────────────────────────────────────────────────────
export {
  AGENT_CHAIN_ID,
  getNetworkConfig,
  MAINNET,
  Network,
  type NetworkConfig,
  SIGNATURE_CHAIN_ID,
  TESTNET,
} from "./config.js";

// ── Crypto ────────────────────────────────────────────────────────
export { type EvmWallet, walletFromPrivateKey } from "./crypto.js";
export { toChecksumAddress } from "./address.js";

// ── Formatting ────────────────────────────────────────────────────
export { formatPrice, formatSize, makeCloid, maxPriceDecimals } from "./format.js";

// ── Logging ───────────────────────────────────────────────────────
export { createLogger, type Logger, type LoggerConfig, type LogLevel } from "./logger.js";

// ── Errors ────────────────────────────────────────────────────────
export {
  EncodingError,
  InvalidAddressFormat,
  isSignerError,
  ParseError,
  SignatureFailure,
  SignerError,
  type SignerErrorCode,
  TypedDataError,
  WalletError,
} from "./errors.js";
