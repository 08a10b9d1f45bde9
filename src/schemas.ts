/**
 * Fixed EIP-712 schemas signed by the exchange.
 *
 * Each builder projects its arguments into the generic {@link TypedData}
 * form. L1 actions are wrapped in an `Agent` message; user-signed
 * transactions use the `HyperliquidTransaction:*` types under the
 * transaction domain.
 *
 * @module
 */

import { normalizeAddress } from "./address.js";
import {
  AGENT_CHAIN_ID,
  AGENT_DOMAIN_NAME,
  DOMAIN_VERSION,
  type NetworkConfig,
  TRANSACTION_DOMAIN_NAME,
  TRANSACTION_TYPE_PREFIX,
  VERIFYING_CONTRACT,
} from "./config.js";
import type { TypedData, TypedDataDomain, TypedDataField, TypedDataMessage } from "./eip712.js";

// ── Domains ─────────────────────────────────────────────────────────

export const AGENT_DOMAIN: TypedDataDomain = {
  name: AGENT_DOMAIN_NAME,
  version: DOMAIN_VERSION,
  chainId: AGENT_CHAIN_ID,
  verifyingContract: VERIFYING_CONTRACT,
};

export function transactionDomain(signatureChainId: number | bigint): TypedDataDomain {
  return {
    name: TRANSACTION_DOMAIN_NAME,
    version: DOMAIN_VERSION,
    chainId: signatureChainId,
    verifyingContract: VERIFYING_CONTRACT,
  };
}

// ── Field lists ─────────────────────────────────────────────────────

export const AGENT_FIELDS: TypedDataField[] = [
  { name: "source", type: "string" },
  { name: "connectionId", type: "bytes32" },
];

/** Field lists of the user-signed transactions, keyed by unprefixed type name. */
export const TRANSACTION_FIELDS = {
  UsdSend: [
    { name: "hyperliquidChain", type: "string" },
    { name: "destination", type: "string" },
    { name: "amount", type: "string" },
    { name: "time", type: "uint64" },
  ],
  Withdraw: [
    { name: "hyperliquidChain", type: "string" },
    { name: "destination", type: "string" },
    { name: "amount", type: "string" },
    { name: "time", type: "uint64" },
  ],
  SpotSend: [
    { name: "hyperliquidChain", type: "string" },
    { name: "destination", type: "string" },
    { name: "token", type: "string" },
    { name: "amount", type: "string" },
    { name: "time", type: "uint64" },
  ],
  ApproveBuilderFee: [
    { name: "hyperliquidChain", type: "string" },
    { name: "maxFeeRate", type: "string" },
    { name: "builder", type: "address" },
    { name: "nonce", type: "uint64" },
  ],
  ApproveAgent: [
    { name: "hyperliquidChain", type: "string" },
    { name: "agentAddress", type: "address" },
    { name: "agentName", type: "string" },
    { name: "nonce", type: "uint64" },
  ],
  SendMultiSig: [
    { name: "hyperliquidChain", type: "string" },
    { name: "multiSigActionHash", type: "bytes32" },
    { name: "nonce", type: "uint64" },
  ],
} satisfies Record<string, TypedDataField[]>;

export type TransactionKind = keyof typeof TRANSACTION_FIELDS;

// ── Builders ────────────────────────────────────────────────────────

/** `Agent {source, connectionId}` under the fixed exchange domain. */
export function agentTypedData(connectionId: Uint8Array, network: NetworkConfig): TypedData {
  return {
    domain: AGENT_DOMAIN,
    types: { Agent: AGENT_FIELDS },
    primaryType: "Agent",
    message: { source: network.agentSource, connectionId },
  };
}

/**
 * A `HyperliquidTransaction:<kind>` message. `hyperliquidChain` is filled
 * in from the network; the remaining fields come from `fields`.
 */
export function transactionTypedData(
  kind: TransactionKind,
  fields: TypedDataMessage,
  network: NetworkConfig,
  signatureChainId: number | bigint = network.signatureChainId,
): TypedData {
  const primaryType = `${TRANSACTION_TYPE_PREFIX}${kind}`;
  return {
    domain: transactionDomain(signatureChainId),
    types: { [primaryType]: TRANSACTION_FIELDS[kind] },
    primaryType,
    message: { hyperliquidChain: network.hyperliquidChain, ...fields },
  };
}

export interface UsdSendFields {
  destination: string;
  amount: string;
  time: number | bigint;
}

export function usdSendTypedData(fields: UsdSendFields, network: NetworkConfig): TypedData {
  return transactionTypedData(
    "UsdSend",
    { destination: fields.destination, amount: fields.amount, time: fields.time },
    network,
  );
}

export function withdrawTypedData(fields: UsdSendFields, network: NetworkConfig): TypedData {
  return transactionTypedData(
    "Withdraw",
    { destination: fields.destination, amount: fields.amount, time: fields.time },
    network,
  );
}

export interface SpotSendFields extends UsdSendFields {
  token: string;
}

export function spotSendTypedData(fields: SpotSendFields, network: NetworkConfig): TypedData {
  return transactionTypedData(
    "SpotSend",
    {
      destination: fields.destination,
      token: fields.token,
      amount: fields.amount,
      time: fields.time,
    },
    network,
  );
}

export interface ApproveBuilderFeeFields {
  builder: string;
  maxFeeRate: string;
  nonce: number | bigint;
}

/** @throws {InvalidAddressFormat} if `builder` is not a 20-byte address. */
export function approveBuilderFeeTypedData(
  fields: ApproveBuilderFeeFields,
  network: NetworkConfig,
): TypedData {
  return transactionTypedData(
    "ApproveBuilderFee",
    { maxFeeRate: fields.maxFeeRate, builder: normalizeAddress(fields.builder), nonce: fields.nonce },
    network,
  );
}

export interface ApproveAgentFields {
  agentAddress: string;
  /** Omitted names are signed as the empty string. */
  agentName?: string;
  nonce: number | bigint;
}

/** @throws {InvalidAddressFormat} if `agentAddress` is not a 20-byte address. */
export function approveAgentTypedData(fields: ApproveAgentFields, network: NetworkConfig): TypedData {
  return transactionTypedData(
    "ApproveAgent",
    {
      agentAddress: normalizeAddress(fields.agentAddress),
      agentName: fields.agentName ?? "",
      nonce: fields.nonce,
    },
    network,
  );
}

export interface SendMultiSigFields {
  multiSigActionHash: Uint8Array;
  nonce: number | bigint;
}

export function sendMultiSigTypedData(
  fields: SendMultiSigFields,
  network: NetworkConfig,
  signatureChainId: number | bigint,
): TypedData {
  return transactionTypedData(
    "SendMultiSig",
    { multiSigActionHash: fields.multiSigActionHash, nonce: fields.nonce },
    network,
    signatureChainId,
  );
}
