/**
 * Network parameters and protocol constants for exchange signing.
 *
 * L1 actions are signed as an `Agent` message under a fixed "Exchange"
 * domain; the network is carried by the `source` field. User-signed
 * transactions use the "HyperliquidSignTransaction" domain and carry the
 * network in the `hyperliquidChain` field. Both networks share one
 * numeric signature chain id.
 *
 * @module
 */

import { ZERO_ADDRESS } from "./address.js";

/** Chain id of the domain that L1 `Agent` messages are signed under. */
export const AGENT_CHAIN_ID = 1337;

/** Chain id of the user-signed transaction domain, shared by both networks. */
export const SIGNATURE_CHAIN_ID = 42161;

/** EIP-712 domain name for L1 actions. */
export const AGENT_DOMAIN_NAME = "Exchange";

/** EIP-712 domain name for user-signed transactions. */
export const TRANSACTION_DOMAIN_NAME = "HyperliquidSignTransaction";

export const DOMAIN_VERSION = "1";

/** `verifyingContract` of both domains. */
export const VERIFYING_CONTRACT = ZERO_ADDRESS;

/** Prefix of every user-signed transaction primary type. */
export const TRANSACTION_TYPE_PREFIX = "HyperliquidTransaction:";

/**
 * Per-network signing parameters.
 *
 * @example
 * ```ts
 * const { hyperliquidChain, agentSource } = getNetworkConfig(Network.TESTNET);
 * // "Testnet", "b"
 * ```
 */
export interface NetworkConfig {
  /** Value of the `hyperliquidChain` field in user-signed transactions. */
  hyperliquidChain: "Mainnet" | "Testnet";
  /** Value of the `source` field in L1 `Agent` messages. */
  agentSource: "a" | "b";
  /** Chain id of the user-signed transaction domain. */
  signatureChainId: number;
}

export const MAINNET: NetworkConfig = {
  hyperliquidChain: "Mainnet",
  agentSource: "a",
  signatureChainId: SIGNATURE_CHAIN_ID,
};

export const TESTNET: NetworkConfig = {
  hyperliquidChain: "Testnet",
  agentSource: "b",
  signatureChainId: SIGNATURE_CHAIN_ID,
};

/** Available exchange networks. */
export enum Network {
  TESTNET = "testnet",
  MAINNET = "mainnet",
}

/** Resolve a {@link Network} enum value to its {@link NetworkConfig}. */
export function getNetworkConfig(network: Network): NetworkConfig {
  switch (network) {
    case Network.TESTNET:
      return TESTNET;
    case Network.MAINNET:
      return MAINNET;
  }
}

/** Map the `isMainnet` flag taken by the signing operations to a network. */
export function networkFromFlag(isMainnet: boolean): NetworkConfig {
  return getNetworkConfig(isMainnet ? Network.MAINNET : Network.TESTNET);
}
