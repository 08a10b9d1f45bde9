/**
 * Exchange action signing - Multi-sig Example
 *
 * Builds a multi-sig body wrapping a scheduled cancel, then produces the
 * outer signer's `SendMultiSig` signature over it.
 *
 * Run: npx tsx examples/multi-sig.ts
 */

import {
  multiSigActionBody,
  SIGNATURE_CHAIN_ID,
  signMultiSigAction,
  toChecksumAddress,
} from "../src/index.js";

const OUTER_KEY = "0x3333333333333333333333333333333333333333333333333333333333333333";
const MULTI_SIG_USER = "0x000000000000000000000000000000000000aaaa";
const OUTER_SIGNER = "0x000000000000000000000000000000000000bbbb";

function main(): void {
  const nonce = Date.now();
  const body = multiSigActionBody(
    {
      multiSigUser: MULTI_SIG_USER,
      outerSigner: OUTER_SIGNER,
      action: { type: "scheduleCancel", time: nonce + 60_000 },
    },
    [],
    SIGNATURE_CHAIN_ID,
  );

  const result = signMultiSigAction(OUTER_KEY, JSON.stringify(body), nonce, false);
  console.log(`Multi-sig user: ${toChecksumAddress(MULTI_SIG_USER)}`);
  console.log(`Body: ${JSON.stringify(body)}`);
  console.log(`Signature: ${result.signature}`);
}

main();
