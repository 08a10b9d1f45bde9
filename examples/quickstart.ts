/**
 * Exchange action signing - Quickstart Example
 *
 * Offline flow:
 * 1. Derive the signer address
 * 2. Build and sign a limit order (L1 action)
 * 3. Sign a USDC transfer (user-signed transaction)
 * 4. Approve an agent wallet
 *
 * Nothing is sent anywhere; the printed payloads are what an exchange
 * endpoint would receive.
 *
 * Run: SIGNER_LOG_LEVEL=debug npx tsx examples/quickstart.ts
 */

import {
  deriveAddress,
  formatPrice,
  formatSize,
  limitOrder,
  makeCloid,
  orderAction,
  signAction,
  signApproveAgent,
  signUsdSend,
} from "../src/index.js";

// Placeholder key; never use it for funds.
const PRIVATE_KEY = "0x1111111111111111111111111111111111111111111111111111111111111111";
const AGENT = "0x2222222222222222222222222222222222222222";

function main(): void {
  // 1. Address
  console.log(`Signer: ${deriveAddress(PRIVATE_KEY)}`);

  // 2. Limit order on asset 0 (szDecimals 5)
  const nonce = Date.now();
  const action = orderAction([
    limitOrder(0, true, formatPrice("64123.456789", 5), formatSize("0.0123456", 5), {
      tif: "Alo",
      cloid: makeCloid(),
    }),
  ]);
  const order = signAction(PRIVATE_KEY, action, nonce, false);
  console.log("Order payload:", JSON.stringify({ action, nonce, signature: { r: order.r, s: order.s, v: order.v } }));
  console.log(`Connection id: ${order.connectionId}`);

  // 3. USDC transfer
  const transfer = signUsdSend(PRIVATE_KEY, AGENT, "5", nonce, false);
  console.log(`UsdSend signature: ${transfer.signature}`);

  // 4. Agent approval
  const approval = signApproveAgent(PRIVATE_KEY, AGENT, "quickstart", nonce, false);
  console.log(`ApproveAgent signature: ${approval.signature}`);
}

main();
