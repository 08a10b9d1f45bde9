/**
 * Exchange action definitions.
 *
 * Provides a discriminated union {@link KnownAction} for the actions whose
 * wire layout is fixed, plus {@link OpaqueAction} for anything else (newer
 * action types, multi-sig bodies). {@link actionToWire} projects an action
 * into the canonical value tree that is hashed: keys in declared order, the
 * `type` tag first, absent optionals omitted.
 *
 * Factory functions ({@link limitOrder}, {@link orderAction},
 * {@link cancelAction}, …) are optional sugar; plain objects with the
 * correct `type` discriminant also work.
 *
 * @module
 */

import { z } from "zod";
import { normalizeAddress } from "./address.js";
import {
  type CanonicalMap,
  type CanonicalObject,
  type CanonicalValue,
  isCanonicalObject,
  objectField,
  toPlainValue,
} from "./canonical.js";
import { U64_MAX } from "./encoding.js";
import { InvalidAddressFormat, ParseError } from "./errors.js";

// ── Field schemas ───────────────────────────────────────────────────

const I64_MIN = -(1n << 63n);
const I64_MAX = (1n << 63n) - 1n;

const u32 = z.number().int().min(0).max(0xffffffff);
const u64 = z.union([z.number().int().nonnegative(), z.bigint().min(0n).max(U64_MAX)]);
const i64 = z.union([z.number().int(), z.bigint().min(I64_MIN).max(I64_MAX)]);

const address = z.string().transform((value, ctx) => {
  try {
    return normalizeAddress(value);
  } catch (error) {
    if (!(error instanceof InvalidAddressFormat)) throw error;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "invalid address" });
    return z.NEVER;
  }
});

/**
 * Accept long field names in place of the short wire keys. A key given
 * under both names is rejected.
 */
function withAliases<T extends z.ZodTypeAny>(aliases: Record<string, string>, schema: T) {
  return z.preprocess((value, ctx) => {
    if (typeof value !== "object" || value === null || Array.isArray(value)) return value;
    const out: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      const target = aliases[key] ?? key;
      if (target in out) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate field "${target}"`, path: [key] });
      }
      out[target] = child;
    }
    return out;
  }, schema);
}

// ── Orders ──────────────────────────────────────────────────────────

const limitSchema = z.object({ limit: z.object({ tif: z.string() }) }).strict();

const triggerSchema = z
  .object({
    trigger: z.object({ isMarket: z.boolean(), triggerPx: z.string(), tpsl: z.string() }),
  })
  .strict();

const orderWireSchema = withAliases(
  {
    asset: "a",
    isBuy: "b",
    limitPx: "p",
    sz: "s",
    reduceOnly: "r",
    orderType: "t",
    cloid: "c",
  },
  z.object({
    a: u32,
    b: z.boolean(),
    p: z.string(),
    s: z.string(),
    r: z.boolean().default(false),
    t: z.union([limitSchema, triggerSchema]),
    c: z.string().optional(),
  }),
);

/** Order type in wire form: `{limit: {tif}}` or `{trigger: {isMarket, triggerPx, tpsl}}`. */
export type OrderTypeWire = z.infer<typeof limitSchema> | z.infer<typeof triggerSchema>;

/** One order in wire form (`a` asset, `b` isBuy, `p` price, `s` size, `r` reduceOnly, `t` type, `c` cloid). */
export type OrderWire = z.infer<typeof orderWireSchema>;

/** Time in force of a limit order. */
export type Tif = "Gtc" | "Ioc" | "Alo";

/** Take-profit or stop-loss. */
export type Tpsl = "tp" | "sl";

/** How the orders of one `order` action relate. */
export type Grouping = "na" | "normalTpsl" | "positionTpsl";

// ── Actions ─────────────────────────────────────────────────────────

const builderSchema = z.object({ b: z.string(), f: u64 });

const updateLeverageSchema = z.object({
  type: z.literal("updateLeverage"),
  asset: u32,
  isCross: z.boolean(),
  leverage: u32,
});

const updateIsolatedMarginSchema = z.object({
  type: z.literal("updateIsolatedMargin"),
  asset: u32,
  isBuy: z.boolean(),
  ntli: i64,
});

const orderSchema = z.object({
  type: z.literal("order"),
  orders: z.array(orderWireSchema),
  grouping: z.string(),
  builder: builderSchema.optional(),
});

const cancelSchema = z.object({
  type: z.literal("cancel"),
  cancels: z.array(withAliases({ asset: "a", oid: "o" }, z.object({ a: u32, o: u64 }))),
});

const cancelByCloidSchema = z.object({
  type: z.literal("cancelByCloid"),
  cancels: z.array(z.object({ asset: u32, cloid: z.string() })),
});

const batchModifySchema = z.object({
  type: z.literal("batchModify"),
  modifies: z.array(withAliases({ oid: "o" }, z.object({ o: u64, order: orderWireSchema }))),
});

const spotUserSchema = z.object({
  type: z.literal("spotUser"),
  classTransfer: z.object({ usdc: u64, toPerp: z.boolean() }),
});

const vaultTransferSchema = z.object({
  type: z.literal("vaultTransfer"),
  vaultAddress: address,
  isDeposit: z.boolean(),
  usd: u64,
});

const subAccountTransferSchema = z.object({
  type: z.literal("subAccountTransfer"),
  subAccountUser: z.string(),
  isDeposit: z.boolean(),
  usd: u64,
});

const subAccountSpotTransferSchema = z.object({
  type: z.literal("subAccountSpotTransfer"),
  subAccountUser: z.string(),
  isDeposit: z.boolean(),
  token: z.string(),
  amount: z.string(),
});

const usdClassTransferSchema = z.object({
  type: z.literal("usdClassTransfer"),
  signatureChainId: z.string(),
  hyperliquidChain: z.string(),
  amount: z.string(),
  toPerp: z.boolean(),
  nonce: u64,
});

const setReferrerSchema = z.object({ type: z.literal("setReferrer"), code: z.string() });

const evmUserModifySchema = z.object({
  type: z.literal("evmUserModify"),
  usingBigBlocks: z.boolean(),
});

const scheduleCancelSchema = z.object({ type: z.literal("scheduleCancel"), time: u64.optional() });

const claimRewardsSchema = z.object({ type: z.literal("claimRewards") });

const knownActionSchema = z.discriminatedUnion("type", [
  updateLeverageSchema,
  updateIsolatedMarginSchema,
  orderSchema,
  cancelSchema,
  cancelByCloidSchema,
  batchModifySchema,
  spotUserSchema,
  vaultTransferSchema,
  subAccountTransferSchema,
  subAccountSpotTransferSchema,
  usdClassTransferSchema,
  setReferrerSchema,
  evmUserModifySchema,
  scheduleCancelSchema,
  claimRewardsSchema,
]);

/** An action with a fixed field set and key order. */
export type KnownAction = z.infer<typeof knownActionSchema>;

export type KnownActionType = KnownAction["type"];

/** Any other action, hashed exactly as given. */
export interface OpaqueAction {
  readonly opaque: CanonicalObject;
}

export type Action = KnownAction | OpaqueAction;

export const KNOWN_ACTION_TYPES: ReadonlySet<string> = new Set<string>(
  knownActionSchema.options.map((option) => option.shape.type.value),
);

export function isOpaqueAction(action: Action): action is OpaqueAction {
  return "opaque" in action;
}

// ── Parsing ─────────────────────────────────────────────────────────

function formatIssuePath(path: (string | number)[]): string {
  return path.reduce<string>(
    (acc, key) => (typeof key === "number" ? `${acc}[${key}]` : `${acc}.${key}`),
    "$",
  );
}

/**
 * Validate a parsed JSON value as an action.
 *
 * Known `type` tags are checked against their schema and normalized (aliases
 * resolved, defaults filled, unknown fields dropped). Anything else becomes
 * an {@link OpaqueAction}.
 *
 * @throws {ParseError} if the value is not an object, has no string `type`,
 * or a known action is malformed.
 */
export function parseAction(value: CanonicalValue): Action {
  if (!isCanonicalObject(value)) {
    throw new ParseError("action must be a JSON object");
  }
  const tag = objectField(value, "type");
  if (typeof tag !== "string") {
    throw new ParseError("action has no string \"type\" field", "$.type");
  }
  if (!KNOWN_ACTION_TYPES.has(tag)) {
    return { opaque: value };
  }
  const result = knownActionSchema.safeParse(toPlainValue(value));
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ParseError(
      `invalid ${tag} action: ${issue?.message ?? "schema mismatch"}`,
      issue ? formatIssuePath(issue.path) : undefined,
    );
  }
  return result.data;
}

// ── Wire projection ─────────────────────────────────────────────────

function orderTypeToWire(t: OrderTypeWire): CanonicalMap {
  if ("limit" in t) {
    return { limit: { tif: t.limit.tif } };
  }
  return {
    trigger: { isMarket: t.trigger.isMarket, triggerPx: t.trigger.triggerPx, tpsl: t.trigger.tpsl },
  };
}

function orderToWire(order: OrderWire): CanonicalMap {
  return {
    a: order.a,
    b: order.b,
    p: order.p,
    s: order.s,
    r: order.r,
    t: orderTypeToWire(order.t),
    c: order.c,
  };
}

/**
 * Canonical value tree of an action: `type` first, fields in declared order,
 * absent optionals left `undefined` (omitted when encoded).
 */
export function actionToWire(action: Action): CanonicalObject {
  if (isOpaqueAction(action)) return action.opaque;
  switch (action.type) {
    case "updateLeverage":
      return {
        type: action.type,
        asset: action.asset,
        isCross: action.isCross,
        leverage: action.leverage,
      };
    case "updateIsolatedMargin":
      return { type: action.type, asset: action.asset, isBuy: action.isBuy, ntli: action.ntli };
    case "order":
      return {
        type: action.type,
        orders: action.orders.map(orderToWire),
        grouping: action.grouping,
        builder: action.builder && { b: action.builder.b, f: action.builder.f },
      };
    case "cancel":
      return { type: action.type, cancels: action.cancels.map((c) => ({ a: c.a, o: c.o })) };
    case "cancelByCloid":
      return {
        type: action.type,
        cancels: action.cancels.map((c) => ({ asset: c.asset, cloid: c.cloid })),
      };
    case "batchModify":
      return {
        type: action.type,
        modifies: action.modifies.map((m) => ({ o: m.o, order: orderToWire(m.order) })),
      };
    case "spotUser":
      return {
        type: action.type,
        classTransfer: { usdc: action.classTransfer.usdc, toPerp: action.classTransfer.toPerp },
      };
    case "vaultTransfer":
      return {
        type: action.type,
        vaultAddress: action.vaultAddress,
        isDeposit: action.isDeposit,
        usd: action.usd,
      };
    case "subAccountTransfer":
      return {
        type: action.type,
        subAccountUser: action.subAccountUser,
        isDeposit: action.isDeposit,
        usd: action.usd,
      };
    case "subAccountSpotTransfer":
      return {
        type: action.type,
        subAccountUser: action.subAccountUser,
        isDeposit: action.isDeposit,
        token: action.token,
        amount: action.amount,
      };
    case "usdClassTransfer":
      return {
        type: action.type,
        signatureChainId: action.signatureChainId,
        hyperliquidChain: action.hyperliquidChain,
        amount: action.amount,
        toPerp: action.toPerp,
        nonce: action.nonce,
      };
    case "setReferrer":
      return { type: action.type, code: action.code };
    case "evmUserModify":
      return { type: action.type, usingBigBlocks: action.usingBigBlocks };
    case "scheduleCancel":
      return { type: action.type, time: action.time };
    case "claimRewards":
      return { type: action.type };
  }
}

// ── Builders ────────────────────────────────────────────────────────

export interface LimitOrderOptions {
  tif?: Tif;
  reduceOnly?: boolean;
  cloid?: string;
}

/**
 * Create a limit order entry.
 *
 * @example
 * ```ts
 * limitOrder(0, true, "50000.0", "0.1", { tif: "Ioc" })
 * ```
 */
export function limitOrder(
  asset: number,
  isBuy: boolean,
  limitPx: string,
  sz: string,
  options: LimitOrderOptions = {},
): OrderWire {
  return {
    a: asset,
    b: isBuy,
    p: limitPx,
    s: sz,
    r: options.reduceOnly ?? false,
    t: { limit: { tif: options.tif ?? "Gtc" } },
    c: options.cloid,
  };
}

export interface TriggerOrderOptions {
  isMarket?: boolean;
  tpsl?: Tpsl;
  reduceOnly?: boolean;
  cloid?: string;
}

/**
 * Create a trigger (take-profit / stop-loss) order entry. Defaults to a
 * market stop-loss.
 */
export function triggerOrder(
  asset: number,
  isBuy: boolean,
  limitPx: string,
  sz: string,
  triggerPx: string,
  options: TriggerOrderOptions = {},
): OrderWire {
  return {
    a: asset,
    b: isBuy,
    p: limitPx,
    s: sz,
    r: options.reduceOnly ?? false,
    t: {
      trigger: {
        isMarket: options.isMarket ?? true,
        triggerPx,
        tpsl: options.tpsl ?? "sl",
      },
    },
    c: options.cloid,
  };
}

/** Builder fee attached to an order action; `fee` is in tenths of a basis point. */
export interface BuilderFee {
  builder: string;
  fee: number;
}

export function orderAction(
  orders: OrderWire[],
  grouping: Grouping = "na",
  builder?: BuilderFee,
): KnownAction {
  return {
    type: "order",
    orders,
    grouping,
    builder: builder && { b: normalizeAddress(builder.builder), f: builder.fee },
  };
}

export function cancelAction(cancels: { asset: number; oid: number | bigint }[]): KnownAction {
  return { type: "cancel", cancels: cancels.map((c) => ({ a: c.asset, o: c.oid })) };
}

export function cancelByCloidAction(cancels: { asset: number; cloid: string }[]): KnownAction {
  return { type: "cancelByCloid", cancels };
}

export function batchModifyAction(
  modifies: { oid: number | bigint; order: OrderWire }[],
): KnownAction {
  return { type: "batchModify", modifies: modifies.map((m) => ({ o: m.oid, order: m.order })) };
}

export function updateLeverageAction(asset: number, isCross: boolean, leverage: number): KnownAction {
  return { type: "updateLeverage", asset, isCross, leverage };
}

export function updateIsolatedMarginAction(
  asset: number,
  isBuy: boolean,
  ntli: number | bigint,
): KnownAction {
  return { type: "updateIsolatedMargin", asset, isBuy, ntli };
}

export function vaultTransferAction(
  vaultAddress: string,
  isDeposit: boolean,
  usd: number | bigint,
): KnownAction {
  return { type: "vaultTransfer", vaultAddress: normalizeAddress(vaultAddress), isDeposit, usd };
}

export function scheduleCancelAction(time?: number | bigint): KnownAction {
  return { type: "scheduleCancel", time };
}
