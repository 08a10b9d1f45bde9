/**
 * EIP-712 typed structured data hashing.
 *
 * Generic mode resolves a caller-supplied type graph (nested structs,
 * fixed and dynamic arrays, `string`, `bytes`, `bytesN`, `uintN`/`intN`,
 * `bool`, `address`). The fixed schemas used by the exchange (`Agent` and
 * the `HyperliquidTransaction:*` family) are projections into the same
 * representation.
 *
 * ```
 * digest = keccak256(0x19 ‖ 0x01 ‖ hashStruct(EIP712Domain, domain) ‖ hashStruct(primaryType, message))
 * ```
 *
 * @module
 */

import { keccak_256 } from "@noble/hashes/sha3.js";
import { z } from "zod";
import { parseAddress } from "./address.js";
import {
  type CanonicalValue,
  Float64,
  isCanonicalObject,
  objectEntries,
  toPlainValue,
} from "./canonical.js";
import { concat, hexToBytes, isHex, padLeft32, padRight32 } from "./encoding.js";
import { InvalidAddressFormat, TypedDataError } from "./errors.js";

// ── Types ───────────────────────────────────────────────────────────

export interface TypedDataField {
  name: string;
  type: string;
}

/** Struct name → ordered field list. */
export type TypedDataTypes = Record<string, TypedDataField[]>;

export interface TypedDataDomain {
  name?: string;
  version?: string;
  chainId?: number | bigint;
  verifyingContract?: string;
  salt?: string;
}

/** A message value as accepted by the encoder. */
export type TypedDataValue =
  | string
  | number
  | bigint
  | boolean
  | Float64
  | Uint8Array
  | TypedDataValue[]
  | TypedDataMessage;

export interface TypedDataMessage {
  [field: string]: TypedDataValue;
}

export interface TypedData {
  domain: TypedDataDomain;
  types: TypedDataTypes;
  primaryType: string;
  message: TypedDataMessage;
}

// ── Domain ──────────────────────────────────────────────────────────

const DOMAIN_FIELDS: ReadonlyArray<TypedDataField & { name: keyof TypedDataDomain }> = [
  { name: "name", type: "string" },
  { name: "version", type: "string" },
  { name: "chainId", type: "uint256" },
  { name: "verifyingContract", type: "address" },
  { name: "salt", type: "bytes32" },
];

/** `EIP712Domain` field list for the fields present in `domain`. */
export function domainFields(domain: TypedDataDomain): TypedDataField[] {
  return DOMAIN_FIELDS.filter((field) => domain[field.name] !== undefined).map(({ name, type }) => ({
    name,
    type,
  }));
}

function domainMessage(domain: TypedDataDomain): TypedDataMessage {
  const message: TypedDataMessage = {};
  for (const { name } of DOMAIN_FIELDS) {
    const value = domain[name];
    if (value !== undefined) message[name] = value;
  }
  return message;
}

/**
 * Domain separator.
 *
 * Uses `types.EIP712Domain` when supplied, otherwise the fields present in
 * the domain in canonical order.
 */
export function hashDomain(domain: TypedDataDomain, types: TypedDataTypes = {}): Uint8Array {
  const allTypes: TypedDataTypes = { ...types, EIP712Domain: types.EIP712Domain ?? domainFields(domain) };
  return hashStruct("EIP712Domain", domainMessage(domain), allTypes);
}

// ── Type strings ────────────────────────────────────────────────────

const ARRAY_SUFFIX_RE = /^(.*)\[(\d*)\]$/;
const UINT_RE = /^u?int(\d*)$/;
const BYTES_N_RE = /^bytes(\d+)$/;

function baseType(type: string): string {
  let t = type;
  let m = ARRAY_SUFFIX_RE.exec(t);
  while (m) {
    t = m[1];
    m = ARRAY_SUFFIX_RE.exec(t);
  }
  return t;
}

function collectDependencies(type: string, types: TypedDataTypes, found: Set<string>): void {
  const base = baseType(type);
  if (found.has(base) || types[base] === undefined) return;
  found.add(base);
  for (const field of types[base]) {
    collectDependencies(field.type, types, found);
  }
}

/**
 * `encodeType` string: the primary struct followed by its referenced
 * structs sorted by name.
 *
 * @example
 * ```ts
 * encodeType("Agent", { Agent: [{ name: "source", type: "string" }, { name: "connectionId", type: "bytes32" }] });
 * // "Agent(string source,bytes32 connectionId)"
 * ```
 */
export function encodeType(primaryType: string, types: TypedDataTypes): string {
  if (types[primaryType] === undefined) {
    throw new TypedDataError(`Unknown struct type "${primaryType}"`, primaryType);
  }
  const deps = new Set<string>();
  collectDependencies(primaryType, types, deps);
  deps.delete(primaryType);
  return [primaryType, ...[...deps].sort()]
    .map((name) => `${name}(${types[name].map((f) => `${f.type} ${f.name}`).join(",")})`)
    .join("");
}

export function typeHash(primaryType: string, types: TypedDataTypes): Uint8Array {
  return keccak_256(new TextEncoder().encode(encodeType(primaryType, types)));
}

// ── Values ──────────────────────────────────────────────────────────

function isMessage(value: TypedDataValue): value is TypedDataMessage {
  return (
    typeof value === "object" &&
    !Array.isArray(value) &&
    !(value instanceof Uint8Array) &&
    !(value instanceof Float64)
  );
}

function toBigInt(value: TypedDataValue, path: string): bigint {
  if (typeof value === "bigint") return value;
  if (typeof value === "number" && Number.isSafeInteger(value)) return BigInt(value);
  if (typeof value === "string" && /^-?(\d+|0[xX][0-9a-fA-F]+)$/.test(value.trim())) {
    const s = value.trim();
    return s.startsWith("-") ? -BigInt(s.slice(1)) : BigInt(s);
  }
  throw new TypedDataError("Expected an integer", path);
}

function toBytes(value: TypedDataValue, path: string): Uint8Array {
  if (value instanceof Uint8Array) return value;
  if (typeof value === "string" && isHex(value)) return hexToBytes(value);
  throw new TypedDataError("Expected hex bytes", path);
}

function encodeInteger(type: string, bits: number, value: TypedDataValue, path: string): Uint8Array {
  const signed = !type.startsWith("u");
  const n = toBigInt(value, path);
  const min = signed ? -(1n << BigInt(bits - 1)) : 0n;
  const max = signed ? (1n << BigInt(bits - 1)) - 1n : (1n << BigInt(bits)) - 1n;
  if (n < min || n > max) {
    throw new TypedDataError(`Value out of ${type} range`, path);
  }
  const twos = n < 0n ? (1n << 256n) + n : n;
  return hexToBytes(twos.toString(16).padStart(64, "0"));
}

function encodeAtomic(type: string, value: TypedDataValue, path: string): Uint8Array | undefined {
  if (type === "bool") {
    if (typeof value !== "boolean") throw new TypedDataError("Expected a boolean", path);
    return padLeft32(Uint8Array.of(value ? 1 : 0));
  }
  if (type === "address") {
    if (typeof value !== "string") throw new TypedDataError("Expected an address string", path);
    try {
      return padLeft32(parseAddress(value));
    } catch (error) {
      if (error instanceof InvalidAddressFormat) {
        throw new TypedDataError("Invalid address", path, { cause: error });
      }
      throw error;
    }
  }
  if (type === "string") {
    if (typeof value !== "string") throw new TypedDataError("Expected a string", path);
    return keccak_256(new TextEncoder().encode(value));
  }
  if (type === "bytes") {
    return keccak_256(toBytes(value, path));
  }
  const intMatch = UINT_RE.exec(type);
  if (intMatch) {
    const bits = intMatch[1] === "" ? 256 : Number(intMatch[1]);
    if (bits < 8 || bits > 256 || bits % 8 !== 0) {
      throw new TypedDataError(`Invalid integer type "${type}"`, path);
    }
    return encodeInteger(type, bits, value, path);
  }
  const bytesMatch = BYTES_N_RE.exec(type);
  if (bytesMatch) {
    const size = Number(bytesMatch[1]);
    if (size < 1 || size > 32) throw new TypedDataError(`Invalid type "${type}"`, path);
    const bytes = toBytes(value, path);
    if (bytes.length !== size) {
      throw new TypedDataError(`Expected ${size} bytes, got ${bytes.length}`, path);
    }
    return padRight32(bytes);
  }
  return undefined;
}

function encodeField(
  type: string,
  value: TypedDataValue,
  types: TypedDataTypes,
  path: string,
): Uint8Array {
  const arrayMatch = ARRAY_SUFFIX_RE.exec(type);
  if (arrayMatch) {
    if (!Array.isArray(value)) throw new TypedDataError("Expected an array", path);
    const [, itemType, fixedLength] = arrayMatch;
    if (fixedLength !== "" && value.length !== Number(fixedLength)) {
      throw new TypedDataError(`Expected ${fixedLength} elements, got ${value.length}`, path);
    }
    return keccak_256(
      concat(value.map((item, i) => encodeField(itemType, item, types, `${path}[${i}]`))),
    );
  }
  if (types[type] !== undefined) {
    if (!isMessage(value)) throw new TypedDataError(`Expected a ${type} struct`, path);
    return hashStructAt(type, value, types, path);
  }
  const atomic = encodeAtomic(type, value, path);
  if (atomic === undefined) {
    throw new TypedDataError(`Unknown type "${type}"`, path);
  }
  return atomic;
}

/** `typeHash ‖ enc(field₁) ‖ … ‖ enc(fieldₙ)`. */
export function encodeData(
  primaryType: string,
  message: TypedDataMessage,
  types: TypedDataTypes,
  path: string = primaryType,
): Uint8Array {
  const fields = types[primaryType];
  if (fields === undefined) {
    throw new TypedDataError(`Unknown struct type "${primaryType}"`, path);
  }
  const parts: Uint8Array[] = [typeHash(primaryType, types)];
  for (const field of fields) {
    const fieldPath = `${path}.${field.name}`;
    const value = message[field.name];
    if (value === undefined) {
      throw new TypedDataError("Missing field", fieldPath);
    }
    parts.push(encodeField(field.type, value, types, fieldPath));
  }
  return concat(parts);
}

function hashStructAt(
  primaryType: string,
  message: TypedDataMessage,
  types: TypedDataTypes,
  path: string,
): Uint8Array {
  return keccak_256(encodeData(primaryType, message, types, path));
}

export function hashStruct(
  primaryType: string,
  message: TypedDataMessage,
  types: TypedDataTypes,
): Uint8Array {
  return hashStructAt(primaryType, message, types, primaryType);
}

/** Final 32-byte digest to sign. */
export function hashTypedData(data: TypedData): Uint8Array {
  if (data.types[data.primaryType] === undefined) {
    throw new TypedDataError(`Primary type "${data.primaryType}" is not defined`, data.primaryType);
  }
  return keccak_256(
    concat([
      Uint8Array.of(0x19, 0x01),
      hashDomain(data.domain, data.types),
      hashStruct(data.primaryType, data.message, data.types),
    ]),
  );
}

// ── JSON input ──────────────────────────────────────────────────────

const typesSchema = z.record(
  z.string(),
  z.array(z.object({ name: z.string().min(1), type: z.string().min(1) }).strict()),
);

const chainIdSchema = z.union([
  z.number().int().nonnegative(),
  z.bigint().nonnegative(),
  z.string().regex(/^(\d+|0[xX][0-9a-fA-F]+)$/).transform((s) => BigInt(s)),
]);

const domainSchema = z
  .object({
    name: z.string().optional(),
    version: z.string().optional(),
    chainId: chainIdSchema.optional(),
    verifyingContract: z.string().optional(),
    salt: z.string().optional(),
  })
  .strict();

function issuePath(issues: z.ZodIssue[], prefix: string): string {
  const first = issues[0];
  return first === undefined || first.path.length === 0 ? prefix : `${prefix}.${first.path.join(".")}`;
}

function toMessageValue(value: CanonicalValue, path: string): TypedDataValue {
  if (value === null) {
    throw new TypedDataError("null is not a typed-data value", path);
  }
  if (Array.isArray(value)) {
    return value.map((item, i) => toMessageValue(item, `${path}[${i}]`));
  }
  if (isCanonicalObject(value)) {
    const out: TypedDataMessage = {};
    for (const [key, child] of objectEntries(value)) {
      out[key] = toMessageValue(child, `${path}.${key}`);
    }
    return out;
  }
  return value;
}

/**
 * Assemble a {@link TypedData} from separately parsed JSON components.
 *
 * @throws {TypedDataError} when the domain or the type graph is malformed,
 * or the message is not an object.
 */
export function typedDataFromJson(
  domain: CanonicalValue,
  types: CanonicalValue,
  message: CanonicalValue,
  primaryType: string,
): TypedData {
  const parsedDomain = domainSchema.safeParse(toPlainValue(domain));
  if (!parsedDomain.success) {
    throw new TypedDataError("Malformed domain", issuePath(parsedDomain.error.issues, "domain"));
  }
  const parsedTypes = typesSchema.safeParse(toPlainValue(types));
  if (!parsedTypes.success) {
    throw new TypedDataError("Malformed types", issuePath(parsedTypes.error.issues, "types"));
  }
  const body = toMessageValue(message, primaryType);
  if (!isMessage(body)) {
    throw new TypedDataError("Message must be an object", primaryType);
  }
  return { domain: parsedDomain.data, types: parsedTypes.data, primaryType, message: body };
}
