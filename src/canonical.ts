/**
 * Canonical binary encoding of action values.
 *
 * Actions are hashed over their MessagePack encoding with string-keyed maps.
 * The byte layout is a wire contract with the exchange:
 *
 * - map keys are written in insertion order, never sorted
 * - map entries whose value is `undefined` are omitted (never written as nil)
 * - integers use the smallest MessagePack integer form
 * - {@link Float64} values are always written as float64, even when integral
 *
 * Map and array headers and 64-bit integers beyond 2^53 are framed here;
 * other scalars go through `@msgpack/msgpack`.
 *
 * JSON input is parsed with `jsonc-parser` in strict mode. Objects become
 * {@link OrderedMap}s so that every key, integer-like ones included, keeps
 * its document position; number literals are read from the source text so
 * that integers above 2^53 survive as bigint and `1.0` stays a float.
 *
 * @module
 */

import { encode } from "@msgpack/msgpack";
import jsonc from "jsonc-parser";
import type { Node as JsonNode, ParseError as JsonSyntaxError } from "jsonc-parser";
import { concat, U64_MAX } from "./encoding.js";
import { EncodingError, ParseError } from "./errors.js";

const I64_MIN = -(1n << 63n);
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);
const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);
const INTEGER_LITERAL = /^-?\d+$/;

// ── Value tree ──────────────────────────────────────────────────────

/**
 * A number that must be encoded as float64.
 *
 * JSON literals with a fraction or exponent parse to this wrapper so that
 * `1.0` and `1` produce different bytes.
 */
export class Float64 {
  constructor(readonly value: number) {}

  toJSON(): number {
    return this.value;
  }
}

export type CanonicalScalar = null | boolean | number | bigint | string | Float64;

/** A JSON-like value tree with integer/float distinction preserved. */
export type CanonicalValue = CanonicalScalar | CanonicalValue[] | CanonicalMap | OrderedMap;

/** String-keyed map; `undefined` entries are omitted when encoding. */
export interface CanonicalMap {
  [key: string]: CanonicalValue | undefined;
}

/**
 * A parsed JSON object. Unlike a plain object, a `Map` iterates
 * integer-like keys (`"10"`, `"2"`) in insertion order too.
 */
export type OrderedMap = Map<string, CanonicalValue>;

/** Either map form. */
export type CanonicalObject = CanonicalMap | OrderedMap;

/** True for a plain-object map node (not an array, {@link Float64} or {@link OrderedMap}). */
export function isCanonicalMap(value: CanonicalValue | undefined): value is CanonicalMap {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Float64) &&
    !(value instanceof Map)
  );
}

export function isCanonicalObject(value: CanonicalValue | undefined): value is CanonicalObject {
  return value instanceof Map || isCanonicalMap(value);
}

/** Entries of either map form in iteration order, `undefined` values skipped. */
export function objectEntries(value: CanonicalObject): [string, CanonicalValue][] {
  const entries: [string, CanonicalValue | undefined][] =
    value instanceof Map ? [...value] : Object.entries(value);
  return entries.filter((entry): entry is [string, CanonicalValue] => entry[1] !== undefined);
}

export function objectField(value: CanonicalObject, key: string): CanonicalValue | undefined {
  return value instanceof Map ? value.get(key) : value[key];
}

/**
 * Deep copy with every {@link OrderedMap} turned into a plain object, for
 * schema validation where key order is irrelevant.
 */
export function toPlainValue(value: CanonicalValue): CanonicalValue {
  if (Array.isArray(value)) return value.map(toPlainValue);
  if (!isCanonicalObject(value)) return value;
  const out: CanonicalMap = {};
  for (const [key, child] of objectEntries(value)) {
    out[key] = toPlainValue(child);
  }
  return out;
}

// ── Parsing ─────────────────────────────────────────────────────────

const JSON_OPTIONS = { disallowComments: true, allowTrailingComma: false, allowEmptyContent: false };

function parseNumber(literal: string): number | bigint | Float64 {
  // `-0` has no integer form
  if (literal === "-0") return new Float64(-0);
  if (INTEGER_LITERAL.test(literal)) {
    const n = BigInt(literal);
    return n >= MIN_SAFE && n <= MAX_SAFE ? Number(n) : n;
  }
  const f = Number(literal);
  if (!Number.isFinite(f)) {
    throw new ParseError(`Invalid JSON: number out of float64 range: ${literal}`);
  }
  return new Float64(f);
}

function fromNode(node: JsonNode, text: string): CanonicalValue {
  const raw: unknown = node.value;
  switch (node.type) {
    case "object": {
      const map: OrderedMap = new Map();
      for (const property of node.children ?? []) {
        const [keyNode, valueNode] = property.children ?? [];
        const key: unknown = keyNode?.value;
        if (typeof key !== "string" || valueNode === undefined) {
          throw new ParseError(`Invalid JSON: malformed property at offset ${property.offset}`);
        }
        // a repeated key keeps its first position and takes the last value
        map.set(key, fromNode(valueNode, text));
      }
      return map;
    }
    case "array":
      return (node.children ?? []).map((child) => fromNode(child, text));
    case "number":
      return parseNumber(text.slice(node.offset, node.offset + node.length));
    case "string":
      if (typeof raw === "string") return raw;
      break;
    case "boolean":
      if (typeof raw === "boolean") return raw;
      break;
    case "null":
      return null;
    case "property":
      break;
  }
  throw new ParseError(`Invalid JSON: unexpected ${node.type} at offset ${node.offset}`);
}

/**
 * Parse a JSON document into a canonical value tree.
 *
 * Objects become {@link OrderedMap}s in document order. Integer literals
 * become `number` when safe and `bigint` otherwise; other numeric literals
 * (and `-0`) become {@link Float64}.
 *
 * @throws {ParseError} on malformed JSON.
 */
export function parseJson(text: string): CanonicalValue {
  const errors: JsonSyntaxError[] = [];
  const root = jsonc.parseTree(text, errors, JSON_OPTIONS);
  const [first] = errors;
  if (first !== undefined) {
    throw new ParseError(`Invalid JSON: ${jsonc.printParseErrorCode(first.error)} at offset ${first.offset}`);
  }
  if (root === undefined) {
    throw new ParseError("Invalid JSON: empty document");
  }
  return fromNode(root, text);
}

/**
 * Convert a plain JavaScript value into a canonical value tree.
 *
 * Integral numbers stay integers; use {@link Float64} to force float64.
 * `undefined` object properties are dropped.
 *
 * @throws {EncodingError} for values with no canonical form (functions,
 * symbols, non-finite numbers, class instances other than Float64).
 */
export function toCanonical(value: unknown, path = "$"): CanonicalValue {
  if (value instanceof Float64) {
    if (!Number.isFinite(value.value)) throw new EncodingError("Non-finite float", path);
    return value;
  }
  switch (typeof value) {
    case "boolean":
    case "string":
    case "bigint":
      return value;
    case "number":
      if (!Number.isFinite(value)) throw new EncodingError("Non-finite number", path);
      return Number.isInteger(value) ? value : new Float64(value);
    case "object": {
      if (value === null) return null;
      if (Array.isArray(value)) {
        return value.map((item: unknown, i) => toCanonical(item, `${path}[${i}]`));
      }
      if (value instanceof Map) {
        const entries: Iterable<[unknown, unknown]> = value;
        const map: OrderedMap = new Map();
        for (const [key, child] of entries) {
          if (typeof key !== "string") throw new EncodingError("Map keys must be strings", path);
          if (child === undefined) continue;
          map.set(key, toCanonical(child, `${path}.${key}`));
        }
        return map;
      }
      const proto: unknown = Object.getPrototypeOf(value);
      if (proto !== Object.prototype && proto !== null) {
        throw new EncodingError("Unsupported object type", path);
      }
      const out: CanonicalMap = {};
      for (const [key, child] of Object.entries(value)) {
        if (child === undefined) continue;
        out[key] = toCanonical(child, `${path}.${key}`);
      }
      return out;
    }
    default:
      throw new EncodingError(`Unsupported value of type ${typeof value}`, path);
  }
}

// ── Encoding ────────────────────────────────────────────────────────

function header(length: number, fix: number, m16: number, m32: number): Uint8Array {
  if (length < 16) return Uint8Array.of(fix | length);
  if (length <= 0xffff) return Uint8Array.of(m16, length >> 8, length & 0xff);
  const buf = new Uint8Array(5);
  buf[0] = m32;
  new DataView(buf.buffer).setUint32(1, length, false);
  return buf;
}

function encodeBigInt(value: bigint, path: string): Uint8Array {
  if (value >= MIN_SAFE && value <= MAX_SAFE) return encode(Number(value));
  if (value < I64_MIN || value > U64_MAX) {
    throw new EncodingError("Integer out of 64-bit range", path);
  }
  const buf = new Uint8Array(9);
  const view = new DataView(buf.buffer);
  if (value >= 0n) {
    buf[0] = 0xcf; // uint 64
    view.setBigUint64(1, value, false);
  } else {
    buf[0] = 0xd3; // int 64
    view.setBigInt64(1, value, false);
  }
  return buf;
}

function write(value: CanonicalValue, path: string, out: Uint8Array[]): void {
  if (value === null || typeof value === "boolean" || typeof value === "string") {
    out.push(encode(value));
    return;
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) throw new EncodingError("Non-finite number", path);
    out.push(encode(value));
    return;
  }
  if (typeof value === "bigint") {
    out.push(encodeBigInt(value, path));
    return;
  }
  if (value instanceof Float64) {
    if (!Number.isFinite(value.value)) throw new EncodingError("Non-finite float", path);
    out.push(encode(value.value, { forceIntegerToFloat: true }));
    return;
  }
  if (Array.isArray(value)) {
    out.push(header(value.length, 0x90, 0xdc, 0xdd));
    value.forEach((item, i) => write(item, `${path}[${i}]`, out));
    return;
  }
  const entries = objectEntries(value);
  out.push(header(entries.length, 0x80, 0xde, 0xdf));
  for (const [key, child] of entries) {
    out.push(encode(key));
    write(child, `${path}.${key}`, out);
  }
}

/**
 * Encode a value tree as MessagePack with string-keyed maps.
 *
 * @throws {EncodingError} naming the path of a value with no encoding.
 */
export function encodeCanonical(value: CanonicalValue): Uint8Array {
  const out: Uint8Array[] = [];
  write(value, "$", out);
  return concat(out);
}
