import { encode } from "@msgpack/msgpack";
import { describe, expect, it } from "vitest";
import {
  type CanonicalMap,
  encodeCanonical,
  Float64,
  parseJson,
  toCanonical,
} from "../src/canonical.js";
import { bytesToHex } from "../src/encoding.js";
import { EncodingError, ParseError } from "../src/errors.js";

describe("Canonical Encoding Module", () => {
  describe("encodeCanonical", () => {
    it("encodes a tagged map with the tag first", () => {
      // fixmap(1) "type" "claimRewards"
      expect(bytesToHex(encodeCanonical({ type: "claimRewards" }))).toBe(
        "0x81a474797065ac636c61696d52657761726473",
      );
    });

    it("keeps insertion order instead of sorting keys", () => {
      expect(bytesToHex(encodeCanonical({ b: 1, a: 2 }))).toBe("0x82a16201a16102");
    });

    it("omits undefined map entries", () => {
      expect(bytesToHex(encodeCanonical({ a: 1, b: undefined }))).toBe("0x81a16101");
    });

    it("uses the smallest integer form", () => {
      expect(bytesToHex(encodeCanonical(0))).toBe("0x00");
      expect(bytesToHex(encodeCanonical(127))).toBe("0x7f");
      expect(bytesToHex(encodeCanonical(255))).toBe("0xccff");
      expect(bytesToHex(encodeCanonical(65536))).toBe("0xce00010000");
      expect(bytesToHex(encodeCanonical(-1))).toBe("0xff");
      expect(bytesToHex(encodeCanonical(1700000000000))).toBe("0xcf0000018bcfe56800");
    });

    it("encodes safe bigints like numbers", () => {
      expect(encodeCanonical(5n)).toEqual(encodeCanonical(5));
      expect(encodeCanonical(-40n)).toEqual(encodeCanonical(-40));
    });

    it("encodes u64 values above 2^53 as uint64", () => {
      expect(bytesToHex(encodeCanonical(2n ** 64n - 1n))).toBe("0xcfffffffffffffffff");
      expect(bytesToHex(encodeCanonical(2n ** 63n))).toBe("0xcf8000000000000000");
      expect(bytesToHex(encodeCanonical({ x: 2n ** 53n + 1n }))).toBe("0x81a178cf0020000000000001");
    });

    it("encodes negative values below -2^53 as int64", () => {
      expect(bytesToHex(encodeCanonical(-(2n ** 63n)))).toBe("0xd38000000000000000");
      expect(bytesToHex(encodeCanonical(-(2n ** 53n) - 1n))).toBe("0xd3ffdfffffffffffff");
    });

    it("rejects integers outside the 64-bit range", () => {
      expect(() => encodeCanonical({ x: 2n ** 64n })).toThrow(EncodingError);
      expect(() => encodeCanonical({ x: -(2n ** 63n) - 1n })).toThrow(EncodingError);
    });

    it("encodes Float64 as float64 even when integral", () => {
      expect(bytesToHex(encodeCanonical(new Float64(1)))).toBe("0xcb3ff0000000000000");
      expect(bytesToHex(encodeCanonical(1))).toBe("0x01");
    });

    it("encodes fractional numbers as float64", () => {
      expect(bytesToHex(encodeCanonical(1.5))).toBe("0xcb3ff8000000000000");
    });

    it("rejects non-finite numbers with the path", () => {
      try {
        encodeCanonical({ orders: [{ p: Number.NaN }] });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(EncodingError);
        if (error instanceof EncodingError) {
          expect(error.path).toBe("$.orders[0].p");
        }
      }
      expect(() => encodeCanonical(new Float64(Number.POSITIVE_INFINITY))).toThrow(EncodingError);
    });

    it("writes 16-bit headers from 16 entries", () => {
      const array = Array.from({ length: 16 }, () => 0);
      const encodedArray = encodeCanonical(array);
      expect(bytesToHex(encodedArray.slice(0, 3))).toBe("0xdc0010");
      expect(encodedArray.length).toBe(3 + 16);

      const map: CanonicalMap = {};
      for (let i = 0; i < 16; i++) map[`k${i.toString(16)}`] = i;
      const encodedMap = encodeCanonical(map);
      expect(bytesToHex(encodedMap.slice(0, 3))).toBe("0xde0010");
    });

    it("matches @msgpack/msgpack for plain values", () => {
      const action = {
        type: "order",
        orders: [{ a: 4, b: true, p: "1100", s: "0.2", r: false, t: { limit: { tif: "Gtc" } } }],
        grouping: "na",
      };
      expect(encodeCanonical(action)).toEqual(encode(action));
    });
  });

  describe("parseJson", () => {
    it("preserves document key order", () => {
      const value = parseJson('{"z":1,"a":2,"m":3}');
      expect(value).toBeInstanceOf(Map);
      if (value instanceof Map) {
        expect([...value.keys()]).toEqual(["z", "a", "m"]);
      }
    });

    it("keeps integer-like keys in document order", () => {
      const value = parseJson('{"type":"x","b":1,"10":2,"2":3}');
      expect(bytesToHex(encodeCanonical(value))).toBe("0x84a474797065a178a16201a2313002a13203");
    });

    it("keeps the first position and last value of a repeated key", () => {
      expect(bytesToHex(encodeCanonical(parseJson('{"a":1,"b":2,"a":3}')))).toBe("0x82a16103a16202");
    });

    it("parses -0 as a float", () => {
      expect(parseJson("-0")).toEqual(new Float64(-0));
      expect(bytesToHex(encodeCanonical(parseJson('{"type":"x","v":-0}')))).toBe(
        "0x82a474797065a178a176cb8000000000000000",
      );
    });

    it("keeps float literals as Float64", () => {
      const value = parseJson('{"a":1.0,"b":1}');
      expect(value).toEqual(
        new Map<string, number | Float64>([
          ["a", new Float64(1)],
          ["b", 1],
        ]),
      );
      expect(bytesToHex(encodeCanonical(value))).toBe("0x82a161cb3ff0000000000000a16201");
    });

    it("parses exponent literals as Float64", () => {
      expect(parseJson("1e3")).toEqual(new Float64(1000));
    });

    it("keeps unsigned integers above 2^53 exact", () => {
      expect(parseJson('{"n":18446744073709551615}')).toEqual(new Map([["n", 18446744073709551615n]]));
    });

    it("returns safe integers as numbers", () => {
      expect(parseJson("[9007199254740991, -3]")).toEqual([9007199254740991, -3]);
    });

    it("rejects malformed JSON", () => {
      expect(() => parseJson("{")).toThrow(ParseError);
      expect(() => parseJson('{"a":}')).toThrow(ParseError);
      expect(() => parseJson("")).toThrow(ParseError);
    });

    it("rejects comments and trailing commas", () => {
      expect(() => parseJson('{"a":1 // note\n}')).toThrow(ParseError);
      expect(() => parseJson("[1,2,]")).toThrow(ParseError);
    });
  });

  describe("toCanonical", () => {
    it("converts plain values and drops undefined properties", () => {
      expect(toCanonical({ a: 1, b: undefined, c: [true, null, "x"], d: 2.5 })).toEqual({
        a: 1,
        c: [true, null, "x"],
        d: new Float64(2.5),
      });
    });

    it("keeps Map entries in insertion order", () => {
      const value = toCanonical(
        new Map<string, unknown>([
          ["10", 1],
          ["2", undefined],
          ["a", 2.5],
        ]),
      );
      expect(bytesToHex(encodeCanonical(value))).toBe("0x82a2313001a161cb4004000000000000");
    });

    it("rejects values with no canonical form", () => {
      expect(() => toCanonical({ when: new Date(0) })).toThrow(EncodingError);
      expect(() => toCanonical({ f: () => 1 })).toThrow(EncodingError);
      expect(() => toCanonical([Number.NaN])).toThrow(EncodingError);
    });
  });
});
