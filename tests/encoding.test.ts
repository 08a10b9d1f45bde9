import { describe, expect, it } from "vitest";
import {
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
} from "../src/encoding.js";

describe("Encoding Module", () => {
  describe("u64BE", () => {
    it("encodes 0 correctly", () => {
      const result = u64BE(0);
      expect(result.length).toBe(8);
      expect(bytesToHex(result)).toBe("0x0000000000000000");
    });

    it("encodes 1 correctly", () => {
      expect(bytesToHex(u64BE(1))).toBe("0x0000000000000001");
    });

    it("encodes a millisecond timestamp", () => {
      // 1700000000000 = 0x18bcfe56800
      expect(bytesToHex(u64BE(1700000000000))).toBe("0x0000018bcfe56800");
    });

    it("encodes u64::MAX correctly", () => {
      expect(bytesToHex(u64BE(U64_MAX))).toBe("0xffffffffffffffff");
    });

    it("rejects values outside u64", () => {
      expect(() => u64BE(-1)).toThrow(RangeError);
      expect(() => u64BE(U64_MAX + 1n)).toThrow(RangeError);
      expect(() => u64BE(1.5)).toThrow(RangeError);
      expect(() => u64BE(Number.MAX_SAFE_INTEGER + 2)).toThrow(RangeError);
    });

    it("toU64 accepts bigint and safe integers", () => {
      expect(toU64(42)).toBe(42n);
      expect(toU64(2n ** 63n)).toBe(2n ** 63n);
    });
  });

  describe("hex", () => {
    it("round-trips bytes through hex", () => {
      const bytes = Uint8Array.of(0x00, 0x0f, 0xab, 0xff);
      expect(bytesToHex(bytes)).toBe("0x000fabff");
      expect(hexToBytes("0x000fabff")).toEqual(bytes);
    });

    it("accepts hex without prefix and with uppercase prefix", () => {
      expect(hexToBytes("ABCD")).toEqual(Uint8Array.of(0xab, 0xcd));
      expect(hexToBytes("0XABCD")).toEqual(Uint8Array.of(0xab, 0xcd));
      expect(strip0x("0Xab")).toBe("ab");
    });

    it("rejects odd length and non-hex characters", () => {
      expect(isHex("0x123")).toBe(false);
      expect(isHex("0xzz")).toBe(false);
      expect(isHex("0x")).toBe(true);
      expect(() => hexToBytes("0x123")).toThrow(TypeError);
      expect(() => hexToBytes("gg")).toThrow(TypeError);
    });
  });

  describe("concat and padding", () => {
    it("concatenates in order", () => {
      const result = concat([Uint8Array.of(1, 2), new Uint8Array(0), Uint8Array.of(3)]);
      expect(result).toEqual(Uint8Array.of(1, 2, 3));
    });

    it("pads to 32-byte words", () => {
      const left = padLeft32(Uint8Array.of(0xaa));
      expect(left.length).toBe(32);
      expect(left[31]).toBe(0xaa);
      expect(left[0]).toBe(0);

      const right = padRight32(Uint8Array.of(0xaa));
      expect(right[0]).toBe(0xaa);
      expect(right[31]).toBe(0);
    });

    it("refuses to pad more than 32 bytes", () => {
      expect(() => padLeft32(new Uint8Array(33))).toThrow(RangeError);
      expect(() => padRight32(new Uint8Array(33))).toThrow(RangeError);
    });
  });
});
