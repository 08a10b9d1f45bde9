import { describe, expect, it } from "vitest";
import { ParseError } from "../src/errors.js";
import {
  formatPrice,
  formatSize,
  makeCloid,
  maxPriceDecimals,
  toFixedTruncate,
  toPrecisionTruncate,
  trimZeros,
} from "../src/format.js";

describe("Format Module", () => {
  describe("trimZeros", () => {
    it.each([
      ["007.50", "7.5"],
      ["-0.0", "0"],
      ["1.000", "1"],
      [".5", "0.5"],
      ["120", "120"],
    ])("%s → %s", (input, expected) => {
      expect(trimZeros(input)).toBe(expected);
    });
  });

  describe("toFixedTruncate", () => {
    it("truncates without rounding", () => {
      expect(toFixedTruncate("100.999", 2)).toBe("100.99");
      expect(toFixedTruncate("1.5", 0)).toBe("1");
      expect(toFixedTruncate("42", 3)).toBe("42");
    });
  });

  describe("toPrecisionTruncate", () => {
    it("keeps significant figures", () => {
      expect(toPrecisionTruncate("123456", 5)).toBe("123450");
      expect(toPrecisionTruncate("0.00012345", 3)).toBe("0.000123");
      expect(toPrecisionTruncate("-98.7654", 3)).toBe("-98.7");
      expect(toPrecisionTruncate("0.000", 3)).toBe("0");
    });
  });

  describe("formatPrice", () => {
    it("applies the perp decimal limit and five significant figures", () => {
      expect(formatPrice("50000.123456", 5)).toBe("50000");
      expect(formatPrice("1234.5678", 1)).toBe("1234.5");
      expect(formatPrice(0.5, 0)).toBe("0.5");
    });

    it("allows more decimals on spot", () => {
      expect(formatPrice("0.0000123456789", 0, { perp: false })).toBe("0.00001234");
      expect(formatPrice("0.0000123456789", 0)).toBe("0.000012");
    });

    it("keeps integer prices as-is", () => {
      expect(formatPrice("123456", 0)).toBe("123456");
      expect(formatPrice(100, 2)).toBe("100");
    });

    it("rejects non-decimal input", () => {
      expect(() => formatPrice("abc", 2)).toThrow(ParseError);
      expect(() => formatPrice(Number.NaN, 2)).toThrow(ParseError);
    });
  });

  describe("formatSize", () => {
    it("truncates to szDecimals", () => {
      expect(formatSize("1.23456789", 5)).toBe("1.23456");
      expect(formatSize(2.5, 0)).toBe("2");
    });
  });

  describe("maxPriceDecimals", () => {
    it("distinguishes perp and spot asset ids", () => {
      expect(maxPriceDecimals(0, 3)).toBe(3);
      expect(maxPriceDecimals(10_001, 2)).toBe(6);
      expect(maxPriceDecimals(0, 7)).toBe(0);
    });
  });

  describe("makeCloid", () => {
    it("returns 16 random bytes as hex", () => {
      const cloid = makeCloid();
      expect(cloid).toMatch(/^0x[0-9a-f]{32}$/);
      expect(makeCloid()).not.toBe(cloid);
    });
  });
});
