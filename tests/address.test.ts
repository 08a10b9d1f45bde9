import { describe, expect, it } from "vitest";
import { normalizeAddress, parseAddress, toChecksumAddress, ZERO_ADDRESS } from "../src/address.js";
import { InvalidAddressFormat } from "../src/errors.js";

// EIP-55 test vectors.
const CHECKSUMMED = [
  "0x5aAeb6053F3E94C9b9A09f33669435E7Ef1BeAed",
  "0xfB6916095ca1df60bB79Ce92cE3Ea74c37c5d359",
  "0xdbF03B407c01E7cD3CBea99509d93f8DDDC8C6FB",
  "0xD1220A0cf47c7B9Be7A2E6BA89F429762e7b9aDb",
];

describe("Address Module", () => {
  describe("toChecksumAddress", () => {
    it.each(CHECKSUMMED)("checksums %s", (expected) => {
      expect(toChecksumAddress(expected.toLowerCase())).toBe(expected);
      expect(toChecksumAddress(expected.toUpperCase().replace("0X", "0x"))).toBe(expected);
    });

    it("is idempotent", () => {
      for (const address of CHECKSUMMED) {
        expect(toChecksumAddress(toChecksumAddress(address))).toBe(address);
      }
    });

    it("accepts a missing or upper-case prefix and surrounding whitespace", () => {
      const [expected] = CHECKSUMMED;
      const body = expected.slice(2).toLowerCase();
      expect(toChecksumAddress(body)).toBe(expected);
      expect(toChecksumAddress(`0X${body}`)).toBe(expected);
      expect(toChecksumAddress(`  0x${body}\n`)).toBe(expected);
    });

    it("leaves the zero address unchanged", () => {
      expect(toChecksumAddress(ZERO_ADDRESS)).toBe(ZERO_ADDRESS);
    });

    it.each([
      ["too short", "0x1234"],
      ["too long", `0x${"a".repeat(42)}`],
      ["non-hex", `0x${"g".repeat(40)}`],
      ["empty", ""],
      ["bare prefix", "0x"],
    ])("rejects %s input", (_label, input) => {
      expect(() => toChecksumAddress(input)).toThrow(InvalidAddressFormat);
    });

    it("reports the rejected input", () => {
      try {
        toChecksumAddress("0x1234");
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidAddressFormat);
        if (error instanceof InvalidAddressFormat) {
          expect(error.input).toBe("0x1234");
          expect(error.code).toBe("INVALID_ADDRESS");
          expect(error.message).toBe('Invalid address format: "0x1234"');
        }
      }
    });
  });

  describe("normalizeAddress", () => {
    it("lowercases and prefixes", () => {
      expect(normalizeAddress("5aAeb6053F3E94C9b9A09f33669435E7Ef1BeAed")).toBe(
        "0x5aaeb6053f3e94c9b9a09f33669435e7ef1beaed",
      );
    });
  });

  describe("parseAddress", () => {
    it("decodes 20 bytes", () => {
      const bytes = parseAddress("0x00000000000000000000000000000000000000ff");
      expect(bytes).toHaveLength(20);
      expect(bytes[19]).toBe(0xff);
      expect(bytes[0]).toBe(0);
    });
  });
});
