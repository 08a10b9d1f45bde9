import { describe, expect, it } from "vitest";
import {
  EncodingError,
  InvalidAddressFormat,
  isSignerError,
  ParseError,
  SignatureFailure,
  SignerError,
  TypedDataError,
  WalletError,
} from "../src/errors.js";

describe("Errors Module", () => {
  it.each([
    [new WalletError(), "WalletError", "WALLET_ERROR"],
    [new ParseError(), "ParseError", "PARSE_ERROR"],
    [new EncodingError(), "EncodingError", "ENCODING_ERROR"],
    [new TypedDataError(), "TypedDataError", "TYPED_DATA_ERROR"],
    [new SignatureFailure(), "SignatureFailure", "SIGNATURE_FAILURE"],
    [new InvalidAddressFormat("x"), "InvalidAddressFormat", "INVALID_ADDRESS"],
  ])("%s carries its name and code", (error, name, code) => {
    expect(error).toBeInstanceOf(SignerError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe(name);
    expect(error.code).toBe(code);
    expect(isSignerError(error)).toBe(true);
  });

  it("appends locations to messages", () => {
    expect(new ParseError("bad value", "$.orders[0].p").message).toBe("bad value at $.orders[0].p");
    expect(new EncodingError("not finite", "$.x").path).toBe("$.x");
    expect(new TypedDataError("Missing field", "Mail.contents").message).toBe(
      "Missing field (field Mail.contents)",
    );
    expect(new ParseError("bad value").path).toBeUndefined();
  });

  it("keeps the cause", () => {
    const cause = new RangeError("boom");
    expect(new SignatureFailure("failed", { cause }).cause).toBe(cause);
  });

  it("does not claim foreign errors", () => {
    expect(isSignerError(new Error("x"))).toBe(false);
    expect(isSignerError("x")).toBe(false);
  });
});
