/**
 * Error types raised by the signing pipeline.
 *
 * Every failure extends the base {@link SignerError} class and carries a
 * stable string `code`. Errors are thrown at the step that detects them:
 * key parsing, JSON parsing, canonical encoding, typed-data encoding,
 * ECDSA signing or address formatting. Nothing is retried and no partial
 * result is returned.
 *
 * @module
 */

/** Stable codes for each failure category. */
export type SignerErrorCode =
  | "WALLET_ERROR"
  | "PARSE_ERROR"
  | "ENCODING_ERROR"
  | "TYPED_DATA_ERROR"
  | "SIGNATURE_FAILURE"
  | "INVALID_ADDRESS";

/**
 * Base error class for all signing errors.
 *
 * @example
 * ```ts
 * try {
 *   signUsdSend(key, destination, "1", 1700000000000, false);
 * } catch (error) {
 *   if (error instanceof SignerError) {
 *     console.log(error.code, error.message);
 *   }
 * }
 * ```
 */
export class SignerError extends Error {
  /** Failure category. */
  readonly code: SignerErrorCode;

  constructor(message: string, code: SignerErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SignerError";
    this.code = code;
  }
}

/** The private key is not 32 bytes of hex or is not a valid secp256k1 scalar. */
export class WalletError extends SignerError {
  constructor(message = "Invalid private key", options?: { cause?: unknown }) {
    super(message, "WALLET_ERROR", options);
    this.name = "WalletError";
  }
}

/** Input JSON is malformed or does not match the expected action shape. */
export class ParseError extends SignerError {
  /** JSON path of the offending value, when known (e.g. `"orders[0].p"`). */
  readonly path: string | undefined;

  constructor(message = "Failed to parse input", path?: string, options?: { cause?: unknown }) {
    super(path ? `${message} at ${path}` : message, "PARSE_ERROR", options);
    this.name = "ParseError";
    this.path = path;
  }
}

/** A value cannot be represented in the canonical binary encoding. */
export class EncodingError extends SignerError {
  /** JSON path of the offending value. */
  readonly path: string | undefined;

  constructor(message = "Failed to encode value", path?: string, options?: { cause?: unknown }) {
    super(path ? `${message} at ${path}` : message, "ENCODING_ERROR", options);
    this.name = "EncodingError";
    this.path = path;
  }
}

/** A typed-data schema is malformed or a message field does not match its declared type. */
export class TypedDataError extends SignerError {
  /** Offending field path (e.g. `"Mail.from.wallet"`). */
  readonly field: string | undefined;

  constructor(message = "Invalid typed data", field?: string, options?: { cause?: unknown }) {
    super(field ? `${message} (field ${field})` : message, "TYPED_DATA_ERROR", options);
    this.name = "TypedDataError";
    this.field = field;
  }
}

/** The signing primitive failed unexpectedly. */
export class SignatureFailure extends SignerError {
  constructor(message = "Signing failed", options?: { cause?: unknown }) {
    super(message, "SIGNATURE_FAILURE", options);
    this.name = "SignatureFailure";
  }
}

/** An address is not 40 hex characters (with or without a `0x` prefix). */
export class InvalidAddressFormat extends SignerError {
  /** The rejected input. */
  readonly input: string;

  constructor(input: string, message = "Invalid address format") {
    super(`${message}: ${JSON.stringify(input)}`, "INVALID_ADDRESS");
    this.name = "InvalidAddressFormat";
    this.input = input;
  }
}

/** Type guard for any error raised by this library. */
export function isSignerError(error: unknown): error is SignerError {
  return error instanceof SignerError;
}
