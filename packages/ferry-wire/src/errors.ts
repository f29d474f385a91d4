// Error types for message construction, encoding and decoding.

/**
 * Thrown when a message cannot be constructed from the given data.
 *
 * Always the caller's data; never retried.
 */
export class InvalidPayloadError extends Error {
  override readonly name = "InvalidPayloadError";

  constructor(message: string) {
    super(message);
  }

  static emptyKey(): InvalidPayloadError {
    return new InvalidPayloadError("key must not be empty");
  }

  static duplicateKey(key: string): InvalidPayloadError {
    return new InvalidPayloadError(`duplicate key: ${JSON.stringify(key)}`);
  }

  static notAString(what: string, value: unknown): InvalidPayloadError {
    return new InvalidPayloadError(`${what} must be a string, got ${typeof value}`);
  }

  static notUtf8(what: string): InvalidPayloadError {
    return new InvalidPayloadError(`${what} contains a lone surrogate and cannot be encoded as UTF-8`);
  }
}

/**
 * Thrown at encode time when a length does not fit its wire field.
 *
 * The connection that attempted the send stays usable.
 */
export class PayloadTooLargeError extends Error {
  override readonly name = "PayloadTooLargeError";

  constructor(
    /** Which length overflowed. */
    public readonly field: "key" | "value" | "body",
    /** Actual size in bytes. */
    public readonly size: number,
    /** Largest size the field can carry. */
    public readonly limit: number,
  ) {
    super(`${field} is ${size} bytes, limit is ${limit}`);
  }
}

/** Decode failure codes. */
export type ProtocolErrorCode = "unknown_kind" | "malformed";

/**
 * Thrown when incoming bytes do not form a valid frame.
 *
 * The connection the bytes came from cannot be resynchronized and is closed.
 */
export class ProtocolError extends Error {
  override readonly name = "ProtocolError";

  constructor(
    public readonly code: ProtocolErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }

  static unknownKind(tag: number): ProtocolError {
    return new ProtocolError("unknown_kind", `unknown message kind tag: ${tag}`);
  }

  static malformed(detail: string, cause?: unknown): ProtocolError {
    return new ProtocolError("malformed", `malformed frame: ${detail}`, { cause });
  }
}
