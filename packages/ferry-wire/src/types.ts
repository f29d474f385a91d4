// ferry wire protocol types.
//
// A frame is a 5-byte header (kind tag + big-endian u32 body length)
// followed by the body. The kind tag values below are fixed on the wire.

// ============================================================================
// Kinds
// ============================================================================

/** Payload variant tags as they appear in byte 0 of a frame header. */
export const MessageKind = {
  /** Body is a sequence of length-prefixed key/value entries. */
  KeyValue: 0,
  /** Body is UTF-8 text. */
  RawString: 1,
} as const;

export type MessageKind = (typeof MessageKind)[keyof typeof MessageKind];

/** Check whether a tag byte names a known kind. */
export function isMessageKind(tag: number): tag is MessageKind {
  return tag === MessageKind.KeyValue || tag === MessageKind.RawString;
}

/** Human-readable kind name, for logs and error messages. */
export function kindName(kind: MessageKind): "key-value" | "raw-string" {
  return kind === MessageKind.KeyValue ? "key-value" : "raw-string";
}

// ============================================================================
// Frame layout
// ============================================================================

/** Header size in bytes: 1 kind byte + 4 length bytes. */
export const HEADER_SIZE = 5;

/** Largest body a frame can declare (u32 length field). */
export const MAX_BODY_LENGTH = 0xffff_ffff;

/** Largest key or value, in UTF-8 bytes (u16 length field). */
export const MAX_FIELD_LENGTH = 0xffff;

// ============================================================================
// Message
// ============================================================================

/**
 * Key/value message.
 *
 * Keys are unique and non-empty. Iteration order is the construction order,
 * which is also the wire order; receivers must not rely on it.
 */
export interface KeyValueMessage {
  readonly kind: typeof MessageKind.KeyValue;
  readonly payload: ReadonlyMap<string, string>;
}

/**
 * Raw string message. The text is carried as UTF-8.
 */
export interface RawStringMessage {
  readonly kind: typeof MessageKind.RawString;
  readonly payload: string;
}

/** The unit of transfer. `payload` is determined by `kind`. */
export type Message = KeyValueMessage | RawStringMessage;

/** Decoded frame header. */
export interface FrameHeader {
  kind: MessageKind;
  length: number;
}
