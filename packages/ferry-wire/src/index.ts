// ferry wire protocol
//
// Message model and the length-prefixed, kind-tagged frame codec shared by
// every ferry transport. Runtime-agnostic: no Node.js APIs.

// ============================================================================
// Types
// ============================================================================

export {
  MessageKind,
  HEADER_SIZE,
  MAX_BODY_LENGTH,
  MAX_FIELD_LENGTH,
  isMessageKind,
  kindName,
  type KeyValueMessage,
  type RawStringMessage,
  type Message,
  type FrameHeader,
} from "./types.ts";

// ============================================================================
// Message Model
// ============================================================================

export {
  newKeyValueMessage,
  newRawMessage,
  isKeyValueMessage,
  isRawStringMessage,
  isUtf8Representable,
  messagesEqual,
  toRecord,
  type KeyValueInput,
} from "./message.ts";

// ============================================================================
// Codec
// ============================================================================

export {
  encodeMessage,
  encodeBody,
  decodeBody,
  decodeFrame,
  readFrameHeader,
  readMessage,
  type ByteReader,
  type ReadOptions,
} from "./codec.ts";

// ============================================================================
// Errors
// ============================================================================

export {
  InvalidPayloadError,
  PayloadTooLargeError,
  ProtocolError,
  type ProtocolErrorCode,
} from "./errors.ts";
