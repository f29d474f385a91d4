// Frame encoding and decoding.
//
// Frame structure:
// ┌──────────┬──────────────────────────────┬──────────────────────────┐
// │   Kind   │         Body Length          │           Body           │
// │ (1 byte) │   (4 bytes, big-endian u32)  │      (Length bytes)      │
// └──────────┴──────────────────────────────┴──────────────────────────┘
//
// Key/value bodies are a run of entries:
// ┌───────────────┬───────────┬─────────────────┬─────────────┐
// │  Key Length   │    Key    │  Value Length   │    Value    │
// │ (u16, BE)     │  (UTF-8)  │  (u16, BE)      │   (UTF-8)   │
// └───────────────┴───────────┴─────────────────┴─────────────┘

import { InvalidPayloadError, PayloadTooLargeError, ProtocolError } from "./errors.ts";
import { isUtf8Representable } from "./message.ts";
import {
  HEADER_SIZE,
  MAX_BODY_LENGTH,
  MAX_FIELD_LENGTH,
  MessageKind,
  isMessageKind,
  type FrameHeader,
  type KeyValueMessage,
  type Message,
  type RawStringMessage,
} from "./types.ts";

const textEncoder = new TextEncoder();
// fatal: invalid UTF-8 throws instead of decoding to U+FFFD.
// ignoreBOM: a leading U+FEFF is payload, not a marker.
const textDecoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Source of bytes for {@link readMessage}.
 *
 * Implemented by stream transports; see `StreamSource` in @ferry/core.
 */
export interface ByteReader {
  /**
   * Resolve with exactly `n` bytes, waiting across as many chunks as needed.
   *
   * Resolves `null` if the stream ends before `n` bytes are available.
   */
  readExactly(n: number): Promise<Uint8Array | null>;
}

export interface ReadOptions {
  /**
   * Largest body length to accept. A header declaring more is rejected
   * before any of the body is read. Defaults to the u32 maximum.
   */
  maxBodyLength?: number;
}

function view(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

// ============================================================================
// Encoding
// ============================================================================

function encodeText(what: "key" | "value", text: string): Uint8Array {
  if (!isUtf8Representable(text)) {
    throw InvalidPayloadError.notUtf8(what);
  }
  const bytes = textEncoder.encode(text);
  if (bytes.length > MAX_FIELD_LENGTH) {
    throw new PayloadTooLargeError(what, bytes.length, MAX_FIELD_LENGTH);
  }
  return bytes;
}

function encodeKeyValueBody(message: KeyValueMessage): Uint8Array {
  const encoded: Array<[Uint8Array, Uint8Array]> = [];
  let total = 0;
  for (const [key, value] of message.payload) {
    if (key.length === 0) {
      throw InvalidPayloadError.emptyKey();
    }
    const k = encodeText("key", key);
    const v = encodeText("value", value);
    encoded.push([k, v]);
    total += 2 + k.length + 2 + v.length;
  }
  if (total > MAX_BODY_LENGTH) {
    throw new PayloadTooLargeError("body", total, MAX_BODY_LENGTH);
  }

  const body = new Uint8Array(total);
  const dv = view(body);
  let offset = 0;
  for (const [k, v] of encoded) {
    dv.setUint16(offset, k.length, false);
    body.set(k, offset + 2);
    offset += 2 + k.length;
    dv.setUint16(offset, v.length, false);
    body.set(v, offset + 2);
    offset += 2 + v.length;
  }
  return body;
}

function encodeRawBody(message: RawStringMessage): Uint8Array {
  if (!isUtf8Representable(message.payload)) {
    throw InvalidPayloadError.notUtf8("text");
  }
  const body = textEncoder.encode(message.payload);
  if (body.length > MAX_BODY_LENGTH) {
    throw new PayloadTooLargeError("body", body.length, MAX_BODY_LENGTH);
  }
  return body;
}

/**
 * Encode a message body (no header).
 *
 * @throws PayloadTooLargeError if a key, value or the body overflows its length field
 */
export function encodeBody(message: Message): Uint8Array {
  switch (message.kind) {
    case MessageKind.KeyValue:
      return encodeKeyValueBody(message);
    case MessageKind.RawString:
      return encodeRawBody(message);
  }
}

/**
 * Encode a message into a complete frame.
 *
 * The output depends only on the message, so equal messages built in the
 * same order always produce identical bytes.
 *
 * @throws PayloadTooLargeError if a key, value or the body overflows its length field
 */
export function encodeMessage(message: Message): Uint8Array {
  const body = encodeBody(message);
  const frame = new Uint8Array(HEADER_SIZE + body.length);
  const dv = view(frame);
  dv.setUint8(0, message.kind);
  dv.setUint32(1, body.length, false);
  frame.set(body, HEADER_SIZE);
  return frame;
}

// ============================================================================
// Decoding
// ============================================================================

function decodeText(what: string, bytes: Uint8Array): string {
  try {
    return textDecoder.decode(bytes);
  } catch (e) {
    throw ProtocolError.malformed(`${what} is not valid UTF-8`, e);
  }
}

function decodeKeyValueBody(body: Uint8Array): KeyValueMessage {
  const dv = view(body);
  const payload = new Map<string, string>();
  let offset = 0;

  const take = (what: string): Uint8Array => {
    if (offset + 2 > body.length) {
      throw ProtocolError.malformed(`truncated ${what} length at offset ${offset}`);
    }
    const len = dv.getUint16(offset, false);
    offset += 2;
    if (offset + len > body.length) {
      throw ProtocolError.malformed(
        `${what} declares ${len} bytes but only ${body.length - offset} remain`,
      );
    }
    const bytes = body.subarray(offset, offset + len);
    offset += len;
    return bytes;
  };

  while (offset < body.length) {
    const key = decodeText("key", take("key"));
    const value = decodeText("value", take("value"));
    if (key.length === 0) {
      throw ProtocolError.malformed("empty key");
    }
    if (payload.has(key)) {
      throw ProtocolError.malformed(`duplicate key ${JSON.stringify(key)}`);
    }
    payload.set(key, value);
  }

  return Object.freeze({ kind: MessageKind.KeyValue, payload });
}

/**
 * Decode a message body of the given kind.
 *
 * @throws ProtocolError (`malformed`) unless the body parses completely
 */
export function decodeBody(kind: MessageKind, body: Uint8Array): Message {
  switch (kind) {
    case MessageKind.KeyValue:
      return decodeKeyValueBody(body);
    case MessageKind.RawString:
      return Object.freeze({ kind: MessageKind.RawString, payload: decodeText("text", body) });
  }
}

/**
 * Parse a 5-byte frame header.
 *
 * @throws ProtocolError (`unknown_kind`) for a tag other than 0 or 1
 */
export function readFrameHeader(header: Uint8Array): FrameHeader {
  if (header.length < HEADER_SIZE) {
    throw ProtocolError.malformed(`header is ${header.length} bytes, expected ${HEADER_SIZE}`);
  }
  const dv = view(header);
  const tag = dv.getUint8(0);
  if (!isMessageKind(tag)) {
    throw ProtocolError.unknownKind(tag);
  }
  return { kind: tag, length: dv.getUint32(1, false) };
}

/**
 * Decode exactly one frame held in memory.
 *
 * @throws ProtocolError if the bytes are not exactly one valid frame
 */
export function decodeFrame(frame: Uint8Array): Message {
  const { kind, length } = readFrameHeader(frame);
  const expected = HEADER_SIZE + length;
  if (frame.length !== expected) {
    throw ProtocolError.malformed(`frame is ${frame.length} bytes, header declares ${expected}`);
  }
  return decodeBody(kind, frame.subarray(HEADER_SIZE));
}

/**
 * Read one frame from a byte stream and decode it.
 *
 * Resolves `null` when the stream ends before a complete header arrives,
 * which is a clean disconnect. A stream that ends inside a body is a
 * framing error.
 *
 * @throws ProtocolError on an unknown kind, a truncated or oversized body, or a body that does not parse
 */
export async function readMessage(reader: ByteReader, options: ReadOptions = {}): Promise<Message | null> {
  const header = await reader.readExactly(HEADER_SIZE);
  if (header === null) {
    return null;
  }

  const { kind, length } = readFrameHeader(header);
  const maxBodyLength = options.maxBodyLength ?? MAX_BODY_LENGTH;
  if (length > maxBodyLength) {
    throw ProtocolError.malformed(`body length ${length} exceeds limit ${maxBodyLength}`);
  }

  const body = length === 0 ? new Uint8Array(0) : await reader.readExactly(length);
  if (body === null) {
    throw ProtocolError.malformed(`stream ended inside a ${length}-byte body`);
  }
  return decodeBody(kind, body);
}
