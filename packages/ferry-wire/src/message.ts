// Message construction and comparison.

import { InvalidPayloadError } from "./errors.ts";
import {
  MessageKind,
  type KeyValueMessage,
  type Message,
  type RawStringMessage,
} from "./types.ts";

/** Key/value input accepted by {@link newKeyValueMessage}. */
export type KeyValueInput = Readonly<Record<string, string>> | Iterable<readonly [string, string]>;

// A lone high surrogate, or a low surrogate without a preceding high one.
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/** Whether a string survives a UTF-8 encode/decode unchanged. */
export function isUtf8Representable(text: string): boolean {
  return !LONE_SURROGATE.test(text);
}

function isPairIterable(input: KeyValueInput): input is Iterable<readonly [string, string]> {
  return Symbol.iterator in input;
}

function checkText(what: string, value: unknown): string {
  if (typeof value !== "string") {
    throw InvalidPayloadError.notAString(what, value);
  }
  if (!isUtf8Representable(value)) {
    throw InvalidPayloadError.notUtf8(what);
  }
  return value;
}

/**
 * Build a key/value message.
 *
 * Accepts a plain record or any iterable of `[key, value]` tuples (including a
 * `Map`). Insertion order is kept as wire order.
 *
 * @throws InvalidPayloadError on an empty or duplicate key, a non-string key or
 * value, or text that cannot be encoded as UTF-8.
 */
export function newKeyValueMessage(pairs: KeyValueInput): KeyValueMessage {
  const entries = isPairIterable(pairs) ? pairs : Object.entries(pairs);

  const payload = new Map<string, string>();
  for (const [key, value] of entries) {
    checkText("key", key);
    checkText(`value of ${JSON.stringify(key)}`, value);
    if (key.length === 0) {
      throw InvalidPayloadError.emptyKey();
    }
    if (payload.has(key)) {
      throw InvalidPayloadError.duplicateKey(key);
    }
    payload.set(key, value);
  }

  return Object.freeze({ kind: MessageKind.KeyValue, payload });
}

/**
 * Build a raw string message.
 *
 * @throws InvalidPayloadError if `text` is not a string or cannot be encoded as UTF-8.
 */
export function newRawMessage(text: string): RawStringMessage {
  return Object.freeze({ kind: MessageKind.RawString, payload: checkText("text", text) });
}

export function isKeyValueMessage(message: Message): message is KeyValueMessage {
  return message.kind === MessageKind.KeyValue;
}

export function isRawStringMessage(message: Message): message is RawStringMessage {
  return message.kind === MessageKind.RawString;
}

/**
 * Structural equality.
 *
 * Key/value messages are equal when they hold the same set of pairs,
 * regardless of order.
 */
export function messagesEqual(a: Message, b: Message): boolean {
  if (a.kind === MessageKind.RawString) {
    return b.kind === MessageKind.RawString && a.payload === b.payload;
  }
  if (b.kind !== MessageKind.KeyValue || a.payload.size !== b.payload.size) {
    return false;
  }
  for (const [key, value] of a.payload) {
    if (b.payload.get(key) !== value) return false;
  }
  return true;
}

/** Copy a key/value payload into a plain object. */
export function toRecord(message: KeyValueMessage): Record<string, string> {
  return Object.fromEntries(message.payload);
}
