// Connection state machine and read loop.
//
// One ConnectionHandler owns one StreamSource. Its read loop decodes frames
// strictly in arrival order and awaits the message callback before reading
// the next frame. Writes from concurrent `send` calls are queued so frames
// never interleave on the wire.

import { getLogger, type Logger } from "@logtape/logtape";
import {
  encodeMessage,
  kindName,
  readMessage,
  ProtocolError,
  type Message,
} from "@ferry/wire";
import { Deferred } from "./deferred.ts";
import { ConnectionError } from "./errors.ts";
import { formatEndpoint, type Endpoint, type StreamSource } from "./transport.ts";

/** Connection lifecycle states. */
export type ConnectionState = "open" | "reading" | "dispatching" | "closed";

/** Who opened the connection. */
export type Direction = "inbound" | "outbound";

/** Why a connection closed. Delivered exactly once. */
export type CloseEvent =
  /** The peer ended the stream between frames. */
  | { reason: "eof"; peer: Endpoint }
  /** `close()` was called on this side. */
  | { reason: "local"; peer: Endpoint }
  /** A protocol, timeout or transport error ended the connection. */
  | { reason: "error"; peer: Endpoint; error: ProtocolError | ConnectionError };

/**
 * Called once per decoded frame. The next frame is not read until the
 * returned promise settles.
 */
export type MessageHandler = (
  message: Message,
  peer: Endpoint,
  connection: ConnectionHandler,
) => void | Promise<void>;

/** Options for a single connection. */
export interface ConnectionOptions {
  /** Receives every inbound message not claimed by a pending `request()`. */
  onMessage?: MessageHandler;

  /** Called once when the connection closes. */
  onClose?: (event: CloseEvent) => void;

  /** Called when `onMessage` throws or rejects. The connection keeps reading. */
  onCallbackError?: (error: unknown, message: Message, peer: Endpoint) => void;

  /**
   * Maximum time to wait for one complete frame, in milliseconds. When it
   * elapses the connection closes with a `timeout` error. Absent means wait
   * indefinitely.
   */
  readTimeoutMs?: number;

  /** Largest inbound body length to accept. */
  maxBodyLength?: number;

  /** Parent logger. Defaults to the `ferry` category. */
  logger?: Logger;
}

/** Options for {@link ConnectionHandler.request}. */
export interface RequestOptions {
  /** Reject with a `timeout` error if no reply arrives in time. */
  timeoutMs?: number;
}

interface PendingReply {
  reply: Deferred<Message>;
  timer: ReturnType<typeof setTimeout> | null;
}

/**
 * A live connection.
 *
 * Call `start()` to begin reading. The handle also serves as the client-side
 * connection returned by `connect`.
 */
export class ConnectionHandler {
  readonly direction: Direction;
  readonly local: Endpoint;
  readonly remote: Endpoint;

  private readonly source: StreamSource;
  private readonly options: ConnectionOptions;
  private readonly logger: Logger;
  private _state: ConnectionState = "open";
  private closeEvent: CloseEvent | null = null;
  private readonly closedDeferred = new Deferred<CloseEvent>();
  private loop: Promise<CloseEvent> | null = null;
  private writeChain: Promise<void> = Promise.resolve();
  private readonly pendingReplies: PendingReply[] = [];
  private received = 0;
  private sent = 0;

  constructor(source: StreamSource, direction: Direction, options: ConnectionOptions = {}) {
    this.source = source;
    this.direction = direction;
    this.local = source.local;
    this.remote = source.remote;
    this.options = options;
    this.logger = (options.logger ?? getLogger(["ferry"]))
      .getChild("connection")
      .with({ peer: formatEndpoint(source.remote), direction });
  }

  get state(): ConnectionState {
    return this._state;
  }

  get isClosed(): boolean {
    return this._state === "closed";
  }

  /** Frames decoded so far. */
  get messagesReceived(): number {
    return this.received;
  }

  /** Frames fully written so far. */
  get messagesSent(): number {
    return this.sent;
  }

  /** Resolves with the close event once the connection has closed. */
  get closed(): Promise<CloseEvent> {
    return this.closedDeferred.promise;
  }

  /**
   * Start the read loop. Idempotent; every call returns the same promise,
   * which resolves with the close event.
   */
  start(): Promise<CloseEvent> {
    if (!this.loop) {
      this.loop = this.run();
    }
    return this.loop;
  }

  /**
   * Encode and write one message.
   *
   * Encoding happens before queuing, so a PayloadTooLargeError leaves the
   * connection untouched. A failed write closes the connection.
   *
   * @throws ConnectionError (`closed`) if the connection has closed
   */
  async send(message: Message): Promise<void> {
    if (this.isClosed) {
      throw ConnectionError.closed();
    }
    const frame = encodeMessage(message);
    const write = this.writeChain.then(() => this.writeFrame(frame));
    // The chain only orders writes; each caller observes its own failure via `write`.
    this.writeChain = write.then(
      () => undefined,
      () => undefined,
    );
    await write;
  }

  /**
   * Send a message and wait for the next inbound message on this connection.
   *
   * Replies are matched to requests in order. A message that completes a
   * request is not passed to `onMessage`. A timed-out request leaves the
   * connection open.
   *
   * Do not await a request from this connection's own `onMessage`: the read
   * loop waits for the handler before reading the reply, so such a request
   * only settles on `timeoutMs` or close.
   */
  async request(message: Message, options: RequestOptions = {}): Promise<Message> {
    if (this.isClosed) {
      throw ConnectionError.closed();
    }

    const pending: PendingReply = { reply: new Deferred<Message>(), timer: null };
    this.pendingReplies.push(pending);

    const timeoutMs = options.timeoutMs;
    if (timeoutMs !== undefined) {
      pending.timer = setTimeout(() => {
        this.dropReply(pending);
        pending.reply.reject(ConnectionError.timeout(`no reply within ${timeoutMs}ms`));
      }, timeoutMs);
    }

    const sent = this.send(message).catch((e: unknown) => {
      this.dropReply(pending);
      throw e;
    });
    const [, reply] = await Promise.all([sent, pending.reply.promise]);
    return reply;
  }

  /** Close the connection. Idempotent. */
  close(): void {
    this.finish({ reason: "local", peer: this.remote });
  }

  // ==========================================================================
  // Read loop
  // ==========================================================================

  private async run(): Promise<CloseEvent> {
    this.logger.debug("connection open");

    while (!this.isClosed) {
      this._state = "reading";

      let message: Message | null;
      try {
        message = await this.readFrame();
      } catch (e) {
        this.finish({ reason: "error", peer: this.remote, error: toConnectionFailure(e) });
        break;
      }

      if (message === null) {
        this.finish({ reason: "eof", peer: this.remote });
        break;
      }
      if (this.isClosed) break;

      this.received++;
      this._state = "dispatching";
      await this.dispatch(message);
    }

    return this.closedDeferred.promise;
  }

  private async readFrame(): Promise<Message | null> {
    const readOptions = { maxBodyLength: this.options.maxBodyLength };
    const timeoutMs = this.options.readTimeoutMs;
    if (timeoutMs === undefined) {
      return readMessage(this.source, readOptions);
    }

    const timer = setTimeout(() => {
      this.finish({
        reason: "error",
        peer: this.remote,
        error: ConnectionError.timeout(`no complete frame within ${timeoutMs}ms`),
      });
    }, timeoutMs);
    try {
      return await readMessage(this.source, readOptions);
    } finally {
      clearTimeout(timer);
    }
  }

  private async dispatch(message: Message): Promise<void> {
    const pending = this.pendingReplies.shift();
    if (pending) {
      if (pending.timer !== null) clearTimeout(pending.timer);
      pending.reply.resolve(message);
      return;
    }

    const onMessage = this.options.onMessage;
    if (!onMessage) {
      this.logger.debug("no message handler, ignoring {kind} message", {
        kind: kindName(message.kind),
      });
      return;
    }

    try {
      await onMessage(message, this.remote, this);
    } catch (e) {
      this.logger.warn("message handler failed: {error}", { error: e });
      try {
        this.options.onCallbackError?.(e, message, this.remote);
      } catch (hookError) {
        this.logger.error("onCallbackError hook failed: {error}", { error: hookError });
      }
    }
  }

  // ==========================================================================
  // Writing and teardown
  // ==========================================================================

  private async writeFrame(frame: Uint8Array): Promise<void> {
    if (this.isClosed) {
      throw ConnectionError.closed();
    }
    try {
      await this.source.write(frame);
    } catch (e) {
      const error = e instanceof ConnectionError ? e : ConnectionError.transport(e);
      this.finish({ reason: "error", peer: this.remote, error });
      throw error;
    }
    this.sent++;
  }

  private dropReply(pending: PendingReply): void {
    const index = this.pendingReplies.indexOf(pending);
    if (index >= 0) this.pendingReplies.splice(index, 1);
    if (pending.timer !== null) clearTimeout(pending.timer);
  }

  private finish(event: CloseEvent): void {
    if (this.closeEvent) return;
    this.closeEvent = event;
    this._state = "closed";
    this.source.close();

    const replyError = event.reason === "error" ? event.error : ConnectionError.closed();
    for (const pending of this.pendingReplies.splice(0)) {
      if (pending.timer !== null) clearTimeout(pending.timer);
      pending.reply.reject(replyError);
    }

    if (event.reason === "error") {
      const { error } = event;
      const kind = error instanceof ProtocolError ? error.code : error.kind;
      if (error instanceof ConnectionError && error.kind === "transport") {
        this.logger.error("connection failed ({kind}): {error}", { kind, error });
      } else {
        this.logger.warn("connection closed ({kind}): {error}", { kind, error });
      }
    } else {
      this.logger.debug("connection closed ({reason})", { reason: event.reason });
    }

    try {
      this.options.onClose?.(event);
    } catch (e) {
      this.logger.error("onClose hook failed: {error}", { error: e });
    }
    this.closedDeferred.resolve(event);
  }
}

function toConnectionFailure(e: unknown): ProtocolError | ConnectionError {
  if (e instanceof ProtocolError || e instanceof ConnectionError) return e;
  return ConnectionError.transport(e);
}
