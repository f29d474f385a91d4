// In-process transport.
//
// Pairs of MemoryStreams behave like the two ends of a socket: bytes written
// on one end are read on the other, and closing either end ends both
// readers. Used by tests and by applications that want ferry semantics
// between components of one process.

import { ByteQueue } from "./byte_queue.ts";
import { ConnectionError } from "./errors.ts";
import type { Acceptor, Endpoint, StreamSource } from "./transport.ts";

/** One end of an in-memory pipe. */
export class MemoryStream implements StreamSource {
  private readonly incoming = new ByteQueue();
  private peer: MemoryStream | null = null;
  private closed = false;

  constructor(
    readonly local: Endpoint,
    readonly remote: Endpoint,
  ) {}

  /** Connect two streams back to back. */
  static link(a: MemoryStream, b: MemoryStream): void {
    a.peer = b;
    b.peer = a;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  readExactly(n: number): Promise<Uint8Array | null> {
    return this.incoming.readExactly(n);
  }

  async write(bytes: Uint8Array): Promise<void> {
    const peer = this.peer;
    if (this.closed || peer === null || peer.closed) {
      throw ConnectionError.transport(new Error("pipe closed"));
    }
    peer.incoming.push(bytes.slice());
  }

  /** Make bytes readable on this end as if the peer had written them. */
  inject(bytes: Uint8Array): void {
    this.incoming.push(bytes.slice());
  }

  /** End this end's reader as if the peer had gone away. */
  endInput(): void {
    this.incoming.end();
  }

  /** Fail this end's reader with a transport error. */
  failInput(cause: unknown): void {
    this.incoming.fail(ConnectionError.transport(cause));
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.incoming.end();
    this.peer?.incoming.end();
  }
}

/**
 * Create a connected pair of streams.
 *
 * @returns `[a, b]` where `a.remote` is `b.local` and vice versa
 */
export function createMemoryPipe(
  aEndpoint: Endpoint = { host: "memory", port: 1 },
  bEndpoint: Endpoint = { host: "memory", port: 2 },
): [MemoryStream, MemoryStream] {
  const a = new MemoryStream(aEndpoint, bEndpoint);
  const b = new MemoryStream(bEndpoint, aEndpoint);
  MemoryStream.link(a, b);
  return [a, b];
}

/**
 * In-memory acceptor. `dial()` plays the part of a connecting client.
 */
export class MemoryAcceptor implements Acceptor {
  private backlog: MemoryStream[] = [];
  private waiting: ((stream: StreamSource | null) => void) | null = null;
  private bound = false;
  private stopped = false;
  private nextClientPort = 49152;

  constructor(readonly endpoint: Endpoint = { host: "memory", port: 1 }) {}

  get isStopped(): boolean {
    return this.stopped;
  }

  async bind(): Promise<Endpoint> {
    if (this.stopped) {
      throw ConnectionError.shutdown();
    }
    this.bound = true;
    return this.endpoint;
  }

  accept(): Promise<StreamSource | null> {
    if (this.stopped) {
      return Promise.resolve(null);
    }
    const next = this.backlog.shift();
    if (next) {
      return Promise.resolve(next);
    }
    if (this.waiting) {
      return Promise.reject(new Error("MemoryAcceptor: accept already pending"));
    }
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  /**
   * Open a connection to this acceptor.
   *
   * @returns the client end; the server end is handed to `accept()`
   */
  async dial(): Promise<MemoryStream> {
    if (!this.bound || this.stopped) {
      throw ConnectionError.transport(new Error(`connection refused: memory:${this.endpoint.port}`));
    }
    const clientEndpoint = { host: "memory", port: this.nextClientPort++ };
    const [client, server] = createMemoryPipe(clientEndpoint, this.endpoint);

    const waiting = this.waiting;
    if (waiting) {
      this.waiting = null;
      waiting(server);
    } else {
      this.backlog.push(server);
    }
    return client;
  }

  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;

    const waiting = this.waiting;
    this.waiting = null;
    waiting?.(null);

    for (const stream of this.backlog.splice(0)) {
      stream.close();
    }
  }
}
