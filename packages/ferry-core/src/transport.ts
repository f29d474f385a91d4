/**
 * Stream transport capabilities.
 *
 * The connection handler and listener only talk to these interfaces, so any
 * byte stream can carry ferry frames.
 *
 * Implementations:
 * - MemoryStream / MemoryAcceptor (this package) for in-process pipes
 * - SocketStream / TcpAcceptor (@ferry/tcp) for TCP
 */

import type { ByteReader } from "@ferry/wire";

/** One side of a connection. */
export interface Endpoint {
  readonly host: string;
  readonly port: number;
}

/** Format an endpoint as `host:port`, bracketing IPv6 hosts. */
export function formatEndpoint(endpoint: Endpoint): string {
  const host = endpoint.host.includes(":") ? `[${endpoint.host}]` : endpoint.host;
  return `${host}:${endpoint.port}`;
}

/**
 * A bidirectional byte stream.
 *
 * `readExactly` (from ByteReader) must resolve `null` once the stream has
 * ended or been closed, including for a read that is already waiting.
 * Only one read is outstanding at a time.
 */
export interface StreamSource extends ByteReader {
  readonly local: Endpoint;
  readonly remote: Endpoint;

  /**
   * Write bytes. Resolves once the transport has taken them; rejects on an
   * I/O failure.
   */
  write(bytes: Uint8Array): Promise<void>;

  /** Close the stream. Idempotent. */
  close(): void;
}

/**
 * Source of inbound streams.
 */
export interface Acceptor {
  /** Bind and start listening. Resolves with the bound endpoint. */
  bind(): Promise<Endpoint>;

  /**
   * Wait for the next inbound stream.
   *
   * Resolves `null` once the acceptor is stopped, including for a call that
   * is already waiting. Rejects on an accept failure; later calls may still
   * succeed.
   */
  accept(): Promise<StreamSource | null>;

  /** Stop accepting and release the listening resource. Idempotent. */
  stop(): Promise<void>;
}
