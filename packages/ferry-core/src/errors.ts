// Connection and configuration errors.

/** Kinds of connection failure. */
export type ConnectionErrorKind = "transport" | "timeout" | "closed" | "shutdown";

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/** Error during connection handling. */
export class ConnectionError extends Error {
  override readonly name = "ConnectionError";

  constructor(
    public readonly kind: ConnectionErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }

  /** I/O failure on the underlying stream. The connection is closed. */
  static transport(cause: unknown): ConnectionError {
    return new ConnectionError("transport", `transport error: ${describe(cause)}`, { cause });
  }

  static timeout(detail: string): ConnectionError {
    return new ConnectionError("timeout", `timed out: ${detail}`);
  }

  static closed(): ConnectionError {
    return new ConnectionError("closed", "connection closed");
  }

  static shutdown(): ConnectionError {
    return new ConnectionError("shutdown", "listener stopped");
  }
}

/** Invalid configuration. `issues` lists every problem found. */
export class ConfigError extends Error {
  override readonly name = "ConfigError";

  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}
