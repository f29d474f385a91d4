// Accept loop and connection tracking for the server role.

import { getLogger, type Logger } from "@logtape/logtape";
import {
  ConnectionHandler,
  type CloseEvent,
  type ConnectionOptions,
  type MessageHandler,
} from "./connection.ts";
import { delay } from "./deferred.ts";
import { ConnectionError } from "./errors.ts";
import { formatEndpoint, type Acceptor, type Endpoint, type StreamSource } from "./transport.ts";

/** Options for a listener. Connection options apply to every accepted connection. */
export interface ListenerOptions extends Omit<ConnectionOptions, "onMessage"> {
  /** Called for each accept failure. The listener keeps accepting. */
  onAcceptError?: (error: unknown) => void;

  /** Called for each accepted connection, before its read loop starts. */
  onConnection?: (connection: ConnectionHandler) => void;

  /** Pause after an accept failure, in milliseconds. Default: 10 */
  acceptBackoffMs?: number;
}

/** Default listener options. */
export function defaultListenerOptions(): Required<Pick<ListenerOptions, "acceptBackoffMs">> {
  return {
    acceptBackoffMs: 10,
  };
}

/**
 * Accepts inbound streams and runs one ConnectionHandler per stream.
 */
export class Listener {
  private readonly acceptor: Acceptor;
  private readonly onMessage: MessageHandler;
  private readonly options: ListenerOptions & Required<Pick<ListenerOptions, "acceptBackoffMs">>;
  private readonly rootLogger: Logger;
  private readonly logger: Logger;
  private readonly live = new Set<ConnectionHandler>();
  private bound: Endpoint | null = null;
  private acceptLoop: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;

  constructor(acceptor: Acceptor, onMessage: MessageHandler, options: ListenerOptions = {}) {
    this.acceptor = acceptor;
    this.onMessage = onMessage;
    this.options = { ...defaultListenerOptions(), ...options };
    this.rootLogger = options.logger ?? getLogger(["ferry"]);
    this.logger = this.rootLogger.getChild("listener");
  }

  /** The bound endpoint, or null before `start()` resolves. */
  get endpoint(): Endpoint | null {
    return this.bound;
  }

  /** Connections currently open. */
  get connections(): ReadonlySet<ConnectionHandler> {
    return this.live;
  }

  get isStopped(): boolean {
    return this.stopping !== null;
  }

  /**
   * Bind and start accepting in the background.
   *
   * @returns the bound endpoint
   * @throws ConnectionError (`shutdown`) after `stop()`
   */
  async start(): Promise<Endpoint> {
    if (this.isStopped) {
      throw ConnectionError.shutdown();
    }
    if (this.bound) {
      return this.bound;
    }
    const endpoint = await this.acceptor.bind();
    if (this.isStopped) {
      throw ConnectionError.shutdown();
    }
    this.bound = endpoint;
    this.logger.info("listening on {endpoint}", { endpoint: formatEndpoint(endpoint) });
    this.acceptLoop = this.runAcceptLoop();
    return endpoint;
  }

  /**
   * Stop accepting and close every open connection.
   *
   * Resolves once the accept loop and all connection read loops have ended.
   * A read loop ends only after its in-flight `onMessage` call settles, so a
   * handler that never settles keeps `stop()` pending. A `start()` still
   * binding when `stop()` runs rejects with a `shutdown` error.
   * Idempotent; concurrent callers share one shutdown.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    this.logger.debug("stopping");
    await this.acceptor.stop();
    await this.acceptLoop;

    const open = [...this.live];
    for (const connection of open) {
      connection.close();
    }
    await Promise.all(open.map((connection) => connection.start()));
    this.logger.info("stopped");
  }

  private async runAcceptLoop(): Promise<void> {
    while (!this.isStopped) {
      let source: StreamSource | null;
      try {
        source = await this.acceptor.accept();
      } catch (e) {
        if (this.isStopped) break;
        this.reportAcceptError(e);
        await delay(this.options.acceptBackoffMs);
        continue;
      }

      if (source === null) break;
      if (this.isStopped) {
        source.close();
        break;
      }
      this.spawn(source);
    }
  }

  private reportAcceptError(error: unknown): void {
    this.logger.warn("accept failed: {error}", { error });
    try {
      this.options.onAcceptError?.(error);
    } catch (hookError) {
      this.logger.error("onAcceptError hook failed: {error}", { error: hookError });
    }
  }

  private spawn(source: StreamSource): void {
    const { onConnection, onClose } = this.options;
    const connection = new ConnectionHandler(source, "inbound", {
      readTimeoutMs: this.options.readTimeoutMs,
      maxBodyLength: this.options.maxBodyLength,
      onCallbackError: this.options.onCallbackError,
      logger: this.rootLogger,
      onMessage: this.onMessage,
      onClose: (event: CloseEvent) => {
        this.live.delete(connection);
        onClose?.(event);
      },
    });

    this.live.add(connection);
    this.logger.debug("accepted {peer}", { peer: formatEndpoint(source.remote) });
    try {
      onConnection?.(connection);
    } catch (e) {
      this.logger.error("onConnection hook failed: {error}", { error: e });
    }

    connection.start().catch((e: unknown) => {
      this.logger.error("read loop for {peer} failed: {error}", {
        peer: formatEndpoint(source.remote),
        error: e,
      });
    });
  }
}
