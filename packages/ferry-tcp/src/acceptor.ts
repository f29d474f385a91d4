// TCP acceptor built on net.Server.

import net from "node:net";
import { getLogger } from "@logtape/logtape";
import { ConnectionError, type Acceptor, type Endpoint, type StreamSource } from "@ferry/core";
import { SocketStream } from "./socket_stream.ts";

const logger = getLogger(["ferry", "tcp"]);

/**
 * Accepts TCP connections on one host and port.
 *
 * Sockets that arrive while nobody is waiting in `accept()` are queued.
 * Port 0 binds an ephemeral port; `bind()` reports the one chosen.
 */
export class TcpAcceptor implements Acceptor {
  private readonly host: string;
  private readonly port: number;
  private server: net.Server | null = null;
  private backlog: SocketStream[] = [];
  private waiting: ((stream: StreamSource | null) => void) | null = null;
  private stopped = false;

  constructor(host: string, port: number) {
    this.host = host;
    this.port = port;
  }

  bind(): Promise<Endpoint> {
    if (this.stopped) {
      return Promise.reject(ConnectionError.shutdown());
    }
    return new Promise((resolve, reject) => {
      const server = net.createServer((socket) => this.onSocket(socket));

      const onError = (err: Error) => {
        reject(ConnectionError.transport(err));
      };
      server.once("error", onError);

      server.listen(this.port, this.host, () => {
        server.off("error", onError);
        if (this.stopped) {
          // stop() ran while the bind was in flight.
          server.close();
          reject(ConnectionError.shutdown());
          return;
        }
        server.on("error", (err: Error) => {
          logger.error("server error: {error}", { error: err });
        });
        this.server = server;
        const address = server.address();
        if (address === null || typeof address === "string") {
          resolve({ host: this.host, port: this.port });
        } else {
          resolve({ host: address.address, port: address.port });
        }
      });
    });
  }

  accept(): Promise<StreamSource | null> {
    if (this.stopped) {
      return Promise.resolve(null);
    }
    const stream = this.backlog.shift();
    if (stream) {
      return Promise.resolve(stream);
    }
    if (this.waiting) {
      return Promise.reject(new Error("TcpAcceptor: accept already pending"));
    }
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
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

    // Accepting stops immediately; the callback only fires once accepted
    // sockets have ended.
    this.server?.close((err) => {
      if (err) logger.debug("server close: {error}", { error: err });
    });
    this.server = null;
  }

  private onSocket(socket: net.Socket): void {
    if (this.stopped) {
      socket.destroy();
      return;
    }
    const stream = new SocketStream(socket);
    const waiting = this.waiting;
    if (waiting) {
      this.waiting = null;
      waiting(stream);
    } else {
      this.backlog.push(stream);
    }
  }
}
