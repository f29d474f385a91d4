// Byte stream over a TCP socket.

import net from "node:net";
import { ByteQueue, ConnectionError, type Endpoint, type StreamSource } from "@ferry/core";

function endpointOf(address: string | undefined, port: number | undefined): Endpoint {
  return { host: address ?? "unknown", port: port ?? 0 };
}

/**
 * A connected TCP socket as a StreamSource.
 *
 * Socket data is buffered in a ByteQueue so reads can ask for exact byte
 * counts regardless of how the kernel splits segments.
 */
export class SocketStream implements StreamSource {
  readonly local: Endpoint;
  readonly remote: Endpoint;

  private readonly socket: net.Socket;
  private readonly incoming = new ByteQueue();

  constructor(socket: net.Socket) {
    this.socket = socket;
    this.local = endpointOf(socket.localAddress, socket.localPort);
    this.remote = endpointOf(socket.remoteAddress, socket.remotePort);

    socket.setNoDelay(true);

    socket.on("data", (chunk: Buffer) => {
      this.incoming.push(chunk);
    });

    socket.on("error", (err: Error) => {
      this.incoming.fail(ConnectionError.transport(err));
    });

    // "end" is the peer's FIN; "close" covers destroy() on either side.
    socket.on("end", () => {
      this.incoming.end();
    });
    socket.on("close", () => {
      this.incoming.end();
    });
  }

  readExactly(n: number): Promise<Uint8Array | null> {
    return this.incoming.readExactly(n);
  }

  write(bytes: Uint8Array): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.socket.destroyed || !this.socket.writable) {
        reject(ConnectionError.transport(new Error("socket is not writable")));
        return;
      }
      this.socket.write(bytes, (err) => {
        if (err) reject(ConnectionError.transport(err));
        else resolve();
      });
    });
  }

  close(): void {
    this.incoming.end();
    this.socket.destroy();
  }
}

/**
 * Open a TCP connection.
 *
 * @throws ConnectionError (`transport`) if the connection is refused or fails
 */
export function dialTcp(host: string, port: number): Promise<SocketStream> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ host, port });

    const onError = (err: Error) => {
      socket.destroy();
      reject(ConnectionError.transport(err));
    };
    socket.once("error", onError);

    socket.once("connect", () => {
      socket.off("error", onError);
      resolve(new SocketStream(socket));
    });
  });
}
