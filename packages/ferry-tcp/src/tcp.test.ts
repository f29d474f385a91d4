// End-to-end tests over loopback TCP.

import { afterEach, describe, expect, it, vi } from "vitest";
import {
  ConfigError,
  ConnectionError,
  MessageKind,
  ProtocolError,
  messagesEqual,
  newKeyValueMessage,
  newRawMessage,
  type CloseEvent,
  type ConnectionHandler,
  Listener,
  type Message,
} from "@ferry/core";

import { TcpAcceptor } from "./acceptor.ts";
import { dialTcp, type SocketStream } from "./socket_stream.ts";
import { connect, connectEndpoint, listen, listenEndpoint } from "./transport.ts";

const HOST = "127.0.0.1";

const listeners: Listener[] = [];
const clients: ConnectionHandler[] = [];
const streams: SocketStream[] = [];

async function startServer(
  onMessage: (message: Message, connection: ConnectionHandler) => void | Promise<void> = () => {},
  onClose?: (event: CloseEvent) => void,
): Promise<{ listener: Listener; port: number }> {
  const listener = await listen(HOST, 0, (message, _peer, connection) => onMessage(message, connection), {
    onClose,
  });
  listeners.push(listener);
  const endpoint = listener.endpoint;
  if (!endpoint) throw new Error("listener did not bind");
  return { listener, port: endpoint.port };
}

async function openClient(port: number, onMessage?: (message: Message) => void): Promise<ConnectionHandler> {
  const client = await connect(HOST, port, { onMessage });
  clients.push(client);
  return client;
}

afterEach(async () => {
  for (const client of clients.splice(0)) client.close();
  for (const stream of streams.splice(0)) stream.close();
  await Promise.all(listeners.splice(0).map((listener) => listener.stop()));
});

describe("TCP transport", () => {
  it("binds an ephemeral port on loopback", async () => {
    const { listener, port } = await startServer();
    expect(port).toBeGreaterThan(0);
    expect(listener.endpoint).toEqual({ host: HOST, port });
  });

  it("delivers a key/value message", async () => {
    const received: Message[] = [];
    const { port } = await startServer((message) => {
      received.push(message);
    });

    const client = await openClient(port);
    await client.send(newKeyValueMessage({ user: "alice", action: "login" }));

    await vi.waitFor(() => expect(received).toHaveLength(1));
    expect(received[0].kind).toBe(MessageKind.KeyValue);
    expect(messagesEqual(received[0], newKeyValueMessage({ user: "alice", action: "login" }))).toBe(true);
  });

  it("delivers a raw string message", async () => {
    const received: Message[] = [];
    const { port } = await startServer((message) => {
      received.push(message);
    });

    const client = await openClient(port);
    await client.send(newRawMessage("<xml>ok</xml>"));

    await vi.waitFor(() => expect(received).toHaveLength(1));
    expect(received[0]).toEqual({ kind: MessageKind.RawString, payload: "<xml>ok</xml>" });
  });

  it("reports the peer address to the handler", async () => {
    const peers: string[] = [];
    const listener = await listen(HOST, 0, (_message, peer) => {
      peers.push(peer.host);
    });
    listeners.push(listener);
    const endpoint = listener.endpoint;
    if (!endpoint) throw new Error("listener did not bind");

    const client = await openClient(endpoint.port);
    await client.send(newRawMessage("who am i"));

    await vi.waitFor(() => expect(peers).toHaveLength(1));
    expect(peers[0]).toBe(HOST);
    expect(client.remote).toEqual({ host: HOST, port: endpoint.port });
  });

  it("keeps per-connection order", async () => {
    const received: string[] = [];
    const { port } = await startServer((message) => {
      received.push(String(message.payload));
    });

    const client = await openClient(port);
    const expected = Array.from({ length: 200 }, (_, i) => `message ${i}`);
    await Promise.all(expected.map((text) => client.send(newRawMessage(text))));

    await vi.waitFor(() => expect(received).toHaveLength(200));
    expect(received).toEqual(expected);
  });

  it("carries a value at the field size limit", async () => {
    const received: Message[] = [];
    const { port } = await startServer((message) => {
      received.push(message);
    });
    const big = "x".repeat(65535);

    const client = await openClient(port);
    await client.send(newKeyValueMessage({ blob: big }));

    await vi.waitFor(() => expect(received).toHaveLength(1));
    expect(messagesEqual(received[0], newKeyValueMessage({ blob: big }))).toBe(true);
  });

  it("answers requests", async () => {
    const { port } = await startServer(async (message, connection) => {
      if (message.kind === MessageKind.RawString) {
        await connection.send(newRawMessage(message.payload.toUpperCase()));
      }
    });

    const client = await openClient(port);
    const reply = await client.request(newRawMessage("ping"), { timeoutMs: 2000 });

    expect(reply).toEqual({ kind: MessageKind.RawString, payload: "PING" });
  });

  it("closes a connection that sends an unknown kind", async () => {
    const onClose = vi.fn<(event: CloseEvent) => void>();
    const { port } = await startServer(() => {}, onClose);

    const stream = await dialTcp(HOST, port);
    streams.push(stream);
    await stream.write(Uint8Array.from([9, 0, 0, 0, 0]));

    await vi.waitFor(() => expect(onClose).toHaveBeenCalledTimes(1));
    const event = onClose.mock.calls[0][0];
    expect(event.reason).toBe("error");
    if (event.reason === "error") {
      expect(event.error).toBeInstanceOf(ProtocolError);
      expect(event.error.message).toBe("unknown message kind tag: 9");
    }
    expect(await stream.readExactly(1)).toBeNull();
  });

  it("applies the configured read timeout to accepted connections", async () => {
    const listener = await listenEndpoint({ host: HOST, port: 0, readTimeoutMs: 50 }, () => {});
    listeners.push(listener);
    const endpoint = listener.endpoint;
    if (!endpoint) throw new Error("listener did not bind");

    const client = await connectEndpoint({ host: HOST, port: endpoint.port });
    clients.push(client);

    expect(await client.closed).toEqual({ reason: "eof", peer: { host: HOST, port: endpoint.port } });
  });

  describe("errors", () => {
    it("rejects a connection to a closed port", async () => {
      const { listener, port } = await startServer();
      await listener.stop();

      const err = await connect(HOST, port).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ConnectionError);
      expect(err).toMatchObject({ kind: "transport" });
    });

    it("rejects a port that is already bound", async () => {
      const { port } = await startServer();

      const err = await listen(HOST, port, () => {}).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ConnectionError);
      expect(err).toMatchObject({ kind: "transport" });
    });

    it("validates endpoints before touching the network", async () => {
      await expect(connect(HOST, 0)).rejects.toBeInstanceOf(ConfigError);
      await expect(connect("", 6789)).rejects.toBeInstanceOf(ConfigError);
      await expect(listen(HOST, 70000, () => {})).rejects.toBeInstanceOf(ConfigError);
    });
  });

  describe("stop", () => {
    it("closes the port when it runs while the bind is in flight", async () => {
      const { listener: earlier, port } = await startServer();
      await earlier.stop();

      const listener = new Listener(new TcpAcceptor(HOST, port), () => {});
      const starting = listener.start().catch((e: unknown) => e);
      await listener.stop();

      const result = await starting;
      expect(result).toBeInstanceOf(ConnectionError);
      expect(result).toMatchObject({ kind: "shutdown", message: "listener stopped" });
      expect(listener.endpoint).toBeNull();
      await expect(dialTcp(HOST, port)).rejects.toMatchObject({ kind: "transport" });
    });

    it("releases a blocked accept promptly", async () => {
      const { listener } = await startServer();

      const started = Date.now();
      await listener.stop();

      expect(Date.now() - started).toBeLessThan(1000);
      expect(listener.isStopped).toBe(true);
    });

    it("disconnects open clients", async () => {
      const { listener, port } = await startServer();
      const client = await openClient(port);
      await vi.waitFor(() => expect(listener.connections.size).toBe(1));

      await listener.stop();

      expect(listener.connections.size).toBe(0);
      expect(await client.closed).toEqual({ reason: "eof", peer: { host: HOST, port } });
    });
  });
});
