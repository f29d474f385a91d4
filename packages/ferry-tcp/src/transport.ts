// TCP entry points: listen for inbound connections, connect outbound.

import { getLogger } from "@logtape/logtape";
import {
  ConnectionHandler,
  formatEndpoint,
  Listener,
  parseEndpointConfig,
  parseListenConfig,
  type ConnectionOptions,
  type EndpointConfig,
  type ListenConfig,
  type ListenerOptions,
  type MessageHandler,
} from "@ferry/core";
import { TcpAcceptor } from "./acceptor.ts";
import { dialTcp } from "./socket_stream.ts";

const logger = getLogger(["ferry", "tcp"]);

/**
 * Listen on `host:port` and call `onMessage` for every decoded message.
 *
 * Resolves once the port is bound. Port 0 picks a free port; read it back
 * from `listener.endpoint`.
 *
 * @throws ConfigError if the host or port is invalid
 * @throws ConnectionError (`transport`) if the port cannot be bound
 */
export function listen(
  host: string,
  port: number,
  onMessage: MessageHandler,
  options: ListenerOptions = {},
): Promise<Listener> {
  return listenEndpoint({ host, port }, onMessage, options);
}

/**
 * Like {@link listen}, taking a listen configuration. The configuration's
 * read timeout applies unless `options` sets one.
 */
export async function listenEndpoint(
  config: ListenConfig,
  onMessage: MessageHandler,
  options: ListenerOptions = {},
): Promise<Listener> {
  const { host, port, readTimeoutMs } = parseListenConfig(config);
  const listener = new Listener(new TcpAcceptor(host, port), onMessage, {
    ...options,
    readTimeoutMs: options.readTimeoutMs ?? readTimeoutMs,
  });
  await listener.start();
  return listener;
}

/**
 * Connect to `host:port`.
 *
 * The returned connection is already reading; inbound messages go to
 * `options.onMessage` or complete pending `request()` calls.
 *
 * @throws ConfigError if the host or port is invalid
 * @throws ConnectionError (`transport`) if the connection cannot be opened
 */
export function connect(
  host: string,
  port: number,
  options: ConnectionOptions = {},
): Promise<ConnectionHandler> {
  return connectEndpoint({ host, port }, options);
}

/**
 * Like {@link connect}, taking an endpoint configuration. The configuration's
 * read timeout applies unless `options` sets one.
 */
export async function connectEndpoint(
  config: EndpointConfig,
  options: ConnectionOptions = {},
): Promise<ConnectionHandler> {
  const { host, port, readTimeoutMs } = parseEndpointConfig(config);
  const stream = await dialTcp(host, port);
  logger.debug("connected to {peer}", { peer: formatEndpoint(stream.remote) });

  const connection = new ConnectionHandler(stream, "outbound", {
    ...options,
    readTimeoutMs: options.readTimeoutMs ?? readTimeoutMs,
  });
  connection.start().catch((e: unknown) => {
    logger.error("read loop for {peer} failed: {error}", {
      peer: formatEndpoint(stream.remote),
      error: e,
    });
  });
  return connection;
}
