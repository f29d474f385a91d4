// @ferry/tcp - TCP transport for ferry messaging (Node.js only)
//
// Provides socket-backed streams, the TCP acceptor, listen/connect entry
// points and the service registry.

export { SocketStream, dialTcp } from "./socket_stream.ts";
export { TcpAcceptor } from "./acceptor.ts";
export { listen, listenEndpoint, connect, connectEndpoint } from "./transport.ts";
export { ServiceRegistry, loadServiceRegistry, connectToService } from "./registry.ts";

// Re-export the connection runtime for convenience
export * from "@ferry/core";
