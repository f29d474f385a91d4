// @ferry/core - connection runtime for ferry messaging
//
// Transport-independent pieces: capability interfaces, the per-connection
// state machine, the accept loop, configuration, and an in-memory transport.

// Wire protocol, re-exported for convenience
export * from "@ferry/wire";

// Transport abstraction
export {
  formatEndpoint,
  type Endpoint,
  type StreamSource,
  type Acceptor,
} from "./transport.ts";
export { ByteQueue } from "./byte_queue.ts";

// Connection handling
export {
  ConnectionHandler,
  type ConnectionState,
  type ConnectionOptions,
  type CloseEvent,
  type Direction,
  type MessageHandler,
  type RequestOptions,
} from "./connection.ts";
export { Listener, defaultListenerOptions, type ListenerOptions } from "./listener.ts";

// Errors
export { ConnectionError, ConfigError, type ConnectionErrorKind } from "./errors.ts";

// Configuration
export {
  EndpointConfigSchema,
  ListenConfigSchema,
  parseEndpointConfig,
  parseListenConfig,
  formatIssues,
  type EndpointConfig,
  type ListenConfig,
} from "./config.ts";

// In-memory transport
export { MemoryStream, MemoryAcceptor, createMemoryPipe } from "./memory.ts";

// Utilities
export { Deferred, delay } from "./deferred.ts";
