// @courier/courier-core - broker-backed RPC client
// This package provides the client, its reply routing and the broker
// abstraction it runs on.

// Envelope and remote error types (for client-side error handling)
export {
  RemoteError,
  DecodeError,
  type CallContext,
  type RemoteErrorDescriptor,
  type RequestEnvelope,
  type ResponseEnvelope,
} from "@courier/courier-wire";

// Client
export { RpcClient, type RpcClientOptions } from "./client.ts";

// Errors
export { ConnectionError, PublishError, RpcTimeoutError, errorMessage } from "./errors.ts";

// Reply routing
export { ResponseListener } from "./listener.ts";
export {
  CallRegistry,
  PendingCall,
  type PendingCallState,
  type ResponseOutcome,
} from "./registry.ts";

// Publish handles
export { ProducerPool } from "./producer_pool.ts";

// Broker abstraction
export type {
  BrokerConnection,
  Consumer,
  ExchangeOptions,
  IncomingMessage,
  MessageProperties,
  Producer,
} from "./transport.ts";

// In-process broker
export {
  MemoryBroker,
  MemoryConnection,
  type QueueOptions,
  type PublishedMessage,
} from "./memory.ts";

// Configuration
export {
  DEFAULT_CONFIG,
  MAX_TIMEOUT_SECONDS,
  ConfigError,
  resolveConfig,
  configFromEnv,
  type RpcClientConfig,
} from "./config.ts";

// Logging
export {
  createLogger,
  isEnabled,
  nullSink,
  type Logger,
  type LoggerOptions,
  type LogSink,
  type LogFields,
} from "./logger.ts";
export { loggingMiddleware, type LoggingOptions } from "./logging.ts";

// Client middleware types
export {
  type ClientContext,
  type CallRequest,
  type CallOutcome,
  type Rejection,
  RejectionError,
  type ClientMiddleware,
} from "./middleware.ts";
