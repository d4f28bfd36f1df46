// @courier/courier-amqp - AMQP transport for courier RPC clients (Node.js only)
//
// Provides the amqplib-backed broker connection and a one-call client setup.

export {
  AmqpBroker,
  amqpUrl,
  connectAmqp,
  type AmqpChannel,
  type AmqpConfirmChannel,
  type AmqpConnection,
  type AmqpDelivery,
  type AmqpPublishOptions,
  type ConnectOptions,
} from "./transport.ts";
export { createAmqpRpcClient, type AmqpRpcClientOptions } from "./client.ts";

// Re-export the client surface from core for convenience
export {
  RpcClient,
  type RpcClientOptions,
  type RpcClientConfig,
  resolveConfig,
  configFromEnv,
  ConfigError,
  ConnectionError,
  PublishError,
  RpcTimeoutError,
  RemoteError,
  DecodeError,
  loggingMiddleware,
  createLogger,
  type CallContext,
  type ClientMiddleware,
} from "@courier/courier-core";
