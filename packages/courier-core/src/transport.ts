/**
 * Broker transport abstraction.
 *
 * This module defines the BrokerConnection interface the RPC client runs on.
 * It covers exactly what the client needs from an exchange/queue broker:
 * declarations, one consumer for the reply queue, and publish handles.
 *
 * Implementations:
 * - AmqpBroker (courier-amqp) over amqplib
 * - MemoryConnection (memory.ts) for in-process use and tests
 */

/** Properties carried next to a message body. */
export interface MessageProperties {
  correlationId?: string;
  replyTo?: string;
  contentType?: string;
  contentEncoding?: string;
  /** Ask the broker to write the message to disk (delivery mode 2). */
  persistent?: boolean;
}

/** A message delivered to a consumer. */
export interface IncomingMessage {
  body: Uint8Array;
  properties: MessageProperties;
}

/** Exchange declaration parameters. */
export interface ExchangeOptions {
  name: string;
  durable: boolean;
  autoDelete: boolean;
}

/**
 * A publish capability on the shared connection.
 *
 * A Producer is never used by two publishes at once; ProducerPool hands
 * each one out exclusively.
 */
export interface Producer {
  /**
   * Publish a message. Resolves once the broker has accepted it.
   */
  publish(
    exchange: string,
    routingKey: string,
    body: Uint8Array,
    properties: MessageProperties,
  ): Promise<void>;

  close(): Promise<void>;
}

/** Handle for an active subscription. */
export interface Consumer {
  cancel(): Promise<void>;
}

/**
 * Interface for brokers the RPC client can run on.
 */
export interface BrokerConnection {
  /**
   * Declare an exchange. Declaring it again with the same parameters is a
   * no-op.
   */
  declareExchange(options: ExchangeOptions): Promise<void>;

  /**
   * Declare a private reply queue: non-durable, exclusive to this
   * connection, deleted when the connection goes away, and bound to
   * `exchange` under a routing key equal to its own name.
   */
  declareReplyQueue(name: string, exchange: string): Promise<void>;

  /**
   * Subscribe to a queue. Resolves once the subscription is active.
   */
  consume(queue: string, onMessage: (message: IncomingMessage) => void): Promise<Consumer>;

  /**
   * Open a new publish handle on this connection.
   */
  openProducer(): Promise<Producer>;

  /**
   * Close the connection.
   */
  close(): Promise<void>;
}
