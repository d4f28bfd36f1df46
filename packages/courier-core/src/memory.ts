// In-process broker.
//
// Implements exchange/queue/routing-key delivery inside one process so the
// client can run without a broker server (tests, local tooling). Direct
// exchanges only; the "" exchange routes to the queue named by the routing
// key. Deliveries are asynchronous, like a real broker's.

import { ConnectionError } from "./errors.ts";
import type {
  BrokerConnection,
  Consumer,
  ExchangeOptions,
  IncomingMessage,
  MessageProperties,
  Producer,
} from "./transport.ts";

/** Options for declaring a queue on a MemoryBroker. */
export interface QueueOptions {
  durable?: boolean;
  exclusive?: boolean;
  autoDelete?: boolean;
}

/** A message as it was handed to the broker. */
export interface PublishedMessage {
  exchange: string;
  routingKey: string;
  body: Uint8Array;
  properties: MessageProperties;
}

type Handler = (message: IncomingMessage) => void;

interface MemoryQueue {
  options: Required<QueueOptions>;
  owner: MemoryConnection | null;
  backlog: IncomingMessage[];
  consumers: Handler[];
  next: number;
}

/**
 * Broker state shared by every connection opened on it.
 */
export class MemoryBroker {
  private exchanges = new Map<string, ExchangeOptions>();
  private queues = new Map<string, MemoryQueue>();
  /** exchange -> routing key -> queue names */
  private bindings = new Map<string, Map<string, Set<string>>>();

  /** Every message published, in order. */
  readonly published: PublishedMessage[] = [];

  /** Open a connection to this broker. */
  connect(): MemoryConnection {
    return new MemoryConnection(this);
  }

  declareExchange(options: ExchangeOptions): void {
    const existing = this.exchanges.get(options.name);
    if (existing) {
      if (existing.durable !== options.durable || existing.autoDelete !== options.autoDelete) {
        throw new Error(`exchange ${options.name} redeclared with different parameters`);
      }
      return;
    }
    this.exchanges.set(options.name, { ...options });
  }

  hasExchange(name: string): boolean {
    return this.exchanges.has(name);
  }

  declareQueue(name: string, options: QueueOptions = {}, owner: MemoryConnection | null = null): void {
    const existing = this.queues.get(name);
    if (existing) {
      if (existing.options.exclusive && existing.owner !== owner) {
        throw new Error(`queue ${name} is exclusive to another connection`);
      }
      return;
    }
    this.queues.set(name, {
      options: {
        durable: options.durable ?? false,
        exclusive: options.exclusive ?? false,
        autoDelete: options.autoDelete ?? false,
      },
      owner,
      backlog: [],
      consumers: [],
      next: 0,
    });
  }

  hasQueue(name: string): boolean {
    return this.queues.has(name);
  }

  /** Messages waiting in a queue with no consumer. */
  backlog(name: string): number {
    return this.queues.get(name)?.backlog.length ?? 0;
  }

  bindQueue(queue: string, exchange: string, routingKey: string): void {
    if (!this.queues.has(queue)) {
      throw new Error(`no queue ${queue}`);
    }
    if (!this.exchanges.has(exchange)) {
      throw new Error(`no exchange ${exchange}`);
    }
    let byKey = this.bindings.get(exchange);
    if (!byKey) {
      byKey = new Map();
      this.bindings.set(exchange, byKey);
    }
    let queues = byKey.get(routingKey);
    if (!queues) {
      queues = new Set();
      byKey.set(routingKey, queues);
    }
    queues.add(queue);
  }

  deleteQueue(name: string): void {
    this.queues.delete(name);
    for (const byKey of this.bindings.values()) {
      for (const queues of byKey.values()) {
        queues.delete(name);
      }
    }
  }

  /**
   * Route a message. Unroutable messages are dropped, as a broker does for
   * non-mandatory publishes.
   *
   * @throws Error if the exchange does not exist
   */
  publish(exchange: string, routingKey: string, body: Uint8Array, properties: MessageProperties): void {
    this.published.push({ exchange, routingKey, body, properties });

    let targets: Iterable<string>;
    if (exchange === "") {
      targets = [routingKey];
    } else {
      if (!this.exchanges.has(exchange)) {
        throw new Error(`no exchange ${exchange}`);
      }
      targets = this.bindings.get(exchange)?.get(routingKey) ?? [];
    }

    for (const name of targets) {
      const queue = this.queues.get(name);
      if (queue) {
        this.enqueue(queue, { body, properties: { ...properties } });
      }
    }
  }

  /**
   * Attach a consumer. Backlogged messages are delivered to it.
   */
  subscribe(name: string, handler: Handler): () => void {
    const queue = this.queues.get(name);
    if (!queue) {
      throw new Error(`no queue ${name}`);
    }
    queue.consumers.push(handler);
    for (const message of queue.backlog.splice(0)) {
      this.enqueue(queue, message);
    }
    return () => {
      queue.consumers = queue.consumers.filter((h) => h !== handler);
      if (queue.consumers.length === 0 && queue.options.autoDelete) {
        this.deleteQueue(name);
      }
    };
  }

  /** Called when a connection closes: its exclusive queues go away. */
  release(owner: MemoryConnection): void {
    for (const [name, queue] of [...this.queues]) {
      if (queue.owner === owner && queue.options.exclusive) {
        this.deleteQueue(name);
      }
    }
  }

  private enqueue(queue: MemoryQueue, message: IncomingMessage): void {
    if (queue.consumers.length === 0) {
      queue.backlog.push(message);
      return;
    }
    const handler = queue.consumers[queue.next % queue.consumers.length];
    queue.next++;
    queueMicrotask(() => handler(message));
  }
}

class MemoryProducer implements Producer {
  private closed = false;

  constructor(private readonly connection: MemoryConnection) {}

  async publish(
    exchange: string,
    routingKey: string,
    body: Uint8Array,
    properties: MessageProperties,
  ): Promise<void> {
    if (this.closed) {
      throw new Error("producer closed");
    }
    this.connection.broker(exchange).publish(exchange, routingKey, body, properties);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/**
 * A connection to a MemoryBroker, implementing BrokerConnection.
 */
export class MemoryConnection implements BrokerConnection {
  private closed = false;
  private cancels = new Set<() => void>();
  /** Number of producers opened on this connection. */
  producersOpened = 0;

  constructor(private readonly state: MemoryBroker) {}

  /** Broker state, or ConnectionError once closed. */
  broker(context: string): MemoryBroker {
    if (this.closed) {
      throw new ConnectionError("closed", `connection closed (${context})`);
    }
    return this.state;
  }

  async declareExchange(options: ExchangeOptions): Promise<void> {
    this.broker(options.name).declareExchange(options);
  }

  async declareReplyQueue(name: string, exchange: string): Promise<void> {
    const broker = this.broker(name);
    broker.declareQueue(name, { durable: false, exclusive: true, autoDelete: true }, this);
    if (exchange !== "") {
      broker.bindQueue(name, exchange, name);
    }
  }

  async consume(queue: string, onMessage: (message: IncomingMessage) => void): Promise<Consumer> {
    const unsubscribe = this.broker(queue).subscribe(queue, onMessage);
    this.cancels.add(unsubscribe);
    return {
      cancel: async () => {
        if (this.cancels.delete(unsubscribe)) {
          unsubscribe();
        }
      },
    };
  }

  async openProducer(): Promise<Producer> {
    this.broker("producer");
    this.producersOpened++;
    return new MemoryProducer(this);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    for (const cancel of this.cancels) {
      cancel();
    }
    this.cancels.clear();
    this.state.release(this);
    this.closed = true;
  }
}
