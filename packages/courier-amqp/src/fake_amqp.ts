// In-process stand-ins for amqplib connections and channels, for tests.

import { EventEmitter } from "node:events";
import type {
  AmqpChannel,
  AmqpConfirmChannel,
  AmqpConnection,
  AmqpDelivery,
  AmqpPublishOptions,
} from "./transport.ts";

export interface FakePublish {
  exchange: string;
  routingKey: string;
  content: Buffer;
  options: AmqpPublishOptions;
}

export class FakeChannel extends EventEmitter implements AmqpChannel {
  readonly exchanges: Array<{ name: string; type: string; durable: boolean; autoDelete: boolean }> =
    [];
  readonly queues: Array<{ name: string; durable: boolean; exclusive: boolean; autoDelete: boolean }> =
    [];
  readonly bindings: Array<{ queue: string; source: string; pattern: string }> = [];
  readonly consumers = new Map<string, (msg: AmqpDelivery | null) => void>();
  readonly cancelled: string[] = [];
  /** Set to make the next queue declaration fail. */
  failAssertQueue: Error | null = null;
  closed = false;

  async assertExchange(
    exchange: string,
    type: "direct",
    options: { durable: boolean; autoDelete: boolean },
  ): Promise<unknown> {
    this.exchanges.push({ name: exchange, type, ...options });
    return { exchange };
  }

  async assertQueue(
    queue: string,
    options: { durable: boolean; exclusive: boolean; autoDelete: boolean },
  ): Promise<unknown> {
    if (this.failAssertQueue) throw this.failAssertQueue;
    this.queues.push({ name: queue, ...options });
    return { queue, messageCount: 0, consumerCount: 0 };
  }

  async bindQueue(queue: string, source: string, pattern: string): Promise<unknown> {
    this.bindings.push({ queue, source, pattern });
    return {};
  }

  async consume(
    queue: string,
    onMessage: (msg: AmqpDelivery | null) => void,
    options: { noAck: boolean },
  ): Promise<{ consumerTag: string }> {
    if (!options.noAck) throw new Error("fake channel only supports noAck consumers");
    const consumerTag = `ctag-${queue}`;
    this.consumers.set(consumerTag, onMessage);
    return { consumerTag };
  }

  async cancel(consumerTag: string): Promise<unknown> {
    this.consumers.delete(consumerTag);
    this.cancelled.push(consumerTag);
    return {};
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /** Deliver a message to every consumer. */
  deliver(msg: AmqpDelivery | null): void {
    for (const handler of this.consumers.values()) {
      handler(msg);
    }
  }
}

export class FakeConfirmChannel extends EventEmitter implements AmqpConfirmChannel {
  readonly published: FakePublish[] = [];
  /** Passed to the confirm callback of the next publish; null acks. */
  nextConfirm: unknown = null;
  /** Called after each acked publish. */
  onPublish: ((publish: FakePublish) => void) | null = null;
  closed = false;

  publish(
    exchange: string,
    routingKey: string,
    content: Buffer,
    options: AmqpPublishOptions,
    callback: (err: unknown) => void,
  ): boolean {
    const publish = { exchange, routingKey, content, options };
    this.published.push(publish);
    const confirm = this.nextConfirm;
    this.nextConfirm = null;
    queueMicrotask(() => {
      callback(confirm);
      if (confirm === null) this.onPublish?.(publish);
    });
    return true;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class FakeConnection extends EventEmitter implements AmqpConnection {
  readonly channels: FakeChannel[] = [];
  readonly confirmChannels: FakeConfirmChannel[] = [];
  /** Applied to every channel this connection opens. */
  prepareChannel: ((channel: FakeChannel) => void) | null = null;
  prepareConfirmChannel: ((channel: FakeConfirmChannel) => void) | null = null;
  closed = false;

  async createChannel(): Promise<AmqpChannel> {
    const channel = new FakeChannel();
    this.prepareChannel?.(channel);
    this.channels.push(channel);
    return channel;
  }

  async createConfirmChannel(): Promise<AmqpConfirmChannel> {
    const channel = new FakeConfirmChannel();
    this.prepareConfirmChannel?.(channel);
    this.confirmChannels.push(channel);
    return channel;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.emit("close");
  }
}
