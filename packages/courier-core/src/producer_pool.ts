// Bounded pool of publish handles.
//
// The shared broker connection is not safe for uncoordinated concurrent
// publishing, so every publish borrows a Producer exclusively. At most
// `size` producers exist at once; further acquirers wait in FIFO order.

import { ConnectionError, errorMessage } from "./errors.ts";
import type { Logger } from "./logger.ts";
import type { Producer } from "./transport.ts";

interface Waiter {
  resolve: (producer: Producer) => void;
  reject: (error: Error) => void;
}

export class ProducerPool {
  private idle: Producer[] = [];
  private waiters: Waiter[] = [];
  /** Producers currently open, idle or lent out. */
  private live = 0;
  private closed = false;

  constructor(
    private readonly factory: () => Promise<Producer>,
    readonly size: number,
    private readonly logger: Logger,
  ) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`pool size must be a positive integer, got ${size}`);
    }
  }

  /** Number of producers currently open. */
  get liveCount(): number {
    return this.live;
  }

  /** Number of open producers not lent out. */
  get idleCount(): number {
    return this.idle.length;
  }

  /** Number of acquirers waiting for a producer. */
  get waitingCount(): number {
    return this.waiters.length;
  }

  /**
   * Borrow a producer, opening one if the pool is below its size and
   * waiting otherwise.
   */
  async acquire(): Promise<Producer> {
    if (this.closed) {
      throw ConnectionError.closed();
    }

    const idle = this.idle.pop();
    if (idle) {
      return idle;
    }

    if (this.live < this.size) {
      return this.open();
    }

    return new Promise<Producer>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /**
   * Return a healthy producer to the pool.
   */
  release(producer: Producer): void {
    if (this.closed) {
      this.live--;
      this.closeQuietly(producer);
      return;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(producer);
    } else {
      this.idle.push(producer);
    }
  }

  /**
   * Drop a producer that failed; its slot is freed for a fresh one.
   */
  discard(producer: Producer): void {
    this.live--;
    this.closeQuietly(producer);

    if (this.closed) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      this.open().then(waiter.resolve, waiter.reject);
    }
  }

  /**
   * Run `fn` with an exclusively borrowed producer. The producer goes back
   * to the pool when `fn` succeeds and is discarded when it throws.
   */
  async use<R>(fn: (producer: Producer) => Promise<R>): Promise<R> {
    const producer = await this.acquire();
    let healthy = false;
    try {
      const result = await fn(producer);
      healthy = true;
      return result;
    } finally {
      if (healthy) {
        this.release(producer);
      } else {
        this.discard(producer);
      }
    }
  }

  /**
   * Close idle producers and fail pending acquirers. Producers still lent
   * out are closed when they come back.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(ConnectionError.closed());
    }

    const idle = this.idle.splice(0);
    this.live -= idle.length;
    const results = await Promise.allSettled(idle.map((p) => p.close()));
    for (const result of results) {
      if (result.status === "rejected") {
        this.logger.warn("failed to close producer", { error: errorMessage(result.reason) });
      }
    }
  }

  private async open(): Promise<Producer> {
    this.live++;
    try {
      return await this.factory();
    } catch (e) {
      this.live--;
      throw e;
    }
  }

  private closeQuietly(producer: Producer): void {
    producer.close().catch((e: unknown) => {
      this.logger.warn("failed to close producer", { error: errorMessage(e) });
    });
  }
}
