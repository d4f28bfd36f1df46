// RPC client over a message broker.
//
// Requests go to the configured exchange under the configured topic; each
// client owns one private reply queue and one ResponseListener on it.
// Synchronous calls register a pending call before publishing and always
// deregister it on the way out, whatever the outcome.

import { randomUUID } from "node:crypto";
import {
  CONTENT_ENCODING,
  CONTENT_TYPE,
  RemoteError,
  encodeRequest,
  type CallContext,
} from "@courier/courier-wire";
import { resolveConfig, type RpcClientConfig } from "./config.ts";
import { ConnectionError, PublishError, errorMessage } from "./errors.ts";
import { ResponseListener } from "./listener.ts";
import { createLogger, type Logger } from "./logger.ts";
import {
  RejectionError,
  type CallOutcome,
  type CallRequest,
  type ClientContext,
  type ClientMiddleware,
} from "./middleware.ts";
import { ProducerPool } from "./producer_pool.ts";
import type { BrokerConnection } from "./transport.ts";

export interface RpcClientOptions {
  /** Defaults to a "courier:client" logger. */
  logger?: Logger;
  /** Correlation id and reply queue name generator. Defaults to UUID v4. */
  generateId?: () => string;
}

/** State shared by a client and every view created with `with()`. */
interface ClientCore {
  broker: BrokerConnection;
  config: RpcClientConfig;
  listener: ResponseListener;
  pool: ProducerPool;
  logger: Logger;
  generateId: () => string;
  closed: boolean;
}

/**
 * Broker-backed RPC client.
 *
 * @example
 * ```typescript
 * const broker = await connectAmqp(config);
 * const client = await RpcClient.connect(broker, config);
 *
 * const sum = await client.syncCall(ctx, "add", { a: 1, b: 2 });
 * await client.asyncCall(ctx, "report_progress", { step: 3 });
 *
 * await client.close();
 * ```
 */
export class RpcClient {
  private constructor(
    private readonly core: ClientCore,
    private readonly middlewares: ClientMiddleware[],
  ) {}

  /**
   * Set up the reply queue and start listening.
   *
   * Declares the request exchange (unless it is the default exchange),
   * declares and binds the private reply queue, then subscribes to it.
   *
   * @throws ConnectionError if any of these steps fail
   */
  static async connect(
    broker: BrokerConnection,
    config: Partial<RpcClientConfig> = {},
    options: RpcClientOptions = {},
  ): Promise<RpcClient> {
    const resolved = resolveConfig(config);
    const logger = options.logger ?? createLogger({ namespace: "courier:client" });
    const generateId = options.generateId ?? randomUUID;
    const queueName = generateId();

    const listener = new ResponseListener(broker, queueName, logger.child("listener"));
    try {
      if (resolved.exchange !== "") {
        await broker.declareExchange({
          name: resolved.exchange,
          durable: resolved.durableQueues,
          autoDelete: resolved.autoDelete,
        });
      }
      await broker.declareReplyQueue(queueName, resolved.exchange);
      await listener.start();
    } catch (e) {
      if (e instanceof ConnectionError) throw e;
      throw ConnectionError.io(`failed to set up reply queue ${queueName}: ${errorMessage(e)}`, e);
    }

    const pool = new ProducerPool(
      () => broker.openProducer(),
      resolved.producerPoolSize,
      logger.child("pool"),
    );

    logger.info("rpc client ready", {
      exchange: resolved.exchange,
      topic: resolved.topic,
      replyQueue: queueName,
    });

    return new RpcClient(
      { broker, config: resolved, listener, pool, logger, generateId, closed: false },
      [],
    );
  }

  /** Name of this client's private reply queue. */
  get replyQueue(): string {
    return this.core.listener.queueName;
  }

  /** Number of synchronous calls currently waiting for a response. */
  get pendingCount(): number {
    return this.core.listener.pendingCount;
  }

  get closed(): boolean {
    return this.core.closed;
  }

  /**
   * Call a remote method and wait for its result.
   *
   * @throws RemoteError when the remote side reports an error
   * @throws RpcTimeoutError when no response arrives within the timeout
   * @throws PublishError when the request cannot be published
   */
  syncCall(
    context: CallContext,
    method: string,
    args: Record<string, unknown> = {},
  ): Promise<unknown> {
    return this.run({ method, context, args, async: false }, (request) => this.invokeSync(request));
  }

  /**
   * Publish a request without waiting for, or ever seeing, its outcome.
   * Resolves once the broker has the request.
   *
   * @throws PublishError when the request cannot be published
   */
  async asyncCall(
    context: CallContext,
    method: string,
    args: Record<string, unknown> = {},
  ): Promise<void> {
    await this.run({ method, context, args, async: true }, (request) => this.invokeAsync(request));
  }

  /**
   * Returns a client that runs `middleware` around every call, after any
   * middleware this client already has. Both share the same connection.
   */
  with(middleware: ClientMiddleware): RpcClient {
    return new RpcClient(this.core, [...this.middlewares, middleware]);
  }

  /**
   * Stop listening, close publish handles and the broker connection.
   * Pending synchronous calls run into their timeouts.
   */
  async close(): Promise<void> {
    const core = this.core;
    if (core.closed) return;
    core.closed = true;

    try {
      try {
        await core.listener.stop();
      } finally {
        await core.pool.close();
      }
    } finally {
      await core.broker.close();
    }
    core.logger.info("rpc client closed", { replyQueue: core.listener.queueName });
  }

  private async invokeSync(request: CallRequest): Promise<unknown> {
    const { listener, config } = this.core;
    const correlationId = this.core.generateId();

    listener.addListener(correlationId);
    try {
      await this.publish(request, correlationId);
      const outcome = await listener.getResult(correlationId, config.timeout * 1000);
      if (outcome.kind === "error") {
        throw RemoteError.fromDescriptor(outcome.error);
      }
      return outcome.value;
    } finally {
      listener.removeListener(correlationId);
    }
  }

  private async invokeAsync(request: CallRequest): Promise<undefined> {
    await this.publish(request, this.core.generateId());
    return undefined;
  }

  private async publish(request: CallRequest, correlationId: string): Promise<void> {
    const { config, pool, logger, listener } = this.core;

    logger.debug("publish request", {
      method: request.method,
      correlationId,
      async: request.async,
    });

    try {
      // Encoding fails on values JSON cannot represent (BigInt, cycles).
      const body = encodeRequest(request.context, request.method, request.args, request.async);
      await pool.use((producer) =>
        producer.publish(config.exchange, config.topic, body, {
          correlationId,
          replyTo: listener.queueName,
          contentType: CONTENT_TYPE,
          contentEncoding: CONTENT_ENCODING,
          persistent: true,
        }),
      );
    } catch (e) {
      if (e instanceof ConnectionError) throw e;
      throw PublishError.wrap(request.method, e);
    }
  }

  /**
   * Run a call through the middleware chain.
   *
   * Pre hooks may rewrite the request or reject it; post hooks see every
   * outcome, rejections included.
   */
  private async run(
    initial: CallRequest,
    invoke: (request: CallRequest) => Promise<unknown>,
  ): Promise<unknown> {
    if (this.core.closed) {
      throw ConnectionError.closed();
    }
    if (this.middlewares.length === 0) {
      return invoke(initial);
    }

    const ctx: ClientContext = { startedAt: performance.now(), state: new Map() };
    const request: CallRequest = {
      ...initial,
      args: { ...initial.args },
      context: { ...initial.context },
    };

    for (const mw of this.middlewares) {
      if (mw.pre) {
        const verdict = await mw.pre(ctx, request);
        if (verdict) {
          const error = new RejectionError(request.method, verdict.reject);
          await this.runPostHooks(ctx, request, { ok: false, error });
          throw error;
        }
      }
    }

    let value: unknown;
    try {
      value = await invoke(request);
    } catch (e) {
      const error = e instanceof Error ? e : new Error(String(e));
      await this.runPostHooks(ctx, request, { ok: false, error });
      throw e;
    }

    await this.runPostHooks(ctx, request, { ok: true, value });
    return value;
  }

  private async runPostHooks(
    ctx: ClientContext,
    request: CallRequest,
    outcome: CallOutcome,
  ): Promise<void> {
    for (let i = this.middlewares.length - 1; i >= 0; i--) {
      const mw = this.middlewares[i];
      if (mw.post) {
        try {
          await mw.post(ctx, request, outcome);
        } catch (e) {
          this.core.logger.warn("middleware post hook failed", {
            method: request.method,
            error: errorMessage(e),
          });
        }
      }
    }
  }
}
