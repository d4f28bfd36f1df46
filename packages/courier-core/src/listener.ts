// Response listener.
//
// One subscription on the client's reply queue. Every delivery is decoded
// and routed to the pending call with the same correlation id. Nothing that
// arrives on the queue can fail the subscription or touch other calls.

import { DecodeError, decodeResponse, type ResponseEnvelope } from "@courier/courier-wire";
import { errorMessage } from "./errors.ts";
import type { Logger } from "./logger.ts";
import { CallRegistry, type ResponseOutcome } from "./registry.ts";
import type { BrokerConnection, Consumer, IncomingMessage } from "./transport.ts";

function toOutcome(envelope: ResponseEnvelope): ResponseOutcome {
  if (envelope.kind === "error") {
    return { kind: "error", error: envelope.payload };
  }
  return { kind: "result", value: envelope.payload };
}

export class ResponseListener {
  private consumer: Consumer | null = null;
  private readonly registry = new CallRegistry();

  constructor(
    private readonly broker: BrokerConnection,
    readonly queueName: string,
    private readonly logger: Logger,
  ) {}

  /** Whether the subscription is active. */
  get running(): boolean {
    return this.consumer !== null;
  }

  /** Number of registered calls. */
  get pendingCount(): number {
    return this.registry.size;
  }

  /**
   * Subscribe to the reply queue. Resolves once the subscription is active;
   * calling it again is a no-op.
   */
  async start(): Promise<void> {
    if (this.consumer) return;
    this.consumer = await this.broker.consume(this.queueName, (message) =>
      this.handleMessage(message),
    );
    this.logger.debug("listening for responses", { queue: this.queueName });
  }

  /**
   * Cancel the subscription. Registered calls are left to time out.
   */
  async stop(): Promise<void> {
    const consumer = this.consumer;
    if (!consumer) return;
    this.consumer = null;
    await consumer.cancel();
  }

  /**
   * Register a waiting call. Must happen before its request is published.
   */
  addListener(correlationId: string): void {
    this.registry.add(correlationId);
  }

  /**
   * Wait for the response to a registered call.
   *
   * @throws RpcTimeoutError if nothing arrives within `timeoutMs`
   */
  getResult(correlationId: string, timeoutMs: number): Promise<ResponseOutcome> {
    const call = this.registry.get(correlationId);
    if (!call) {
      return Promise.reject(new Error(`no pending call for correlation id ${correlationId}`));
    }
    return call.wait(timeoutMs);
  }

  /**
   * Drop a call's registry entry. Safe to call more than once.
   */
  removeListener(correlationId: string): void {
    this.registry.remove(correlationId);
  }

  /** Whether a call is registered under this id. */
  hasListener(correlationId: string): boolean {
    return this.registry.has(correlationId);
  }

  /**
   * Route one delivery. Never throws.
   */
  handleMessage(message: IncomingMessage): void {
    let envelope: ResponseEnvelope;
    try {
      envelope = decodeResponse(message.body, message.properties.correlationId);
    } catch (e) {
      if (e instanceof DecodeError) {
        this.logger.warn("dropping undecodable response", {
          error: e.message,
          correlationId: message.properties.correlationId,
          bytes: message.body.length,
        });
      } else {
        this.logger.error("unexpected error decoding response", { error: errorMessage(e) });
      }
      return;
    }

    const correlationId = envelope.correlation_id;
    if (!this.registry.has(correlationId)) {
      // Timed out, already answered, or the reply to an async call.
      this.logger.debug("dropping response with no pending call", { correlationId });
      return;
    }

    if (!this.registry.fulfil(correlationId, toOutcome(envelope))) {
      this.logger.debug("dropping duplicate response", { correlationId });
    }
  }
}
