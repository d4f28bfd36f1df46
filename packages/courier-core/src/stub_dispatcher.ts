// Minimal remote dispatcher on a MemoryBroker, for tests.
//
// Consumes the topic queue, runs the named handler and publishes one
// response to the request's reply_to with its correlation id.

import {
  RemoteError,
  decodeRequest,
  encodeResponse,
  errorResponse,
  resultResponse,
  type CallContext,
  type RequestEnvelope,
  type ResponseEnvelope,
} from "@courier/courier-wire";
import type { MemoryBroker } from "./memory.ts";
import type { IncomingMessage } from "./transport.ts";

export type StubHandler = (
  args: Record<string, unknown>,
  context: CallContext,
) => unknown | Promise<unknown>;

export interface StubDispatcherOptions {
  exchange?: string;
  topic?: string;
  /** Also answer requests marked is_async. Defaults to false. */
  replyToAsync?: boolean;
}

export interface StubDispatcher {
  /** Every request received, in arrival order. */
  readonly received: RequestEnvelope[];
  /** Responses published, in order. */
  readonly replies: ResponseEnvelope[];
  /** Requests the dispatcher could not handle. */
  readonly failures: Error[];
  stop(): void;
}

export function startStubDispatcher(
  broker: MemoryBroker,
  handlers: Record<string, StubHandler>,
  options: StubDispatcherOptions = {},
): StubDispatcher {
  const exchange = options.exchange ?? "";
  const topic = options.topic ?? "workflow";
  const received: RequestEnvelope[] = [];
  const replies: ResponseEnvelope[] = [];
  const failures: Error[] = [];

  broker.declareQueue(topic);
  if (exchange !== "") {
    broker.declareExchange({ name: exchange, durable: false, autoDelete: false });
    broker.bindQueue(topic, exchange, topic);
  }

  async function respond(request: RequestEnvelope, correlationId: string): Promise<ResponseEnvelope> {
    const handler = handlers[request.method];
    if (!handler) {
      return errorResponse(correlationId, {
        type: "NoSuchMethod",
        message: `unknown method ${request.method}`,
      });
    }
    try {
      return resultResponse(correlationId, await handler(request.arguments, request.context));
    } catch (e) {
      if (e instanceof RemoteError) {
        return errorResponse(correlationId, e.toDescriptor());
      }
      const error = e instanceof Error ? e : new Error(String(e));
      return errorResponse(correlationId, { type: error.name, message: error.message });
    }
  }

  async function handle(message: IncomingMessage): Promise<void> {
    const request = decodeRequest(message.body);
    received.push(request);

    const { replyTo, correlationId } = message.properties;
    if (!replyTo || !correlationId) return;
    if (request.is_async && !options.replyToAsync) return;

    const response = await respond(request, correlationId);
    replies.push(response);
    broker.publish(exchange, replyTo, encodeResponse(response), { correlationId });
  }

  const unsubscribe = broker.subscribe(topic, (message) => {
    handle(message).catch((e: unknown) => {
      failures.push(e instanceof Error ? e : new Error(String(e)));
    });
  });

  return { received, replies, failures, stop: unsubscribe };
}
