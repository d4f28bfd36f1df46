import { describe, expect, it, vi } from "vitest";
import { encodeResponse, errorResponse, resultResponse } from "@courier/courier-wire";
import { RpcTimeoutError } from "./errors.ts";
import { ResponseListener } from "./listener.ts";
import { createLogger, type LogSink } from "./logger.ts";
import { MemoryBroker } from "./memory.ts";

function setup() {
  const broker = new MemoryBroker();
  const connection = broker.connect();
  const sink = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies LogSink;
  const logger = createLogger({ namespace: "listener", debug: "listener", sink });
  const listener = new ResponseListener(connection, "replies", logger);
  return { broker, connection, sink, listener };
}

const bytes = (text: string) => new TextEncoder().encode(text);

describe("ResponseListener", () => {
  it("routes a delivery to the call with the same correlation id", async () => {
    const { broker, connection, listener } = setup();
    await connection.declareReplyQueue("replies", "");
    await listener.start();
    listener.addListener("c1");
    listener.addListener("c2");

    broker.publish("", "replies", encodeResponse(resultResponse("c2", "two")), {});
    broker.publish("", "replies", encodeResponse(resultResponse("c1", "one")), {});

    await expect(listener.getResult("c1", 1000)).resolves.toEqual({ kind: "result", value: "one" });
    await expect(listener.getResult("c2", 1000)).resolves.toEqual({ kind: "result", value: "two" });
  });

  it("uses the message property when the body carries no id", async () => {
    const { listener } = setup();
    listener.addListener("c1");

    listener.handleMessage({
      body: bytes('{"kind":"result","payload":5}'),
      properties: { correlationId: "c1" },
    });

    await expect(listener.getResult("c1", 1000)).resolves.toEqual({ kind: "result", value: 5 });
  });

  it("delivers remote errors as error outcomes", async () => {
    const { listener } = setup();
    listener.addListener("c1");

    listener.handleMessage({
      body: encodeResponse(errorResponse("c1", { type: "ValueError", message: "bad arg" })),
      properties: {},
    });

    await expect(listener.getResult("c1", 1000)).resolves.toEqual({
      kind: "error",
      error: { type: "ValueError", message: "bad arg" },
    });
  });

  it("drops undecodable deliveries with a warning", () => {
    const { listener, sink } = setup();
    listener.addListener("c1");

    listener.handleMessage({ body: bytes("not json"), properties: { correlationId: "c1" } });

    expect(listener.hasListener("c1")).toBe(true);
    expect(sink.warn).toHaveBeenCalledTimes(1);
    expect(sink.warn.mock.calls[0][0]).toBe("[listener] dropping undecodable response");
    expect(sink.warn.mock.calls[0][1]).toMatchObject({ correlationId: "c1", bytes: 8 });
  });

  it("drops responses with no pending call", () => {
    const { listener, sink } = setup();

    listener.handleMessage({ body: encodeResponse(resultResponse("ghost", 1)), properties: {} });

    expect(sink.debug).toHaveBeenCalledWith("[listener] dropping response with no pending call", {
      correlationId: "ghost",
    });
  });

  it("keeps the first of duplicate responses", async () => {
    const { listener, sink } = setup();
    listener.addListener("c1");

    listener.handleMessage({ body: encodeResponse(resultResponse("c1", "first")), properties: {} });
    listener.handleMessage({ body: encodeResponse(resultResponse("c1", "second")), properties: {} });

    await expect(listener.getResult("c1", 1000)).resolves.toEqual({
      kind: "result",
      value: "first",
    });
    expect(sink.debug).toHaveBeenCalledWith("[listener] dropping duplicate response", {
      correlationId: "c1",
    });
  });

  it("rejects getResult for an unknown id", async () => {
    const { listener } = setup();
    await expect(listener.getResult("nope", 10)).rejects.toThrow(
      "no pending call for correlation id nope",
    );
  });

  it("times out and leaves cleanup to the caller", async () => {
    vi.useFakeTimers();
    try {
      const { listener } = setup();
      listener.addListener("c1");
      const result = listener.getResult("c1", 100).catch((e: unknown) => e);

      await vi.advanceTimersByTimeAsync(100);

      expect(await result).toBeInstanceOf(RpcTimeoutError);
      expect(listener.pendingCount).toBe(1);
      listener.removeListener("c1");
      listener.removeListener("c1");
      expect(listener.pendingCount).toBe(0);
    } finally {
      vi.useRealTimers();
    }
  });

  it("starts once and stops its subscription", async () => {
    const { broker, connection, listener } = setup();
    await connection.declareReplyQueue("replies", "");

    await listener.start();
    await listener.start();
    expect(listener.running).toBe(true);

    await listener.stop();
    expect(listener.running).toBe(false);
    // The reply queue is auto-delete.
    expect(broker.hasQueue("replies")).toBe(false);
    await expect(listener.stop()).resolves.toBeUndefined();
  });
});
