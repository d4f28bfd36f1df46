// Tests for logging middleware

import { describe, it, expect, beforeEach } from "vitest";
import { RemoteError } from "@courier/courier-wire";
import { RpcTimeoutError } from "./errors.ts";
import { createLogger, type LogSink } from "./logger.ts";
import { loggingMiddleware, type LoggingOptions } from "./logging.ts";
import type { ClientContext, CallRequest, CallOutcome } from "./middleware.ts";

describe("loggingMiddleware", () => {
  let lines: Array<{ message: string; data: unknown }> = [];

  const sink: LogSink = {
    debug: (message, data) => lines.push({ message, data }),
    info: () => {},
    warn: () => {},
    error: () => {},
  };

  function middlewareWith(options: Omit<LoggingOptions, "logger"> = {}, debug = "courier:*") {
    return loggingMiddleware({
      ...options,
      logger: createLogger({ namespace: "courier:rpc", debug, sink }),
    });
  }

  function newContext(startedAt = performance.now()): ClientContext {
    return { startedAt, state: new Map() };
  }

  function call(overrides: Partial<CallRequest> = {}): CallRequest {
    return { method: "add", args: {}, context: {}, async: false, ...overrides };
  }

  beforeEach(() => {
    lines = [];
  });

  it("logs basic request and response", async () => {
    const middleware = middlewareWith();
    const ctx = newContext();
    const request = call();

    middleware.pre?.(ctx, request);
    expect(lines).toHaveLength(1);
    expect(lines[0].message).toBe("[courier:rpc] → add");
    expect(lines[0].data).toEqual({ type: "request", method: "add", async: false });

    await new Promise((resolve) => setTimeout(resolve, 5));

    const outcome: CallOutcome = { ok: true, value: 3 };
    middleware.post?.(ctx, request, outcome);
    expect(lines).toHaveLength(2);
    expect(lines[1].message).toMatch(/^\[courier:rpc\] ← add: ✓ \d+\.\d{2}ms$/);
    expect(lines[1].data).toMatchObject({ type: "response", method: "add", ok: true, result: 3 });
  });

  it("logs request arguments by default", () => {
    const middleware = middlewareWith();
    const ctx = newContext();

    middleware.pre?.(ctx, call({ args: { a: 1, b: 2 } }));
    expect(lines[0].data).toMatchObject({ args: { a: 1, b: 2 } });
  });

  it("does not log arguments when disabled", () => {
    const middleware = middlewareWith({ logArgs: false });
    const ctx = newContext();

    middleware.pre?.(ctx, call({ args: { a: 1 } }));
    expect(lines[0].data).not.toHaveProperty("args");
  });

  it("does not log results when disabled", () => {
    const middleware = middlewareWith({ logResults: false });
    const ctx = newContext();
    const request = call();

    middleware.pre?.(ctx, request);
    middleware.post?.(ctx, request, { ok: true, value: { total: 3 } });

    expect(lines[1].data).toMatchObject({ ok: true });
    expect(lines[1].data).not.toHaveProperty("result");
  });

  it("leaves the context out unless asked", () => {
    const ctx = newContext();
    const request = call({ context: { user: "u1" } });

    middlewareWith().pre?.(ctx, request);
    middlewareWith({ logContext: true }).pre?.(ctx, request);

    expect(lines[0].data).not.toHaveProperty("context");
    expect(lines[1].data).toMatchObject({ context: { user: "u1" } });
  });

  it("marks async calls", () => {
    const ctx = newContext();
    middlewareWith().pre?.(ctx, call({ async: true }));
    expect(lines[0].data).toMatchObject({ async: true });
  });

  it("logs remote errors with their kind", () => {
    const middleware = middlewareWith();
    const ctx = newContext();
    const request = call();

    middleware.pre?.(ctx, request);
    middleware.post?.(ctx, request, {
      ok: false,
      error: new RemoteError("ValueError", "bad arg"),
    });

    expect(lines[1].message).toMatch(/^\[courier:rpc\] ← add: ✗ /);
    expect(lines[1].data).toMatchObject({
      ok: false,
      error: { name: "RemoteError", kind: "ValueError", message: "bad arg" },
    });
  });

  it("logs timeouts with the timeout that elapsed", () => {
    const middleware = middlewareWith();
    const ctx = newContext();
    const request = call();

    middleware.pre?.(ctx, request);
    middleware.post?.(ctx, request, { ok: false, error: new RpcTimeoutError("id-1", 1000) });

    expect(lines[1].data).toMatchObject({
      error: { name: "RpcTimeoutError", timeoutMs: 1000 },
    });
  });

  it("skips calls faster than minDuration", () => {
    const middleware = middlewareWith({ minDuration: 60_000 });
    const ctx = newContext();
    const request = call();

    middleware.pre?.(ctx, request);
    middleware.post?.(ctx, request, { ok: true, value: 1 });

    expect(lines).toHaveLength(1);
  });

  it("does not log when the namespace is disabled", () => {
    const middleware = middlewareWith({}, "courier:listener");
    const ctx = newContext();
    const request = call();

    middleware.pre?.(ctx, request);
    middleware.post?.(ctx, request, { ok: true, value: 1 });

    expect(lines).toHaveLength(0);
  });

  it("respects exclusion patterns", () => {
    const middleware = middlewareWith({}, "courier:*,-courier:rpc");
    const ctx = newContext();

    middleware.pre?.(ctx, call());

    expect(lines).toHaveLength(0);
  });

  it("measures from the time the call started", () => {
    const middleware = middlewareWith({ minDuration: 40 });
    const ctx = newContext(performance.now() - 50);

    middleware.post?.(ctx, call(), { ok: true, value: 1 });

    expect(lines).toHaveLength(1);
    expect(lines[0].data).toMatchObject({ type: "response", ok: true });
  });
});
