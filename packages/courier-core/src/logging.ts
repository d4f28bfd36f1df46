// Logging middleware for courier clients.
//
// Provides call/outcome logging with timing information through a Logger,
// so output follows the same namespace patterns as the rest of the client.

import { RemoteError } from "@courier/courier-wire";
import { RpcTimeoutError } from "./errors.ts";
import { createLogger, type LogFields, type Logger } from "./logger.ts";
import type { CallOutcome, CallRequest, ClientContext, ClientMiddleware } from "./middleware.ts";

export interface LoggingOptions {
  /**
   * Logger to write to. Defaults to a "courier:rpc" logger; calls are
   * logged at debug level, so they only show when that namespace is enabled.
   */
  logger?: Logger;

  /**
   * Log request arguments. Defaults to true.
   */
  logArgs?: boolean;

  /**
   * Log result values. Defaults to true.
   */
  logResults?: boolean;

  /**
   * Log the call context. Defaults to false (usually carries auth tokens).
   */
  logContext?: boolean;

  /**
   * Minimum duration (ms) to log. Calls faster than this are skipped.
   * Defaults to 0 (log all calls).
   */
  minDuration?: number;
}

/**
 * Create a logging middleware that logs every call with its duration.
 *
 * - Request: `→ method` with { method, async, args?, context? }
 * - Outcome: `← method: ✓ 1.23ms` or `← method: ✗ 1.23ms` with
 *   { method, duration, ok, result? | error }
 *
 * @example
 * ```typescript
 * const client = (await RpcClient.connect(broker)).with(loggingMiddleware());
 * // DEBUG=courier:rpc node service.js
 * ```
 */
export function loggingMiddleware(options: LoggingOptions = {}): ClientMiddleware {
  const logger = options.logger ?? createLogger({ namespace: "courier:rpc" });
  const logArgs = options.logArgs ?? true;
  const logResults = options.logResults ?? true;
  const logContext = options.logContext ?? false;
  const minDuration = options.minDuration ?? 0;

  return {
    pre(_ctx: ClientContext, request: CallRequest): void {
      if (!logger.debugEnabled) return;

      const fields: LogFields = {
        type: "request",
        method: request.method,
        async: request.async,
      };

      if (logArgs && Object.keys(request.args).length > 0) {
        fields.args = request.args;
      }

      if (logContext && Object.keys(request.context).length > 0) {
        fields.context = request.context;
      }

      logger.debug(`→ ${request.method}`, fields);
    },

    post(ctx: ClientContext, request: CallRequest, outcome: CallOutcome): void {
      const duration = performance.now() - ctx.startedAt;
      if (duration < minDuration) return;
      if (!logger.debugEnabled) return;

      const fields: LogFields = {
        type: "response",
        method: request.method,
        duration: `${duration.toFixed(2)}ms`,
      };

      if (outcome.ok) {
        fields.ok = true;
        if (logResults && outcome.value !== undefined) {
          fields.result = outcome.value;
        }
        logger.debug(`← ${request.method}: ✓ ${duration.toFixed(2)}ms`, fields);
        return;
      }

      fields.ok = false;
      fields.error = describeError(outcome.error);
      logger.debug(`← ${request.method}: ✗ ${duration.toFixed(2)}ms`, fields);
    },
  };
}

function describeError(error: Error): LogFields {
  if (error instanceof RemoteError) {
    return { name: error.name, kind: error.kind, message: error.message };
  }
  if (error instanceof RpcTimeoutError) {
    return { name: error.name, timeoutMs: error.timeoutMs };
  }
  return { name: error.name, message: error.message };
}
