// Hooks around syncCall/asyncCall.
//
// A middleware sees each call before its request envelope is encoded and
// again once the call has an outcome. Hooks run in registration order before
// the call and in reverse order after it.

import type { CallContext } from "@courier/courier-wire";

/** Per-call state handed to both hooks of every middleware. */
export interface ClientContext {
  /** `performance.now()` when the call entered the chain. */
  readonly startedAt: number;
  /** Scratch space; key it with a symbol private to the middleware. */
  readonly state: Map<symbol, unknown>;
}

/**
 * The call about to be published. `args` and `context` are copies that
 * pre hooks may replace or mutate.
 */
export interface CallRequest {
  readonly method: string;
  args: Record<string, unknown>;
  context: CallContext;
  /** true for asyncCall. */
  readonly async: boolean;
}

export type CallOutcome = { ok: true; value: unknown } | { ok: false; error: Error };

/** Returned by a pre hook to stop the call before anything is published. */
export interface Rejection {
  reject: string;
}

/** The call was stopped by a pre hook. */
export class RejectionError extends Error {
  constructor(
    readonly method: string,
    readonly reason: string,
  ) {
    super(`call to ${method} rejected: ${reason}`);
    this.name = "RejectionError";
  }
}

/**
 * @example
 * ```typescript
 * const withProject: ClientMiddleware = {
 *   pre(_ctx, request) {
 *     request.context = { ...request.context, project_id: currentProject() };
 *   },
 * };
 *
 * const client = (await RpcClient.connect(broker)).with(withProject);
 * ```
 */
export interface ClientMiddleware {
  pre?(ctx: ClientContext, request: CallRequest): Promise<Rejection | void> | Rejection | void;

  /** Errors thrown here are logged and do not change the outcome. */
  post?(ctx: ClientContext, request: CallRequest, outcome: CallOutcome): Promise<void> | void;
}
