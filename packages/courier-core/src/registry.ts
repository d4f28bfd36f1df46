// Pending-call registry.
//
// Maps correlation ids to the synchronous calls waiting on them. Callers
// insert and remove entries; the response listener only fulfils them.
// Each PendingCall waits on its own deferred, never on the map, so a slow
// waiter cannot hold up registration or delivery for anyone else.

import type { RemoteErrorDescriptor } from "@courier/courier-wire";
import { RpcTimeoutError } from "./errors.ts";

/** Lifecycle of a pending call. */
export type PendingCallState = "waiting" | "fulfilled" | "timedOut";

/** What the remote side answered. */
export type ResponseOutcome =
  | { kind: "result"; value: unknown }
  | { kind: "error"; error: RemoteErrorDescriptor };

/**
 * One outstanding synchronous call.
 */
export class PendingCall {
  private _state: PendingCallState = "waiting";
  private _outcome: ResponseOutcome | undefined;
  private wakers: Array<(outcome: ResponseOutcome) => void> = [];

  constructor(readonly correlationId: string) {}

  get state(): PendingCallState {
    return this._state;
  }

  /** Present once fulfilled; never set for a timed-out call. */
  get outcome(): ResponseOutcome | undefined {
    return this._outcome;
  }

  /**
   * Record the response and wake the waiter.
   *
   * Returns false if the call already left the waiting state (duplicate
   * delivery, or a response racing a timeout).
   */
  fulfil(outcome: ResponseOutcome): boolean {
    if (this._state !== "waiting") {
      return false;
    }
    this._state = "fulfilled";
    this._outcome = outcome;
    for (const wake of this.wakers.splice(0)) {
      wake(outcome);
    }
    return true;
  }

  /**
   * Wait for the response for at most `timeoutMs`.
   *
   * @throws RpcTimeoutError when the time elapses first; the call is then
   * marked timed out and ignores any later response
   */
  wait(timeoutMs: number): Promise<ResponseOutcome> {
    return new Promise<ResponseOutcome>((resolve, reject) => {
      if (this._outcome) {
        resolve(this._outcome);
        return;
      }
      if (this._state === "timedOut") {
        reject(new RpcTimeoutError(this.correlationId, timeoutMs));
        return;
      }

      const wake = (outcome: ResponseOutcome) => {
        clearTimeout(timer);
        resolve(outcome);
      };
      const timer = setTimeout(() => {
        this.wakers = this.wakers.filter((w) => w !== wake);
        this._state = "timedOut";
        reject(new RpcTimeoutError(this.correlationId, timeoutMs));
      }, timeoutMs);
      this.wakers.push(wake);
    });
  }
}

/**
 * Registry of pending calls keyed by correlation id.
 */
export class CallRegistry {
  private calls = new Map<string, PendingCall>();

  /**
   * Register a new waiting call.
   *
   * @throws Error if the id is already registered
   */
  add(correlationId: string): PendingCall {
    if (this.calls.has(correlationId)) {
      throw new Error(`correlation id already registered: ${correlationId}`);
    }
    const call = new PendingCall(correlationId);
    this.calls.set(correlationId, call);
    return call;
  }

  get(correlationId: string): PendingCall | undefined {
    return this.calls.get(correlationId);
  }

  has(correlationId: string): boolean {
    return this.calls.has(correlationId);
  }

  /**
   * Fulfil the call registered under `correlationId`.
   *
   * Returns false when there is no such call or it is no longer waiting.
   */
  fulfil(correlationId: string, outcome: ResponseOutcome): boolean {
    const call = this.calls.get(correlationId);
    if (!call) {
      return false;
    }
    return call.fulfil(outcome);
  }

  /**
   * Remove an entry. Idempotent.
   */
  remove(correlationId: string): boolean {
    return this.calls.delete(correlationId);
  }

  get size(): number {
    return this.calls.size;
  }

  ids(): string[] {
    return [...this.calls.keys()];
  }
}
