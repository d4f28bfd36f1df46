// Client-side error types.
//
// Remote and decode errors live in @courier/courier-wire; these are the
// failures that originate on the calling side.

/** Error while talking to the broker. */
export class ConnectionError extends Error {
  constructor(
    public kind: "io" | "closed",
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ConnectionError";
  }

  static io(message: string, cause?: unknown): ConnectionError {
    return new ConnectionError("io", message, { cause });
  }

  static closed(): ConnectionError {
    return new ConnectionError("closed", "connection closed");
  }
}

/** A request could not be handed to the broker. Never retried. */
export class PublishError extends Error {
  constructor(
    public readonly method: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PublishError";
  }

  static wrap(method: string, cause: unknown): PublishError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new PublishError(method, `failed to publish ${method}: ${detail}`, { cause });
  }
}

/** No response arrived for a synchronous call within its timeout. */
export class RpcTimeoutError extends Error {
  constructor(
    public readonly correlationId: string,
    public readonly timeoutMs: number,
  ) {
    super(`RPC request timed out after ${timeoutMs}ms`);
    this.name = "RpcTimeoutError";
  }
}

/** Turn an unknown thrown value into a log-friendly string. */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
