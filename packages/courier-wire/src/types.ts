// Courier envelope types.
//
// The request and response envelopes are the only things that travel as
// message bodies. Broker-level addressing (correlation id, reply queue,
// delivery mode) rides in message properties and is not part of these types.

// ============================================================================
// Request
// ============================================================================

/**
 * Opaque caller context (auth token, project id, ...).
 *
 * The client never interprets it; the remote dispatcher rebuilds its own
 * context object from this map.
 */
export type CallContext = Record<string, unknown>;

/**
 * Request body published to the request exchange.
 */
export interface RequestEnvelope {
  context: CallContext;
  method: string;
  arguments: Record<string, unknown>;
  /** Fire-and-forget request: the caller does not wait for a response. */
  is_async: boolean;
}

// ============================================================================
// Response
// ============================================================================

/** Response discriminant. */
export const ResponseKind = {
  RESULT: "result",
  ERROR: "error",
} as const;

export type ResponseKind = (typeof ResponseKind)[keyof typeof ResponseKind];

/**
 * Structured description of an error raised on the remote side.
 */
export interface RemoteErrorDescriptor {
  /** Remote error class name, e.g. "ValueError". */
  type: string;
  message: string;
  details?: unknown;
}

/**
 * Response body published by the dispatcher to the caller's reply queue.
 */
export type ResponseEnvelope =
  | { correlation_id: string; kind: "result"; payload: unknown }
  | { correlation_id: string; kind: "error"; payload: RemoteErrorDescriptor };

// ============================================================================
// Factory functions
// ============================================================================

export function requestEnvelope(
  context: CallContext,
  method: string,
  args: Record<string, unknown>,
  isAsync: boolean,
): RequestEnvelope {
  return { context, method, arguments: args, is_async: isAsync };
}

export function resultResponse(correlationId: string, payload: unknown): ResponseEnvelope {
  return { correlation_id: correlationId, kind: ResponseKind.RESULT, payload };
}

export function errorResponse(
  correlationId: string,
  payload: RemoteErrorDescriptor,
): ResponseEnvelope {
  return { correlation_id: correlationId, kind: ResponseKind.ERROR, payload };
}

/** MIME type set on every published envelope. */
export const CONTENT_TYPE = "application/json";

/** Body charset. */
export const CONTENT_ENCODING = "utf-8";
