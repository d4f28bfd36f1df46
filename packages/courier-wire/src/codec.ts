// Envelope codec.
//
// Bodies are UTF-8 JSON. Decoders validate with the zod schemas and throw
// DecodeError for anything malformed; encoders never validate.

import { DecodeError, toRemoteErrorDescriptor } from "./errors.ts";
import { RawResponseSchema, RequestEnvelopeSchema } from "./schemas.ts";
import { requestEnvelope, type CallContext, type RequestEnvelope, type ResponseEnvelope } from "./types.ts";

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8", { fatal: true });

function encodeJson(value: unknown): Uint8Array {
  return textEncoder.encode(JSON.stringify(value));
}

function decodeJson(raw: Uint8Array): unknown {
  try {
    return JSON.parse(textDecoder.decode(raw));
  } catch (e) {
    throw DecodeError.invalidJson(raw, e);
  }
}

function describeIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

// ============================================================================
// Request Encoding/Decoding
// ============================================================================

/**
 * Encode a request envelope.
 *
 * @param isAsync - true for fire-and-forget calls
 */
export function encodeRequest(
  context: CallContext,
  method: string,
  args: Record<string, unknown>,
  isAsync: boolean,
): Uint8Array {
  return encodeJson(requestEnvelope(context, method, args, isAsync));
}

/**
 * Decode a request envelope (dispatcher side).
 */
export function decodeRequest(raw: Uint8Array): RequestEnvelope {
  const parsed = RequestEnvelopeSchema.safeParse(decodeJson(raw));
  if (!parsed.success) {
    throw DecodeError.invalidShape(raw, describeIssues(parsed.error.issues));
  }
  return parsed.data;
}

// ============================================================================
// Response Encoding/Decoding
// ============================================================================

/**
 * Encode a response envelope (dispatcher side).
 */
export function encodeResponse(envelope: ResponseEnvelope): Uint8Array {
  return encodeJson(envelope);
}

/**
 * Decode a response envelope.
 *
 * The body's `correlation_id` takes precedence; `fallbackCorrelationId`
 * (normally the message's correlation id property) is used when the body
 * has none.
 *
 * @throws DecodeError if the body is not JSON, has the wrong shape, or no
 * correlation id can be found
 */
export function decodeResponse(raw: Uint8Array, fallbackCorrelationId?: string): ResponseEnvelope {
  const parsed = RawResponseSchema.safeParse(decodeJson(raw));
  if (!parsed.success) {
    throw DecodeError.invalidShape(raw, describeIssues(parsed.error.issues));
  }

  const correlationId = parsed.data.correlation_id ?? fallbackCorrelationId;
  if (!correlationId) {
    throw DecodeError.missingCorrelationId(raw);
  }

  if (parsed.data.kind === "error") {
    return {
      correlation_id: correlationId,
      kind: "error",
      payload: toRemoteErrorDescriptor(parsed.data.payload),
    };
  }
  return { correlation_id: correlationId, kind: "result", payload: parsed.data.payload };
}
