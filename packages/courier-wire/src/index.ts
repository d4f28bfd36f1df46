// Courier wire envelopes and codec
//
// Request/response envelope types, their zod schemas, the JSON codec and the
// errors raised while decoding or reported by the remote side.

// ============================================================================
// Envelope Types
// ============================================================================

export type {
  CallContext,
  RequestEnvelope,
  RemoteErrorDescriptor,
  ResponseEnvelope,
} from "./types.ts";

export {
  ResponseKind,
  CONTENT_TYPE,
  CONTENT_ENCODING,
  requestEnvelope,
  resultResponse,
  errorResponse,
} from "./types.ts";

// ============================================================================
// Schemas
// ============================================================================

export {
  RequestEnvelopeSchema,
  RemoteErrorDescriptorSchema,
  ResponseKindSchema,
  RawResponseSchema,
} from "./schemas.ts";

// ============================================================================
// Errors
// ============================================================================

export {
  DecodeError,
  RemoteError,
  GENERIC_REMOTE_ERROR,
  toRemoteErrorDescriptor,
} from "./errors.ts";

// ============================================================================
// Codec
// ============================================================================

export { encodeRequest, decodeRequest, encodeResponse, decodeResponse } from "./codec.ts";
