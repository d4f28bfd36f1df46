// zod schemas for courier envelopes.
//
// Decoding goes through these so that a body from an unknown producer never
// reaches the registry half-parsed.

import { z } from "zod";

// ============================================================================
// Request
// ============================================================================

export const RequestEnvelopeSchema = z.object({
  context: z.record(z.unknown()),
  method: z.string().min(1),
  arguments: z.record(z.unknown()),
  is_async: z.boolean(),
});

// ============================================================================
// Response
// ============================================================================

export const RemoteErrorDescriptorSchema = z.object({
  type: z.string().min(1),
  message: z.string(),
  details: z.unknown().optional(),
});

export const ResponseKindSchema = z.enum(["result", "error"]);

/**
 * Raw response body. `correlation_id` is optional here because some
 * dispatchers only set it as a message property.
 */
export const RawResponseSchema = z.object({
  correlation_id: z.string().min(1).optional(),
  kind: ResponseKindSchema,
  payload: z.unknown(),
});
