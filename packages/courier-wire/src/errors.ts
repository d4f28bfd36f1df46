// Wire-level error types.

import { RemoteErrorDescriptorSchema } from "./schemas.ts";
import type { RemoteErrorDescriptor } from "./types.ts";

/** Error class name used when the remote side sent an unstructured error. */
export const GENERIC_REMOTE_ERROR = "RemoteError";

/**
 * A message body that could not be decoded into an envelope.
 */
export class DecodeError extends Error {
  constructor(
    message: string,
    public readonly raw: Uint8Array,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "DecodeError";
  }

  static invalidJson(raw: Uint8Array, cause: unknown): DecodeError {
    return new DecodeError("response body is not valid UTF-8 JSON", raw, { cause });
  }

  static invalidShape(raw: Uint8Array, detail: string): DecodeError {
    return new DecodeError(`response body has unexpected shape: ${detail}`, raw);
  }

  static missingCorrelationId(raw: Uint8Array): DecodeError {
    return new DecodeError("response carries no correlation id", raw);
  }
}

/**
 * Error reported by the remote dispatcher for one call.
 *
 * `kind` is the remote error class name; callers branch on it the same way
 * they would on a local error type.
 */
export class RemoteError extends Error {
  readonly kind: string;
  readonly details: unknown;

  constructor(kind: string, message: string, details?: unknown) {
    super(message);
    this.name = "RemoteError";
    this.kind = kind;
    this.details = details;
  }

  static fromDescriptor(descriptor: RemoteErrorDescriptor): RemoteError {
    return new RemoteError(descriptor.type, descriptor.message, descriptor.details);
  }

  toDescriptor(): RemoteErrorDescriptor {
    const descriptor: RemoteErrorDescriptor = { type: this.kind, message: this.message };
    if (this.details !== undefined) {
      descriptor.details = this.details;
    }
    return descriptor;
  }

  /** Check the remote error class name. */
  is(kind: string): boolean {
    return this.kind === kind;
  }
}

/**
 * Coerce whatever a dispatcher put in an error payload into a descriptor.
 *
 * Structured payloads pass through; strings become the message; anything else
 * is JSON-stringified.
 */
export function toRemoteErrorDescriptor(payload: unknown): RemoteErrorDescriptor {
  const parsed = RemoteErrorDescriptorSchema.safeParse(payload);
  if (parsed.success) {
    const descriptor: RemoteErrorDescriptor = {
      type: parsed.data.type,
      message: parsed.data.message,
    };
    if (parsed.data.details !== undefined) {
      descriptor.details = parsed.data.details;
    }
    return descriptor;
  }
  if (typeof payload === "string") {
    return { type: GENERIC_REMOTE_ERROR, message: payload };
  }
  return { type: GENERIC_REMOTE_ERROR, message: JSON.stringify(payload) ?? String(payload) };
}
