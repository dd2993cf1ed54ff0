// ─── midi-reshape: Errors ────────────────────────────────────────────────────
//
// Every engine operation fails synchronously, before any output is built.
// Per-event domain overflow is never thrown: it is clamped in place so one
// extreme note cannot discard the rest of a performance.
// ─────────────────────────────────────────────────────────────────────────────

/** Failure categories raised by engine operations. */
export type TransformErrorKind = "NotSupported" | "OutOfRange" | "InvalidArgument";

export class TransformError extends Error {
  readonly kind: TransformErrorKind;

  /** Name of the operation that raised the error (e.g. "quantizeNotes"). */
  readonly operation: string;

  constructor(kind: TransformErrorKind, operation: string, message: string) {
    super(`${operation}: ${message}`);
    this.name = "TransformError";
    this.kind = kind;
    this.operation = operation;
  }
}

/** Narrow an unknown error to a TransformError, optionally of one kind. */
export function isTransformError(
  err: unknown,
  kind?: TransformErrorKind,
): err is TransformError {
  if (!(err instanceof TransformError)) return false;
  return kind === undefined || err.kind === kind;
}

/** Clamp a per-event field to its domain. */
export function clampToDomain(value: number, min: number, max: number): number {
  if (value < min) return min;
  if (value > max) return max;
  return value;
}

/**
 * Reject anything that is not an integer within [min, max].
 * Used for caller-supplied parameters (semitones, grid size, channel, ...).
 */
export function requireInteger(
  value: number,
  operation: string,
  name: string,
  min = Number.MIN_SAFE_INTEGER,
  max = Number.MAX_SAFE_INTEGER,
): void {
  if (!Number.isInteger(value)) {
    throw new TransformError("InvalidArgument", operation, `${name} must be an integer, got ${value}`);
  }
  if (value < min || value > max) {
    throw new TransformError(
      "InvalidArgument",
      operation,
      `${name} must be between ${min} and ${max}, got ${value}`,
    );
  }
}

/**
 * Exhaustiveness guard for switches over the event union. Only reachable
 * at runtime when an untyped caller hands in a variant the model lacks.
 */
export function assertNever(value: never, operation: string): never {
  const received: unknown = value;
  const type =
    typeof received === "object" && received !== null && "type" in received
      ? String(received.type)
      : typeof received;
  throw new TransformError("NotSupported", operation, `Unsupported event type: ${type}`);
}
