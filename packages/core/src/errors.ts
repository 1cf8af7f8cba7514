/**
 * packages/core/src/errors.ts - Error type shared by every Tessera package.
 *
 * Configuration and addressing mistakes are programmer errors: they surface at
 * the call site that introduced them and are never retried.
 */

// =============================================================================
// TesseraErrorCode Union
// =============================================================================

/**
 * Deterministic error codes for all contract violations.
 * These are surfaced as TesseraError instances.
 */
export type TesseraErrorCode =
  | "TESSERA_INVALID_TIME_WINDOW"
  | "TESSERA_INVALID_CURVE"
  | "TESSERA_INVALID_DURATION"
  | "TESSERA_INVALID_ELEMENT_ID"
  | "TESSERA_OUT_OF_BOUNDS"
  | "TESSERA_UNKNOWN_TEXTURE"
  | "TESSERA_UNHANDLED_ELEMENT"
  | "TESSERA_INVALID_CONFIG"
  | "TESSERA_BACKEND_ERROR";

// =============================================================================
// TesseraError Class
// =============================================================================

export class TesseraError extends Error {
  override readonly name = "TesseraError";
  readonly code: TesseraErrorCode;

  constructor(code: TesseraErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TesseraError);
    }
  }
}

/** Coerce any thrown value into an Error instance. */
export function safeErr(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/** Format a thrown value for log lines and error details. */
export function describeThrown(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
