/**
 * Core Result type used across the audit pipeline.
 *
 * Expected failures (unreadable files, malformed manifests, invalid profiles)
 * travel as values; exceptions are reserved for programming errors and for the
 * error taxonomy in `@/lib/errors`.
 */

/**
 * Structured guidance attached to a failed result
 */
export interface ErrorGuidance {
  /** Short description of what went wrong */
  message?: string;
  /** Hint about the likely cause */
  hint?: string;
  /** Suggested remediation step */
  resolution?: string;
  /** Extra machine-readable context */
  details?: Record<string, unknown>;
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: string; guidance?: ErrorGuidance };

/**
 * Create a successful result
 */
export const Success = <T>(value: T): Result<T> => ({ ok: true, value });

/**
 * Create a failed result with optional guidance
 */
export const Failure = <T>(error: string, guidance?: ErrorGuidance): Result<T> =>
  guidance ? { ok: false, error, guidance } : { ok: false, error };
