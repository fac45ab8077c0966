/**
 * Error taxonomy for the audit pipeline.
 *
 * Only PolicyConfigurationError is allowed to end a run; parse and rule
 * failures are downgraded to ERROR findings at their boundary.
 */

import type { ErrorGuidance } from '@/types';

export const AuditErrorCode = {
  PARSE_ERROR: 'PARSE_ERROR',
  RULE_EVALUATION_ERROR: 'RULE_EVALUATION_ERROR',
  POLICY_CONFIGURATION_ERROR: 'POLICY_CONFIGURATION_ERROR',
} as const;
export type AuditErrorCode = (typeof AuditErrorCode)[keyof typeof AuditErrorCode];

/**
 * Base class for all audit errors
 */
export abstract class AuditError extends Error {
  abstract readonly code: AuditErrorCode;

  constructor(
    message: string,
    readonly guidance?: ErrorGuidance,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A manifest could not be read or is not a well-formed manifest
 */
export class ParseError extends AuditError {
  readonly code = AuditErrorCode.PARSE_ERROR;

  constructor(
    message: string,
    readonly filePath?: string,
    guidance?: ErrorGuidance,
    options?: { cause?: unknown },
  ) {
    super(message, guidance, options);
  }
}

/**
 * A single rule threw while inspecting a single service (or document)
 */
export class RuleEvaluationError extends AuditError {
  readonly code = AuditErrorCode.RULE_EVALUATION_ERROR;

  constructor(
    readonly ruleId: string,
    readonly serviceName: string | undefined,
    cause: unknown,
  ) {
    super(
      serviceName
        ? `Rule '${ruleId}' failed for service '${serviceName}': ${extractErrorMessage(cause)}`
        : `Rule '${ruleId}' failed: ${extractErrorMessage(cause)}`,
      undefined,
      { cause },
    );
  }
}

/**
 * The selected policy profile is unknown or invalid; fatal for the run
 */
export class PolicyConfigurationError extends AuditError {
  readonly code = AuditErrorCode.POLICY_CONFIGURATION_ERROR;
}

/**
 * Extract a readable message from any thrown value
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  // Errors from another realm (Node internals under a test VM) fail instanceof
  if (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string'
  ) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

/**
 * Build an ErrorGuidance object, omitting absent fields
 */
export function createErrorGuidance(
  message: string,
  hint?: string,
  resolution?: string,
  details?: Record<string, unknown>,
): ErrorGuidance {
  return {
    message,
    ...(hint && { hint }),
    ...(resolution && { resolution }),
    ...(details && { details }),
  };
}
