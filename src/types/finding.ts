/**
 * Finding and severity types shared by the rule engine, the aggregator and
 * the policy gate.
 */

import { z } from 'zod';

/**
 * Ordinal risk classification plus ERROR for processing failures
 */
export const severitySchema = z.enum(['HIGH', 'MEDIUM', 'LOW', 'INFO', 'ERROR']);

export type Severity = z.infer<typeof severitySchema>;

/**
 * One reported rule violation. Created once by the engine, never mutated.
 */
export interface Finding {
  readonly severity: Severity;
  /** Free-form label, e.g. "Container Security" */
  readonly category: string;
  readonly message: string;
  readonly sourceFile: string;
  readonly serviceName?: string;
  /** Stable identifier of the rule that produced the finding */
  readonly ruleId: string;
}

/**
 * Create a frozen finding, omitting an absent service name
 */
export function createFinding(fields: {
  severity: Severity;
  category: string;
  message: string;
  sourceFile: string;
  ruleId: string;
  serviceName?: string | undefined;
}): Finding {
  const finding: Finding = {
    severity: fields.severity,
    category: fields.category,
    message: fields.message,
    sourceFile: fields.sourceFile,
    ruleId: fields.ruleId,
    ...(fields.serviceName !== undefined && { serviceName: fields.serviceName }),
  };
  return Object.freeze(finding);
}
