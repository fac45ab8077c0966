/**
 * Shared Runtime Logging - audit run lifecycle
 *
 * Keeps the start/complete/failure records of a run in one consistent shape
 * so log pipelines can pick them up by message.
 */

import type { Logger } from 'pino';
import type { AuditReport } from '@/report/aggregator';
import type { PolicyDecision } from '@/policy/gate';

/**
 * Run startup information
 */
export interface AuditStartInfo {
  version: string;
  cwd: string;
  profile: string;
  /** Files selected for the run */
  files: number;
  rules: number;
  /** Whether the files were discovered rather than given explicitly */
  discovered: boolean;
}

export function logAuditStart(info: AuditStartInfo, logger: Logger): void {
  logger.info(
    {
      version: info.version,
      cwd: info.cwd,
      profile: info.profile,
      files: info.files,
      rules: info.rules,
      discovered: info.discovered,
    },
    'Starting compose security audit',
  );
}

export function logAuditComplete(
  report: AuditReport,
  decision: PolicyDecision,
  logger: Logger,
  durationMs?: number,
): void {
  logger.info(
    {
      filesScanned: report.filesScanned,
      findings: report.findings.length,
      summary: report.severityCounts,
      outcome: decision.outcome,
      failing: decision.failingFindings.length,
      exempted: decision.exemptedFindings.length,
      ...(durationMs !== undefined && { durationMs }),
    },
    'Completed compose security audit',
  );
}

/**
 * Log a failure that ends the run
 */
export function logAuditFailure(
  error: string | Error,
  logger: Logger,
  context?: Record<string, unknown>,
): void {
  const errorMessage = typeof error === 'string' ? error : error.message;
  const logData = context ? { ...context, error: errorMessage } : { error: errorMessage };
  logger.error(logData, 'Compose security audit failed');
}
