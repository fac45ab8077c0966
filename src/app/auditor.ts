/**
 * Auditor
 *
 * Runs read → parse → normalize → evaluate for each file. Files are audited
 * concurrently and each produces its own partial result; the aggregator
 * restores input order.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { Logger } from 'pino';
import { createFinding, type Finding } from '@/types';
import { extractErrorMessage } from '@/lib/errors';
import { createSilentLogger, createTimer } from '@/lib/logger';
import { parseManifest } from '@/manifest/normalizer';
import { RuleCategory } from '@/rules/types';
import type { RuleEngine } from '@/rules/engine';
import { aggregateReport, type AuditReport, type FileAuditResult } from '@/report/aggregator';

/** Rule id recorded on findings for files that could not be processed */
export const FILE_PROCESSING_RULE_ID = 'file-processing';

export interface AuditOptions {
  engine: RuleEngine;
  /** Directory relative paths are read from; defaults to process.cwd() */
  cwd?: string;
  logger?: Logger;
}

function fileProcessingFinding(path: string, reason: string): Finding {
  return createFinding({
    severity: 'ERROR',
    category: RuleCategory.FILE_PROCESSING,
    message: `Failed to process ${path}: ${reason}`,
    sourceFile: path,
    ruleId: FILE_PROCESSING_RULE_ID,
  });
}

/**
 * Audit one manifest. Never rejects: unreadable or malformed files become a
 * single ERROR finding.
 */
export async function auditFile(path: string, options: AuditOptions): Promise<FileAuditResult> {
  const logger = options.logger ?? createSilentLogger();
  const location = resolve(options.cwd ?? process.cwd(), path);

  let content: string;
  try {
    content = await readFile(location, 'utf-8');
  } catch (error) {
    const reason = extractErrorMessage(error);
    logger.warn({ file: path, error: reason }, 'Manifest is not readable');
    return { path, findings: [fileProcessingFinding(path, reason)] };
  }

  const parsed = parseManifest(content, path);
  if (!parsed.ok) {
    logger.warn({ file: path, error: parsed.error, guidance: parsed.guidance }, 'Manifest is malformed');
    return { path, findings: [fileProcessingFinding(path, parsed.error)] };
  }

  const findings = options.engine.evaluate(parsed.value);
  logger.debug({ file: path, findings: findings.length }, 'Audited manifest');
  return { path, findings };
}

/**
 * Audit every file concurrently and aggregate the results in input order
 */
export async function runAudit(paths: readonly string[], options: AuditOptions): Promise<AuditReport> {
  const logger = options.logger ?? createSilentLogger();
  const timer = createTimer(logger, 'audit', { files: paths.length });

  const results = await Promise.all(paths.map((path) => auditFile(path, { ...options, logger })));
  const report = aggregateReport(results);

  timer.end({ findings: report.findings.length });
  return report;
}
