/**
 * Report Aggregator
 *
 * Folds per-file partial results into one immutable AuditReport and renders
 * the machine-readable view of it.
 */

import type { Finding, Severity } from '@/types';
import { SEVERITY_ORDER } from '@/config/constants';

/**
 * Result of auditing one file; produced independently per file
 */
export interface FileAuditResult {
  readonly path: string;
  readonly findings: readonly Finding[];
}

export type SeverityCounts = Readonly<Record<Severity, number>>;

export interface AuditReport {
  readonly findings: readonly Finding[];
  /** Every severity is present, zero when unused */
  readonly severityCounts: SeverityCounts;
  readonly filesScanned: number;
}

export interface StructuredFinding {
  severity: Severity;
  category: string;
  message: string;
  file: string;
  service?: string;
  rule: string;
}

/**
 * JSON shape written to the report file and printed by `--format json`
 */
export interface StructuredReport {
  findings: StructuredFinding[];
  summary: Record<Severity, number>;
  total_files: number;
  total_findings: number;
}

export function emptySeverityCounts(): Record<Severity, number> {
  return { HIGH: 0, MEDIUM: 0, LOW: 0, INFO: 0, ERROR: 0 };
}

/**
 * Concatenate findings in file order and tally severities
 */
export function aggregateReport(fileResults: readonly FileAuditResult[]): AuditReport {
  const findings = fileResults.flatMap((result) => result.findings);
  const severityCounts = emptySeverityCounts();
  for (const finding of findings) {
    severityCounts[finding.severity] += 1;
  }

  return Object.freeze({
    findings: Object.freeze(findings),
    severityCounts: Object.freeze(severityCounts),
    filesScanned: fileResults.length,
  });
}

export function toStructuredReport(report: AuditReport): StructuredReport {
  const summary = emptySeverityCounts();
  for (const severity of SEVERITY_ORDER) {
    summary[severity] = report.severityCounts[severity];
  }

  return {
    findings: report.findings.map((finding) => ({
      severity: finding.severity,
      category: finding.category,
      message: finding.message,
      file: finding.sourceFile,
      ...(finding.serviceName !== undefined && { service: finding.serviceName }),
      rule: finding.ruleId,
    })),
    summary,
    total_files: report.filesScanned,
    total_findings: report.findings.length,
  };
}
