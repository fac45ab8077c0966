/**
 * Text formatters for the audit report and the policy verdict
 */

import { OUTPUT, SEVERITY_ICONS, SEVERITY_ORDER } from '@/config/constants';
import type { PolicyDecision } from '@/policy/gate';
import type { AuditReport } from './aggregator';

const RECOMMENDATIONS = [
  'Address HIGH and MEDIUM severity findings immediately',
  'Review volume mounts for unnecessary host access',
  "Use specific image tags instead of 'latest'",
  'Implement proper user configurations',
  "Add security hardening options like 'no-new-privileges'",
  'Consider using secrets management for sensitive data',
];

/**
 * Human-readable report: totals, counts per severity, findings grouped by
 * severity, then a remediation checklist
 */
export function formatReportText(report: AuditReport): string {
  const banner = '='.repeat(OUTPUT.BANNER_WIDTH);
  const parts: string[] = [
    banner,
    'SECURITY AUDIT REPORT',
    banner,
    `Files scanned: ${report.filesScanned}`,
    `Total findings: ${report.findings.length}`,
    '',
    'Findings by severity:',
  ];

  for (const severity of SEVERITY_ORDER) {
    const count = report.severityCounts[severity];
    if (count > 0) {
      parts.push(`  ${SEVERITY_ICONS[severity]} ${severity}: ${count}`);
    }
  }

  if (report.findings.length === 0) {
    parts.push('', '🎉 No security issues found!');
    return parts.join('\n');
  }

  parts.push('', 'Detailed findings:', '-'.repeat(OUTPUT.BANNER_WIDTH));
  for (const severity of SEVERITY_ORDER) {
    const group = report.findings.filter((finding) => finding.severity === severity);
    if (group.length === 0) continue;

    parts.push('', `${severity} SEVERITY:`);
    for (const finding of group) {
      const fileInfo = finding.sourceFile ? ` (${finding.sourceFile})` : '';
      parts.push(`  • ${finding.message}${fileInfo}`);
    }
  }

  parts.push('', 'Recommendations:', '-'.repeat(OUTPUT.SECTION_WIDTH));
  RECOMMENDATIONS.forEach((step, index) => parts.push(`${index + 1}. ${step}`));

  return parts.join('\n');
}

/**
 * Gate verdict: the failing findings, or a pass summary naming the profile
 */
export function formatPolicyDecision(decision: PolicyDecision): string {
  const { profile } = decision;
  const failOn = profile.failOn.join(', ');

  if (decision.outcome === 'FAIL') {
    const parts = [
      `💥 Policy '${profile.name}' failed: ${decision.failingFindings.length} blocking finding(s) at ${failOn}`,
    ];
    for (const finding of decision.failingFindings) {
      parts.push(`  • ${finding.message} (${finding.sourceFile})`);
    }
    return parts.join('\n');
  }

  const parts = [`✅ Policy '${profile.name}' passed: no blocking findings at ${failOn}`];
  if (decision.exemptedFindings.length > 0) {
    parts.push(`ℹ️  ${decision.exemptedFindings.length} finding(s) accepted by the profile`);
  }
  return parts.join('\n');
}
