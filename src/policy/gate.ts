/**
 * Policy Gate
 *
 * Turns a report and a profile into the PASS/FAIL decision that sets the
 * process exit status.
 */

import type { Finding } from '@/types';
import type { PolicyProfile } from '@/config/policy-profile';
import type { AuditReport } from '@/report/aggregator';

export const PolicyOutcome = {
  PASS: 'PASS',
  FAIL: 'FAIL',
} as const;
export type PolicyOutcome = (typeof PolicyOutcome)[keyof typeof PolicyOutcome];

export interface PolicyDecision {
  readonly outcome: PolicyOutcome;
  /** Findings at a failOn severity that no exemption covers */
  readonly failingFindings: readonly Finding[];
  /** Findings at a failOn severity accepted by the profile */
  readonly exemptedFindings: readonly Finding[];
  readonly profile: PolicyProfile;
}

/**
 * Whether the profile accepts this finding as a known risk
 */
export function isExempted(finding: Finding, profile: PolicyProfile): boolean {
  if (profile.exemptRules.includes(finding.ruleId)) {
    return true;
  }
  const message = finding.message.toLowerCase();
  return profile.exemptKeywords.some((keyword) => message.includes(keyword.toLowerCase()));
}

export function decidePolicy(report: AuditReport, profile: PolicyProfile): PolicyDecision {
  const failingFindings: Finding[] = [];
  const exemptedFindings: Finding[] = [];

  for (const finding of report.findings) {
    if (!profile.failOn.includes(finding.severity)) {
      continue;
    }
    if (isExempted(finding, profile)) {
      exemptedFindings.push(finding);
    } else {
      failingFindings.push(finding);
    }
  }

  return {
    outcome: failingFindings.length > 0 ? PolicyOutcome.FAIL : PolicyOutcome.PASS,
    failingFindings,
    exemptedFindings,
    profile,
  };
}
