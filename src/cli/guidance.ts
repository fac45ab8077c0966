/**
 * Contextual guidance module for CLI error handling
 * Provides troubleshooting steps based on error types
 */

import type { ErrorGuidance } from '@/types';
import { AuditError } from '@/lib/errors';

/**
 * Error categories for contextual guidance
 */
const ErrorCategory = {
  NotFound: 'not-found',
  Permission: 'permission',
  Profile: 'profile',
} as const;
type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/**
 * Guidance messages organized by category
 */
const GUIDANCE_MESSAGES = {
  [ErrorCategory.NotFound]: {
    title: '💡 File not found:',
    steps: [
      'Check the path relative to --cwd',
      'Omit paths to discover docker-compose*.yml and compose.y(a)ml files',
    ],
  },
  [ErrorCategory.Permission]: {
    title: '💡 Permission issue detected:',
    steps: [
      'Check file/directory permissions: ls -la',
      'Write the report elsewhere with --report-file <path>, or skip it with --no-report-file',
    ],
  },
  [ErrorCategory.Profile]: {
    title: '💡 Policy profile issue:',
    steps: [
      'List built-in profiles: compose-audit --list-profiles',
      'List rule ids usable in exemptRules: compose-audit --list-rules',
      'Allowed profile keys: name, description, failOn, exemptRules, exemptKeywords',
    ],
  },
};

/**
 * General troubleshooting steps shown for all errors
 */
const GENERAL_TROUBLESHOOTING = [
  'Enable debug logging: --log-level debug',
  'Validate a manifest: docker compose -f <file> config',
];

function detectErrorCategory(error: Error): ErrorCategory | null {
  const message = error.message.toLowerCase();

  if (message.includes('profile')) {
    return ErrorCategory.Profile;
  }

  if (message.includes('enoent') || message.includes('not found')) {
    return ErrorCategory.NotFound;
  }

  if (message.includes('permission') || message.includes('eacces')) {
    return ErrorCategory.Permission;
  }

  return null;
}

function formatErrorGuidance(guidance: ErrorGuidance): string[] {
  const lines: string[] = [];
  if (guidance.hint) lines.push(`  Hint: ${guidance.hint}`);
  if (guidance.resolution) lines.push(`  Resolution: ${guidance.resolution}`);
  return lines;
}

/**
 * Render guidance for an error that ended the run
 */
export function formatContextualGuidance(error: Error): string {
  const parts = [`🔍 Error: ${error.message}`];

  if (error instanceof AuditError && error.guidance) {
    parts.push(...formatErrorGuidance(error.guidance));
  }

  const category = detectErrorCategory(error);
  if (category) {
    const guidance = GUIDANCE_MESSAGES[category];
    parts.push('', guidance.title);
    guidance.steps.forEach((step) => parts.push(`  • ${step}`));
  }

  parts.push('', '🛠️ General troubleshooting steps:');
  GENERAL_TROUBLESHOOTING.forEach((step, index) => parts.push(`  ${index + 1}. ${step}`));

  return parts.join('\n');
}
