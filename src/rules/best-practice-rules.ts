/**
 * Opt-in best-practice rules; enabled with `--best-practices`
 */

import type { ServiceRule } from './types';
import { RuleCategory } from './types';

export const missingHealthcheckRule: ServiceRule = {
  id: 'missing-healthcheck',
  name: 'Missing healthcheck',
  category: RuleCategory.BEST_PRACTICE,
  description: 'Without a healthcheck the runtime cannot tell a hung service from a healthy one',
  remediation: 'Add a healthcheck with a test command that exercises the service',
  scope: 'service',
  checkService: (service) =>
    service.hasHealthcheck
      ? []
      : [{ severity: 'INFO', message: `Service '${service.name}' does not define a healthcheck` }],
};

export const missingRestartPolicyRule: ServiceRule = {
  id: 'missing-restart-policy',
  name: 'Missing restart policy',
  category: RuleCategory.BEST_PRACTICE,
  description: 'Services without a restart policy stay down after a crash or host reboot',
  remediation: 'Set restart: unless-stopped',
  scope: 'service',
  checkService: (service) =>
    service.restartPolicy === undefined
      ? [{ severity: 'LOW', message: `Service '${service.name}' has no restart policy` }]
      : [],
};

export const BEST_PRACTICE_RULES: readonly ServiceRule[] = [
  missingHealthcheckRule,
  missingRestartPolicyRule,
];
