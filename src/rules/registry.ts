/**
 * Statically registered rule sets
 */

import { BEST_PRACTICE_RULES } from './best-practice-rules';
import {
  alwaysRestartRule,
  dangerousCapabilitiesRule,
  missingHardeningRule,
  privilegedCommandRule,
  privilegedModeRule,
  rootUserRule,
} from './container-rules';
import { unpinnedImageTagRule, untrustedRegistryRule } from './image-rules';
import {
  exposedPortsRule,
  externalNetworksRule,
  hostNetworkRule,
  implicitDefaultNetworkRule,
} from './network-rules';
import { hardcodedSecretsRule } from './secret-rules';
import type { AuditRule } from './types';
import { broadFilesystemMountsRule, dangerousMountsRule } from './volume-rules';

/**
 * The canonical security rule set, evaluated on every run
 */
export const SECURITY_RULES: readonly AuditRule[] = [
  privilegedModeRule,
  dangerousCapabilitiesRule,
  privilegedCommandRule,
  hostNetworkRule,
  dangerousMountsRule,
  broadFilesystemMountsRule,
  hardcodedSecretsRule,
  rootUserRule,
  missingHardeningRule,
  implicitDefaultNetworkRule,
  externalNetworksRule,
  exposedPortsRule,
  alwaysRestartRule,
  unpinnedImageTagRule,
  untrustedRegistryRule,
];

/**
 * Every rule that can be registered, for id lookups and profile validation
 */
export const ALL_RULES: readonly AuditRule[] = [...SECURITY_RULES, ...BEST_PRACTICE_RULES];

/**
 * Select the rules for a run
 */
export function selectRules(options: { bestPractices?: boolean } = {}): readonly AuditRule[] {
  return options.bestPractices ? ALL_RULES : SECURITY_RULES;
}

export function getRule(id: string): AuditRule | undefined {
  return ALL_RULES.find((rule) => rule.id === id);
}

export function listRuleIds(rules: readonly AuditRule[] = ALL_RULES): string[] {
  return rules.map((rule) => rule.id);
}
