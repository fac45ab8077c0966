/**
 * Secret management rules
 */

import type { EnvValue } from '@/manifest/types';
import type { RuleHit, RuleTables, ServiceRule } from './types';
import { RuleCategory } from './types';

function isSecretKey(key: string, tables: RuleTables): boolean {
  const lower = key.toLowerCase();
  return tables.secretKeyPatterns.some((pattern) => lower.includes(pattern));
}

/**
 * A hardcoded secret is a non-empty literal that is not an obvious placeholder;
 * substitution references and inherited values are resolved outside the manifest.
 */
function isHardcodedValue(value: EnvValue, tables: RuleTables): boolean {
  if (value.kind !== 'literal' || value.value.length === 0) {
    return false;
  }
  return !tables.secretPlaceholders.includes(value.value.toLowerCase());
}

export const hardcodedSecretsRule: ServiceRule = {
  id: 'hardcoded-secrets',
  name: 'Hardcoded secrets',
  category: RuleCategory.SECRET,
  description: 'Secret-looking environment variables should not carry literal values',
  remediation: 'Reference the value with ${VAR} from an .env file, or use Compose secrets',
  scope: 'service',
  checkService: (service, { tables }) =>
    [...service.environment]
      .filter(([key, value]) => isSecretKey(key, tables) && isHardcodedValue(value, tables))
      .map(
        ([key]): RuleHit => ({
          severity: 'HIGH',
          message: `Service '${service.name}' may have hardcoded secret in ${key}`,
        }),
      ),
};
