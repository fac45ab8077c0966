/**
 * Default rule tables and helpers to extend them per run
 */

import {
  ALL_INTERFACE_ADDRESSES,
  BROAD_MOUNT_PREFIXES,
  BROAD_MOUNT_ROOT,
  DANGEROUS_CAPABILITIES,
  PRIVILEGED_FLAG,
  SECRET_KEY_PATTERNS,
  SECRET_PLACEHOLDERS,
  SENSITIVE_MOUNTS,
  SENSITIVE_PORTS,
  TRUSTED_REGISTRIES,
} from '@/config/constants';
import type { RuleTables } from './types';

export const DEFAULT_RULE_TABLES: RuleTables = {
  dangerousCapabilities: DANGEROUS_CAPABILITIES,
  sensitiveMounts: SENSITIVE_MOUNTS,
  broadMountRoot: BROAD_MOUNT_ROOT,
  broadMountPrefixes: BROAD_MOUNT_PREFIXES,
  secretKeyPatterns: SECRET_KEY_PATTERNS,
  secretPlaceholders: SECRET_PLACEHOLDERS,
  sensitivePorts: SENSITIVE_PORTS,
  allInterfaceAddresses: ALL_INTERFACE_ADDRESSES,
  trustedRegistries: TRUSTED_REGISTRIES,
  privilegedFlag: PRIVILEGED_FLAG,
};

/**
 * Return tables whose trusted-registry allowlist also contains `registries`
 */
export function withTrustedRegistries(tables: RuleTables, registries: readonly string[]): RuleTables {
  const extra = registries.map((registry) => registry.trim().toLowerCase()).filter(Boolean);
  if (extra.length === 0) {
    return tables;
  }
  return {
    ...tables,
    trustedRegistries: [...new Set([...tables.trustedRegistries, ...extra])],
  };
}
