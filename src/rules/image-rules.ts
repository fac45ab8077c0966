/**
 * Image rules: tag pinning and registry trust
 */

import { DEFAULT_TAG } from '@/manifest/image-reference';
import { containsSubstitution } from '@/manifest/substitution';
import type { RuleTables, ServiceRule } from './types';
import { RuleCategory } from './types';

function isTrustedRegistry(registry: string, tables: RuleTables): boolean {
  const host = registry.toLowerCase();
  return tables.trustedRegistries.some((trusted) => host === trusted || host.endsWith(`.${trusted}`));
}

export const unpinnedImageTagRule: ServiceRule = {
  id: 'unpinned-image-tag',
  name: 'Unpinned image tag',
  category: RuleCategory.IMAGE,
  description: "Images without a tag resolve to 'latest' and change underneath the deployment",
  remediation: 'Pin a specific version tag or digest',
  scope: 'service',
  checkService: (service) =>
    service.image &&
    service.image.tag === DEFAULT_TAG &&
    service.image.digest === undefined &&
    // `${IMAGE}` may carry its own tag
    !containsSubstitution(service.image.repository)
      ? [
          {
            severity: 'LOW',
            message: `Service '${service.name}' uses 'latest' tag or no tag specified`,
          },
        ]
      : [],
};

export const untrustedRegistryRule: ServiceRule = {
  id: 'untrusted-registry',
  name: 'Untrusted registry',
  category: RuleCategory.IMAGE,
  description: 'Images pulled from registries outside the allowlist have unknown provenance',
  remediation: 'Pull from a trusted registry or add your own registry with --trusted-registry',
  scope: 'service',
  checkService: (service, { tables }) => {
    const registry = service.image?.registry;
    // Registries built from substitutions cannot be judged statically
    if (registry === undefined || registry.includes('$') || isTrustedRegistry(registry, tables)) {
      return [];
    }
    return [
      {
        severity: 'MEDIUM',
        message: `Service '${service.name}' uses image from potentially untrusted registry: ${registry}`,
      },
    ];
  },
};
