/**
 * Volume rules: sensitive host paths and broad filesystem access
 */

import type { RuleHit, ServiceRule } from './types';
import { RuleCategory } from './types';

/**
 * Drop trailing slashes so `/proc/` and `/proc` compare equal; `/` stays `/`
 */
function trimTrailingSlash(path: string): string {
  const trimmed = path.replace(/\/+$/, '');
  return trimmed === '' && path.startsWith('/') ? '/' : trimmed;
}

export const dangerousMountsRule: ServiceRule = {
  id: 'dangerous-mounts',
  name: 'Dangerous bind mounts',
  category: RuleCategory.VOLUME,
  description: 'The Docker socket and kernel or credential paths give containers control over the host',
  remediation: 'Remove the mount, or use a socket proxy with a restricted API for the Docker socket',
  scope: 'service',
  checkService: (service, { tables }) =>
    service.volumeMounts.flatMap((mount): RuleHit[] => {
      if (mount.kind !== 'bindMount') return [];
      const source = trimTrailingSlash(mount.source);
      const match = tables.sensitiveMounts.find((entry) => entry.path === source);
      return match
        ? [
            {
              severity: match.severity,
              message: `Service '${service.name}' mounts dangerous path: ${match.path}`,
            },
          ]
        : [];
    }),
};

export const broadFilesystemMountsRule: ServiceRule = {
  id: 'broad-filesystem-mounts',
  name: 'Broad filesystem mounts',
  category: RuleCategory.VOLUME,
  description: 'Mounting the root filesystem or home directories exposes far more than a service needs',
  remediation: 'Mount only the specific directory the service needs, read-only where possible',
  scope: 'service',
  checkService: (service, { tables }) =>
    service.volumeMounts.flatMap((mount): RuleHit[] => {
      if (mount.kind !== 'bindMount') return [];
      const source = trimTrailingSlash(mount.source);
      const broad =
        source === tables.broadMountRoot ||
        tables.broadMountPrefixes.some((prefix) => source.startsWith(prefix));
      return broad
        ? [
            {
              severity: 'HIGH',
              message: `Service '${service.name}' has broad filesystem access: ${mount.source}`,
            },
          ]
        : [];
    }),
};
