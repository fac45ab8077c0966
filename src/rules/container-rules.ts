/**
 * Container runtime rules: privilege, capabilities, user, hardening, restart
 */

import type { ServiceRule, RuleHit } from './types';
import { RuleCategory } from './types';

const ROOT_USERS = new Set(['root', '0']);
const NO_NEW_PRIVILEGES = /^no-new-privileges(?:[:=]true)?$/;
const MAC_PROFILE = /apparmor|selinux|^label[:=]/;
const MAC_DISABLED = /unconfined|disable/;

export const privilegedModeRule: ServiceRule = {
  id: 'privileged-mode',
  name: 'Privileged containers',
  category: RuleCategory.CONTAINER,
  description: 'Privileged containers have full access to host devices and kernel features',
  remediation: 'Remove `privileged: true` and grant only the capabilities the service needs',
  scope: 'service',
  checkService: (service) =>
    service.privileged
      ? [{ severity: 'HIGH', message: `Service '${service.name}' runs in privileged mode` }]
      : [],
};

export const dangerousCapabilitiesRule: ServiceRule = {
  id: 'dangerous-capabilities',
  name: 'Dangerous capabilities',
  category: RuleCategory.CONTAINER,
  description: 'Some Linux capabilities are close to full root on the host',
  remediation: 'Drop SYS_ADMIN, NET_ADMIN, SYS_PTRACE and SYS_MODULE from cap_add',
  scope: 'service',
  checkService: (service, { tables }) =>
    [...service.capabilitiesAdded]
      .filter((capability) => tables.dangerousCapabilities.includes(capability))
      .map((capability): RuleHit => ({
        severity: 'MEDIUM',
        message: `Service '${service.name}' has dangerous capability: ${capability}`,
      })),
};

export const privilegedCommandRule: ServiceRule = {
  id: 'privileged-command',
  name: 'Privileged via command',
  category: RuleCategory.CONTAINER,
  description: 'Commands that pass --privileged start privileged nested containers',
  remediation: 'Remove --privileged from the service command',
  scope: 'service',
  checkService: (service, { tables }) =>
    service.command?.includes(tables.privilegedFlag)
      ? [
          {
            severity: 'HIGH',
            message: `Service '${service.name}' uses ${tables.privilegedFlag} in command`,
          },
        ]
      : [],
};

export const rootUserRule: ServiceRule = {
  id: 'root-user',
  name: 'Root user',
  category: RuleCategory.CONTAINER,
  description: 'Containers running as root turn a container escape into host root',
  remediation: 'Set `user:` to an unprivileged UID:GID',
  scope: 'service',
  checkService: (service): RuleHit[] => {
    if (service.user === undefined) {
      return [
        {
          severity: 'LOW',
          message: `Service '${service.name}' does not specify a user (may run as root)`,
        },
      ];
    }

    // `root:root` and `0:0` name the group too
    const userPart = service.user.split(':')[0]?.trim() ?? '';
    return ROOT_USERS.has(userPart)
      ? [{ severity: 'MEDIUM', message: `Service '${service.name}' explicitly runs as root` }]
      : [];
  },
};

export const missingHardeningRule: ServiceRule = {
  id: 'missing-hardening',
  name: 'Missing hardening options',
  category: RuleCategory.CONTAINER,
  description: 'security_opt should block privilege escalation and confine the process',
  remediation: "Add 'no-new-privileges:true' and an AppArmor or SELinux profile to security_opt",
  scope: 'service',
  checkService: (service): RuleHit[] => {
    const options = [...service.securityOptions].map((option) =>
      option.toLowerCase().replace(/\s+/g, ''),
    );
    const hits: RuleHit[] = [];

    if (!options.some((option) => NO_NEW_PRIVILEGES.test(option))) {
      hits.push({
        severity: 'LOW',
        message: `Service '${service.name}' is missing the 'no-new-privileges:true' security option`,
      });
    }

    if (!options.some((option) => MAC_PROFILE.test(option) && !MAC_DISABLED.test(option))) {
      hits.push({
        severity: 'INFO',
        message: `Service '${service.name}' could benefit from an AppArmor or SELinux profile`,
      });
    }

    return hits;
  },
};

export const alwaysRestartRule: ServiceRule = {
  id: 'always-restart',
  name: 'Always-restart policy',
  category: RuleCategory.CONTAINER,
  description: "'always' restarts a container even after it was stopped on purpose",
  remediation: "Use 'unless-stopped' instead of 'always'",
  scope: 'service',
  checkService: (service) =>
    service.restartPolicy === 'always'
      ? [
          {
            severity: 'LOW',
            message: `Service '${service.name}' uses 'always' restart policy (consider 'unless-stopped')`,
          },
        ]
      : [],
};
