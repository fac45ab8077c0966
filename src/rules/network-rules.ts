/**
 * Network rules: host networking, default network, external networks, published ports
 */

import { isUnresolved } from '@/manifest/substitution';
import type { PortBinding, PortRange, UnresolvedValue } from '@/manifest/types';
import type { DocumentRule, RuleHit, ServiceRule } from './types';
import { RuleCategory } from './types';

function formatRange(range: PortRange | UnresolvedValue): string {
  if (isUnresolved(range)) return range.expression;
  return range.start === range.end ? `${range.start}` : `${range.start}-${range.end}`;
}

/**
 * Render a binding the way it is written in short syntax, e.g. `8080:80` or `53:53/udp`
 */
export function formatPortBinding(binding: PortBinding): string {
  const ports = binding.hostPort
    ? `${formatRange(binding.hostPort)}:${formatRange(binding.containerPort)}`
    : formatRange(binding.containerPort);
  return binding.protocol === 'tcp' ? ports : `${ports}/${binding.protocol}`;
}

function findSensitivePort(
  range: PortRange | UnresolvedValue | undefined,
  sensitive: readonly number[],
): number | undefined {
  // An unresolved port could be anything; only literal ports are judged
  if (!range || isUnresolved(range)) return undefined;
  return sensitive.find((port) => port >= range.start && port <= range.end);
}

export const hostNetworkRule: ServiceRule = {
  id: 'host-network',
  name: 'Host network mode',
  category: RuleCategory.NETWORK,
  description: 'Host networking removes network isolation between container and host',
  remediation: 'Use a bridge network and publish only the required ports',
  scope: 'service',
  checkService: (service) =>
    service.networkMode === 'host'
      ? [{ severity: 'MEDIUM', message: `Service '${service.name}' uses host network mode` }]
      : [],
};

export const implicitDefaultNetworkRule: ServiceRule = {
  id: 'implicit-default-network',
  name: 'Implicit default network',
  category: RuleCategory.NETWORK,
  description: 'Services on the default network can reach every other service in the project',
  remediation: 'Attach the service to an explicit, purpose-specific network',
  scope: 'service',
  checkService: (service) =>
    service.explicitNetworks.size === 0 && service.networkMode === undefined
      ? [
          {
            severity: 'LOW',
            message: `Service '${service.name}' uses the default network (consider an explicit network)`,
          },
        ]
      : [],
};

export const externalNetworksRule: DocumentRule = {
  id: 'external-networks',
  name: 'External network declared',
  category: RuleCategory.NETWORK,
  description: 'External networks are managed outside this manifest and may be shared',
  remediation: 'Review who else is attached to the external network',
  scope: 'document',
  checkDocument: ({ document }) =>
    [...document.networks.values()]
      .filter((network) => network.external)
      .map(
        (network): RuleHit => ({
          severity: 'INFO',
          message: `Network '${network.name}' is external; ensure it is properly secured`,
        }),
      ),
};

export const exposedPortsRule: ServiceRule = {
  id: 'exposed-ports',
  name: 'Exposed ports',
  category: RuleCategory.NETWORK,
  description: 'Ports published on every interface, or well-known admin/database ports, widen the attack surface',
  remediation: 'Bind published ports to 127.0.0.1 or a specific interface, and avoid publishing admin ports',
  scope: 'service',
  checkService: (service, { tables }): RuleHit[] =>
    service.ports.flatMap((binding) => {
      const hits: RuleHit[] = [];

      if (tables.allInterfaceAddresses.includes(binding.hostInterface)) {
        hits.push({
          severity: 'MEDIUM',
          message: `Service '${service.name}' exposes port ${formatPortBinding(binding)} to all interfaces`,
        });
      }

      const sensitive =
        findSensitivePort(binding.containerPort, tables.sensitivePorts) ??
        findSensitivePort(binding.hostPort, tables.sensitivePorts);
      if (sensitive !== undefined) {
        hits.push({
          severity: 'MEDIUM',
          message: `Service '${service.name}' exposes sensitive port ${sensitive}`,
        });
      }

      return hits;
    }),
};
