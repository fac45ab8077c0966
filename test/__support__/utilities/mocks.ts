/**
 * Test utilities for building manifest models and capturing logs
 */

import pino, { type Logger } from 'pino';
import type {
  ManifestDocument,
  NetworkDeclaration,
  ServiceDefinition,
} from '@/manifest/types';

/**
 * A service with nothing set beyond defaults; every field can be overridden
 */
export function createService(
  name: string,
  overrides: Partial<Omit<ServiceDefinition, 'name'>> = {},
): ServiceDefinition {
  return {
    name,
    privileged: false,
    capabilitiesAdded: new Set(),
    volumeMounts: [],
    environment: new Map(),
    securityOptions: new Set(),
    ports: [],
    explicitNetworks: new Set(),
    dependsOn: new Set(),
    hasHealthcheck: false,
    ...overrides,
  };
}

/**
 * A service that no security rule reports on
 */
export function createHardenedService(
  name: string,
  overrides: Partial<Omit<ServiceDefinition, 'name'>> = {},
): ServiceDefinition {
  return createService(name, {
    image: { raw: 'nginx:1.27', repository: 'nginx', tag: '1.27' },
    user: '1000:1000',
    securityOptions: new Set(['no-new-privileges:true', 'apparmor:docker-default']),
    explicitNetworks: new Set(['backend']),
    restartPolicy: 'unless-stopped',
    hasHealthcheck: true,
    ...overrides,
  });
}

export function createDocument(
  services: ServiceDefinition[],
  options: { path?: string; networks?: NetworkDeclaration[] } = {},
): ManifestDocument {
  return {
    path: options.path ?? 'docker-compose.yml',
    services: new Map(services.map((service) => [service.name, service])),
    networks: new Map((options.networks ?? []).map((network) => [network.name, network])),
    volumes: new Set(),
  };
}

export interface CapturedLogger {
  logger: Logger;
  records: Array<Record<string, unknown>>;
}

/**
 * Pino logger writing parsed records into an array
 */
export function createCapturingLogger(level = 'debug'): CapturedLogger {
  const records: Array<Record<string, unknown>> = [];
  const logger = pino(
    { level, formatters: { level: (label) => ({ level: label }) } },
    {
      write(line: string): void {
        records.push(JSON.parse(line));
      },
    },
  );
  return { logger, records };
}
