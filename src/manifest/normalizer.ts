/**
 * Manifest Normalizer
 *
 * Converts a raw, syntactically polymorphic Compose tree into the canonical
 * ManifestDocument. Only type coercion happens here; judging whether a value
 * is risky is left to the rule engine.
 */

import yaml from 'js-yaml';
import type { ZodError } from 'zod';
import { ParseError, createErrorGuidance, extractErrorMessage } from '@/lib/errors';
import { Failure, Success, type Result } from '@/types';
import { ALL_INTERFACES } from '@/config/constants';
import { parseImageReference } from './image-reference';
import {
  containsSubstitution,
  lastIndexOutsideSubstitutions,
  splitOutsideSubstitutions,
  unresolved,
} from './substitution';
import {
  rawManifestSchema,
  type RawEnvironment,
  type RawNetwork,
  type RawPort,
  type RawService,
  type RawVolume,
} from './schemas';
import {
  RESTART_POLICIES,
  type EnvValue,
  type ManifestDocument,
  type MountKind,
  type NetworkDeclaration,
  type PortBinding,
  type PortRange,
  type RestartPolicy,
  type ServiceDefinition,
  type UnresolvedValue,
  type VolumeMount,
} from './types';

const SUBSTITUTION_BRACED = /^\$\{/;
const SUBSTITUTION_BARE = /^\$[A-Za-z_][A-Za-z0-9_]*$/;
const PORT_RANGE = /^(\d+)(?:-(\d+))?$/;
const MAX_PORT = 65535;

// ===== Classification helpers =====

/**
 * A mount is a bind mount iff its source is an absolute or `./`-relative path.
 * A source that starts with a variable is left unclassified.
 */
export function classifyMountSource(source: string): MountKind {
  if (source.startsWith('$') && containsSubstitution(source)) {
    return 'substitution';
  }
  return source.startsWith('/') || source.startsWith('./') ? 'bindMount' : 'namedVolume';
}

/**
 * Classify an environment value; `$$` escapes stay literal
 */
export function classifyEnvValue(value: string): EnvValue {
  if (SUBSTITUTION_BRACED.test(value) || SUBSTITUTION_BARE.test(value)) {
    return { kind: 'substitution', expression: value };
  }
  return { kind: 'literal', value };
}

// ===== Field normalizers =====

function normalizeEnvironment(raw: RawEnvironment | null | undefined): Map<string, EnvValue> {
  const environment = new Map<string, EnvValue>();
  if (raw == null) {
    return environment;
  }

  if (Array.isArray(raw)) {
    for (const entry of raw) {
      const text = String(entry);
      const eq = text.indexOf('=');
      if (eq === -1) {
        environment.set(text, { kind: 'inherited' });
      } else {
        environment.set(text.slice(0, eq), classifyEnvValue(text.slice(eq + 1)));
      }
    }
    return environment;
  }

  for (const [key, value] of Object.entries(raw)) {
    environment.set(key, value === null ? { kind: 'inherited' } : classifyEnvValue(String(value)));
  }
  return environment;
}

function parseMountMode(flags: string | undefined): 'rw' | 'ro' {
  if (!flags) return 'rw';
  return flags.split(',').some((flag) => flag.trim() === 'ro') ? 'ro' : 'rw';
}

function normalizeVolume(raw: RawVolume, serviceName: string): VolumeMount {
  if (typeof raw !== 'string') {
    const source = raw.source ?? '';
    return {
      source,
      target: raw.target,
      mode: raw.read_only ? 'ro' : 'rw',
      kind: classifyMountSource(source),
    };
  }

  const parts = splitOutsideSubstitutions(raw, ':');
  const [first, second, third] = parts;
  if (parts.length > 3 || first === undefined || (parts.length > 1 && !second)) {
    throw new ParseError(`Service '${serviceName}' has an invalid volume: ${raw}`);
  }

  if (second === undefined) {
    // Anonymous volume: only the container path is given
    return { source: '', target: first, mode: 'rw', kind: 'namedVolume' };
  }

  return {
    source: first,
    target: second,
    mode: parseMountMode(third),
    kind: classifyMountSource(first),
  };
}

function parsePortRange(text: string, spec: string, serviceName: string): PortRange | UnresolvedValue {
  if (containsSubstitution(text)) {
    return unresolved(text.trim());
  }

  const match = PORT_RANGE.exec(text.trim());
  const startText = match?.[1];
  const endText = match?.[2];
  if (startText === undefined) {
    throw new ParseError(`Service '${serviceName}' has an invalid port: ${spec}`);
  }

  const start = Number(startText);
  const end = endText === undefined ? start : Number(endText);
  if (end < start || end > MAX_PORT) {
    throw new ParseError(`Service '${serviceName}' has an invalid port: ${spec}`);
  }
  return { start, end };
}

/**
 * Parse `[ip:][host:]container[/protocol]`, with optional bracketed IPv6 address
 */
function parsePortString(spec: string, serviceName: string): PortBinding {
  let rest = spec.trim();
  let protocol = 'tcp';

  const slash = lastIndexOutsideSubstitutions(rest, '/');
  if (slash !== -1) {
    protocol = rest.slice(slash + 1).toLowerCase();
    rest = rest.slice(0, slash);
  }

  let hostInterface: string | undefined;
  if (rest.startsWith('[')) {
    const close = rest.indexOf(']');
    if (close === -1 || rest[close + 1] !== ':') {
      throw new ParseError(`Service '${serviceName}' has an invalid port: ${spec}`);
    }
    hostInterface = rest.slice(1, close);
    rest = rest.slice(close + 2);
  }

  const parts = splitOutsideSubstitutions(rest, ':');
  let hostPort: string | undefined;
  let containerPort: string | undefined;

  if (parts.length === 1) {
    containerPort = parts[0];
  } else if (parts.length === 2) {
    [hostPort, containerPort] = parts;
  } else if (hostInterface === undefined) {
    // Unbracketed addresses may themselves contain colons (IPv6)
    hostInterface = parts.slice(0, -2).join(':');
    hostPort = parts[parts.length - 2];
    containerPort = parts[parts.length - 1];
  } else {
    throw new ParseError(`Service '${serviceName}' has an invalid port: ${spec}`);
  }

  if (!containerPort) {
    throw new ParseError(`Service '${serviceName}' has an invalid port: ${spec}`);
  }

  return {
    hostInterface: hostInterface || ALL_INTERFACES,
    ...(hostPort && { hostPort: parsePortRange(hostPort, spec, serviceName) }),
    containerPort: parsePortRange(containerPort, spec, serviceName),
    protocol,
  };
}

function normalizePort(raw: RawPort, serviceName: string): PortBinding {
  if (typeof raw === 'number') {
    return parsePortString(String(raw), serviceName);
  }
  if (typeof raw === 'string') {
    return parsePortString(raw, serviceName);
  }

  const spec = JSON.stringify(raw);
  const published = raw.published == null ? '' : String(raw.published);
  return {
    hostInterface: raw.host_ip || ALL_INTERFACES,
    ...(published && { hostPort: parsePortRange(published, spec, serviceName) }),
    containerPort: parsePortRange(String(raw.target), spec, serviceName),
    protocol: (raw.protocol ?? 'tcp').toLowerCase(),
  };
}

function normalizeRestartPolicy(
  raw: string | boolean | null | undefined,
  serviceName: string,
): RestartPolicy | UnresolvedValue | undefined {
  if (raw == null) return undefined;
  if (raw === false) return 'no';
  if (typeof raw === 'string' && containsSubstitution(raw)) return unresolved(raw.trim());

  // `on-failure:5` carries a retry count that the linter does not need
  const policy = String(raw).split(':')[0]?.trim();
  const known = RESTART_POLICIES.find((candidate) => candidate === policy);
  if (!known) {
    throw new ParseError(`Service '${serviceName}' has an unknown restart policy: ${String(raw)}`);
  }
  return known;
}

function normalizeNames(raw: string[] | Record<string, unknown> | null | undefined): Set<string> {
  if (raw == null) return new Set();
  return new Set(Array.isArray(raw) ? raw : Object.keys(raw));
}

function normalizeCapability(capability: string): string {
  const upper = capability.trim().toUpperCase();
  return upper.startsWith('CAP_') ? upper.slice(4) : upper;
}

function hasActiveHealthcheck(raw: RawService['healthcheck']): boolean {
  if (raw == null || raw.disable === true) return false;
  const test = Array.isArray(raw.test) ? raw.test[0] : raw.test;
  return test !== 'NONE';
}

function normalizeService(name: string, raw: RawService | null): ServiceDefinition {
  const service: RawService = raw ?? {};

  const command = Array.isArray(service.command)
    ? service.command.map(String).join(' ')
    : service.command ?? undefined;
  const restartPolicy = normalizeRestartPolicy(service.restart, name);

  return {
    name,
    ...(service.image != null && { image: parseImageReference(service.image) }),
    privileged: service.privileged === true || service.privileged === 'true',
    capabilitiesAdded: new Set((service.cap_add ?? []).map(normalizeCapability)),
    ...(command !== undefined && { command }),
    ...(service.network_mode != null && { networkMode: service.network_mode }),
    volumeMounts: (service.volumes ?? []).map((volume) => normalizeVolume(volume, name)),
    environment: normalizeEnvironment(service.environment),
    ...(service.user != null && { user: String(service.user) }),
    securityOptions: new Set((service.security_opt ?? []).map((opt) => opt.trim())),
    ports: (service.ports ?? []).map((port) => normalizePort(port, name)),
    ...(restartPolicy !== undefined && { restartPolicy }),
    explicitNetworks: normalizeNames(service.networks),
    dependsOn: normalizeNames(service.depends_on),
    hasHealthcheck: hasActiveHealthcheck(service.healthcheck),
  };
}

function normalizeNetwork(name: string, raw: RawNetwork | null): NetworkDeclaration {
  const external = raw?.external;
  return {
    name,
    // Legacy form `external: { name: ... }` also marks the network external
    external: external === true || (typeof external === 'object' && external !== null),
    ...(raw?.driver != null && { driver: raw.driver }),
  };
}

function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ===== Public API =====

/**
 * Create a document with nothing to audit
 */
export function createEmptyDocument(path: string): ManifestDocument {
  return { path, services: new Map(), networks: new Map(), volumes: new Set() };
}

/**
 * Normalize a parsed Compose tree.
 *
 * An empty document or one without `services` has nothing to audit and
 * yields an empty ManifestDocument.
 *
 * @throws ParseError when the root is not a mapping or a field has a shape Compose does not allow
 */
export function normalizeManifest(raw: unknown, path: string): ManifestDocument {
  if (raw == null) {
    return createEmptyDocument(path);
  }
  if (!isMapping(raw)) {
    throw new ParseError('Manifest root must be a mapping', path);
  }

  const parsed = rawManifestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ParseError(`Invalid manifest structure: ${formatZodIssues(parsed.error)}`, path);
  }

  const { services, networks, volumes } = parsed.data;
  if (services == null) {
    return createEmptyDocument(path);
  }

  return {
    path,
    services: new Map(
      Object.entries(services).map(([name, service]) => [name, normalizeService(name, service)]),
    ),
    networks: new Map(
      Object.entries(networks ?? {}).map(([name, network]) => [name, normalizeNetwork(name, network)]),
    ),
    volumes: new Set(Object.keys(volumes ?? {})),
  };
}

/**
 * Parse manifest text (YAML or JSON) and normalize it.
 * Every failure is returned as a value so the caller can record it as a finding.
 */
export function parseManifest(content: string, path: string): Result<ManifestDocument> {
  try {
    const raw: unknown = yaml.load(content, { filename: path });
    return Success(normalizeManifest(raw, path));
  } catch (error) {
    const message = extractErrorMessage(error);
    return Failure(
      message,
      createErrorGuidance(
        `Failed to parse ${path}`,
        error instanceof ParseError
          ? 'The file parsed as YAML but is not a valid Compose manifest'
          : 'The file is not valid YAML',
        `Validate the file with: docker compose -f ${path} config`,
        { path },
      ),
    );
  }
}
