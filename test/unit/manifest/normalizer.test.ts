/**
 * Unit Tests: Manifest Normalizer
 */

import { describe, it, expect } from '@jest/globals';
import {
  classifyEnvValue,
  classifyMountSource,
  normalizeManifest,
  parseManifest,
} from '@/manifest/normalizer';
import { ParseError } from '@/lib/errors';

function serviceOf(raw: unknown, name = 'app') {
  const document = normalizeManifest(raw, 'docker-compose.yml');
  const service = document.services.get(name);
  if (!service) {
    throw new Error(`service ${name} missing`);
  }
  return service;
}

describe('normalizeManifest', () => {
  describe('document shape', () => {
    it('returns an empty document for a null document', () => {
      const document = normalizeManifest(null, 'empty.yml');

      expect(document.path).toBe('empty.yml');
      expect(document.services.size).toBe(0);
      expect(document.networks.size).toBe(0);
    });

    it('returns an empty document when services is missing', () => {
      const document = normalizeManifest({ version: '3.8' }, 'no-services.yml');

      expect(document.services.size).toBe(0);
    });

    it('rejects a root that is not a mapping', () => {
      expect(() => normalizeManifest(['a', 'b'], 'list.yml')).toThrow(ParseError);
      expect(() => normalizeManifest('text', 'scalar.yml')).toThrow('Manifest root must be a mapping');
    });

    it('rejects a field with a shape Compose does not allow', () => {
      expect(() => normalizeManifest({ services: { app: { cap_add: 'SYS_ADMIN' } } }, 'bad.yml')).toThrow(
        /^Invalid manifest structure: services\.app/,
      );
    });

    it('accepts a service declared without a body', () => {
      const service = serviceOf({ services: { app: null } });

      expect(service.privileged).toBe(false);
      expect(service.image).toBeUndefined();
      expect(service.volumeMounts).toEqual([]);
    });

    it('collects top level networks and volumes', () => {
      const document = normalizeManifest(
        {
          services: { app: { image: 'nginx' } },
          networks: {
            proxy: { external: true },
            legacy: { external: { name: 'shared' } },
            internal: { driver: 'bridge' },
            bare: null,
          },
          volumes: { data: null, cache: {} },
        },
        'docker-compose.yml',
      );

      expect(document.networks.get('proxy')).toEqual({ name: 'proxy', external: true });
      expect(document.networks.get('legacy')?.external).toBe(true);
      expect(document.networks.get('internal')).toEqual({ name: 'internal', external: false, driver: 'bridge' });
      expect(document.networks.get('bare')).toEqual({ name: 'bare', external: false });
      expect([...document.volumes]).toEqual(['data', 'cache']);
    });
  });

  describe('environment', () => {
    it('normalizes the list form', () => {
      const service = serviceOf({
        services: { app: { environment: ['A=1', 'B=${B_VALUE}', 'C', 'D=x=y'] } },
      });

      expect(service.environment.get('A')).toEqual({ kind: 'literal', value: '1' });
      expect(service.environment.get('B')).toEqual({ kind: 'substitution', expression: '${B_VALUE}' });
      expect(service.environment.get('C')).toEqual({ kind: 'inherited' });
      expect(service.environment.get('D')).toEqual({ kind: 'literal', value: 'x=y' });
    });

    it('normalizes the mapping form and coerces scalars', () => {
      const service = serviceOf({
        services: { app: { environment: { PORT: 8080, DEBUG: true, TOKEN: null, HOME_DIR: '$HOME' } } },
      });

      expect(service.environment.get('PORT')).toEqual({ kind: 'literal', value: '8080' });
      expect(service.environment.get('DEBUG')).toEqual({ kind: 'literal', value: 'true' });
      expect(service.environment.get('TOKEN')).toEqual({ kind: 'inherited' });
      expect(service.environment.get('HOME_DIR')).toEqual({ kind: 'substitution', expression: '$HOME' });
    });
  });

  describe('volumes', () => {
    it('normalizes short and long forms', () => {
      const service = serviceOf({
        services: {
          app: {
            volumes: [
              '/var/run/docker.sock:/var/run/docker.sock:ro',
              './config:/config',
              'data:/data:ro,z',
              '/cache',
              { type: 'bind', source: '/srv/media', target: '/media', read_only: true },
              { type: 'volume', source: 'db', target: '/var/lib/db' },
            ],
          },
        },
      });

      expect(service.volumeMounts).toEqual([
        { source: '/var/run/docker.sock', target: '/var/run/docker.sock', mode: 'ro', kind: 'bindMount' },
        { source: './config', target: '/config', mode: 'rw', kind: 'bindMount' },
        { source: 'data', target: '/data', mode: 'ro', kind: 'namedVolume' },
        { source: '', target: '/cache', mode: 'rw', kind: 'namedVolume' },
        { source: '/srv/media', target: '/media', mode: 'ro', kind: 'bindMount' },
        { source: 'db', target: '/var/lib/db', mode: 'rw', kind: 'namedVolume' },
      ]);
    });

    it('rejects a short form with too many segments', () => {
      expect(() => serviceOf({ services: { app: { volumes: ['a:b:c:d'] } } })).toThrow(
        "Service 'app' has an invalid volume: a:b:c:d",
      );
    });
  });

  describe('ports', () => {
    it('normalizes every short form', () => {
      const service = serviceOf({
        services: {
          app: {
            ports: [80, '8080:80', '127.0.0.1:5432:5432', '53:53/UDP', '8000-8010:8000-8010', '[::1]:9000:9000'],
          },
        },
      });

      expect(service.ports).toEqual([
        { hostInterface: '0.0.0.0', containerPort: { start: 80, end: 80 }, protocol: 'tcp' },
        {
          hostInterface: '0.0.0.0',
          hostPort: { start: 8080, end: 8080 },
          containerPort: { start: 80, end: 80 },
          protocol: 'tcp',
        },
        {
          hostInterface: '127.0.0.1',
          hostPort: { start: 5432, end: 5432 },
          containerPort: { start: 5432, end: 5432 },
          protocol: 'tcp',
        },
        {
          hostInterface: '0.0.0.0',
          hostPort: { start: 53, end: 53 },
          containerPort: { start: 53, end: 53 },
          protocol: 'udp',
        },
        {
          hostInterface: '0.0.0.0',
          hostPort: { start: 8000, end: 8010 },
          containerPort: { start: 8000, end: 8010 },
          protocol: 'tcp',
        },
        {
          hostInterface: '::1',
          hostPort: { start: 9000, end: 9000 },
          containerPort: { start: 9000, end: 9000 },
          protocol: 'tcp',
        },
      ]);
    });

    it('normalizes the long form', () => {
      const service = serviceOf({
        services: { app: { ports: [{ target: 443, published: '8443', host_ip: '10.0.0.5', protocol: 'tcp' }] } },
      });

      expect(service.ports).toEqual([
        {
          hostInterface: '10.0.0.5',
          hostPort: { start: 8443, end: 8443 },
          containerPort: { start: 443, end: 443 },
          protocol: 'tcp',
        },
      ]);
    });

    it('rejects a port that is not a number or range', () => {
      expect(() => serviceOf({ services: { app: { ports: ['http:80'] } } })).toThrow(
        "Service 'app' has an invalid port: http:80",
      );
    });
  });

  describe('variable substitution', () => {
    it('keeps substituted host ports unresolved', () => {
      const service = serviceOf({
        services: {
          app: {
            ports: [
              '${DB_PORT}:5432',
              '${DB_PORT:-5432}:5432',
              '127.0.0.1:${WEB_PORT:-8080}:80',
              { target: 80, published: '${HTTP_PORT}' },
            ],
          },
        },
      });

      expect(service.ports).toEqual([
        {
          hostInterface: '0.0.0.0',
          hostPort: { expression: '${DB_PORT}' },
          containerPort: { start: 5432, end: 5432 },
          protocol: 'tcp',
        },
        {
          hostInterface: '0.0.0.0',
          hostPort: { expression: '${DB_PORT:-5432}' },
          containerPort: { start: 5432, end: 5432 },
          protocol: 'tcp',
        },
        {
          hostInterface: '127.0.0.1',
          hostPort: { expression: '${WEB_PORT:-8080}' },
          containerPort: { start: 80, end: 80 },
          protocol: 'tcp',
        },
        {
          hostInterface: '0.0.0.0',
          hostPort: { expression: '${HTTP_PORT}' },
          containerPort: { start: 80, end: 80 },
          protocol: 'tcp',
        },
      ]);
    });

    it('does not split a volume on colons inside a substitution', () => {
      const service = serviceOf({
        services: {
          app: {
            volumes: [
              '${DATA_DIR:-/srv/db}:/data:rw',
              '${CONFIG_DIR}/app:/config:ro',
              '/home/${USER}:/workspace',
            ],
          },
        },
      });

      expect(service.volumeMounts).toEqual([
        { source: '${DATA_DIR:-/srv/db}', target: '/data', mode: 'rw', kind: 'substitution' },
        { source: '${CONFIG_DIR}/app', target: '/config', mode: 'ro', kind: 'substitution' },
        { source: '/home/${USER}', target: '/workspace', mode: 'rw', kind: 'bindMount' },
      ]);
    });

    it('keeps a substituted restart policy unresolved', () => {
      const service = serviceOf({ services: { app: { restart: '${RESTART_POLICY:-unless-stopped}' } } });

      expect(service.restartPolicy).toEqual({ expression: '${RESTART_POLICY:-unless-stopped}' });
    });

    it('parses images with substituted tags and registries', () => {
      const document = normalizeManifest(
        {
          services: {
            tagged: { image: 'app:${TAG:-1.0}' },
            hosted: { image: '${REGISTRY:-ghcr.io}/team/app:${TAG}' },
          },
        },
        'docker-compose.yml',
      );

      expect(document.services.get('tagged')?.image).toEqual({
        raw: 'app:${TAG:-1.0}',
        repository: 'app',
        tag: '${TAG:-1.0}',
      });
      expect(document.services.get('hosted')?.image).toEqual({
        raw: '${REGISTRY:-ghcr.io}/team/app:${TAG}',
        registry: '${REGISTRY:-ghcr.io}',
        repository: 'team/app',
        tag: '${TAG}',
      });
    });

    it('does not grant privilege from a substituted flag', () => {
      const service = serviceOf({ services: { app: { privileged: '${PRIVILEGED:-false}' } } });

      expect(service.privileged).toBe(false);
    });
  });

  describe('pass-through fields', () => {
    it('coerces privileged, user, capabilities and command', () => {
      const service = serviceOf({
        services: {
          app: {
            privileged: 'true',
            user: 0,
            cap_add: ['cap_net_admin', 'SYS_PTRACE'],
            command: ['docker', 'run', '--privileged', 'alpine'],
          },
        },
      });

      expect(service.privileged).toBe(true);
      expect(service.user).toBe('0');
      expect([...service.capabilitiesAdded]).toEqual(['NET_ADMIN', 'SYS_PTRACE']);
      expect(service.command).toBe('docker run --privileged alpine');
    });

    it('normalizes restart policies', () => {
      const document = normalizeManifest(
        {
          services: {
            a: { restart: 'on-failure:5' },
            b: { restart: false },
            c: { restart: 'unless-stopped' },
            d: {},
          },
        },
        'docker-compose.yml',
      );

      expect(document.services.get('a')?.restartPolicy).toBe('on-failure');
      expect(document.services.get('b')?.restartPolicy).toBe('no');
      expect(document.services.get('c')?.restartPolicy).toBe('unless-stopped');
      expect(document.services.get('d')?.restartPolicy).toBeUndefined();
    });

    it('rejects an unknown restart policy', () => {
      expect(() => serviceOf({ services: { app: { restart: 'sometimes' } } })).toThrow(
        "Service 'app' has an unknown restart policy: sometimes",
      );
    });

    it('reads networks and depends_on in list and mapping form', () => {
      const service = serviceOf({
        services: {
          app: {
            networks: { frontend: null, backend: { aliases: ['api'] } },
            depends_on: { db: { condition: 'service_healthy' } },
          },
        },
      });

      expect([...service.explicitNetworks]).toEqual(['frontend', 'backend']);
      expect([...service.dependsOn]).toEqual(['db']);
    });

    it('treats a disabled healthcheck as absent', () => {
      const document = normalizeManifest(
        {
          services: {
            checked: { healthcheck: { test: ['CMD', 'curl', '-f', 'http://localhost'] } },
            disabled: { healthcheck: { disable: true } },
            none: { healthcheck: { test: ['NONE'] } },
          },
        },
        'docker-compose.yml',
      );

      expect(document.services.get('checked')?.hasHealthcheck).toBe(true);
      expect(document.services.get('disabled')?.hasHealthcheck).toBe(false);
      expect(document.services.get('none')?.hasHealthcheck).toBe(false);
    });
  });
});

describe('classifyMountSource', () => {
  it.each([
    ['/etc/passwd', 'bindMount'],
    ['./data', 'bindMount'],
    ['data', 'namedVolume'],
    ['../data', 'namedVolume'],
    ['~/data', 'namedVolume'],
    ['${DATA_DIR}', 'substitution'],
    ['$HOME/data', 'substitution'],
    ['$$literal', 'namedVolume'],
  ])('classifies %s as %s', (source, kind) => {
    expect(classifyMountSource(source)).toBe(kind);
  });
});

describe('classifyEnvValue', () => {
  it('keeps escaped dollars literal', () => {
    expect(classifyEnvValue('$$NOT_A_REF')).toEqual({ kind: 'literal', value: '$$NOT_A_REF' });
  });

  it('keeps embedded references literal', () => {
    expect(classifyEnvValue('prefix-${VAR}')).toEqual({ kind: 'literal', value: 'prefix-${VAR}' });
  });
});

describe('parseManifest', () => {
  it('parses YAML text into a document', () => {
    const result = parseManifest('services:\n  web:\n    image: nginx:1.27\n', 'compose.yml');

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.services.get('web')?.image?.tag).toBe('1.27');
    }
  });

  it('returns a failure with guidance for invalid YAML', () => {
    const result = parseManifest('services:\n  web: [unclosed\n', 'broken.yml');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.guidance?.hint).toBe('The file is not valid YAML');
      expect(result.guidance?.details).toEqual({ path: 'broken.yml' });
    }
  });

  it('returns a failure for a manifest with an invalid field', () => {
    const result = parseManifest('services:\n  web:\n    restart: sometimes\n', 'compose.yml');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBe("Service 'web' has an unknown restart policy: sometimes");
      expect(result.guidance?.hint).toBe('The file parsed as YAML but is not a valid Compose manifest');
    }
  });
});
