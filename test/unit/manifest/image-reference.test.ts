/**
 * Unit Tests: Image Reference Parsing
 */

import { describe, it, expect } from '@jest/globals';
import { parseImageReference } from '@/manifest/image-reference';

describe('parseImageReference', () => {
  it('defaults a bare name to the latest tag', () => {
    expect(parseImageReference('nginx')).toEqual({ raw: 'nginx', repository: 'nginx', tag: 'latest' });
  });

  it('treats a Docker Hub namespace as part of the repository', () => {
    expect(parseImageReference('linuxserver/sonarr:4.0.0')).toEqual({
      raw: 'linuxserver/sonarr:4.0.0',
      repository: 'linuxserver/sonarr',
      tag: '4.0.0',
    });
  });

  it('recognises a registry host with a port', () => {
    expect(parseImageReference('registry.local:5000/team/app:2.1')).toEqual({
      raw: 'registry.local:5000/team/app:2.1',
      registry: 'registry.local:5000',
      repository: 'team/app',
      tag: '2.1',
    });
  });

  it('recognises localhost as a registry', () => {
    expect(parseImageReference('localhost/app').registry).toBe('localhost');
  });

  it('splits a digest off the reference', () => {
    expect(parseImageReference('ghcr.io/acme/api:1.4@sha256:ab12')).toEqual({
      raw: 'ghcr.io/acme/api:1.4@sha256:ab12',
      registry: 'ghcr.io',
      repository: 'acme/api',
      tag: '1.4',
      digest: 'sha256:ab12',
    });
  });

  it('keeps the latest tag on a digest-only reference', () => {
    const reference = parseImageReference('alpine@sha256:ff00');

    expect(reference.tag).toBe('latest');
    expect(reference.digest).toBe('sha256:ff00');
  });
});
