/**
 * Image reference parsing: `[registry/]repository[:tag][@digest]`
 */

import {
  indexOutsideSubstitutions,
  lastIndexOutsideSubstitutions,
} from './substitution';
import type { ImageReference } from './types';

export const DEFAULT_TAG = 'latest';

/**
 * A leading path segment is a registry host when it looks like one
 * (has a dot or a port, or is `localhost`); otherwise it is a Docker Hub namespace.
 */
function isRegistryComponent(segment: string): boolean {
  return segment.includes('.') || segment.includes(':') || segment === 'localhost';
}

/**
 * Parse an image reference into its parts. Separators inside `${...}` are
 * part of the substitution and do not split the reference.
 *
 * @example
 * parseImageReference('nginx')
 * // { raw: 'nginx', repository: 'nginx', tag: 'latest' }
 * parseImageReference('ghcr.io/acme/api:1.4@sha256:ab12')
 * // { raw: ..., registry: 'ghcr.io', repository: 'acme/api', tag: '1.4', digest: 'sha256:ab12' }
 */
export function parseImageReference(raw: string): ImageReference {
  let remainder = raw.trim();

  let digest: string | undefined;
  const at = indexOutsideSubstitutions(remainder, '@');
  if (at !== -1) {
    digest = remainder.slice(at + 1);
    remainder = remainder.slice(0, at);
  }

  let registry: string | undefined;
  const firstSlash = indexOutsideSubstitutions(remainder, '/');
  if (firstSlash !== -1) {
    const first = remainder.slice(0, firstSlash);
    if (isRegistryComponent(first)) {
      registry = first;
      remainder = remainder.slice(firstSlash + 1);
    }
  }

  let tag: string | undefined;
  const colon = lastIndexOutsideSubstitutions(remainder, ':');
  if (colon > lastIndexOutsideSubstitutions(remainder, '/')) {
    tag = remainder.slice(colon + 1);
    remainder = remainder.slice(0, colon);
  }

  return {
    raw,
    ...(registry !== undefined && { registry }),
    repository: remainder,
    tag: tag || DEFAULT_TAG,
    ...(digest && { digest }),
  };
}
