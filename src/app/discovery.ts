/**
 * Manifest discovery by glob
 */

import { glob } from 'glob';
import type { Logger } from 'pino';
import { DISCOVERY } from '@/config/constants';

export interface DiscoveryOptions {
  cwd: string;
  patterns?: readonly string[];
  ignore?: readonly string[];
  logger?: Logger;
}

/**
 * Find manifest files under `cwd`; paths are relative to it, de-duplicated and sorted
 */
export async function discoverManifests(options: DiscoveryOptions): Promise<string[]> {
  const patterns = options.patterns ?? DISCOVERY.PATTERNS;
  const files = await glob([...patterns], {
    cwd: options.cwd,
    ignore: [...(options.ignore ?? DISCOVERY.IGNORE)],
    nodir: true,
  });

  const unique = [...new Set(files)].sort();
  options.logger?.debug({ cwd: options.cwd, patterns, count: unique.length }, 'Discovered manifests');
  return unique;
}
