/**
 * Unit Tests: Policy Profiles
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import tmp from 'tmp';
import {
  DEFAULT_PROFILE_NAME,
  listBuiltInProfiles,
  loadPolicyProfile,
  policyProfileSchema,
  resolvePolicyProfile,
} from '@/config/policy-profile';
import { PolicyConfigurationError } from '@/lib/errors';
import { listRuleIds } from '@/rules/registry';

describe('policy profiles', () => {
  let dir: tmp.DirResult;

  beforeEach(() => {
    dir = tmp.dirSync({ unsafeCleanup: true });
  });

  afterEach(() => {
    dir.removeCallback();
  });

  function writeProfile(name: string, content: string): string {
    const path = join(dir.name, name);
    writeFileSync(path, content);
    return path;
  }

  describe('policyProfileSchema', () => {
    it('defaults failOn and the exemption lists', () => {
      expect(policyProfileSchema.parse({ name: 'minimal' })).toEqual({
        name: 'minimal',
        failOn: ['HIGH'],
        exemptRules: [],
        exemptKeywords: [],
      });
    });

    it('rejects an empty failOn and unknown keys', () => {
      expect(policyProfileSchema.safeParse({ name: 'x', failOn: [] }).success).toBe(false);
      expect(policyProfileSchema.safeParse({ name: 'x', exempt: ['a'] }).success).toBe(false);
      expect(policyProfileSchema.safeParse({ name: 'x', failOn: ['CRITICAL'] }).success).toBe(false);
    });
  });

  describe('built-in profiles', () => {
    it('lists the three profiles with risk-tolerant as default', () => {
      expect(listBuiltInProfiles().map((profile) => profile.name)).toEqual([
        'risk-tolerant',
        'keyword-allowlist',
        'strict',
      ]);
      expect(DEFAULT_PROFILE_NAME).toBe('risk-tolerant');
    });
  });

  describe('loadPolicyProfile', () => {
    it('loads a YAML profile', async () => {
      const path = writeProfile(
        'profile.yml',
        ['name: team', 'failOn: [HIGH, MEDIUM]', 'exemptRules:', '  - host-network', ''].join('\n'),
      );

      const result = await loadPolicyProfile(path);

      expect(result).toEqual({
        ok: true,
        value: {
          name: 'team',
          failOn: ['HIGH', 'MEDIUM'],
          exemptRules: ['host-network'],
          exemptKeywords: [],
        },
      });
    });

    it('loads a JSON profile', async () => {
      const path = writeProfile('profile.json', JSON.stringify({ name: 'json', exemptKeywords: ['docker.sock'] }));

      const result = await loadPolicyProfile(path);

      expect(result.ok && result.value.exemptKeywords).toEqual(['docker.sock']);
    });

    it('fails for a missing file', async () => {
      const result = await loadPolicyProfile(join(dir.name, 'missing.yml'));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toMatch(/^Cannot read policy profile .*missing\.yml: ENOENT/);
      }
    });

    it('fails for a profile with invalid fields', async () => {
      const path = writeProfile('bad.yml', 'name: bad\nfailOn: []\n');

      const result = await loadPolicyProfile(path);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBe(`Invalid policy profile ${path}: failOn: Array must contain at least 1 element(s)`);
      }
    });
  });

  describe('resolvePolicyProfile', () => {
    const knownRuleIds = listRuleIds();

    it('resolves the default profile', async () => {
      const profile = await resolvePolicyProfile({ knownRuleIds });

      expect(profile.name).toBe('risk-tolerant');
      expect(profile.exemptRules).toEqual([
        'privileged-mode',
        'privileged-command',
        'dangerous-mounts',
        'host-network',
        'exposed-ports',
      ]);
    });

    it('rejects an unknown profile name', async () => {
      await expect(resolvePolicyProfile({ name: 'lenient', knownRuleIds })).rejects.toThrow(
        new PolicyConfigurationError('Unknown policy profile: lenient'),
      );
    });

    it('rejects a profile that exempts an unregistered rule', async () => {
      const path = writeProfile('typo.yml', 'name: typo\nexemptRules: [privileged-mod]\n');

      await expect(resolvePolicyProfile({ file: path, knownRuleIds })).rejects.toThrow(
        "Policy profile 'typo' exempts unknown rules: privileged-mod",
      );
    });

    it('prefers the profile file over the name', async () => {
      const path = writeProfile('custom.yml', 'name: custom\n');

      const profile = await resolvePolicyProfile({ name: 'strict', file: path, knownRuleIds });

      expect(profile.name).toBe('custom');
    });

    it('raises PolicyConfigurationError for an unreadable file', async () => {
      await expect(
        resolvePolicyProfile({ file: join(dir.name, 'absent.yml'), knownRuleIds }),
      ).rejects.toBeInstanceOf(PolicyConfigurationError);
    });
  });
});
