/**
 * Policy Profile Configuration
 *
 * A profile decides which findings block a run. Built-in profiles ship with
 * the tool; custom ones are loaded from YAML or JSON files.
 */

import { readFile } from 'node:fs/promises';
import yaml from 'js-yaml';
import { z } from 'zod';
import { Failure, Success, severitySchema, type Result } from '@/types';
import { PolicyConfigurationError, createErrorGuidance, extractErrorMessage } from '@/lib/errors';

// ===== SCHEMA =====

export const policyProfileSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().optional(),

    /**
     * Severities that fail the run unless exempted
     */
    failOn: z.array(severitySchema).nonempty().default(['HIGH']),

    /**
     * Rule ids whose findings never fail the run
     */
    exemptRules: z.array(z.string().min(1)).default([]),

    /**
     * Case-insensitive substrings; a finding whose message contains one is exempted
     */
    exemptKeywords: z.array(z.string().min(1)).default([]),
  })
  .strict();

export type PolicyProfile = z.output<typeof policyProfileSchema>;
export type PolicyProfileInput = z.input<typeof policyProfileSchema>;

// ===== BUILT-IN PROFILES =====

export const DEFAULT_PROFILE_NAME = 'risk-tolerant';

const BUILT_IN_PROFILE_INPUTS: readonly PolicyProfileInput[] = [
  {
    name: 'risk-tolerant',
    description:
      'Accepts privileged containers, host networking, exposed ports and socket mounts common in homelab setups',
    exemptRules: [
      'privileged-mode',
      'privileged-command',
      'dangerous-mounts',
      'host-network',
      'exposed-ports',
    ],
  },
  {
    name: 'keyword-allowlist',
    description: 'Exempts HIGH findings whose message mentions an accepted risk keyword',
    exemptKeywords: ['docker.sock', 'host network', 'port', 'privileged'],
  },
  {
    name: 'strict',
    description: 'Every HIGH finding fails the run',
  },
];

export const BUILT_IN_PROFILES: ReadonlyMap<string, PolicyProfile> = new Map(
  BUILT_IN_PROFILE_INPUTS.map((input) => {
    const profile = policyProfileSchema.parse(input);
    return [profile.name, profile];
  }),
);

export function listBuiltInProfiles(): PolicyProfile[] {
  return [...BUILT_IN_PROFILES.values()];
}

// ===== LOADING =====

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Load a profile from a YAML or JSON file
 */
export async function loadPolicyProfile(path: string): Promise<Result<PolicyProfile>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    return Failure(`Cannot read policy profile ${path}: ${extractErrorMessage(error)}`, {
      message: 'Policy profile file is not readable',
      hint: 'Check that the path exists and is a file',
      resolution: 'Pass an existing file with --profile-file',
      details: { path },
    });
  }

  let raw: unknown;
  try {
    raw = yaml.load(content, { filename: path });
  } catch (error) {
    return Failure(`Invalid policy profile ${path}: ${extractErrorMessage(error)}`, {
      message: 'Policy profile is not valid YAML or JSON',
      resolution: 'Fix the syntax of the profile file',
      details: { path },
    });
  }

  const parsed = policyProfileSchema.safeParse(raw);
  if (!parsed.success) {
    return Failure(`Invalid policy profile ${path}: ${formatIssues(parsed.error)}`, {
      message: 'Policy profile does not match the expected structure',
      hint: 'Allowed keys: name, description, failOn, exemptRules, exemptKeywords',
      resolution: 'Fix the listed fields in the profile file',
      details: { path },
    });
  }

  return Success(parsed.data);
}

export interface ResolvePolicyProfileOptions {
  /** Built-in profile name; ignored when `file` is given */
  name?: string | undefined;
  file?: string | undefined;
  /** Every registered rule id, used to reject typos in `exemptRules` */
  knownRuleIds: readonly string[];
}

/**
 * Resolve the profile for a run
 *
 * @throws PolicyConfigurationError when the profile is unknown, unreadable,
 * invalid, or exempts a rule that is not registered
 */
export async function resolvePolicyProfile(
  options: ResolvePolicyProfileOptions,
): Promise<PolicyProfile> {
  let profile: PolicyProfile;

  if (options.file) {
    const loaded = await loadPolicyProfile(options.file);
    if (!loaded.ok) {
      throw new PolicyConfigurationError(loaded.error, loaded.guidance);
    }
    profile = loaded.value;
  } else {
    const name = options.name ?? DEFAULT_PROFILE_NAME;
    const builtIn = BUILT_IN_PROFILES.get(name);
    if (!builtIn) {
      throw new PolicyConfigurationError(
        `Unknown policy profile: ${name}`,
        createErrorGuidance(
          'The requested profile is not built in',
          `Available profiles: ${[...BUILT_IN_PROFILES.keys()].join(', ')}`,
          'Choose a built-in profile or pass --profile-file',
        ),
      );
    }
    profile = builtIn;
  }

  const known = new Set(options.knownRuleIds);
  const unknown = profile.exemptRules.filter((ruleId) => !known.has(ruleId));
  if (unknown.length > 0) {
    throw new PolicyConfigurationError(
      `Policy profile '${profile.name}' exempts unknown rules: ${unknown.join(', ')}`,
      createErrorGuidance(
        'exemptRules must name registered rules',
        'Run compose-audit --list-rules to see valid ids',
        'Remove or correct the unknown rule ids',
        { unknown },
      ),
    );
  }

  return profile;
}
