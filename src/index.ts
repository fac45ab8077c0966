/**
 * Public API for compose-security-audit
 *
 * @example
 * ```typescript
 * import { createRuleEngine, runAudit, decidePolicy, resolvePolicyProfile } from 'compose-security-audit';
 *
 * const engine = createRuleEngine();
 * const report = await runAudit(['docker-compose.yml'], { engine });
 * const profile = await resolvePolicyProfile({ name: 'strict', knownRuleIds: listRuleIds() });
 * const decision = decidePolicy(report, profile);
 * ```
 */

// Core types and results
export * from './types';
export {
  AuditError,
  AuditErrorCode,
  ParseError,
  PolicyConfigurationError,
  RuleEvaluationError,
  extractErrorMessage,
} from './lib/errors';
export { createLogger, type Logger } from './lib/logger';

// Manifest model
export * from './manifest/types';
export { normalizeManifest, parseManifest, createEmptyDocument } from './manifest/normalizer';
export { parseImageReference } from './manifest/image-reference';
export { containsSubstitution, splitOutsideSubstitutions } from './manifest/substitution';

// Rules
export * from './rules';

// Report and policy
export * from './report';
export * from './policy';
export {
  BUILT_IN_PROFILES,
  DEFAULT_PROFILE_NAME,
  listBuiltInProfiles,
  loadPolicyProfile,
  policyProfileSchema,
  resolvePolicyProfile,
  type PolicyProfile,
} from './config/policy-profile';

// Runner
export * from './app';
export { runAuditCommand, type AuditCommandOptions, type CommandIO } from './cli/audit-command';
