/**
 * Rule Engine types
 *
 * A rule inspects one orthogonal concern and returns hits; the engine turns
 * hits into findings. Rules hold no state and must not depend on the order in
 * which they are evaluated.
 */

import type { Severity } from '@/types';
import type { ManifestDocument, ServiceDefinition } from '@/manifest/types';

/**
 * Finding categories used by the built-in rules
 */
export const RuleCategory = {
  CONTAINER: 'Container Security',
  NETWORK: 'Network Security',
  VOLUME: 'Volume Security',
  SECRET: 'Secret Management',
  IMAGE: 'Image Security',
  BEST_PRACTICE: 'Best Practice',
  FILE_PROCESSING: 'File Processing',
  RULE_EVALUATION: 'Rule Evaluation',
} as const;
export type RuleCategory = (typeof RuleCategory)[keyof typeof RuleCategory];

/**
 * Data tables the rules consult; swapping them never requires touching rule logic
 */
export interface RuleTables {
  readonly dangerousCapabilities: readonly string[];
  readonly sensitiveMounts: ReadonlyArray<{ readonly path: string; readonly severity: Severity }>;
  readonly broadMountRoot: string;
  readonly broadMountPrefixes: readonly string[];
  readonly secretKeyPatterns: readonly string[];
  readonly secretPlaceholders: readonly string[];
  readonly sensitivePorts: readonly number[];
  readonly allInterfaceAddresses: readonly string[];
  readonly trustedRegistries: readonly string[];
  readonly privilegedFlag: string;
}

/**
 * What a rule reports; the engine adds file, service, rule id and category
 */
export interface RuleHit {
  severity: Severity;
  message: string;
}

export interface RuleContext {
  readonly document: ManifestDocument;
  readonly tables: RuleTables;
}

interface RuleMetadata {
  /** Stable identifier, used by policy profiles */
  readonly id: string;
  readonly name: string;
  readonly category: RuleCategory;
  readonly description: string;
  /** Remediation advice shown by `--list-rules` */
  readonly remediation: string;
}

export interface ServiceRule extends RuleMetadata {
  readonly scope: 'service';
  checkService(service: ServiceDefinition, context: RuleContext): RuleHit[];
}

export interface DocumentRule extends RuleMetadata {
  readonly scope: 'document';
  checkDocument(context: RuleContext): RuleHit[];
}

export type AuditRule = ServiceRule | DocumentRule;
