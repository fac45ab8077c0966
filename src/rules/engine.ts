/**
 * Rule Engine
 *
 * Evaluates a fixed list of rules against one ManifestDocument. Each rule
 * invocation is isolated: a rule that throws for a service becomes a single
 * ERROR finding scoped to that service, and evaluation carries on.
 */

import type { Logger } from 'pino';
import { createFinding, type Finding } from '@/types';
import { RuleEvaluationError } from '@/lib/errors';
import { createSilentLogger } from '@/lib/logger';
import type { ManifestDocument } from '@/manifest/types';
import { DEFAULT_RULE_TABLES } from './tables';
import { SECURITY_RULES } from './registry';
import { RuleCategory, type AuditRule, type RuleContext, type RuleHit, type RuleTables } from './types';

export interface RuleEngineOptions {
  /** Rules to evaluate; defaults to SECURITY_RULES */
  rules?: readonly AuditRule[];
  tables?: RuleTables;
  logger?: Logger;
}

export interface RuleEngine {
  readonly rules: readonly AuditRule[];
  readonly tables: RuleTables;
  evaluate(document: ManifestDocument): Finding[];
}

function assertUniqueRuleIds(rules: readonly AuditRule[]): void {
  const seen = new Set<string>();
  for (const rule of rules) {
    if (seen.has(rule.id)) {
      throw new Error(`Duplicate rule id: ${rule.id}`);
    }
    seen.add(rule.id);
  }
}

function toFindings(
  rule: AuditRule,
  hits: RuleHit[],
  document: ManifestDocument,
  serviceName?: string,
): Finding[] {
  return hits.map((hit) =>
    createFinding({
      severity: hit.severity,
      category: rule.category,
      message: hit.message,
      sourceFile: document.path,
      ruleId: rule.id,
      serviceName,
    }),
  );
}

function ruleFailure(
  rule: AuditRule,
  document: ManifestDocument,
  error: unknown,
  logger: Logger,
  serviceName?: string,
): Finding {
  const failure = new RuleEvaluationError(rule.id, serviceName, error);
  logger.warn(
    { ruleId: rule.id, service: serviceName, file: document.path, error: failure.message },
    'Rule evaluation failed',
  );
  return createFinding({
    severity: 'ERROR',
    category: RuleCategory.RULE_EVALUATION,
    message: failure.message,
    sourceFile: document.path,
    ruleId: rule.id,
    serviceName,
  });
}

function evaluateRule(
  rule: AuditRule,
  document: ManifestDocument,
  context: RuleContext,
  logger: Logger,
): Finding[] {
  if (rule.scope === 'document') {
    try {
      return toFindings(rule, rule.checkDocument(context), document);
    } catch (error) {
      return [ruleFailure(rule, document, error, logger)];
    }
  }

  const findings: Finding[] = [];
  for (const service of document.services.values()) {
    try {
      findings.push(...toFindings(rule, rule.checkService(service, context), document, service.name));
    } catch (error) {
      findings.push(ruleFailure(rule, document, error, logger, service.name));
    }
  }
  return findings;
}

/**
 * Create a rule engine over a fixed rule list
 *
 * @throws Error when two rules share an id
 */
export function createRuleEngine(options: RuleEngineOptions = {}): RuleEngine {
  const rules = options.rules ?? SECURITY_RULES;
  const tables = options.tables ?? DEFAULT_RULE_TABLES;
  const logger = options.logger ?? createSilentLogger();
  assertUniqueRuleIds(rules);

  return {
    rules,
    tables,
    evaluate(document: ManifestDocument): Finding[] {
      const context: RuleContext = { document, tables };
      const findings = rules.flatMap((rule) => evaluateRule(rule, document, context, logger));
      logger.debug(
        { file: document.path, services: document.services.size, findings: findings.length },
        'Rules evaluated',
      );
      return findings;
    },
  };
}
