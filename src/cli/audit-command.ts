/**
 * Audit command
 *
 * Everything `compose-audit` does, expressed as a function of options and
 * output streams that returns the exit code. The commander entry point only
 * parses argv and sets process.exitCode.
 */

import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { Logger } from 'pino';
import { z } from 'zod';
import { Failure, Success, type Result } from '@/types';
import { PolicyConfigurationError, extractErrorMessage } from '@/lib/errors';
import { createLogger, createTimer } from '@/lib/logger';
import { logAuditComplete, logAuditFailure, logAuditStart } from '@/lib/runtime-logging';
import { EXIT_CODES, OUTPUT } from '@/config/constants';
import { loadConfig, logLevelSchema, resolveLogLevel, type AppConfig } from '@/config/index';
import {
  listBuiltInProfiles,
  resolvePolicyProfile,
  type PolicyProfile,
} from '@/config/policy-profile';
import {
  ALL_RULES,
  DEFAULT_RULE_TABLES,
  createRuleEngine,
  listRuleIds,
  selectRules,
  withTrustedRegistries,
} from '@/rules';
import { discoverManifests, runAudit } from '@/app';
import { decidePolicy, PolicyOutcome } from '@/policy/gate';
import { formatPolicyDecision, formatReportText, toStructuredReport } from '@/report';
import { formatContextualGuidance } from './guidance';

export const auditCommandOptionsSchema = z.object({
  paths: z.array(z.string()).default([]),
  cwd: z.string().optional(),
  profile: z.string().optional(),
  profileFile: z.string().optional(),
  format: z.enum(['text', 'json']).default('text'),
  /** `false` when --no-report-file is given */
  reportFile: z.union([z.string(), z.literal(false)]).optional(),
  bestPractices: z.boolean().optional(),
  trustedRegistry: z.array(z.string()).optional(),
  logLevel: logLevelSchema.optional(),
  listRules: z.boolean().optional(),
  listProfiles: z.boolean().optional(),
});

export type AuditCommandOptions = z.input<typeof auditCommandOptionsSchema>;
type ParsedAuditCommandOptions = z.output<typeof auditCommandOptionsSchema>;

export interface CommandIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export const processIO: CommandIO = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

export interface AuditCommandDependencies {
  version?: string;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

function formatOptionIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `--${issue.path.join('.')}: ${issue.message}`).join('; ');
}

/**
 * Validate raw commander output
 */
export function parseAuditCommandOptions(
  paths: readonly string[],
  raw: unknown,
): Result<AuditCommandOptions> {
  const parsed = auditCommandOptionsSchema.safeParse({
    ...(typeof raw === 'object' && raw !== null ? raw : {}),
    paths,
  });
  if (!parsed.success) {
    return Failure(`Invalid options: ${formatOptionIssues(parsed.error)}`, {
      message: 'Command line options are invalid',
      resolution: 'Run compose-audit --help for usage information',
    });
  }
  return Success(parsed.data);
}

function formatRuleList(): string {
  const parts = ['Registered rules:', ''];
  for (const rule of ALL_RULES) {
    parts.push(`  ${rule.id}  [${rule.category}]`);
    parts.push(`      ${rule.description}`);
    parts.push(`      Fix: ${rule.remediation}`);
  }
  return parts.join('\n');
}

function formatProfileList(): string {
  const parts = ['Built-in policy profiles:', ''];
  for (const profile of listBuiltInProfiles()) {
    parts.push(`  ${profile.name}  (fails on ${profile.failOn.join(', ')})`);
    if (profile.description) parts.push(`      ${profile.description}`);
    if (profile.exemptRules.length > 0) {
      parts.push(`      Exempt rules: ${profile.exemptRules.join(', ')}`);
    }
    if (profile.exemptKeywords.length > 0) {
      parts.push(`      Exempt keywords: ${profile.exemptKeywords.join(', ')}`);
    }
  }
  return parts.join('\n');
}

function resolveReportFile(options: ParsedAuditCommandOptions, config: AppConfig): string | undefined {
  if (options.reportFile === false) return undefined;
  return options.reportFile ?? config.reportFile ?? OUTPUT.DEFAULT_REPORT_FILE;
}

/**
 * Run an audit and return the process exit code
 */
export async function runAuditCommand(
  rawOptions: AuditCommandOptions,
  io: CommandIO = processIO,
  deps: AuditCommandDependencies = {},
): Promise<number> {
  const parsedOptions = auditCommandOptionsSchema.safeParse(rawOptions);
  if (!parsedOptions.success) {
    io.stderr(`❌ Invalid options: ${formatOptionIssues(parsedOptions.error)}`);
    return EXIT_CODES.CONFIGURATION_ERROR;
  }
  const options = parsedOptions.data;

  let config: AppConfig;
  try {
    config = loadConfig(deps.env ?? process.env);
  } catch (error) {
    io.stderr(`❌ Invalid environment configuration: ${extractErrorMessage(error)}`);
    return EXIT_CODES.CONFIGURATION_ERROR;
  }

  if (options.listRules) {
    io.stdout(formatRuleList());
    return EXIT_CODES.PASS;
  }
  if (options.listProfiles) {
    io.stdout(formatProfileList());
    return EXIT_CODES.PASS;
  }

  const logger =
    deps.logger ?? createLogger({ name: 'cli', level: options.logLevel ?? resolveLogLevel(config) });
  const cwd = resolve(options.cwd ?? process.cwd());

  let profile: PolicyProfile;
  try {
    profile = await resolvePolicyProfile({
      name: options.profile ?? config.profile,
      file: options.profileFile ?? config.profileFile,
      knownRuleIds: listRuleIds(ALL_RULES),
    });
  } catch (error) {
    if (error instanceof PolicyConfigurationError) {
      logAuditFailure(error, logger, { code: error.code });
      io.stderr(formatContextualGuidance(error));
      return EXIT_CODES.CONFIGURATION_ERROR;
    }
    throw error;
  }

  const engine = createRuleEngine({
    rules: selectRules({ bestPractices: options.bestPractices }),
    tables: withTrustedRegistries(DEFAULT_RULE_TABLES, options.trustedRegistry ?? []),
    logger,
  });

  const paths = options.paths.length > 0 ? options.paths : await discoverManifests({ cwd, logger });
  logAuditStart(
    {
      version: deps.version ?? 'unknown',
      cwd,
      profile: profile.name,
      files: paths.length,
      rules: engine.rules.length,
      discovered: options.paths.length === 0,
    },
    logger,
  );

  const timer = createTimer(logger, 'compose-audit', { profile: profile.name });
  const report = await runAudit(paths, { engine, cwd, logger });
  const decision = decidePolicy(report, profile);
  const structured = toStructuredReport(report);

  if (options.format === 'json') {
    io.stdout(JSON.stringify(structured, null, 2));
  } else {
    io.stdout(formatReportText(report));
  }

  const reportFile = resolveReportFile(options, config);
  if (reportFile !== undefined) {
    const target = resolve(cwd, reportFile);
    try {
      await writeFile(target, `${JSON.stringify(structured, null, 2)}\n`, 'utf-8');
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(extractErrorMessage(error));
      logAuditFailure(failure, logger, { reportFile: target });
      io.stderr(formatContextualGuidance(failure));
      return EXIT_CODES.CONFIGURATION_ERROR;
    }
    if (options.format === 'text') {
      io.stdout(`\n📄 Detailed report saved to ${reportFile}`);
    }
  }

  const verdict = formatPolicyDecision(decision);
  if (options.format === 'json') {
    io.stderr(verdict);
  } else {
    io.stdout(`\n${verdict}`);
  }

  logAuditComplete(report, decision, logger, timer.end());
  return decision.outcome === PolicyOutcome.PASS ? EXIT_CODES.PASS : EXIT_CODES.FAIL;
}
