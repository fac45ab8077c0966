#!/usr/bin/env node
/**
 * compose-audit CLI
 * Audits Docker Compose manifests for security misconfigurations
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { DEFAULT_PROFILE_NAME } from '@/config/policy-profile';
import { EXIT_CODES, OUTPUT } from '@/config/constants';
import { extractErrorMessage } from '@/lib/errors';
import { parseAuditCommandOptions, processIO, runAuditCommand } from './audit-command';

// src/cli/ and dist/cli/ both sit two levels below the package root
const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(join(__dirname, '../../package.json'), 'utf-8')));

export function createProgram(): Command {
  const program = new Command();

  program
    .name('compose-audit')
    .description('Security linter for Docker Compose manifests')
    .version(packageJson.version)
    .argument('[paths...]', 'manifest files to audit (default: discover compose files under --cwd)')
    .option('--cwd <dir>', 'directory to discover and resolve files from (default: current directory)')
    .option('--profile <name>', `built-in policy profile (default: ${DEFAULT_PROFILE_NAME})`)
    .option('--profile-file <path>', 'custom policy profile in YAML or JSON')
    .option('--format <format>', 'report format: text or json', 'text')
    .option('--report-file <path>', `JSON report file (default: ${OUTPUT.DEFAULT_REPORT_FILE})`)
    .option('--no-report-file', 'do not write the JSON report file')
    .option('--best-practices', 'also run healthcheck and restart policy checks')
    .option('--trusted-registry <host...>', 'additional trusted image registries')
    .option('--log-level <level>', 'logging level: debug, info, warn, error (default: warn)')
    .option('--list-rules', 'list registered rules and exit')
    .option('--list-profiles', 'list built-in policy profiles and exit')
    .addHelpText(
      'after',
      `

Examples:
  $ compose-audit                                   Audit every compose file under the current directory
  $ compose-audit stacks/media/docker-compose.yml   Audit one file
  $ compose-audit --profile strict --format json    Fail on every HIGH finding, print JSON
  $ compose-audit --profile-file audit-profile.yml  Use a custom policy profile

Exit codes:
  0  policy passed
  1  policy failed
  2  configuration error

Environment Variables:
  LOG_LEVEL             Logging level (debug, info, warn, error)
  AUDIT_PROFILE         Built-in policy profile name
  AUDIT_PROFILE_FILE    Custom policy profile path
  AUDIT_REPORT_FILE     JSON report file path
`,
    )
    .action(async (paths: string[], opts: unknown) => {
      const parsed = parseAuditCommandOptions(paths, opts);
      if (!parsed.ok) {
        processIO.stderr(`❌ ${parsed.error}`);
        processIO.stderr('\nUse --help for usage information');
        process.exitCode = EXIT_CODES.CONFIGURATION_ERROR;
        return;
      }
      process.exitCode = await runAuditCommand(parsed.value, processIO, {
        version: packageJson.version,
      });
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      processIO.stderr(`❌ Unexpected error: ${extractErrorMessage(error)}`);
      process.exitCode = EXIT_CODES.CONFIGURATION_ERROR;
    });
}
