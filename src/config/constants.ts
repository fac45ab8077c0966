/**
 * Application Constants and Defaults
 *
 * Rule tables, severity ordering, discovery patterns and output defaults.
 * Rules read their tables through the engine context rather than importing
 * these values directly, so callers can extend them per run.
 */

import type { Severity } from '@/types';

/**
 * Fixed presentation order for severities (highest first, ERROR last)
 */
export const SEVERITY_ORDER: readonly Severity[] = ['HIGH', 'MEDIUM', 'LOW', 'INFO', 'ERROR'];

/**
 * Severity icons used by the text report
 */
export const SEVERITY_ICONS: Readonly<Record<Severity, string>> = {
  HIGH: '🚨',
  MEDIUM: '⚠️',
  LOW: '💡',
  INFO: 'ℹ️',
  ERROR: '💥',
};

/**
 * Capabilities that grant host-level control when added to a container
 */
export const DANGEROUS_CAPABILITIES = ['SYS_ADMIN', 'NET_ADMIN', 'SYS_PTRACE', 'SYS_MODULE'] as const;

/**
 * Host paths that must not be mounted into containers, with their severity
 */
export const SENSITIVE_MOUNTS: ReadonlyArray<{ path: string; severity: Severity }> = [
  { path: '/var/run/docker.sock', severity: 'HIGH' },
  { path: '/proc', severity: 'MEDIUM' },
  { path: '/sys', severity: 'MEDIUM' },
  { path: '/etc/passwd', severity: 'MEDIUM' },
  { path: '/etc/shadow', severity: 'MEDIUM' },
  { path: '/etc/sudoers', severity: 'MEDIUM' },
  { path: '/root/.ssh', severity: 'MEDIUM' },
];

/**
 * Mount sources granting broad filesystem access: exact root, or any path under these prefixes
 */
export const BROAD_MOUNT_ROOT = '/';
export const BROAD_MOUNT_PREFIXES = ['/home'] as const;

/**
 * Substrings of environment keys that indicate a secret
 */
export const SECRET_KEY_PATTERNS = [
  'password',
  'passwd',
  'secret',
  'key',
  'token',
  'credential',
  'auth',
  'private',
] as const;

/**
 * Values that are obviously placeholders rather than real secrets
 */
export const SECRET_PLACEHOLDERS = ['changeme', 'your-password', 'example'] as const;

/**
 * Well-known ports for remote administration and databases
 */
export const SENSITIVE_PORTS = [22, 23, 80, 443, 3389, 5432, 3306] as const;

/**
 * Host interface values meaning "every interface"
 */
export const ALL_INTERFACES = '0.0.0.0';
export const ALL_INTERFACE_ADDRESSES = ['0.0.0.0', '::'] as const;

/**
 * Registries whose images are accepted without a finding (subdomains included)
 */
export const TRUSTED_REGISTRIES = [
  'docker.io',
  'ghcr.io',
  'quay.io',
  'registry.redhat.io',
  'mcr.microsoft.com',
  'gcr.io',
] as const;

/**
 * Literal flag that grants privileged mode when found in a command
 */
export const PRIVILEGED_FLAG = '--privileged';

/**
 * Manifest discovery defaults
 */
export const DISCOVERY = {
  /** Glob patterns evaluated relative to the working directory */
  PATTERNS: [
    'docker-compose.yml',
    'docker-compose.yaml',
    'compose.yml',
    'compose.yaml',
    '**/docker-compose*.yml',
    '**/docker-compose*.yaml',
  ],
  /** Directories never searched */
  IGNORE: ['**/node_modules/**', '**/.git/**'],
} as const;

/**
 * Output defaults
 */
export const OUTPUT = {
  /** Default machine-readable report file */
  DEFAULT_REPORT_FILE: 'security-audit.json',
  /** Width of the text report banner */
  BANNER_WIDTH: 60,
  /** Width of the section separators */
  SECTION_WIDTH: 30,
} as const;

/**
 * Process exit codes
 */
export const EXIT_CODES = {
  PASS: 0,
  FAIL: 1,
  CONFIGURATION_ERROR: 2,
} as const;
