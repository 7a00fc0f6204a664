import { DEFAULT_CONCURRENCY, DEFAULT_REPO_LIMIT, InvalidOptionError } from './application';

export const DEFAULT_API_URL = 'https://api.github.com';

export interface AuditConfig {
  token?: string;
  apiUrl: string;
  repoLimit: number;
  concurrency: number;
}

export function parsePositiveInt(value: string, name: string): number {
  const parsed = parseInt(value, 10);
  if (!/^\s*\d+\s*$/.test(value) || Number.isNaN(parsed) || parsed < 1) {
    throw new InvalidOptionError(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

/** Command-line values that take precedence over the environment. */
export interface ConfigOverrides {
  apiUrl?: string;
  limit?: string;
  concurrency?: string;
}

/**
 * Resolve configuration from the environment.
 * An environment value is only parsed when no override replaces it.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
): AuditConfig {
  return {
    token: env.GITHUB_TOKEN || env.GH_TOKEN || undefined,
    apiUrl: overrides.apiUrl || env.GITHUB_API_URL || DEFAULT_API_URL,
    repoLimit: overrides.limit
      ? parsePositiveInt(overrides.limit, '--limit')
      : parsePositiveInt(env.AUDIT_REPO_LIMIT || String(DEFAULT_REPO_LIMIT), 'AUDIT_REPO_LIMIT'),
    concurrency: overrides.concurrency
      ? parsePositiveInt(overrides.concurrency, '--concurrency')
      : parsePositiveInt(env.AUDIT_CONCURRENCY || String(DEFAULT_CONCURRENCY), 'AUDIT_CONCURRENCY'),
  };
}
