import { z } from 'zod';
import type { ExportConfig } from './types';
import { DEFAULT_ORIGIN_RULES } from './assets';
import { ConfigError } from './errors';

export interface ConfigOptions {
  repo?: string[];
  rawRoot?: string;
  outRoot?: string;
  profileDir?: string;
  concurrency?: string | number;
  maxAttempts?: string | number;
  timeout?: string | number;
  headed?: boolean;
  browserChannel?: string;
}

export const DEFAULTS = {
  rawRoot: 'export/raw',
  outRoot: 'export',
  profileDir: 'export/browser_profile',
  concurrency: 4,
  maxAttempts: 3,
  baseDelayMs: 1000,
  timeoutMs: 30000,
  sessionDelayMs: 250,
} as const;

export const RepositorySchema = z
  .string()
  .regex(/^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/, 'expected OWNER/REPO');

const PositiveIntSchema = z.coerce.number().int().positive();

/**
 * Builds the run configuration. Flags win over the environment; the
 * environment wins over defaults.
 */
export function loadExportConfig(
  options: ConfigOptions,
  env: NodeJS.ProcessEnv = process.env,
  { requireRepositories = true }: { requireRepositories?: boolean } = {}
): ExportConfig {
  const listed = options.repo && options.repo.length > 0
    ? options.repo
    : (env.EXPORT_REPOS ?? '').split(',');
  const repositories: string[] = [];
  for (const entry of listed.map(value => value.trim()).filter(Boolean)) {
    const result = RepositorySchema.safeParse(entry);
    if (!result.success) {
      throw new ConfigError(`Invalid repository "${entry}": expected OWNER/REPO`);
    }
    if (!repositories.includes(result.data)) {
      repositories.push(result.data);
    }
  }
  if (requireRepositories && repositories.length === 0) {
    throw new ConfigError('No repositories configured: pass --repo OWNER/REPO or set EXPORT_REPOS');
  }

  const token = nonEmpty(env.GH_TOKEN) ?? nonEmpty(env.GITHUB_TOKEN);

  return {
    repositories,
    rawRoot: nonEmpty(options.rawRoot) ?? nonEmpty(env.EXPORT_RAW_ROOT) ?? DEFAULTS.rawRoot,
    outRoot: nonEmpty(options.outRoot) ?? nonEmpty(env.EXPORT_OUT_ROOT) ?? DEFAULTS.outRoot,
    profileDir: nonEmpty(options.profileDir) ?? nonEmpty(env.EXPORT_PROFILE_DIR) ?? DEFAULTS.profileDir,
    ...(token ? { token } : {}),
    originRules: DEFAULT_ORIGIN_RULES.map(rule => ({ ...rule })),
    fetch: {
      concurrency: positiveInt('--concurrency', options.concurrency, DEFAULTS.concurrency),
      maxAttempts: positiveInt('--max-attempts', options.maxAttempts, DEFAULTS.maxAttempts),
      baseDelayMs: DEFAULTS.baseDelayMs,
      timeoutMs: positiveInt('--timeout', options.timeout, DEFAULTS.timeoutMs),
      sessionDelayMs: DEFAULTS.sessionDelayMs,
      headless: !options.headed,
      browserChannel: nonEmpty(options.browserChannel) ?? nonEmpty(env.EXPORT_BROWSER_CHANNEL),
    },
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function positiveInt(flag: string, value: string | number | undefined, fallback: number): number {
  if (value === undefined || value === '') return fallback;
  const result = PositiveIntSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(`${flag} must be a positive integer, got "${value}"`);
  }
  return result.data;
}
