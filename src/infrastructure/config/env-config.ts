import { readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { resolve } from 'node:path';
import { parse } from 'dotenv';
import {
  clientConfigSchema,
  formatIssues,
  type ClientConfig,
  type ClientConfigInput,
} from '../../application/index.js';
import { ConfigurationError, getErrorMessage } from '../../domain/index.js';

const CONFIG_FIELDS = [
  'project_key',
  'deliverable_key',
  'endpoint',
  'silent_failures',
  'retries',
  'timeout_ms',
  'retry_delay_ms',
  'max_retry_delay_ms',
] as const satisfies readonly (keyof ClientConfigInput)[];

type ConfigField = (typeof CONFIG_FIELDS)[number];

/** Environment variable read for each config field. */
export const ENV_KEYS: Readonly<Record<ConfigField, string>> = {
  project_key: 'PROJECT_KEY',
  deliverable_key: 'DELIVERABLE_KEY',
  endpoint: 'HUNTGLITCH_ENDPOINT',
  silent_failures: 'HUNTGLITCH_SILENT_FAILURES',
  retries: 'HUNTGLITCH_RETRIES',
  timeout_ms: 'HUNTGLITCH_TIMEOUT_MS',
  retry_delay_ms: 'HUNTGLITCH_RETRY_DELAY_MS',
  max_retry_delay_ms: 'HUNTGLITCH_MAX_RETRY_DELAY_MS',
};

/**
 * Default `.env` search order: project root, local override, then a
 * per-user file. Earlier paths win.
 */
export function defaultConfigPaths(cwd: string = process.cwd(), home: string = homedir()): string[] {
  return [
    resolve(cwd, '.env'),
    resolve(cwd, '.env.local'),
    resolve(home, '.huntglitch', '.env'),
  ];
}

function isMissingFile(err: unknown): boolean {
  return (
    err instanceof Error &&
    'code' in err &&
    (err.code === 'ENOENT' || err.code === 'ENOTDIR')
  );
}

/**
 * Reads and merges `.env` files. A key defined in an earlier file is not
 * overwritten by a later one. Missing files are skipped; any other read
 * failure is thrown.
 */
export function readEnvFiles(paths: readonly string[]): Record<string, string> {
  const merged: Record<string, string> = {};

  for (const path of paths) {
    let content: string;
    try {
      content = readFileSync(path, 'utf-8');
    } catch (err: unknown) {
      if (isMissingFile(err)) continue;
      throw new ConfigurationError(`Cannot read env file ${path}: ${getErrorMessage(err)}`, [], {
        cause: err,
      });
    }

    for (const [key, value] of Object.entries(parse(content))) {
      if (!(key in merged)) merged[key] = value;
    }
  }

  return merged;
}

export type ConfigResolution =
  | { readonly ok: true; readonly config: ClientConfig }
  | { readonly ok: false; readonly error: ConfigurationError };

export interface ResolveConfigOptions {
  /** Values passed in code; they beat every other source. */
  overrides?: Partial<ClientConfigInput>;
  env?: NodeJS.ProcessEnv;
  paths?: readonly string[];
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/** Blank override strings fall through to env and files like blank env values do. */
function presentOverride<T>(value: T): T | undefined {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

/**
 * Resolves the client configuration without throwing.
 *
 * Precedence per field: `overrides` > `env` > the first `.env` file in
 * `paths` that defines it > schema default.
 */
export function resolveClientConfig(options: ResolveConfigOptions = {}): ConfigResolution {
  const env = options.env ?? process.env;
  const paths = options.paths ?? defaultConfigPaths();

  let fileValues: Record<string, string>;
  try {
    fileValues = readEnvFiles(paths);
  } catch (err: unknown) {
    const error =
      err instanceof ConfigurationError
        ? err
        : new ConfigurationError(getErrorMessage(err), [], { cause: err });
    return { ok: false, error };
  }

  const raw: Record<string, unknown> = {};
  for (const field of CONFIG_FIELDS) {
    const envKey = ENV_KEYS[field];
    raw[field] =
      presentOverride(options.overrides?.[field]) ??
      nonEmpty(env[envKey]) ??
      nonEmpty(fileValues[envKey]);
  }

  const parsed = clientConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    return {
      ok: false,
      error: new ConfigurationError(
        `Invalid HuntGlitch configuration: ${issues.join('; ')}`,
        issues,
        { cause: parsed.error },
      ),
    };
  }

  return { ok: true, config: Object.freeze(parsed.data) };
}

/**
 * Throwing variant of {@link resolveClientConfig}, for startup code that
 * should fail loudly on a misconfigured integration.
 */
export function loadClientConfig(options: ResolveConfigOptions = {}): ClientConfig {
  const resolution = resolveClientConfig(options);
  if (!resolution.ok) throw resolution.error;
  return resolution.config;
}
