/**
 * File store configuration - parse, don't validate.
 *
 * - Environment is the only input; zod validates it at the boundary
 * - Paths are resolved to absolute form here, never later
 * - Errors are data (Result), never thrown
 */

import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigInvalidError, ConfigIssue, ValidatedAppConfig } from '../errors/app-error.js';

// =============================================================================
// Branded primitives
// =============================================================================

export type DataDir = Brand<string, 'DataDir'>;
export type CacheBaseDir = Brand<string, 'CacheBaseDir'>;
export type AssetsDir = Brand<string, 'AssetsDir'>;
export type UserId = Brand<number, 'UserId'>;
export type DbExtension = Brand<string, 'DbExtension'>;

export interface AppConfig {
  readonly storage: {
    /** Durable root: survives upgrades, holds everything user data needs. */
    readonly dataDir: DataDir;
    /** Parent of the purgeable `cache/` directory. */
    readonly cacheBaseDir: CacheBaseDir;
    /** Read-only bundled assets (schema.json). */
    readonly assetsDir: AssetsDir;
  };
  readonly session: { readonly userId: UserId };
  readonly database: { readonly extension: DbExtension };
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
  readonly cwd: string;
  /** Defaults to the OS home directory. */
  readonly homeDir?: string;
}

export const DEFAULT_DB_EXTENSION = 'realm';

// =============================================================================
// Schema
// =============================================================================

const optionalDir = z.string().min(1, 'must not be empty').optional();

const EnvSchema = z.object({
  REFSTORE_DATA_DIR: optionalDir,
  REFSTORE_CACHE_DIR: optionalDir,
  REFSTORE_ASSETS_DIR: optionalDir,

  REFSTORE_USER_ID: z
    .string()
    .optional()
    .transform((v) => (v === undefined ? undefined : Number(v)))
    .pipe(
      z
        .number()
        .int('REFSTORE_USER_ID must be an integer')
        .min(0, 'REFSTORE_USER_ID cannot be negative')
        .default(0)
    ),

  REFSTORE_DB_EXTENSION: z
    .string()
    .regex(/^[a-z0-9]+$/, 'REFSTORE_DB_EXTENSION must be lowercase alphanumeric')
    .default(DEFAULT_DB_EXTENSION),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(buildConfig(parsed.data, options.cwd, options.homeDir ?? os.homedir()) as ValidatedConfig);
}

/**
 * Tests and local construction only: skips env parsing but still brands the
 * value so raw objects cannot be passed by accident.
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv, cwd: string, homeDir: string): AppConfig {
  const appHome = path.join(homeDir, '.refstore');

  return {
    storage: {
      dataDir: resolveDir(env.REFSTORE_DATA_DIR, cwd, path.join(appHome, 'data')) as DataDir,
      cacheBaseDir: resolveDir(env.REFSTORE_CACHE_DIR, cwd, path.join(appHome, 'caches')) as CacheBaseDir,
      assetsDir: resolveDir(env.REFSTORE_ASSETS_DIR, cwd, path.join(cwd, 'assets')) as AssetsDir,
    },
    session: { userId: env.REFSTORE_USER_ID as UserId },
    database: { extension: env.REFSTORE_DB_EXTENSION as DbExtension },
  };
}

function resolveDir(configured: string | undefined, cwd: string, fallback: string): string {
  return configured === undefined ? fallback : path.resolve(cwd, configured);
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
