/**
 * Bootstrap configuration - parse, don't validate.
 *
 * - Single source of truth for the env surface the bootstrapper reads
 * - Zod validates at boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigInvalidError, ConfigIssue, ValidatedAppConfig } from '../errors/app-error.js';
import { LOG_LEVELS } from '../core/logging/types.js';
import type { LogLevel } from '../core/logging/types.js';

// =============================================================================
// Env variable names
// =============================================================================

export const ENV = {
  ModulePath: 'KICKSTAND_MODULE_PATH',
  Home: 'KICKSTAND_HOME',
  Entry: 'KICKSTAND_ENTRY',
  ArchiveSuffix: 'KICKSTAND_ARCHIVE_SUFFIX',
  LogLevel: 'KICKSTAND_LOG_LEVEL',
  LogConfig: 'KICKSTAND_LOG_CONFIG',
  LogFile: 'KICKSTAND_LOG_FILE',
} as const;

export const DEFAULT_ENTRY_SYMBOL = 'kickstand.Application';
export const DEFAULT_ARCHIVE_SUFFIX = '.mjs';

// =============================================================================
// Branded primitives (prove parsing/validation happened)
// =============================================================================

export type EntrySymbol = Brand<string, 'EntrySymbol'>;
export type ArchiveSuffix = Brand<string, 'ArchiveSuffix'>;

export interface BootConfig {
  /** Ambient search path as found at startup; undefined when the variable is unset. */
  readonly modulePath: string | undefined;
  /** Installation override, consulted only for unpackaged launches. */
  readonly homeOverride: string | undefined;
  readonly entrySymbol: EntrySymbol;
  readonly archiveSuffix: ArchiveSuffix;
  readonly logLevel: LogLevel;
  /** Bootstrapper log file; stderr when unset. */
  readonly logFile: string | undefined;
}

export type ValidatedConfig = ValidatedAppConfig<BootConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
}

// =============================================================================
// Schema (single source of truth for validation + types)
// =============================================================================

const QUALIFIED_NAME = /^[A-Za-z_$][\w$]*(\.[A-Za-z_$][\w$]*)*$/;

const EnvSchema = z.object({
  KICKSTAND_MODULE_PATH: z.string().optional(),

  KICKSTAND_HOME: z.string().optional(),

  KICKSTAND_ENTRY: z
    .string()
    .regex(QUALIFIED_NAME, 'KICKSTAND_ENTRY must be a dotted name such as kickstand.Application')
    .default(DEFAULT_ENTRY_SYMBOL),

  KICKSTAND_ARCHIVE_SUFFIX: z
    .string()
    .regex(/^\.[^./\\]+$/, 'KICKSTAND_ARCHIVE_SUFFIX must look like .mjs')
    .default(DEFAULT_ARCHIVE_SUFFIX),

  KICKSTAND_LOG_LEVEL: z
    .string()
    .optional()
    .transform((v) => v?.toLowerCase())
    .pipe(z.enum(LOG_LEVELS).default('warn')),

  KICKSTAND_LOG_FILE: z.string().min(1, 'KICKSTAND_LOG_FILE must not be empty').optional(),
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

  return ok(buildConfig(parsed.data) as ValidatedConfig);
}

/**
 * Tests and local construction only: creates a validated config without env parsing.
 * (Still branded as validated to prevent accidentally passing raw objects.)
 */
export function createValidatedConfig(value: BootConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv): BootConfig {
  return {
    modulePath: env.KICKSTAND_MODULE_PATH,
    homeOverride: env.KICKSTAND_HOME,
    entrySymbol: env.KICKSTAND_ENTRY as EntrySymbol,
    archiveSuffix: env.KICKSTAND_ARCHIVE_SUFFIX as ArchiveSuffix,
    logLevel: env.KICKSTAND_LOG_LEVEL,
    logFile: env.KICKSTAND_LOG_FILE,
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
