/**
 * Application configuration - parse, don't validate.
 *
 * - Single source of truth for the environment surface
 * - Zod validates at the boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import * as path from 'path';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';
import { Err } from '../errors/factories.js';
import type { ConfigInvalidError, ConfigIssue, ValidatedAppConfig } from '../errors/app-error.js';
import { LOG_LEVELS, type LogLevel } from '../core/logging/types.js';

export type TaskPublishing = { readonly kind: 'enabled' } | { readonly kind: 'disabled' };

export interface AppConfig {
  readonly paths: {
    /** Null means the default `~/.splitwright/data`. */
    readonly dataDir: string | null;
    /** Null means `<dataDir>/../tasks`. */
    readonly tasksDir: string | null;
  };
  readonly logging: { readonly level: LogLevel };
  readonly session: {
    readonly sessionId: string | undefined;
    readonly taskListId: string | undefined;
    readonly envFile: string | undefined;
  };
  readonly tasks: { readonly publishing: TaskPublishing };
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
  /** Base for relative directory overrides. */
  readonly cwd: string;
}

// =============================================================================
// Schema
// =============================================================================

const optionalText = z
  .string()
  .optional()
  .transform((v) => {
    const trimmed = v?.trim();
    return trimmed ? trimmed : undefined;
  });

const EnvSchema = z.object({
  SPLITWRIGHT_DATA_DIR: optionalText,
  SPLITWRIGHT_TASKS_DIR: optionalText,
  SPLITWRIGHT_LOG_LEVEL: z
    .string()
    .optional()
    .transform((v) => v?.trim().toLowerCase() || undefined)
    .pipe(z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('silent')),
  SPLITWRIGHT_SESSION_ID: optionalText,
  SPLITWRIGHT_TASK_LIST_ID: optionalText,
  SPLITWRIGHT_ENV_FILE: optionalText,
  SPLITWRIGHT_DISABLE_TASKS: z.enum(['0', '1']).default('0'),
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

  return ok(buildConfig(parsed.data, options.cwd) as ValidatedConfig);
}

/**
 * Tests and local construction only: creates a validated config without env parsing.
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv, cwd: string): AppConfig {
  const level = LOG_LEVELS.find((l) => l === env.SPLITWRIGHT_LOG_LEVEL) ?? 'silent';

  return {
    paths: {
      dataDir: env.SPLITWRIGHT_DATA_DIR ? path.resolve(cwd, env.SPLITWRIGHT_DATA_DIR) : null,
      tasksDir: env.SPLITWRIGHT_TASKS_DIR ? path.resolve(cwd, env.SPLITWRIGHT_TASKS_DIR) : null,
    },
    logging: { level },
    session: {
      sessionId: env.SPLITWRIGHT_SESSION_ID,
      taskListId: env.SPLITWRIGHT_TASK_LIST_ID,
      envFile: env.SPLITWRIGHT_ENV_FILE,
    },
    tasks: {
      publishing: env.SPLITWRIGHT_DISABLE_TASKS === '1' ? { kind: 'disabled' } : { kind: 'enabled' },
    },
  };
}

export function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
