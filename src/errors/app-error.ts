import type { Brand } from '../runtime/brand.js';

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly kind: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

export type UnexpectedError = Readonly<{
  readonly kind: 'Unexpected';
  readonly message: string;
  readonly cause: unknown;
}>;

/**
 * Failures outside the engine: the process environment, or a bug.
 */
export type AppError = ConfigInvalidError | UnexpectedError;

/**
 * Config that went through `loadConfig`. Callers can require it without re-checking.
 */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
