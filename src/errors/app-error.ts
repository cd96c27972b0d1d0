import type { Brand } from '../runtime/brand.js';

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

/**
 * A path or URL that cannot be turned into a loadable locator.
 * During initial assembly these are collected as initialization failures.
 */
export type MalformedLocatorError = Readonly<{
  readonly _tag: 'MalformedLocator';
  readonly input: string;
  readonly message: string;
  readonly cause?: unknown;
}>;

export type SymbolNotFoundError = Readonly<{
  readonly _tag: 'SymbolNotFound';
  readonly symbol: string;
  readonly searched: readonly string[];
  readonly message: string;
}>;

export type SymbolLoadFailedError = Readonly<{
  readonly _tag: 'SymbolLoadFailed';
  readonly symbol: string;
  readonly locator: string;
  readonly message: string;
  readonly cause: unknown;
}>;

export type EntryNotStartableError = Readonly<{
  readonly _tag: 'EntryNotStartable';
  readonly symbol: string;
  readonly message: string;
}>;

export type NoActiveContextError = Readonly<{
  readonly _tag: 'NoActiveContext';
  readonly operation: string;
  readonly message: string;
}>;

export type StartupFailedError = Readonly<{
  readonly _tag: 'StartupFailed';
  readonly phase: string;
  readonly message: string;
  readonly cause?: unknown;
}>;

export type UnexpectedError = Readonly<{
  readonly _tag: 'Unexpected';
  readonly message: string;
  readonly cause: unknown;
}>;

export type SymbolLoadError = SymbolNotFoundError | SymbolLoadFailedError;

export type AppError =
  | ConfigInvalidError
  | MalformedLocatorError
  | SymbolNotFoundError
  | SymbolLoadFailedError
  | EntryNotStartableError
  | NoActiveContextError
  | StartupFailedError
  | UnexpectedError;

/** Archive paths that could not be added during initial assembly. */
export type InitializationFailure = MalformedLocatorError;

/**
 * Branded error type for validated config.
 * (Kept here so callers can require a validated version without runtime checks.)
 */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
