import type {
  AppError,
  ConfigIssue,
  ConfigInvalidError,
  EntryNotStartableError,
  MalformedLocatorError,
  NoActiveContextError,
  StartupFailedError,
  SymbolLoadFailedError,
  SymbolNotFoundError,
  UnexpectedError,
} from './app-error.js';

export const Err = {
  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Invalid configuration',
  }),

  malformedLocator: (input: string, reason: string, cause?: unknown): MalformedLocatorError => ({
    _tag: 'MalformedLocator',
    input,
    message: `Error adding archive: ${input} (${reason})`,
    cause,
  }),

  symbolNotFound: (symbol: string, searched: readonly string[]): SymbolNotFoundError => ({
    _tag: 'SymbolNotFound',
    symbol,
    searched,
    message: `Symbol ${symbol} not found in ${searched.length} locator(s)`,
  }),

  symbolLoadFailed: (symbol: string, locator: string, cause: unknown): SymbolLoadFailedError => ({
    _tag: 'SymbolLoadFailed',
    symbol,
    locator,
    message: `Failed to load ${locator} while resolving ${symbol}`,
    cause,
  }),

  entryNotStartable: (symbol: string, reason: string): EntryNotStartableError => ({
    _tag: 'EntryNotStartable',
    symbol,
    message: `Entry symbol ${symbol} ${reason}`,
  }),

  noActiveContext: (operation: string): NoActiveContextError => ({
    _tag: 'NoActiveContext',
    operation,
    message: `${operation} called outside a bootstrapped application`,
  }),

  startupFailed: (phase: string, message: string, cause?: unknown): StartupFailedError => ({
    _tag: 'StartupFailed',
    phase,
    message,
    cause,
  }),

  unexpected: (message: string, cause: unknown): UnexpectedError => ({
    _tag: 'Unexpected',
    message,
    cause,
  }),
} as const satisfies Record<string, (...args: never[]) => AppError>;
