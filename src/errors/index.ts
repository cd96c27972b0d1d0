export type {
  AppError,
  ConfigIssue,
  ConfigInvalidError,
  EntryNotStartableError,
  InitializationFailure,
  MalformedLocatorError,
  NoActiveContextError,
  StartupFailedError,
  SymbolLoadError,
  SymbolLoadFailedError,
  SymbolNotFoundError,
  UnexpectedError,
  ValidatedAppConfig,
} from './app-error.js';
export { Err } from './factories.js';
export { formatAppError, describeCause } from './formatter.js';
