import path from 'path';
import type { Result } from 'neverthrow';
import { ok, err, ResultAsync } from 'neverthrow';
import { ENV } from '../config/app-config.js';
import type { Logger } from '../core/logging/types.js';
import type {
  EntryNotStartableError,
  InitializationFailure,
  StartupFailedError,
  SymbolLoadError,
} from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import { formatAppError } from '../errors/formatter.js';
import { assertNever } from '../runtime/assert-never.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { runInBootContext } from './execution-context.js';
import type { BootContext, InitializeResult } from './initialize.js';
import type { InstallationDirectory } from './installation.js';
import { describeInstallation } from './installation.js';

/**
 * What the application's entry symbol must be: a class with a no-argument
 * constructor whose instances can be started with the process arguments.
 */
export interface Startable {
  start(args: string[]): void | Promise<void>;
}

export type StartableClass = new () => unknown;

export type HandOffError = SymbolLoadError | EntryNotStartableError | StartupFailedError;

export type BootOutcome =
  | { readonly kind: 'handed_off' }
  | { readonly kind: 'aborted_config'; readonly failures: readonly InitializationFailure[] }
  | { readonly kind: 'aborted_runtime'; readonly error: HandOffError };

export interface HandOffDeps {
  /** Terminal reports; stderr in production. */
  readonly writeError: (text: string) => void;
  readonly logger: Logger;
}

/** Relative to the installation directory. */
export const DEFAULT_LOG_CONFIG = path.join('bin', 'logging.json');

/**
 * Start the application, or explain why not.
 *
 * Never throws and never exits: the caller turns the outcome into an exit code.
 */
export async function handOff(init: InitializeResult, args: readonly string[], deps: HandOffDeps): Promise<BootOutcome> {
  if (init.isErr()) {
    deps.writeError(formatInitializationFailures(init.error));
    return { kind: 'aborted_config', failures: init.error };
  }

  const context = init.value;
  return runInBootContext(context, async (): Promise<BootOutcome> => {
    applyLoggingDefaults(context, deps.logger);

    const started = await startApplication(context, args, deps.logger);
    if (started.isOk()) {
      return { kind: 'handed_off' };
    }

    deps.writeError(formatHandOffFailure(started.error, context.installation));
    return { kind: 'aborted_runtime', error: started.error };
  });
}

export function interpretBootOutcome(outcome: BootOutcome, terminator: ProcessTerminator): void {
  switch (outcome.kind) {
    case 'handed_off':
      // The application owns the process from here on.
      return;
    case 'aborted_config':
    case 'aborted_runtime':
      return terminator.terminate({ kind: 'failure' });
    default:
      return assertNever(outcome);
  }
}

export function formatInitializationFailures(failures: readonly InitializationFailure[]): string {
  return ['Configuration error during init, see failures:', ...failures.map(formatAppError)].join('\n');
}

export function formatHandOffFailure(error: HandOffError, installation: InstallationDirectory): string {
  return `${formatAppError(error)}\nInstallation directory was detected as: ${describeInstallation(installation)}`;
}

function applyLoggingDefaults(context: BootContext, logger: Logger): void {
  if (context.env[ENV.LogConfig] !== undefined) return;

  if (context.installation.kind === 'unknown') {
    logger.warn(`${ENV.LogConfig} not set and installation directory unknown; leaving it unset`);
    return;
  }
  context.env[ENV.LogConfig] = `file:${path.join(context.installation.path, DEFAULT_LOG_CONFIG)}`;
}

function startApplication(context: BootContext, args: readonly string[], logger: Logger): ResultAsync<void, HandOffError> {
  const symbol = context.config.entrySymbol;
  logger.debug({ symbol, args: args.length }, 'Handing off to entry symbol');

  return context.loader
    .loadSymbol(symbol)
    .andThen((value) => instantiate(symbol, value))
    .andThen((app) =>
      ResultAsync.fromPromise(
        Promise.resolve().then(() => app.start([...args])),
        (e): HandOffError => Err.startupFailed('start', `${symbol}.start() failed`, e)
      )
    );
}

function instantiate(symbol: string, value: unknown): Result<Startable, HandOffError> {
  if (!isStartableClass(value)) {
    return err(Err.entryNotStartable(symbol, 'is not a class'));
  }

  let instance: unknown;
  try {
    instance = new value();
  } catch (e) {
    return err(Err.startupFailed('instantiate', `Cannot instantiate ${symbol}`, e));
  }

  if (!isStartable(instance)) {
    return err(Err.entryNotStartable(symbol, 'has no start(args) method'));
  }
  return ok(instance);
}

function isStartableClass(value: unknown): value is StartableClass {
  return typeof value === 'function' && value.prototype !== undefined;
}

function isStartable(value: unknown): value is Startable {
  return typeof value === 'object' && value !== null && 'start' in value && typeof value.start === 'function';
}
