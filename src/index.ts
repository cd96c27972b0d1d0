/**
 * Application-facing API.
 *
 * Code started by the launcher calls these to grow its own module search path
 * at run time, e.g. to pick up plugins dropped into a directory. They act on
 * the boot context of the current hand-off and fail with NoActiveContext
 * anywhere else.
 */

import type { Result, ResultAsync } from 'neverthrow';
import type { MalformedLocatorError, NoActiveContextError, SymbolLoadError } from './errors/index.js';
import { currentBootContext } from './boot/execution-context.js';
import type { InstallationDirectory } from './boot/installation.js';
import type { LoadableLocator } from './boot/locator.js';

export type ExtendError = MalformedLocatorError | NoActiveContextError;

/** Add a directory or archive (and a directory's archives) to the loader and the published search path. */
export function addPath(target: string): Result<void, ExtendError> {
  return currentBootContext('addPath').andThen((context) => context.extender.addPath(target));
}

/** Add a `file:` URL to the loader only. */
export function addURL(locator: string | URL): Result<void, ExtendError> {
  return currentBootContext('addURL').andThen((context) => context.extender.addURL(locator));
}

/** Add a directory or archive (and a directory's archives) to the loader only. */
export function addLoaderPath(target: string): Result<void, ExtendError> {
  return currentBootContext('addLoaderPath').andThen((context) => context.extender.addLoaderPath(target));
}

export function getInstallationDirectory(): Result<InstallationDirectory, NoActiveContextError> {
  return currentBootContext('getInstallationDirectory').map((context) => context.installation);
}

/** Locators registered with the active loader, in search order. */
export function loaderLocators(): Result<readonly LoadableLocator[], NoActiveContextError> {
  return currentBootContext('loaderLocators').map((context) => context.loader.locators());
}

/** Resolve a symbol by name through the active loader, e.g. a plugin's entry class. */
export function loadSymbol(qualifiedName: string): ResultAsync<unknown, SymbolLoadError | NoActiveContextError> {
  return currentBootContext('loadSymbol').asyncAndThen((context) => context.loader.loadSymbol(qualifiedName));
}

export { currentBootContext, runInBootContext } from './boot/execution-context.js';
export type { BootContext, InitializeOptions, InitializeResult } from './boot/initialize.js';
export { initialize } from './boot/initialize.js';
export type { Startable, BootOutcome, HandOffError } from './boot/hand-off.js';
export { handOff, interpretBootOutcome } from './boot/hand-off.js';
export type { InstallationDirectory } from './boot/installation.js';
export { describeInstallation } from './boot/installation.js';
export type { LoadableLocator } from './boot/locator.js';
export type {
  AppError,
  EntryNotStartableError,
  MalformedLocatorError,
  NoActiveContextError,
  StartupFailedError,
  SymbolLoadError,
} from './errors/index.js';
export { formatAppError, describeCause } from './errors/index.js';
