import { fileURLToPath, pathToFileURL } from 'url';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import type { Platform } from '../runtime/platform.js';
import type { MalformedLocatorError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';

/**
 * A `file:` URL the dynamic loader can import from.
 * Directory locators end in `/`; everything else is an archive.
 */
export type LoadableLocator = Brand<string, 'LoadableLocator'>;

export type LocatorFactory = (path: string) => Result<LoadableLocator, MalformedLocatorError>;

export interface LocatorOptions {
  /** Read the path with Windows rules (drive letters, `\\host\share`). Defaults to the host's rules. */
  readonly windows?: boolean;
}

export function locatorFromPath(path: string, options: LocatorOptions = {}): Result<LoadableLocator, MalformedLocatorError> {
  if (path.length === 0) return err(rejectPath(path, 'empty path'));
  if (path.includes('\0')) return err(rejectPath(path, 'path contains a NUL character'));

  try {
    const url = options.windows === undefined ? pathToFileURL(path) : pathToFileURL(path, { windows: options.windows });
    return ok(url.href as LoadableLocator);
  } catch (e) {
    return err(Err.malformedLocator(path, 'cannot convert to a file URL', e));
  }
}

/** Locator factory that reads paths the way the given platform writes them. */
export function locatorFactoryFor(platform: Platform): LocatorFactory {
  const windows = platform.kind === 'windows';
  return (path) => locatorFromPath(path, { windows });
}

/**
 * Accepts a `file:` URL only if it names a path on this machine, so that
 * everything in the loader can later be turned back into a path.
 */
export function parseLocator(input: string | URL): Result<LoadableLocator, MalformedLocatorError> {
  const text = input.toString();
  if (!URL.canParse(text)) return err(Err.malformedLocator(text, 'not a URL'));

  const url = new URL(text);
  if (url.protocol !== 'file:') {
    return err(Err.malformedLocator(text, `unsupported protocol ${url.protocol}`));
  }

  try {
    fileURLToPath(url);
  } catch (e) {
    return err(Err.malformedLocator(text, 'not a local file URL', e));
  }
  return ok(url.href as LoadableLocator);
}

export function isDirectoryLocator(locator: LoadableLocator): boolean {
  return locator.endsWith('/');
}

function rejectPath(path: string, reason: string): MalformedLocatorError {
  return Err.malformedLocator(path, reason, new TypeError(`Invalid archive path: ${reason}`));
}
