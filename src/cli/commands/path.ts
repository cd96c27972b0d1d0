/**
 * Path Command
 *
 * Shows the module search path the launcher would hand to the application,
 * either as published in the environment or as the loader's locators.
 */

import type { CliResult } from '../types/cli-result.js';
import { success, failure } from '../types/cli-result.js';
import type { InitializeResult } from '../../boot/initialize.js';

export interface PathCommandDeps {
  readonly initialize: () => InitializeResult;
}

export interface PathCommandOptions {
  /** List loader locators instead of search-path segments. */
  readonly loader?: boolean;
}

export function executePathCommand(deps: PathCommandDeps, options: PathCommandOptions = {}): CliResult {
  const init = deps.initialize();

  if (init.isErr()) {
    return failure('Module search path could not be assembled', {
      details: init.error.map((f) => f.message),
    });
  }

  const context = init.value;
  const entries = options.loader ? context.loader.locators() : context.searchPath.segments();
  const message = options.loader
    ? `Loader locators (${entries.length})`
    : `Module search path (${entries.length} segments)`;

  return success({
    message,
    details: entries,
    warnings: context.diagnostics.map((d) => d.message),
  });
}
