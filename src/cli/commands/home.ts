/**
 * Home Command
 *
 * Shows where kickstand believes it is installed.
 * Pure function with dependency injection.
 */

import type { CliResult } from '../types/cli-result.js';
import { success, failure } from '../types/cli-result.js';
import type { InstallationDirectory } from '../../boot/installation.js';
import { ENV } from '../../config/app-config.js';

export interface HomeCommandDeps {
  readonly locateInstallation: () => InstallationDirectory;
}

export function executeHomeCommand(deps: HomeCommandDeps): CliResult {
  const installation = deps.locateInstallation();

  switch (installation.kind) {
    case 'resolved':
      return success({ message: 'Installation directory', details: [installation.path] });
    case 'unknown':
      return failure('Installation directory could not be determined', {
        details: [installation.reason],
        suggestions: [`Set ${ENV.Home} to the installation directory`],
      });
  }
}
