import path from 'path';
import type { Logger } from '../core/logging/types.js';
import type { InitializationFailure } from '../errors/app-error.js';
import type { Platform } from '../runtime/platform.js';
import type { ArchiveScanner, ScanDiagnostic, ScanResult } from './archive-scanner.js';
import { NAME_ONLY, inaccessible } from './archive-scanner.js';
import type { InstallationDirectory } from './installation.js';
import type { LoadableLocator, LocatorFactory } from './locator.js';
import { normalizeSharePath } from './path-normalizer.js';
import type { SearchPath } from './search-path.js';

/** Library directories under the installation root, in load order. */
export const STANDARD_LIBRARY_DIRS: readonly (readonly string[])[] = [
  ['lib'],
  ['lib', 'ext'],
  ['lib', 'junit'],
];

export interface AssemblyInput {
  readonly installation: InstallationDirectory;
  readonly platform: Platform;
  readonly searchPath: SearchPath;
}

export interface AssemblyDeps {
  readonly scanner: Pick<ArchiveScanner, 'scan'>;
  readonly toLocator: LocatorFactory;
  readonly logger: Logger;
}

export interface Assembly {
  readonly locators: readonly LoadableLocator[];
  readonly failures: readonly InitializationFailure[];
  readonly diagnostics: readonly ScanDiagnostic[];
}

/**
 * Builds the initial locator list from the standard library directories.
 *
 * Nothing here aborts: an unreadable directory becomes a diagnostic, an archive
 * path that cannot become a locator becomes a failure, and the rest of the
 * archives are still added. The search path is published once, at the end.
 */
export function assembleClasspath(input: AssemblyInput, deps: AssemblyDeps): Assembly {
  const locators: LoadableLocator[] = [];
  const failures: InitializationFailure[] = [];
  const diagnostics: ScanDiagnostic[] = [];

  for (const segments of STANDARD_LIBRARY_DIRS) {
    const scan = scanLibraryDir(input.installation, segments, deps.scanner);

    if (scan.kind === 'inaccessible') {
      deps.logger.warn({ directory: scan.diagnostic.directory, reason: scan.diagnostic.reason }, scan.diagnostic.message);
      diagnostics.push(scan.diagnostic);
      continue;
    }

    for (const entry of scan.entries) {
      const locator = deps.toLocator(entry.path);

      if (locator.isErr()) {
        failures.push(locator.error);
        continue;
      }

      locators.push(locator.value);
      input.searchPath.append(normalizeSharePath(entry.path, input.platform));
    }
  }

  input.searchPath.publish();
  deps.logger.debug(
    { locators: locators.length, failures: failures.length, skippedDirectories: diagnostics.length },
    'Assembled initial module search path'
  );

  return { locators, failures, diagnostics };
}

function scanLibraryDir(
  installation: InstallationDirectory,
  segments: readonly string[],
  scanner: Pick<ArchiveScanner, 'scan'>
): ScanResult {
  if (installation.kind === 'unknown') {
    const relative = path.join(...segments);
    return inaccessible(relative, 'installation_unknown', `Skipping ${relative}: installation directory unknown (${installation.reason})`);
  }
  return scanner.scan(path.join(installation.path, ...segments), NAME_ONLY);
}
