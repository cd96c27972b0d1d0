import path from 'path';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Logger } from '../core/logging/types.js';
import type { MalformedLocatorError } from '../errors/app-error.js';
import type { ArchiveEntry, ArchiveScanner } from './archive-scanner.js';
import { READABLE_FILES } from './archive-scanner.js';
import type { DynamicLoader } from './dynamic-loader.js';
import type { LocatorFactory } from './locator.js';
import { parseLocator } from './locator.js';
import type { BootFileSystem } from './ports/boot-file-system.port.js';
import type { SearchPath } from './search-path.js';

export interface ClasspathExtenderDeps {
  readonly fs: BootFileSystem;
  readonly scanner: ArchiveScanner;
  readonly toLocator: LocatorFactory;
  readonly logger: Logger;
}

/**
 * Runtime additions to the module search path, for the running application
 * (plugin directories and the like).
 *
 * Each call adds the locator and its search-path segments without awaiting in
 * between, so on Node's single thread the loader and the published path never
 * drift apart mid-call.
 */
export class ClasspathExtender {
  constructor(
    private readonly loader: DynamicLoader,
    private readonly searchPath: SearchPath,
    private readonly deps: ClasspathExtenderDeps
  ) {}

  /** Add one locator to the loader only; the published search path is untouched. */
  addURL(locator: string | URL): Result<void, MalformedLocatorError> {
    return parseLocator(locator).map((parsed) => {
      this.loader.add(parsed);
    });
  }

  /**
   * Add a directory or archive to the loader and the published search path.
   * For a directory, the archives directly inside it are added too.
   */
  addPath(target: string): Result<void, MalformedLocatorError> {
    return this.addToLoader(target).map((archives) => {
      this.searchPath.append(target);
      for (const archive of archives) {
        this.searchPath.append(archive.path);
      }
      this.searchPath.publish();
    });
  }

  /** Like addPath, for the loader only. */
  addLoaderPath(target: string): Result<void, MalformedLocatorError> {
    return this.addToLoader(target).map(() => undefined);
  }

  private addToLoader(target: string): Result<readonly ArchiveEntry[], MalformedLocatorError> {
    const isDirectory = this.deps.fs.isDirectory(target);
    // Directory locators must end in a separator
    const base = isDirectory && !endsWithSeparator(target) ? target + path.sep : target;

    const locator = this.deps.toLocator(base);
    if (locator.isErr()) return err(locator.error);
    this.loader.add(locator.value);

    if (!isDirectory) return ok([]);

    const scan = this.deps.scanner.scan(base, READABLE_FILES);
    if (scan.kind === 'inaccessible') {
      this.deps.logger.warn({ directory: scan.diagnostic.directory }, scan.diagnostic.message);
      return ok([]);
    }

    const added: ArchiveEntry[] = [];
    for (const archive of scan.entries) {
      const child = this.deps.toLocator(archive.path);
      if (child.isErr()) return err(child.error);
      this.loader.add(child.value);
      added.push(archive);
    }
    this.deps.logger.debug({ target, archives: added.length }, 'Extended module search path');
    return ok(added);
  }
}

function endsWithSeparator(target: string): boolean {
  return target.endsWith('/') || target.endsWith(path.sep);
}
