import { fileURLToPath } from 'url';
import type { Result } from 'neverthrow';
import { ok, err, ResultAsync } from 'neverthrow';
import type { SymbolLoadError, SymbolLoadFailedError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import type { BootFileSystem } from './ports/boot-file-system.port.js';
import type { LoadableLocator } from './locator.js';
import { isDirectoryLocator } from './locator.js';

export type ModuleNamespace = Readonly<Record<string, unknown>>;

/** Imports one module by URL. Swapped for an in-memory table in tests. */
export type ModuleImporter = (href: string) => Promise<ModuleNamespace>;

export const nodeModuleImporter: ModuleImporter = (href) => import(href);

/** Module files probed, in order, under a directory locator. */
const SOURCE_EXTENSIONS = ['.mjs', '.js'] as const;

export interface DynamicLoaderDeps {
  readonly fs: BootFileSystem;
  readonly importModule: ModuleImporter;
}

/**
 * Append-only registry of locators, searched in registration order when a
 * symbol is requested by name.
 *
 * A name `a.b.C` resolves to:
 * - under a directory locator: module `a/b/C.mjs` (then `.js`), export `C`, else its default export
 * - in an archive locator: the archive's own export `C`
 *
 * The first locator that provides the symbol wins.
 */
export class DynamicLoader {
  private readonly registry: LoadableLocator[];

  constructor(
    initial: readonly LoadableLocator[],
    private readonly deps: DynamicLoaderDeps
  ) {
    this.registry = [...initial];
  }

  add(locator: LoadableLocator): void {
    this.registry.push(locator);
  }

  locators(): readonly LoadableLocator[] {
    return [...this.registry];
  }

  loadSymbol(qualifiedName: string): ResultAsync<unknown, SymbolLoadError> {
    return new ResultAsync(this.search(qualifiedName));
  }

  private async search(qualifiedName: string): Promise<Result<unknown, SymbolLoadError>> {
    const segments = qualifiedName.split('.');
    const exportName = segments[segments.length - 1] ?? qualifiedName;
    const modulePath = segments.join('/');
    const searched = this.locators();

    for (const locator of searched) {
      const target = this.moduleFor(locator, modulePath, qualifiedName);
      if (target.isErr()) return err(target.error);
      const href = target.value;
      if (href === null) continue;

      // A synchronous throw from the importer is a load failure too
      const loaded = await ResultAsync.fromPromise(
        Promise.resolve().then(() => this.deps.importModule(href)),
        (e) => Err.symbolLoadFailed(qualifiedName, href, e)
      );
      if (loaded.isErr()) return err(loaded.error);

      const namespace = loaded.value;
      if (Object.hasOwn(namespace, exportName)) return ok(namespace[exportName]);
      if (isDirectoryLocator(locator) && Object.hasOwn(namespace, 'default')) return ok(namespace['default']);
    }

    return err(Err.symbolNotFound(qualifiedName, searched));
  }

  /** Module to import for the name under this locator; `null` when the locator has none. */
  private moduleFor(
    locator: LoadableLocator,
    modulePath: string,
    qualifiedName: string
  ): Result<string | null, SymbolLoadFailedError> {
    if (!isDirectoryLocator(locator)) return ok(locator);

    for (const extension of SOURCE_EXTENSIONS) {
      const candidate = new URL(modulePath + extension, locator);
      let candidatePath: string;
      try {
        candidatePath = fileURLToPath(candidate);
      } catch (e) {
        return err(Err.symbolLoadFailed(qualifiedName, locator, e));
      }
      if (this.deps.fs.isReadableFile(candidatePath)) return ok(candidate.href);
    }
    return ok(null);
  }
}
