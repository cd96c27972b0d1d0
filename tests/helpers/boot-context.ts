import { loadConfig, ENV } from '../../src/config/app-config.js';
import { ArchiveScanner } from '../../src/boot/archive-scanner.js';
import { ClasspathExtender } from '../../src/boot/classpath-extender.js';
import { DynamicLoader } from '../../src/boot/dynamic-loader.js';
import type { BootContext } from '../../src/boot/initialize.js';
import type { InstallationDirectory } from '../../src/boot/installation.js';
import { locatorFromPath, parseLocator } from '../../src/boot/locator.js';
import type { BootFileSystem } from '../../src/boot/ports/boot-file-system.port.js';
import { SearchPath } from '../../src/boot/search-path.js';
import { InMemoryBootFileSystem } from '../fakes/boot-file-system.fake.js';
import type { ModuleTable } from '../fakes/module-table.fake.js';
import { FakeLogger } from './FakeLogger.js';
import { expectOk } from './result-helpers.js';

export interface TestContextOptions {
  readonly modules: ModuleTable;
  /** Initial loader locators (file: URLs). */
  readonly locators?: readonly string[];
  readonly installation?: InstallationDirectory;
  readonly env?: Record<string, string | undefined>;
  readonly configEnv?: Record<string, string | undefined>;
  readonly fs?: BootFileSystem;
}

/**
 * A BootContext assembled by hand, for hand-off and public API tests that do
 * not care how the locators were discovered.
 */
export function createTestContext(options: TestContextOptions): BootContext {
  const env = options.env ?? {};
  const fs = options.fs ?? new InMemoryBootFileSystem();
  const config = expectOk(loadConfig({ env: options.configEnv ?? {} }), 'test config');

  const initial = (options.locators ?? []).map((l) => expectOk(parseLocator(l), `locator ${l}`));
  const loader = new DynamicLoader(initial, { fs, importModule: options.modules.importModule });
  const searchPath = new SearchPath(env, ENV.ModulePath, ':', '');
  const extender = new ClasspathExtender(loader, searchPath, {
    fs,
    scanner: new ArchiveScanner(fs, config.archiveSuffix),
    toLocator: locatorFromPath,
    logger: new FakeLogger().asLogger(),
  });

  return {
    config,
    env,
    installation: options.installation ?? { kind: 'resolved', path: '/opt/kickstand' },
    loader,
    searchPath,
    extender,
    diagnostics: [],
  };
}
