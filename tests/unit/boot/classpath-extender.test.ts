import { describe, it, expect } from 'vitest';
import { ArchiveScanner } from '../../../src/boot/archive-scanner.js';
import { ClasspathExtender } from '../../../src/boot/classpath-extender.js';
import { DynamicLoader } from '../../../src/boot/dynamic-loader.js';
import { locatorFromPath } from '../../../src/boot/locator.js';
import { SearchPath } from '../../../src/boot/search-path.js';
import { InMemoryBootFileSystem } from '../../fakes/boot-file-system.fake.js';
import { ModuleTable } from '../../fakes/module-table.fake.js';
import { FakeLogger } from '../../helpers/FakeLogger.js';
import { expectErr, expectErrTag, expectOk } from '../../helpers/result-helpers.js';

const KEY = 'KICKSTAND_MODULE_PATH';

function setup() {
  const fsFake = new InMemoryBootFileSystem()
    .addFile('/plugins/b.mjs')
    .addFile('/plugins/a.mjs')
    .addFile('/plugins/notes.txt')
    .addFile('/plugins/locked.mjs', { readable: false })
    .addFile('/opt/tool.mjs')
    .addDirectory('/locked')
    .markUnlistable('/locked');
  const env: Record<string, string | undefined> = {};
  const logger = new FakeLogger();
  const loader = new DynamicLoader([], { fs: fsFake, importModule: new ModuleTable().importModule });
  const searchPath = new SearchPath(env, KEY, ':', '/opt/app/bin/launcher.js');
  const extender = new ClasspathExtender(loader, searchPath, {
    fs: fsFake,
    scanner: new ArchiveScanner(fsFake, '.mjs'),
    toLocator: locatorFromPath,
    logger: logger.asLogger(),
  });
  return { env, logger, loader, extender };
}

describe('ClasspathExtender', () => {
  describe('addPath', () => {
    it('adds a directory and its readable archives to the loader and the search path', () => {
      const { env, loader, extender } = setup();

      expectOk(extender.addPath('/plugins'), 'addPath');

      expect(loader.locators()).toEqual(['file:///plugins/', 'file:///plugins/a.mjs', 'file:///plugins/b.mjs']);
      expect(env[KEY]).toBe('/opt/app/bin/launcher.js:/plugins:/plugins/a.mjs:/plugins/b.mjs');
    });

    it('keeps an existing trailing separator', () => {
      const { env, loader, extender } = setup();

      expectOk(extender.addPath('/plugins/'), 'addPath');

      expect(loader.locators()[0]).toBe('file:///plugins/');
      expect(env[KEY]).toBe('/opt/app/bin/launcher.js:/plugins/:/plugins/a.mjs:/plugins/b.mjs');
    });

    it('adds a single archive as one segment', () => {
      const { env, loader, extender } = setup();

      expectOk(extender.addPath('/opt/tool.mjs'), 'addPath');

      expect(loader.locators()).toEqual(['file:///opt/tool.mjs']);
      expect(env[KEY]).toBe('/opt/app/bin/launcher.js:/opt/tool.mjs');
    });

    it('adds an unlistable directory on its own and warns', () => {
      const { env, loader, logger, extender } = setup();

      expectOk(extender.addPath('/locked'), 'addPath');

      expect(loader.locators()).toEqual(['file:///locked/']);
      expect(env[KEY]).toBe('/opt/app/bin/launcher.js:/locked');
      expect(logger.getEntries('warn').map((e) => e.msg)).toEqual(['Could not access /locked/: EACCES: /locked/']);
    });

    it('rejects an empty path and changes nothing', () => {
      const { env, loader, extender } = setup();

      const error = expectErr(extender.addPath(''), 'empty');

      expect(error.message).toBe('Error adding archive:  (empty path)');
      expect(loader.locators()).toEqual([]);
      expect(env[KEY]).toBeUndefined();
    });
  });

  describe('addURL', () => {
    it('adds to the loader without publishing the search path', () => {
      const { env, loader, extender } = setup();

      expectOk(extender.addURL('file:///srv/extra.mjs'), 'addURL');
      expectOk(extender.addURL(new URL('file:///srv/plugins/')), 'addURL');

      expect(loader.locators()).toEqual(['file:///srv/extra.mjs', 'file:///srv/plugins/']);
      expect(env[KEY]).toBeUndefined();
    });

    it('rejects a non-file URL', () => {
      const { loader, extender } = setup();

      expect(expectErr(extender.addURL('ftp://host/a.mjs'), 'ftp')._tag).toBe('MalformedLocator');
      expect(loader.locators()).toEqual([]);
    });

    it('rejects a file URL on a remote host and leaves the loader untouched', async () => {
      const { env, loader, extender } = setup();

      const error = expectErr(extender.addURL('file://fileserver/plugins/'), 'remote');

      expect(error.message).toBe('Error adding archive: file://fileserver/plugins/ (not a local file URL)');
      expect(loader.locators()).toEqual([]);
      expect(env[KEY]).toBeUndefined();
      expect(expectErrTag(await loader.loadSymbol('plugin.Main'), 'SymbolNotFound', 'empty').searched).toEqual([]);
    });
  });

  describe('addLoaderPath', () => {
    it('adds a directory and its archives to the loader only', () => {
      const { env, loader, extender } = setup();

      expectOk(extender.addLoaderPath('/plugins'), 'addLoaderPath');

      expect(loader.locators()).toEqual(['file:///plugins/', 'file:///plugins/a.mjs', 'file:///plugins/b.mjs']);
      expect(env[KEY]).toBeUndefined();
    });
  });
});
