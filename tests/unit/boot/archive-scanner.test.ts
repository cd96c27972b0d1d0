import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import { ArchiveScanner, READABLE_FILES } from '../../../src/boot/archive-scanner.js';
import { NodeBootFileSystem } from '../../../src/boot/adapters/node-boot-file-system.js';
import { InMemoryBootFileSystem } from '../../fakes/boot-file-system.fake.js';
import { makeTempDir, removeTempDir, writeTree } from '../../helpers/platform.js';

describe('ArchiveScanner', () => {
  describe('with an in-memory filesystem', () => {
    it('returns only suffixed children, sorted by path regardless of listing order', () => {
      const fsFake = new InMemoryBootFileSystem()
        .addFile('/inst/lib/zeta.mjs')
        .addFile('/inst/lib/readme.txt')
        .addFile('/inst/lib/alpha.mjs')
        .addFile('/inst/lib/beta.mjs.bak')
        .addFile('/inst/lib/mid.mjs');

      const result = new ArchiveScanner(fsFake, '.mjs').scan('/inst/lib');

      expect(result).toEqual({
        kind: 'listed',
        entries: [
          { name: 'alpha.mjs', path: '/inst/lib/alpha.mjs' },
          { name: 'mid.mjs', path: '/inst/lib/mid.mjs' },
          { name: 'zeta.mjs', path: '/inst/lib/zeta.mjs' },
        ],
      });
    });

    it('orders by code unit, so upper case sorts before lower case', () => {
      const fsFake = new InMemoryBootFileSystem().addFile('/lib/b.mjs').addFile('/lib/B.mjs').addFile('/lib/a.mjs');

      const result = new ArchiveScanner(fsFake, '.mjs').scan('/lib');

      expect(result.kind === 'listed' && result.entries.map((e) => e.name)).toEqual(['B.mjs', 'a.mjs', 'b.mjs']);
    });

    it('does not descend into subdirectories', () => {
      const fsFake = new InMemoryBootFileSystem().addFile('/lib/top.mjs').addFile('/lib/ext/inner.mjs');

      const result = new ArchiveScanner(fsFake, '.mjs').scan('/lib');

      expect(result.kind === 'listed' && result.entries.map((e) => e.path)).toEqual(['/lib/top.mjs']);
    });

    it('reports a missing directory as one diagnostic instead of failing', () => {
      const result = new ArchiveScanner(new InMemoryBootFileSystem(), '.mjs').scan('/nowhere/lib');

      expect(result).toEqual({
        kind: 'inaccessible',
        diagnostic: {
          directory: '/nowhere/lib',
          reason: 'not_a_directory',
          message: 'Could not access /nowhere/lib: not a directory',
        },
      });
    });

    it('reports an unlistable directory as one diagnostic', () => {
      const fsFake = new InMemoryBootFileSystem().addFile('/lib/a.mjs').markUnlistable('/lib');

      const result = new ArchiveScanner(fsFake, '.mjs').scan('/lib');

      expect(result).toEqual({
        kind: 'inaccessible',
        diagnostic: { directory: '/lib', reason: 'unreadable', message: 'Could not access /lib: EACCES: /lib' },
      });
    });

    it('with the readable_files filter, skips unreadable files and suffixed directories', () => {
      const fsFake = new InMemoryBootFileSystem()
        .addFile('/plugins/ok.mjs')
        .addFile('/plugins/locked.mjs', { readable: false })
        .addDirectory('/plugins/folder.mjs');

      const scanner = new ArchiveScanner(fsFake, '.mjs');

      expect(scanner.scan('/plugins', READABLE_FILES)).toEqual({
        kind: 'listed',
        entries: [{ name: 'ok.mjs', path: '/plugins/ok.mjs' }],
      });
      const byName = scanner.scan('/plugins');
      expect(byName.kind === 'listed' && byName.entries.map((e) => e.name)).toEqual(['folder.mjs', 'locked.mjs', 'ok.mjs']);
    });
  });

  describe('with the real filesystem', () => {
    let root: string;

    beforeEach(() => {
      root = makeTempDir('kickstand-scan');
    });

    afterEach(() => {
      removeTempDir(root);
    });

    it('lists N suffixed files and ignores M others', () => {
      writeTree(root, {
        'c.mjs': '',
        'a.mjs': '',
        'b.mjs': '',
        'notes.md': '',
        'a.js': '',
      });
      fs.mkdirSync(path.join(root, 'nested'));

      const result = new ArchiveScanner(new NodeBootFileSystem(), '.mjs').scan(root);

      expect(result).toEqual({
        kind: 'listed',
        entries: ['a.mjs', 'b.mjs', 'c.mjs'].map((name) => ({ name, path: path.join(root, name) })),
      });
    });

    it('treats a regular file as inaccessible', () => {
      writeTree(root, { 'core.mjs': '' });
      const target = path.join(root, 'core.mjs');

      const result = new ArchiveScanner(new NodeBootFileSystem(), '.mjs').scan(target);

      expect(result.kind).toBe('inaccessible');
      expect(result.kind === 'inaccessible' && result.diagnostic.reason).toBe('not_a_directory');
    });
  });
});
