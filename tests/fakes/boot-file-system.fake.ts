/**
 * In-memory fake for the BootFileSystem port.
 *
 * - Directories keep their children in insertion order, so tests control the
 *   "OS listing order"
 * - Files can be marked unreadable, directories unlistable
 * - canonicalize() follows registered symlinks, or fails on request
 * - Lookups ignore a trailing separator, like the real filesystem
 */

import path from 'path';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { BootFileSystem, FsError } from '../../src/boot/ports/boot-file-system.port.js';

export class InMemoryBootFileSystem implements BootFileSystem {
  private readonly directories = new Map<string, string[]>();
  private readonly files = new Map<string, { readable: boolean }>();
  private readonly unlistable = new Set<string>();
  private readonly links = new Map<string, string>();
  private readonly uncanonical = new Set<string>();

  addDirectory(dirPath: string): this {
    const key = path.resolve(dirPath);
    if (!this.directories.has(key)) {
      this.directories.set(key, []);
      this.attach(key);
    }
    return this;
  }

  addFile(filePath: string, options: { readable?: boolean } = {}): this {
    const key = path.resolve(filePath);
    this.files.set(key, { readable: options.readable ?? true });
    this.attach(key);
    return this;
  }

  markUnlistable(dirPath: string): this {
    this.unlistable.add(path.resolve(dirPath));
    return this;
  }

  addSymlink(linkPath: string, targetPath: string): this {
    this.links.set(linkPath, targetPath);
    return this;
  }

  failCanonicalize(target: string): this {
    this.uncanonical.add(target);
    return this;
  }

  isDirectory(target: string): boolean {
    return this.directories.has(path.resolve(target));
  }

  isReadableFile(target: string): boolean {
    return this.files.get(path.resolve(target))?.readable ?? false;
  }

  listDirectory(target: string): Result<readonly string[], FsError> {
    const key = path.resolve(target);
    const children = this.directories.get(key);
    if (children === undefined) return err({ code: 'FS_NOT_FOUND', message: `ENOENT: ${target}` });
    if (this.unlistable.has(key)) return err({ code: 'FS_PERMISSION_DENIED', message: `EACCES: ${target}` });
    return ok([...children]);
  }

  canonicalize(target: string): Result<string, FsError> {
    if (this.uncanonical.has(target)) return err({ code: 'FS_IO_ERROR', message: `EIO: ${target}` });
    return ok(this.links.get(target) ?? path.resolve(target));
  }

  private attach(childPath: string): void {
    const parent = path.dirname(childPath);
    if (parent === childPath) return;
    this.addDirectory(parent);
    this.directories.get(parent)?.push(path.basename(childPath));
  }
}
