import fs from 'fs';
import path from 'path';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { BootFileSystem, FsError } from '../ports/boot-file-system.port.js';

function errorCode(e: unknown): string | undefined {
  return e instanceof Error && 'code' in e && typeof e.code === 'string' ? e.code : undefined;
}

function toFsError(e: unknown): FsError {
  const message = e instanceof Error ? e.message : String(e);
  switch (errorCode(e)) {
    case 'ENOENT':
      return { code: 'FS_NOT_FOUND', message };
    case 'EACCES':
    case 'EPERM':
      return { code: 'FS_PERMISSION_DENIED', message };
    default:
      return { code: 'FS_IO_ERROR', message };
  }
}

/**
 * Node.js adapter for BootFileSystem on the synchronous `fs` API.
 */
export class NodeBootFileSystem implements BootFileSystem {
  isDirectory(target: string): boolean {
    try {
      return fs.statSync(target).isDirectory();
    } catch {
      return false;
    }
  }

  isReadableFile(target: string): boolean {
    try {
      if (!fs.statSync(target).isFile()) return false;
      fs.accessSync(target, fs.constants.R_OK);
      return true;
    } catch {
      return false;
    }
  }

  listDirectory(target: string): Result<readonly string[], FsError> {
    try {
      return ok(fs.readdirSync(target));
    } catch (e) {
      return err(toFsError(e));
    }
  }

  canonicalize(target: string): Result<string, FsError> {
    const absolute = path.resolve(target);
    try {
      return ok(fs.realpathSync(absolute));
    } catch (e) {
      if (errorCode(e) !== 'ENOENT') return err(toFsError(e));
    }

    const parent = path.dirname(absolute);
    if (parent === absolute) return ok(absolute);
    return this.canonicalize(parent).map((canonicalParent) => path.join(canonicalParent, path.basename(absolute)));
  }
}
