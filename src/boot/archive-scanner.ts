import path from 'path';
import type { BootFileSystem } from './ports/boot-file-system.port.js';

export interface ArchiveEntry {
  readonly name: string;
  /** `directory` joined with `name`. */
  readonly path: string;
}

export type ScanDiagnosticReason = 'not_a_directory' | 'unreadable' | 'installation_unknown';

export interface ScanDiagnostic {
  readonly directory: string;
  readonly reason: ScanDiagnosticReason;
  readonly message: string;
}

export type ScanResult =
  | { readonly kind: 'listed'; readonly entries: readonly ArchiveEntry[] }
  | { readonly kind: 'inaccessible'; readonly diagnostic: ScanDiagnostic };

/**
 * - `name_only`: the suffix match is enough (standard library directories)
 * - `readable_files`: the child must also be a regular, readable file (runtime additions)
 */
export type ArchiveFilter = { readonly kind: 'name_only' } | { readonly kind: 'readable_files' };

export const NAME_ONLY: ArchiveFilter = { kind: 'name_only' };
export const READABLE_FILES: ArchiveFilter = { kind: 'readable_files' };

/**
 * Lists the archives directly inside one directory.
 *
 * Entries come back sorted by full path (code-unit order) whatever order the
 * filesystem lists them in: when two archives export the same name, the first
 * one on the search path wins, and that has to be the same archive on every run.
 */
export class ArchiveScanner {
  constructor(
    private readonly fs: BootFileSystem,
    private readonly suffix: string
  ) {}

  scan(directory: string, filter: ArchiveFilter = NAME_ONLY): ScanResult {
    if (!this.fs.isDirectory(directory)) {
      return inaccessible(directory, 'not_a_directory', `Could not access ${directory}: not a directory`);
    }

    const listing = this.fs.listDirectory(directory);
    if (listing.isErr()) {
      return inaccessible(directory, 'unreadable', `Could not access ${directory}: ${listing.error.message}`);
    }

    const entries = listing.value
      .filter((name) => name.endsWith(this.suffix))
      .map((name) => ({ name, path: path.join(directory, name) }))
      .filter((entry) => filter.kind === 'name_only' || this.fs.isReadableFile(entry.path))
      .sort(byPath);

    return { kind: 'listed', entries };
  }
}

export function inaccessible(directory: string, reason: ScanDiagnosticReason, message: string): ScanResult {
  return { kind: 'inaccessible', diagnostic: { directory, reason, message } };
}

function byPath(a: ArchiveEntry, b: ArchiveEntry): number {
  if (a.path < b.path) return -1;
  if (a.path > b.path) return 1;
  return 0;
}
