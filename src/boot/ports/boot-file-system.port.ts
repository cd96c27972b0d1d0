import type { Result } from 'neverthrow';

export type FsError =
  | { readonly code: 'FS_IO_ERROR'; readonly message: string }
  | { readonly code: 'FS_NOT_FOUND'; readonly message: string }
  | { readonly code: 'FS_PERMISSION_DENIED'; readonly message: string };

/**
 * Port: the filesystem as the bootstrapper sees it.
 *
 * Synchronous on purpose: discovery and assembly finish before any
 * application code runs, so nothing can interleave with them.
 */
export interface BootFileSystem {
  /** False for missing paths and paths that cannot be stat'ed. */
  isDirectory(path: string): boolean;

  /** A regular file the current process may read. */
  isReadableFile(path: string): boolean;

  /** Entry names (not full paths) of a directory, in whatever order the OS returns them. */
  listDirectory(path: string): Result<readonly string[], FsError>;

  /**
   * Absolute, symlink-free form of `path`. A tail that does not exist yet is
   * resolved lexically against its deepest existing ancestor.
   */
  canonicalize(path: string): Result<string, FsError>;
}
