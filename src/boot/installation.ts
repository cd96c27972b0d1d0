import path from 'path';
import type { Platform } from '../runtime/platform.js';
import type { BootFileSystem } from './ports/boot-file-system.port.js';

/**
 * The root folder holding `lib/`, `bin/` and the rest of the runtime files.
 * Computed once at startup; `unknown` when discovery found nothing usable.
 */
export type InstallationDirectory =
  | { readonly kind: 'resolved'; readonly path: string }
  | { readonly kind: 'unknown'; readonly reason: string };

export interface LocateInstallationInput {
  /** Ambient search path, delimiter-joined. */
  readonly searchPath: string;
  readonly override: string | undefined;
  readonly cwd: string;
  readonly platform: Platform;
  readonly delimiter: string;
  readonly fs: BootFileSystem;
}

export function splitSearchPath(value: string, delimiter: string): readonly string[] {
  return value.split(delimiter).filter((token) => token.length > 0);
}

/**
 * A packaged launch runs from a single launcher file two levels below the
 * installation root (`<root>/bin/launcher.js`). macOS may add a second entry.
 */
function isPackagedLaunch(tokens: readonly string[], platform: Platform): boolean {
  return tokens.length === 1 || (tokens.length === 2 && platform.kind === 'macos');
}

export function locateInstallation(input: LocateInstallationInput): InstallationDirectory {
  const tokens = splitSearchPath(input.searchPath, input.delimiter);
  const [launcher] = tokens;

  if (launcher !== undefined && isPackagedLaunch(tokens, input.platform)) {
    return input.fs.canonicalize(launcher).match(
      (canonical): InstallationDirectory => ({ kind: 'resolved', path: path.dirname(path.dirname(canonical)) }),
      (e): InstallationDirectory => ({ kind: 'unknown', reason: `cannot canonicalize ${launcher}: ${e.message}` })
    );
  }

  // e.g. started from an IDE or test runner with a full search path
  if (input.override !== undefined && input.override.length > 0) {
    return { kind: 'resolved', path: path.resolve(input.cwd, input.override) };
  }

  const workingDir = path.resolve(input.cwd);
  const parent = path.dirname(workingDir);
  if (parent === workingDir) {
    return { kind: 'unknown', reason: `working directory ${workingDir} has no parent` };
  }
  return { kind: 'resolved', path: parent };
}

export function describeInstallation(dir: InstallationDirectory): string {
  return dir.kind === 'resolved' ? dir.path : `(unknown: ${dir.reason})`;
}
