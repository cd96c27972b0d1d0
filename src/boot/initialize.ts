import path from 'path';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { ValidatedConfig } from '../config/app-config.js';
import { ENV } from '../config/app-config.js';
import type { ILoggerFactory } from '../core/logging/types.js';
import type { InitializationFailure } from '../errors/app-error.js';
import type { Platform } from '../runtime/platform.js';
import { ArchiveScanner } from './archive-scanner.js';
import type { ScanDiagnostic } from './archive-scanner.js';
import { assembleClasspath } from './classpath-assembler.js';
import { ClasspathExtender } from './classpath-extender.js';
import { DynamicLoader } from './dynamic-loader.js';
import type { ModuleImporter } from './dynamic-loader.js';
import type { InstallationDirectory } from './installation.js';
import { locateInstallation } from './installation.js';
import type { LocatorFactory } from './locator.js';
import { locatorFactoryFor } from './locator.js';
import type { BootFileSystem } from './ports/boot-file-system.port.js';
import { SearchPath } from './search-path.js';

export interface InitializeOptions {
  readonly config: ValidatedConfig;
  /** Environment record the search path is published to (process.env in production). */
  readonly env: Record<string, string | undefined>;
  /** Script the process was started with; seeds the search path when the variable is unset. */
  readonly launcherPath: string | undefined;
  readonly cwd: string;
  readonly platform: Platform;
  readonly fs: BootFileSystem;
  readonly importModule: ModuleImporter;
  readonly loggerFactory: ILoggerFactory;
  readonly toLocator?: LocatorFactory;
  readonly delimiter?: string;
}

/**
 * Everything the hand-off and the running application need, created once.
 */
export interface BootContext {
  readonly config: ValidatedConfig;
  readonly env: Record<string, string | undefined>;
  readonly installation: InstallationDirectory;
  readonly loader: DynamicLoader;
  readonly searchPath: SearchPath;
  readonly extender: ClasspathExtender;
  readonly diagnostics: readonly ScanDiagnostic[];
}

export type InitializeResult = Result<BootContext, readonly InitializationFailure[]>;

/**
 * One-time startup: find the installation, assemble the initial search path,
 * build the loader. Call exactly once, before any application code runs.
 *
 * Failures collected during assembly are returned as the error side; they are
 * terminal for the hand-off.
 */
export function initialize(options: InitializeOptions): InitializeResult {
  const delimiter = options.delimiter ?? path.delimiter;
  const toLocator = options.toLocator ?? locatorFactoryFor(options.platform);
  const logger = options.loggerFactory.create('bootstrap');

  const initialValue = options.config.modulePath ?? options.launcherPath ?? '';
  const searchPath = new SearchPath(options.env, ENV.ModulePath, delimiter, initialValue);

  const installation = locateInstallation({
    searchPath: initialValue,
    override: options.config.homeOverride,
    cwd: options.cwd,
    platform: options.platform,
    delimiter,
    fs: options.fs,
  });
  if (installation.kind === 'unknown') {
    logger.warn({ reason: installation.reason }, 'Installation directory could not be determined');
  } else {
    logger.debug({ installation: installation.path }, 'Installation directory located');
  }

  const scanner = new ArchiveScanner(options.fs, options.config.archiveSuffix);
  const assembly = assembleClasspath(
    { installation, platform: options.platform, searchPath },
    { scanner, toLocator, logger }
  );

  if (assembly.failures.length > 0) {
    return err(assembly.failures);
  }

  const loader = new DynamicLoader(assembly.locators, { fs: options.fs, importModule: options.importModule });
  const extender = new ClasspathExtender(loader, searchPath, {
    fs: options.fs,
    scanner,
    toLocator,
    logger: options.loggerFactory.create('classpath'),
  });

  return ok({
    config: options.config,
    env: options.env,
    installation,
    loader,
    searchPath,
    extender,
    diagnostics: assembly.diagnostics,
  });
}
