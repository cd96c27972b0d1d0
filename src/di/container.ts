import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import type { DependencyContainer } from 'tsyringe';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { DI } from './tokens.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { Platform } from '../runtime/platform.js';
import { detectPlatform } from '../runtime/platform.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import type { ConfigInvalidError } from '../errors/app-error.js';
import type { ILoggerFactory } from '../core/logging/types.js';
import { PinoLoggerFactory } from '../core/logging/create-logger.js';
import { createBootstrapLogger } from '../core/logging/bootstrap.js';
import type { BootFileSystem } from '../boot/ports/boot-file-system.port.js';
import { NodeBootFileSystem } from '../boot/adapters/node-boot-file-system.js';
import type { ModuleImporter } from '../boot/dynamic-loader.js';
import { nodeModuleImporter } from '../boot/dynamic-loader.js';
import type { InitializeOptions } from '../boot/initialize.js';

export interface ContainerInitOptions {
  readonly runtimeMode: RuntimeMode;
  readonly env: Record<string, string | undefined>;
  readonly nodePlatform?: NodeJS.Platform;
}

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerRuntime(options: ContainerInitOptions): void {
  container.register<Platform>(DI.Runtime.Platform, {
    useValue: detectPlatform(options.nodePlatform ?? process.platform),
  });

  const terminator: ProcessTerminator =
    options.runtimeMode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
  container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(options: ContainerInitOptions): Result<ValidatedConfig, ConfigInvalidError> {
  // Tests may register a config before initialization; keep theirs.
  if (container.isRegistered(DI.Config.App)) {
    return ok(container.resolve<ValidatedConfig>(DI.Config.App));
  }

  const configResult = loadConfig({ env: options.env });
  if (configResult.isOk()) {
    container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
  }
  return configResult;
}

// ═══════════════════════════════════════════════════════════════════════════
// INFRASTRUCTURE REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerInfra(): void {
  if (!container.isRegistered(DI.Infra.LoggerFactory)) {
    container.register<ILoggerFactory>(DI.Infra.LoggerFactory, {
      useFactory: instanceCachingFactory((c) => {
        const config = c.resolve<ValidatedConfig>(DI.Config.App);
        return new PinoLoggerFactory(
          config.logLevel,
          config.logFile === undefined ? { kind: 'stderr' } : { kind: 'file', path: config.logFile }
        );
      }),
    });
  }
  if (!container.isRegistered(DI.Infra.FileSystem)) {
    container.register<BootFileSystem>(DI.Infra.FileSystem, { useValue: new NodeBootFileSystem() });
  }
  if (!container.isRegistered(DI.Infra.ModuleImporter)) {
    container.register<ModuleImporter>(DI.Infra.ModuleImporter, { useValue: nodeModuleImporter });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Wire the container for one composition root.
 * The runtime tokens are registered even when config is invalid, so the
 * caller can still resolve the terminator to report and exit.
 */
export function initializeContainer(
  options: ContainerInitOptions
): Result<DependencyContainer, ConfigInvalidError> {
  const logger = createBootstrapLogger('container');

  registerRuntime(options);
  const config = registerConfig(options);
  if (config.isErr()) {
    logger.debug({ issues: config.error.issues.length }, 'Configuration rejected');
    return err(config.error);
  }

  registerInfra();
  logger.debug({ mode: options.runtimeMode.kind }, 'Container initialized');
  return ok(container);
}

/**
 * Options for boot/initialize, drawn from the container plus the process
 * facts only the composition root knows.
 */
export function resolveInitializeOptions(
  c: DependencyContainer,
  processFacts: Pick<InitializeOptions, 'env' | 'launcherPath' | 'cwd'>
): InitializeOptions {
  return {
    ...processFacts,
    config: c.resolve<ValidatedConfig>(DI.Config.App),
    platform: c.resolve<Platform>(DI.Runtime.Platform),
    fs: c.resolve<BootFileSystem>(DI.Infra.FileSystem),
    importModule: c.resolve<ModuleImporter>(DI.Infra.ModuleImporter),
    loggerFactory: c.resolve<ILoggerFactory>(DI.Infra.LoggerFactory),
  };
}

/** Tests only: forget every registration. */
export function resetContainer(): void {
  container.reset();
}

export { container };
