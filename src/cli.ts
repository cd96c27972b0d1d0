#!/usr/bin/env node
/**
 * kickstand-info CLI - Composition Root
 *
 * Answers "where does kickstand think it is installed, and what would it
 * load" without starting the application. No business logic here; see
 * src/cli/commands/*.ts.
 */

import path from 'path';
import { Command } from 'commander';

import { container, initializeContainer, resolveInitializeOptions } from './di/container.js';
import { DI } from './di/tokens.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import type { Platform } from './runtime/platform.js';
import type { BootFileSystem } from './boot/ports/boot-file-system.port.js';
import type { ValidatedConfig } from './config/app-config.js';
import { locateInstallation } from './boot/installation.js';
import { initialize } from './boot/initialize.js';
import { interpretCliResult } from './cli/interpret-result.js';
import { executeHomeCommand, executePathCommand } from './cli/commands/index.js';
import { fromAppError } from './cli/types/cli-result.js';
import { printResult } from './cli/output-formatter.js';

// The script that would be the launcher in a packaged install sits beside this one.
const launcherPath = path.join(path.dirname(process.argv[1] ?? process.cwd()), 'launcher.js');

function wire() {
  const wired = initializeContainer({ runtimeMode: { kind: 'cli' }, env: process.env });
  const terminator = container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);

  if (wired.isErr()) {
    printResult(fromAppError(wired.error, ['Check the KICKSTAND_* environment variables']));
    return terminator.terminate({ kind: 'misconfigured' });
  }
  return { c: wired.value, terminator };
}

const program = new Command();

program
  .name('kickstand-info')
  .description('Inspect how kickstand resolves its installation directory and module search path')
  .version('0.1.0');

program
  .command('home')
  .description('Print the detected installation directory')
  .action(() => {
    const { c, terminator } = wire();
    const config = c.resolve<ValidatedConfig>(DI.Config.App);

    const result = executeHomeCommand({
      locateInstallation: () =>
        locateInstallation({
          searchPath: config.modulePath ?? launcherPath,
          override: config.homeOverride,
          cwd: process.cwd(),
          platform: c.resolve<Platform>(DI.Runtime.Platform),
          delimiter: path.delimiter,
          fs: c.resolve<BootFileSystem>(DI.Infra.FileSystem),
        }),
    });

    interpretCliResult(result, terminator);
  });

program
  .command('path')
  .description('Print the module search path assembled from the installation')
  .option('--loader', 'List loader locators instead of search-path segments')
  .action((options: { loader?: boolean }) => {
    const { c, terminator } = wire();

    const result = executePathCommand(
      {
        initialize: () =>
          initialize(resolveInitializeOptions(c, { env: { ...process.env }, launcherPath, cwd: process.cwd() })),
      },
      { loader: options.loader }
    );

    interpretCliResult(result, terminator);
  });

program.parse();
