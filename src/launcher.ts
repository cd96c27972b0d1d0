#!/usr/bin/env node
/**
 * kickstand launcher - Composition Root
 *
 * 1. Wires dependencies
 * 2. Runs the one-time initialization
 * 3. Hands off to the application and interprets the outcome
 *
 * Arguments are passed to the application untouched.
 */

import { container, initializeContainer, resolveInitializeOptions } from './di/container.js';
import { DI } from './di/tokens.js';
import type { ILoggerFactory } from './core/logging/types.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import { formatAppError } from './errors/formatter.js';
import { Err } from './errors/factories.js';
import { initialize } from './boot/initialize.js';
import { handOff, interpretBootOutcome } from './boot/hand-off.js';

async function main(): Promise<void> {
  const wired = initializeContainer({ runtimeMode: { kind: 'launcher' }, env: process.env });

  // Registered even when the environment is rejected
  const terminator = container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);

  if (wired.isErr()) {
    console.error(formatAppError(wired.error));
    return terminator.terminate({ kind: 'misconfigured' });
  }

  const c = wired.value;
  const logger = c.resolve<ILoggerFactory>(DI.Infra.LoggerFactory).create('launcher');

  const init = initialize(
    resolveInitializeOptions(c, { env: process.env, launcherPath: process.argv[1], cwd: process.cwd() })
  );

  const outcome = await handOff(init, process.argv.slice(2), {
    writeError: (text) => console.error(text),
    logger,
  });
  interpretBootOutcome(outcome, terminator);
}

main().catch((error: unknown) => {
  console.error(formatAppError(Err.unexpected('kickstand launcher crashed', error)));
  process.exit(1);
});
