import { AsyncLocalStorage } from 'async_hooks';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { NoActiveContextError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import type { BootContext } from './initialize.js';

/**
 * The boot context of the running application: its loader, search path and
 * installation directory. Set for everything the entry point does, including
 * callbacks and timers it schedules.
 */
const activeContext = new AsyncLocalStorage<BootContext>();

export function runInBootContext<R>(context: BootContext, fn: () => R): R {
  return activeContext.run(context, fn);
}

export function currentBootContext(operation: string): Result<BootContext, NoActiveContextError> {
  const context = activeContext.getStore();
  return context === undefined ? err(Err.noActiveContext(operation)) : ok(context);
}
