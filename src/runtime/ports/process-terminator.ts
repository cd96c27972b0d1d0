/**
 * How a composition root ends the process.
 *
 * - success: 0
 * - failure: 1, the application could not be started
 * - misconfigured: 2, the environment was rejected before anything was scanned
 *
 * The bootstrapper never exits on its own; it returns outcomes that the
 * launcher and kickstand-info turn into one of these.
 */
export type ExitCode =
  | { readonly kind: 'success' }
  | { readonly kind: 'failure' }
  | { readonly kind: 'misconfigured' };

export interface ProcessTerminator {
  terminate(code: ExitCode): never;
}
