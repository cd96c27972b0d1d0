/**
 * Runtime mode of the current process.
 * Decided by the composition root and injected (DI), not inferred ad-hoc via env vars.
 */
export type RuntimeMode =
  | { kind: 'launcher' }
  | { kind: 'cli' }
  | { kind: 'test' };
