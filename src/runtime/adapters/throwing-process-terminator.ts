import type { ExitCode, ProcessTerminator } from '../ports/process-terminator.js';

/** Thrown instead of exiting, so a test can assert which exit was requested. */
export class TerminationRequested extends Error {
  constructor(readonly code: ExitCode) {
    super(`Process termination requested: ${code.kind}`);
    this.name = 'TerminationRequested';
  }
}

/**
 * Test adapter: records every request and throws TerminationRequested
 * rather than ending the worker.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  readonly requested: ExitCode[] = [];

  terminate(code: ExitCode): never {
    this.requested.push(code);
    throw new TerminationRequested(code);
  }
}
