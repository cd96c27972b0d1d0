import { describe, it, expect } from 'vitest';
import { toExitStatus } from '../../../src/runtime/adapters/node-process-terminator.js';
import { TerminationRequested, ThrowingProcessTerminator } from '../../../src/runtime/adapters/throwing-process-terminator.js';

describe('process termination', () => {
  it('maps exit codes to process statuses', () => {
    expect(toExitStatus({ kind: 'success' })).toBe(0);
    expect(toExitStatus({ kind: 'failure' })).toBe(1);
    expect(toExitStatus({ kind: 'misconfigured' })).toBe(2);
  });

  it('records the request and throws instead of exiting', () => {
    const terminator = new ThrowingProcessTerminator();

    let thrown: unknown;
    try {
      terminator.terminate({ kind: 'misconfigured' });
    } catch (e) {
      thrown = e;
    }

    expect(thrown).toBeInstanceOf(TerminationRequested);
    expect(thrown instanceof TerminationRequested && thrown.message).toBe('Process termination requested: misconfigured');
    expect(terminator.requested).toEqual([{ kind: 'misconfigured' }]);
  });
});
