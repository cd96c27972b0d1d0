import type { ExitCode, ProcessTerminator } from '../ports/process-terminator.js';
import { assertNever } from '../assert-never.js';

export function toExitStatus(code: ExitCode): number {
  switch (code.kind) {
    case 'success':
      return 0;
    case 'failure':
      return 1;
    case 'misconfigured':
      return 2;
    default:
      return assertNever(code);
  }
}

export class NodeProcessTerminator implements ProcessTerminator {
  terminate(code: ExitCode): never {
    return process.exit(toExitStatus(code));
  }
}
