import type { ExitCode as ProcessExitCode } from '../../runtime/ports/process-terminator.js';

/**
 * Outcome classes for kickstand-info commands.
 * `misuse` covers rejected arguments and a rejected environment.
 */
export type ExitCode =
  | { kind: 'success' }
  | { kind: 'general_error' }
  | { kind: 'misuse' };

export function toProcessExitCode(exitCode: ExitCode): ProcessExitCode {
  switch (exitCode.kind) {
    case 'success':
      return { kind: 'success' };
    case 'general_error':
      return { kind: 'failure' };
    case 'misuse':
      return { kind: 'misconfigured' };
  }
}
