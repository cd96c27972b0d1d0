/**
 * What a kickstand-info command produces. Commands build these from boot
 * results; only the composition root prints them and picks the exit code.
 */

import type { AppError } from '../../errors/app-error.js';
import { formatAppError } from '../../errors/formatter.js';
import type { ExitCode } from './exit-code.js';

export interface CliOutput {
  readonly message: string;
  readonly details?: readonly string[];
  readonly warnings?: readonly string[];
  readonly suggestions?: readonly string[];
}

export type CliResult =
  | { kind: 'success'; output?: CliOutput }
  | { kind: 'failure'; exitCode: ExitCode; output: CliOutput };

export interface FailureOptions {
  readonly exitCode?: ExitCode;
  readonly details?: readonly string[];
  readonly suggestions?: readonly string[];
}

export function success(output?: CliOutput): CliResult {
  return { kind: 'success', output };
}

export function failure(message: string, options: FailureOptions = {}): CliResult {
  return {
    kind: 'failure',
    exitCode: options.exitCode ?? { kind: 'general_error' },
    output: { message, details: options.details, suggestions: options.suggestions },
  };
}

/**
 * A failure whose details are the formatted error's remaining lines.
 * A rejected environment is misuse; everything else is a general error.
 */
export function fromAppError(error: AppError, suggestions?: readonly string[]): CliResult {
  const details = formatAppError(error)
    .split('\n')
    .slice(1)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  return failure(error.message, {
    exitCode: error._tag === 'ConfigInvalid' ? { kind: 'misuse' } : { kind: 'general_error' },
    details,
    suggestions,
  });
}
