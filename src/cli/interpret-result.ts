/**
 * The only place a CliResult becomes process termination.
 */

import type { CliResult } from './types/cli-result.js';
import { toProcessExitCode } from './types/exit-code.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import type { OutputSink } from './output-formatter.js';
import { consoleSink, printResult } from './output-formatter.js';

export function interpretCliResult(result: CliResult, terminator: ProcessTerminator, sink: OutputSink = consoleSink): void {
  printResult(result, sink);

  switch (result.kind) {
    case 'success':
      // Let the process end naturally.
      return;
    case 'failure':
      return terminator.terminate(toProcessExitCode(result.exitCode));
  }
}
