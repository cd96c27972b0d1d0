/**
 * Terminal rendering for kickstand-info results (chalk).
 *
 * Layout: the headline, then one indented block per non-empty section,
 * separated by blank lines.
 */

import chalk from 'chalk';
import type { CliResult, CliOutput } from './types/cli-result.js';

export interface OutputSink {
  readonly out: (text: string) => void;
  readonly err: (text: string) => void;
}

export const consoleSink: OutputSink = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

interface Section {
  readonly heading?: string;
  readonly lines: readonly string[] | undefined;
  readonly marker: string;
  readonly paint: (text: string) => string;
}

function renderSection(section: Section): string[] {
  if (!section.lines || section.lines.length === 0) return [];

  const block = section.heading === undefined ? [] : [section.paint(section.heading)];
  for (const line of section.lines) {
    block.push(section.paint(`  ${section.marker}${line}`));
  }
  return ['', ...block];
}

export function formatOutput(output: CliOutput, isError: boolean = false): string {
  const headline = isError ? chalk.red(`✖ ${output.message}`) : chalk.green(output.message);

  return [
    headline,
    ...renderSection({ lines: output.details, marker: '', paint: (text) => text }),
    ...renderSection({ heading: 'Warnings:', lines: output.warnings, marker: '• ', paint: chalk.yellow }),
    ...renderSection({ lines: output.suggestions, marker: '→ ', paint: chalk.gray }),
  ].join('\n');
}

export function formatResult(result: CliResult): string {
  switch (result.kind) {
    case 'success':
      return result.output ? formatOutput(result.output) : '';
    case 'failure':
      return formatOutput(result.output, true);
  }
}

/** Successes go to stdout, failures to stderr. */
export function printResult(result: CliResult, sink: OutputSink = consoleSink): void {
  const formatted = formatResult(result);
  if (formatted.length === 0) return;

  if (result.kind === 'failure') {
    sink.err(formatted);
  } else {
    sink.out(formatted);
  }
}
