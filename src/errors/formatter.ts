import type { AppError } from './app-error.js';
import { assertNever } from '../runtime/assert-never.js';

export function formatAppError(error: AppError): string {
  switch (error._tag) {
    case 'ConfigInvalid': {
      const issues = error.issues.length
        ? error.issues.map((i) => `  - ${i.path}: ${i.message}`).join('\n')
        : '  - (no details)';
      return `${error.message}\n\n${issues}`;
    }

    case 'SymbolNotFound': {
      const searched = error.searched.length
        ? error.searched.map((s) => `  - ${s}`).join('\n')
        : '  - (no locators)';
      return `${error.message}\nSearched:\n${searched}`;
    }

    case 'MalformedLocator':
    case 'StartupFailed':
      return error.cause === undefined ? error.message : `${error.message}\nCaused by: ${describeCause(error.cause)}`;

    case 'SymbolLoadFailed':
    case 'Unexpected':
      return `${error.message}\nCaused by: ${describeCause(error.cause)}`;

    case 'EntryNotStartable':
    case 'NoActiveContext':
      return error.message;

    default:
      return assertNever(error);
  }
}

/**
 * Full diagnostic text for a cause: the stack when there is one.
 */
export function describeCause(value: unknown): string {
  if (value instanceof Error) return value.stack ?? `${value.name}: ${value.message}`;
  try {
    // JSON.stringify yields undefined for undefined and functions
    return typeof value === 'string' ? value : JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
