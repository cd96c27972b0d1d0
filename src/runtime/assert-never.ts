/**
 * Exhaustiveness check for the `kind` / `_tag` unions used throughout.
 * Unreachable when the switch covers every variant; the thrown message names
 * the variant that slipped through at run time.
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${describeVariant(value)}`);
}

function describeVariant(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    if ('kind' in value) return `kind=${String(value.kind)}`;
    if ('_tag' in value) return `_tag=${String(value._tag)}`;
  }
  return String(value);
}
