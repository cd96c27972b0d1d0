import type { Platform } from '../runtime/platform.js';
import { usesSharePaths } from '../runtime/platform.js';

const SHARE_PREFIXES = ['\\\\', '//'] as const;

/**
 * Search-path form of a network share path (`\\host\share`): the leading
 * separator pair is doubled (2 → 4) so that readers which collapse a doubled
 * separator still see the host part.
 *
 * Only the search-path segment takes this form. Locators are built from the
 * path as listed; `pathToFileURL` maps `\\host\share` to `file://host/share`
 * and rejects the doubled form.
 *
 * Paths that already start with three or more separators are left alone, as is
 * every path on platforms without share paths.
 */
export function normalizeSharePath(input: string, platform: Platform): string {
  if (!usesSharePaths(platform)) return input;

  for (const prefix of SHARE_PREFIXES) {
    const separator = prefix.charAt(0);
    if (input.startsWith(prefix) && !input.startsWith(prefix + separator)) {
      return prefix + input;
    }
  }
  return input;
}
