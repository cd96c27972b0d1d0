/**
 * Operating-system family, as far as path handling cares.
 * Resolved once at the composition root; everything else takes it as a value.
 */
export type Platform =
  | { readonly kind: 'windows' }
  | { readonly kind: 'macos' }
  | { readonly kind: 'other' };

export function detectPlatform(nodePlatform: NodeJS.Platform): Platform {
  switch (nodePlatform) {
    case 'win32':
      return { kind: 'windows' };
    case 'darwin':
      return { kind: 'macos' };
    default:
      return { kind: 'other' };
  }
}

/** Whether the platform addresses network shares with a leading `\\host\share`. */
export function usesSharePaths(platform: Platform): boolean {
  return platform.kind === 'windows';
}
