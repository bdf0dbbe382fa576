/**
 * Platforms that use the Windows conventions: `Scripts` venvs, `;` search
 * paths, PATHEXT lookup, case-insensitive env keys and no execute bit.
 */
export function isWindowsLike(platform: NodeJS.Platform): boolean {
  return platform === 'win32' || platform === 'cygwin';
}
