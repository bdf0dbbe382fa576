import { accessSync, statSync, constants } from 'node:fs';
import { delimiter, join } from 'node:path';
import { ForwarderError, ForwarderErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { isWindowsLike } from '../shared/platform.js';

/** Name looked up on the search path when no executable is configured. */
export const DEFAULT_EXECUTABLE_NAME = 'lean';

/** A verified, runnable executable location. */
export interface ExecutableHandle {
  readonly path: string;
}

export interface PlatformEnv {
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
}

/**
 * Verify that `path` names an existing regular file that can be executed.
 * On Windows and Cygwin there is no execute bit, so existence is enough.
 */
export function resolveExecutable(path: string, options: PlatformEnv = {}): ExecutableHandle {
  const platform = options.platform ?? process.platform;
  if (!isRunnable(path, platform)) {
    throw new ForwarderError(ForwarderErrorCode.EXECUTABLE_NOT_FOUND, 'LEAN CLI not found at expected location', {
      expected: path,
    });
  }
  logger.debug({ path }, 'Executable resolved');
  return Object.freeze({ path });
}

/**
 * Find `name` on the search path. Returns the first runnable match, or null.
 * On Windows and Cygwin each PATHEXT extension is tried as well as the bare name.
 */
export function discoverExecutable(name: string = DEFAULT_EXECUTABLE_NAME, options: PlatformEnv = {}): string | null {
  const platform = options.platform ?? process.platform;
  const env = options.env ?? process.env;
  const isWindows = isWindowsLike(platform);
  const separator = isWindows ? ';' : delimiter;

  const dirs = (readPathVar(env, isWindows) ?? '').split(separator).filter((dir) => dir.length > 0);
  const extensions = isWindows ? ['', ...(env['PATHEXT'] ?? '.COM;.EXE;.BAT;.CMD').split(';').filter(Boolean)] : [''];

  for (const dir of dirs) {
    for (const ext of extensions) {
      const candidate = join(dir, name + ext);
      if (isRunnable(candidate, platform)) {
        logger.debug({ candidate }, 'Executable discovered on search path');
        return candidate;
      }
    }
  }
  return null;
}

/** Value of PATH, matching the key case-insensitively on Windows (`Path`). */
export function readPathVar(env: NodeJS.ProcessEnv, caseInsensitive: boolean): string | undefined {
  if (!caseInsensitive) return env['PATH'];
  const key = Object.keys(env).find((k) => k.toUpperCase() === 'PATH');
  return key === undefined ? undefined : env[key];
}

function isRunnable(path: string, platform: NodeJS.Platform): boolean {
  try {
    if (!statSync(path).isFile()) return false;
    if (!isWindowsLike(platform)) accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}
