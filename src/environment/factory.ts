// Factory for platform-specific environment activators.
// Adding a platform family requires a new VenvActivator subclass and a branch here.
import type { EnvironmentActivator } from './interface.js';
import { PosixActivator } from './posix.js';
import { WindowsActivator } from './windows.js';
import { isWindowsLike } from '../shared/platform.js';

/** Create the activator matching the platform's venv layout. */
export function createEnvironmentActivator(platform: NodeJS.Platform = process.platform): EnvironmentActivator {
  return isWindowsLike(platform) ? new WindowsActivator() : new PosixActivator();
}
