import { VenvActivator } from './base.js';

/**
 * venv layout on Windows. `activate` (no extension) is what Git Bash and
 * other POSIX shells on Windows source; cmd and PowerShell use the others.
 */
export class WindowsActivator extends VenvActivator {
  readonly family = 'windows' as const;
  protected readonly binDirName = 'Scripts';
  protected readonly markerNames = ['activate.bat', 'Activate.ps1', 'activate'];
  protected readonly pathDelimiter = ';';
  protected readonly caseInsensitiveEnv = true;
}
