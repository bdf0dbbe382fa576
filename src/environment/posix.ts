import { VenvActivator } from './base.js';

/** venv layout on Linux, macOS and the BSDs. */
export class PosixActivator extends VenvActivator {
  readonly family = 'posix' as const;
  protected readonly binDirName = 'bin';
  protected readonly markerNames = ['activate'];
  protected readonly pathDelimiter = ':';
  protected readonly caseInsensitiveEnv = false;
}
