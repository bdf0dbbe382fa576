export enum ForwarderErrorCode {
  EXECUTABLE_NOT_FOUND = 'EXECUTABLE_NOT_FOUND',
  SPAWN_FAILED = 'SPAWN_FAILED',
  CONFIG_INVALID = 'CONFIG_INVALID',
}

export class ForwarderError extends Error {
  readonly code: ForwarderErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: ForwarderErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'ForwarderError';
    this.code = code;
    this.context = context;
  }
}

/** Process exit status the CLI reports for each wrapper-side failure. */
export function exitCodeFor(code: ForwarderErrorCode): number {
  switch (code) {
    case ForwarderErrorCode.SPAWN_FAILED:
      return 126;
    case ForwarderErrorCode.EXECUTABLE_NOT_FOUND:
    case ForwarderErrorCode.CONFIG_INVALID:
      return 1;
  }
}
