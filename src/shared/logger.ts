import pino from 'pino';

export const DEFAULT_LOG_LEVEL = 'warn';

/** Accept a pino level name (or `silent`); anything else falls back to the default. */
export function resolveLogLevel(value: string | undefined): string {
  if (value === undefined) return DEFAULT_LOG_LEVEL;
  const level = value.trim().toLowerCase();
  if (level === 'silent' || Object.prototype.hasOwnProperty.call(pino.levels.values, level)) return level;
  return DEFAULT_LOG_LEVEL;
}

const requestedLevel = process.env['LEAN_FORWARD_LOG_LEVEL'];
const level = resolveLogLevel(requestedLevel);

// stdout belongs to the wrapped CLI; everything of ours goes to fd 2.
export const logger = pino(
  {
    name: 'lean-forward',
    level,
  },
  pino.destination(2)
);

if (requestedLevel !== undefined && level !== requestedLevel.trim().toLowerCase()) {
  logger.warn({ requestedLevel }, `Unknown LEAN_FORWARD_LOG_LEVEL, using ${DEFAULT_LOG_LEVEL}`);
}

export interface DiagnosticSink {
  write(chunk: string): unknown;
}

/** Write plain, human-readable lines (not log records) to the given sink. */
export function report(sink: DiagnosticSink, lines: string[]): void {
  sink.write(lines.map((line) => line + '\n').join(''));
}
