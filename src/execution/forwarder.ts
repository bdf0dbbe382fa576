import { constants } from 'node:os';
import type { ExecutableHandle } from './resolver.js';
import type { Spawner, SpawnOutcome } from './spawner.js';
import { logger } from '../shared/logger.js';

/** Signals relayed from the wrapper to the running child. */
export const RELAYED_SIGNALS: readonly NodeJS.Signals[] = ['SIGTERM', 'SIGHUP'];

/** Minimal view of `process` for signal handling. */
export interface SignalHost {
  on(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface ForwardOptions {
  spawner: Spawner;
  env: NodeJS.ProcessEnv;
  cwd?: string;
  signals?: SignalHost;
  /**
   * Whether the wrapper runs on a terminal. There a Ctrl-C already reaches the
   * child through the foreground process group, so SIGINT is held rather than
   * sent twice. Otherwise SIGINT is relayed like SIGTERM. Defaults to stdin's TTY state.
   */
  interactive?: boolean;
}

/** Run the executable with args untouched and return the exit code to report. */
export async function forward(
  executable: ExecutableHandle,
  args: readonly string[],
  options: ForwardOptions
): Promise<number> {
  const signals: SignalHost = options.signals ?? process;
  const interactive = options.interactive ?? process.stdin.isTTY === true;
  logger.debug({ executable: executable.path, argc: args.length }, 'Forwarding');

  const child = options.spawner.spawn(executable.path, args, { env: options.env, cwd: options.cwd });

  const relay = (signal: NodeJS.Signals): void => {
    logger.debug({ signal }, 'Relaying signal to child');
    child.kill(signal);
  };
  const hold = (signal: NodeJS.Signals): void => {
    logger.debug({ signal }, 'Holding terminal signal, child receives it from the process group');
  };
  const onInterrupt = interactive ? hold : relay;

  for (const signal of RELAYED_SIGNALS) signals.on(signal, relay);
  signals.on('SIGINT', onInterrupt);
  try {
    const outcome = await child.completion;
    const code = exitCodeOf(outcome);
    logger.debug({ outcome, code }, 'Child exited');
    return code;
  } finally {
    for (const signal of RELAYED_SIGNALS) signals.off(signal, relay);
    signals.off('SIGINT', onInterrupt);
  }
}

/** Exit code for a child outcome; signal deaths follow the shell's 128 + n. */
export function exitCodeOf(outcome: SpawnOutcome): number {
  if (outcome.kind === 'exited') return outcome.exitCode;
  return 128 + (isSignalName(outcome.signal) ? constants.signals[outcome.signal] : 0);
}

function isSignalName(name: string): name is keyof typeof constants.signals {
  return Object.prototype.hasOwnProperty.call(constants.signals, name);
}
