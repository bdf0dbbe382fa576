// Process spawning boundary. ExecaSpawner is the only production implementation;
// tests substitute an in-memory Spawner so nothing real is launched.
import execa from 'execa';
import { ForwarderError, ForwarderErrorCode } from '../shared/errors.js';

export interface SpawnOptions {
  readonly env: NodeJS.ProcessEnv;
  readonly cwd?: string;
}

/** How the child ended: an exit code, or the signal that killed it. */
export type SpawnOutcome =
  | { readonly kind: 'exited'; readonly exitCode: number }
  | { readonly kind: 'signaled'; readonly signal: string };

export interface SpawnedProcess {
  kill(signal: NodeJS.Signals): void;
  /** Settles when the child terminates; rejects with SPAWN_FAILED if it never started. */
  readonly completion: Promise<SpawnOutcome>;
}

export interface Spawner {
  spawn(file: string, args: readonly string[], options: SpawnOptions): SpawnedProcess;
}

/** Spawns with stdio inherited; the child talks to the caller's terminal directly. */
export class ExecaSpawner implements Spawner {
  spawn(file: string, args: readonly string[], options: SpawnOptions): SpawnedProcess {
    const child = execa(file, [...args], {
      stdio: 'inherit',
      env: options.env,
      extendEnv: false,
      cwd: options.cwd,
      reject: false,
    });

    const completion = child.then((result): SpawnOutcome => {
      if (typeof result.exitCode === 'number') {
        return { kind: 'exited', exitCode: result.exitCode };
      }
      if (result.signal) {
        return { kind: 'signaled', signal: result.signal };
      }
      throw new ForwarderError(ForwarderErrorCode.SPAWN_FAILED, `Command failed to spawn: ${file}`, {
        command: result.command,
      });
    });

    return {
      kill: (signal) => {
        // The child owns its shutdown; no escalation to SIGKILL after a grace period.
        child.kill(signal, { forceKillAfterTimeout: false });
      },
      completion,
    };
  }
}
