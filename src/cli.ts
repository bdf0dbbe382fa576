// Wrapper flow: load config, resolve the executable, activate the venv, forward.
// The wrapper defines no flags; every argument belongs to the LEAN CLI.
import { loadConfig, type LoadConfigOptions } from './config/loader.js';
import { createEnvironmentActivator } from './environment/factory.js';
import { resolveExecutable, discoverExecutable, DEFAULT_EXECUTABLE_NAME } from './execution/resolver.js';
import { forward, type SignalHost } from './execution/forwarder.js';
import { ExecaSpawner, type Spawner } from './execution/spawner.js';
import { ForwarderError, ForwarderErrorCode, exitCodeFor } from './shared/errors.js';
import { logger, report, type DiagnosticSink } from './shared/logger.js';

export interface RunOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  platform?: NodeJS.Platform;
  spawner?: Spawner;
  stderr?: DiagnosticSink;
  signals?: SignalHost;
  interactive?: boolean;
  userConfigPath?: LoadConfigOptions['userConfigPath'];
}

/** Run the wrapper for the given arguments and return the exit code to report. */
export async function runForwarder(args: readonly string[], options: RunOptions = {}): Promise<number> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const platform = options.platform ?? process.platform;
  const stderr = options.stderr ?? process.stderr;

  try {
    const { config } = loadConfig({ env, cwd, userConfigPath: options.userConfigPath });
    const expected = config.executable ?? discoverExecutable(DEFAULT_EXECUTABLE_NAME, { platform, env }) ?? DEFAULT_EXECUTABLE_NAME;
    const executable = resolveExecutable(expected, { platform });

    const activation = config.environment.enabled
      ? createEnvironmentActivator(platform).activate(config.environment.dir, env)
      : null;

    return await forward(executable, args, {
      spawner: options.spawner ?? new ExecaSpawner(),
      env: activation?.env ?? env,
      cwd,
      signals: options.signals,
      interactive: options.interactive,
    });
  } catch (err) {
    if (err instanceof ForwarderError) {
      report(stderr, diagnosticLines(err));
      return exitCodeFor(err.code);
    }
    logger.error({ err }, 'Unexpected failure');
    return 1;
  }
}

function diagnosticLines(err: ForwarderError): string[] {
  switch (err.code) {
    case ForwarderErrorCode.EXECUTABLE_NOT_FOUND:
      return [
        'Error: LEAN CLI not found at expected location',
        `Expected: ${String(err.context?.['expected'])}`,
        '',
        'Please ensure LEAN CLI is installed correctly',
        'Set LEAN_CLI_PATH or "executable" in .lean-forward.yaml to point at it',
      ];
    case ForwarderErrorCode.SPAWN_FAILED:
      return [`Error: ${err.message}`, 'The LEAN CLI exists but could not be started'];
    case ForwarderErrorCode.CONFIG_INVALID: {
      const issues = err.context?.['issues'];
      const cause = err.context?.['cause'];
      const details = Array.isArray(issues) ? issues.map((issue) => String(issue)) : typeof cause === 'string' ? [cause] : [];
      return [`Error: ${err.message}`, ...details.map((detail) => `  ${detail}`)];
    }
  }
}
