import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import type { ActivationMarker, ActivatorFamily, EnvironmentActivation, EnvironmentActivator } from './interface.js';
import { logger } from '../shared/logger.js';

/** Shared venv activation: prepend the bin dir, set VIRTUAL_ENV, drop PYTHONHOME. */
export abstract class VenvActivator implements EnvironmentActivator {
  abstract readonly family: ActivatorFamily;
  /** Executables directory inside the venv (`bin` or `Scripts`). */
  protected abstract readonly binDirName: string;
  /** Marker files relative to binDirName, in priority order. */
  protected abstract readonly markerNames: readonly string[];
  protected abstract readonly pathDelimiter: string;
  /** Windows env keys are case-insensitive; `Path` and `PATH` are the same variable. */
  protected abstract readonly caseInsensitiveEnv: boolean;

  findMarker(envDir: string): ActivationMarker | null {
    const absEnvDir = resolve(envDir);
    const binDir = join(absEnvDir, this.binDirName);
    for (const name of this.markerNames) {
      const markerFile = join(binDir, name);
      if (existsSync(markerFile)) {
        return { envDir: absEnvDir, binDir, markerFile };
      }
    }
    return null;
  }

  apply(marker: ActivationMarker, baseEnv: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
    const env: NodeJS.ProcessEnv = { ...baseEnv };
    const pathKey = this.keyFor(env, 'PATH');
    const current = env[pathKey];
    env[pathKey] = current ? `${marker.binDir}${this.pathDelimiter}${current}` : marker.binDir;

    env[this.keyFor(env, 'VIRTUAL_ENV')] = marker.envDir;
    delete env[this.keyFor(env, 'PYTHONHOME')];
    return env;
  }

  activate(envDir: string, baseEnv: NodeJS.ProcessEnv): EnvironmentActivation | null {
    const marker = this.findMarker(envDir);
    if (!marker) {
      logger.debug({ envDir, family: this.family }, 'No environment marker, skipping activation');
      return null;
    }
    logger.debug({ marker }, 'Activating environment');
    return { marker, env: this.apply(marker, baseEnv) };
  }

  private keyFor(env: NodeJS.ProcessEnv, name: string): string {
    if (!this.caseInsensitiveEnv) return name;
    return Object.keys(env).find((key) => key.toUpperCase() === name) ?? name;
  }
}
