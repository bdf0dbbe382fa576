/**
 * Platform-specific virtual environment activation.
 * Callers ask "is there an environment here, and what does the child's
 * environment look like once it is activated"; implementations own the
 * directory layout, marker files and search-path conventions.
 */
export interface EnvironmentActivator {
  readonly family: ActivatorFamily;

  /** Locate an activation marker under envDir, or null if there is none. */
  findMarker(envDir: string): ActivationMarker | null;

  /** Child environment with the marker's effects applied. baseEnv is not modified. */
  apply(marker: ActivationMarker, baseEnv: NodeJS.ProcessEnv): NodeJS.ProcessEnv;

  /** findMarker + apply; null when no marker exists. */
  activate(envDir: string, baseEnv: NodeJS.ProcessEnv): EnvironmentActivation | null;
}

export type ActivatorFamily = 'posix' | 'windows';

export interface ActivationMarker {
  readonly envDir: string;
  readonly binDir: string;
  readonly markerFile: string;
}

export interface EnvironmentActivation {
  readonly marker: ActivationMarker;
  readonly env: NodeJS.ProcessEnv;
}
