export { runForwarder, type RunOptions } from './cli.js';
export { loadConfig, readConfigFile, DEFAULT_CONFIG, type ConfigResult, type LoadConfigOptions } from './config/loader.js';
export type { ForwarderConfig } from './types/config.js';
export {
  resolveExecutable,
  discoverExecutable,
  DEFAULT_EXECUTABLE_NAME,
  type ExecutableHandle,
} from './execution/resolver.js';
export { forward, exitCodeOf, type ForwardOptions, type SignalHost } from './execution/forwarder.js';
export { ExecaSpawner, type Spawner, type SpawnedProcess, type SpawnOutcome, type SpawnOptions } from './execution/spawner.js';
export { createEnvironmentActivator } from './environment/factory.js';
export { PosixActivator } from './environment/posix.js';
export { WindowsActivator } from './environment/windows.js';
export type { EnvironmentActivator, EnvironmentActivation, ActivationMarker } from './environment/interface.js';
export { ForwarderError, ForwarderErrorCode, exitCodeFor } from './shared/errors.js';
