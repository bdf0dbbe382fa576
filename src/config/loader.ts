// Config loader: defaults, then the first YAML config file found, then LEAN_CLI_PATH.
// The result is frozen and resolved once at startup; nothing downstream re-reads it.
// A broken discovered config file is logged and ignored so the wrapper stays usable;
// a file named by LEAN_FORWARD_CONFIG that cannot be loaded is a CONFIG_INVALID error.
import { readFileSync, existsSync } from 'node:fs';
import { join, dirname, resolve, isAbsolute } from 'node:path';
import { homedir } from 'node:os';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { ForwarderConfig } from '../types/config.js';
import { ForwarderError, ForwarderErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export const PROJECT_CONFIG_FILE = '.lean-forward.yaml';
export const USER_CONFIG_PATH = join(homedir(), '.config', 'lean-forward', 'config.yaml');

export const DEFAULT_CONFIG: ForwarderConfig = {
  executable: null,
  environment: { dir: 'QC_VENV', enabled: true },
};

const configFileSchema = z
  .object({
    executable: z.string().min(1).nullable().optional(),
    environment: z
      .object({
        dir: z.string().min(1).optional(),
        enabled: z.boolean().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof configFileSchema>;

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Overrides the user-level config location; used by tests. */
  userConfigPath?: string;
}

export interface ConfigResult {
  config: ForwarderConfig;
  /** Config file that contributed, or null when only defaults and env were used. */
  configPath: string | null;
}

export function loadConfig(options: LoadConfigOptions = {}): ConfigResult {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  const explicit = env['LEAN_FORWARD_CONFIG'];
  const configPath = explicit
    ? resolve(cwd, explicit)
    : findConfigFile(cwd, options.userConfigPath ?? USER_CONFIG_PATH);
  let merged: ForwarderConfig = DEFAULT_CONFIG;

  if (configPath) {
    try {
      merged = mergeConfig(DEFAULT_CONFIG, readConfigFile(configPath), dirname(configPath));
    } catch (err) {
      if (explicit) throw asConfigError(configPath, err);
      logger.error({ configPath, err }, 'Failed to load config file, using defaults');
    }
  }

  const cliPath = env['LEAN_CLI_PATH'];
  if (cliPath) {
    merged = { ...merged, executable: resolve(cwd, cliPath) };
  }

  const config = freeze({
    executable: merged.executable,
    environment: {
      dir: resolve(cwd, merged.environment.dir),
      enabled: merged.environment.enabled,
    },
  });
  logger.debug({ configPath, config }, 'Configuration loaded');
  return { config, configPath };
}

function findConfigFile(cwd: string, userConfigPath: string): string | null {
  for (const candidate of [join(cwd, PROJECT_CONFIG_FILE), userConfigPath]) {
    if (existsSync(candidate)) return candidate;
  }
  return null;
}

function asConfigError(configPath: string, err: unknown): ForwarderError {
  if (err instanceof ForwarderError) return err;
  return new ForwarderError(ForwarderErrorCode.CONFIG_INVALID, `Cannot read config file: ${configPath}`, {
    cause: err instanceof Error ? err.message : String(err),
  });
}

/** Read and validate one YAML config file. An empty file is an empty config. */
export function readConfigFile(configPath: string): ConfigFile {
  const raw = readFileSync(configPath, 'utf-8');
  const parsed: unknown = parseYaml(raw) ?? {};
  const result = configFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ForwarderError(ForwarderErrorCode.CONFIG_INVALID, `Invalid config file: ${configPath}`, {
      issues: result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    });
  }
  return result.data;
}

/** Overlay file values on base; relative paths in the file resolve against baseDir. */
function mergeConfig(base: ForwarderConfig, file: ConfigFile, baseDir: string): ForwarderConfig {
  const executable =
    file.executable === undefined
      ? base.executable
      : file.executable === null
        ? null
        : absoluteFrom(baseDir, file.executable);
  return {
    executable,
    environment: {
      dir: file.environment?.dir !== undefined ? absoluteFrom(baseDir, file.environment.dir) : base.environment.dir,
      enabled: file.environment?.enabled ?? base.environment.enabled,
    },
  };
}

function absoluteFrom(baseDir: string, value: string): string {
  return isAbsolute(value) ? value : resolve(baseDir, value);
}

function freeze(config: ForwarderConfig): ForwarderConfig {
  Object.freeze(config.environment);
  return Object.freeze(config);
}
