/**
 * CLI-specific config loading utilities.
 *
 * Wraps the library-level config parsing (`../config.js`) with file-system
 * awareness: locating the config file, reading TOML and producing the JSON
 * output shape of the `config` command.
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';

import { type Config, defaultConfig, parseConfig } from '../config.js';
import { formatDuration } from '../duration.js';

export const CONFIG_FILE_NAME = 'vmkit.toml';

export interface LoadedConfig {
  configPath: string;
  /** Whether `configPath` existed; defaults apply otherwise. */
  exists: boolean;
  config: Config;
}

/**
 * Determine the default configuration file path.
 *
 * Resolution order:
 * 1. `./vmkit.toml` if it exists in the current working directory.
 * 2. `$XDG_CONFIG_HOME/vmkit/vmkit.toml` (or `~/.config/vmkit/vmkit.toml`),
 *    returned even when it does not exist yet.
 */
export function defaultConfigPath(): string {
  const localConfig = path.resolve(CONFIG_FILE_NAME);
  if (fs.existsSync(localConfig)) {
    return localConfig;
  }

  const xdgConfigHome = process.env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return path.join(xdgConfigHome, 'vmkit', CONFIG_FILE_NAME);
}

/**
 * Load the vmkit configuration.
 *
 * @param configPath - Explicit path to a TOML config file. When omitted the
 *   result of {@link defaultConfigPath} is used.
 */
export async function loadConfig(configPath?: string): Promise<LoadedConfig> {
  const resolvedPath = configPath ? path.resolve(configPath) : defaultConfigPath();

  let tomlStr: string;
  try {
    tomlStr = await fs.promises.readFile(resolvedPath, 'utf-8');
  } catch (e: unknown) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
      return { configPath: resolvedPath, exists: false, config: defaultConfig() };
    }
    throw e;
  }

  return {
    configPath: resolvedPath,
    exists: true,
    config: parseConfig(tomlStr, path.dirname(resolvedPath)),
  };
}

/** JSON-serialisable output of the `config` command. Durations are rendered as strings. */
export function configOutput(loaded: LoadedConfig): object {
  const { config } = loaded;
  return {
    config_file: loaded.configPath,
    config_file_exists: loaded.exists,
    credentials: config.credentials,
    http: {
      timeout: formatDuration(config.http.timeout),
      skip_certificate_check: config.http.skip_certificate_check,
    },
    vcenter: config.vcenter,
    nsx: config.nsx,
    vcloud: {
      ...config.vcloud,
      poll_interval: formatDuration(config.vcloud.poll_interval),
      task_timeout: formatDuration(config.vcloud.task_timeout),
    },
    terraform: config.terraform,
  };
}
