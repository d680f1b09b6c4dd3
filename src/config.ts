/**
 * Configuration for vmkit.
 *
 * Parses TOML and fills in defaults. Durations are human-readable strings
 * (e.g. "30s", "10m") converted to milliseconds.
 */

import path from 'node:path';
import toml from 'toml';

import { parseDuration } from './duration.js';
import { ConfigError, errorMessage } from './errors.js';
import {
  type CredentialConfig,
  defaultCredentialConfig,
  parseCredentialConfigValue,
} from './credentials/credential-config.js';
import { DEFAULT_API_VERSION } from './targets/vcloud.js';
import { DEFAULT_POLL_OPTIONS } from './tasks/poll.js';
import { DEFAULT_TIMEOUT_MS } from './http/invoker.js';

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export interface HttpConfig {
  /** Per-request timeout (ms). */
  timeout: number;
  /** Accept any server certificate. */
  skip_certificate_check: boolean;
}

export interface TargetConfig {
  /** Default server when none is given on the command line. */
  server?: string;
  /** Default username when none is given on the command line. */
  username?: string;
}

export interface VCloudConfig extends TargetConfig {
  org?: string;
  api_version: string;
  /** Delay between task polls (ms). */
  poll_interval: number;
  /** Give up waiting for a task after this long (ms). */
  task_timeout: number;
}

export interface TerraformConfig {
  binary: string;
  /** Directory terraform runs in; defaults to the current directory. */
  working_dir?: string;
}

export interface Config {
  credentials: CredentialConfig;
  http: HttpConfig;
  vcenter: TargetConfig;
  nsx: TargetConfig;
  vcloud: VCloudConfig;
  terraform: TerraformConfig;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_HTTP_CONFIG: HttpConfig = {
  timeout: DEFAULT_TIMEOUT_MS,
  skip_certificate_check: false,
};

export const DEFAULT_VCLOUD_CONFIG: VCloudConfig = {
  api_version: DEFAULT_API_VERSION,
  poll_interval: DEFAULT_POLL_OPTIONS.intervalMs,
  task_timeout: DEFAULT_POLL_OPTIONS.timeoutMs,
};

export const DEFAULT_TERRAFORM_CONFIG: TerraformConfig = {
  binary: 'terraform',
};

export function defaultConfig(): Config {
  return {
    credentials: defaultCredentialConfig(),
    http: { ...DEFAULT_HTTP_CONFIG },
    vcenter: {},
    nsx: {},
    vcloud: { ...DEFAULT_VCLOUD_CONFIG },
    terraform: { ...DEFAULT_TERRAFORM_CONFIG },
  };
}

// ---------------------------------------------------------------------------
// Parsing helpers
// ---------------------------------------------------------------------------

type Table = Record<string, unknown>;

function isTable(value: unknown): value is Table {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function table(raw: Table, key: string): Table {
  const value = raw[key];
  if (value === undefined) return {};
  if (!isTable(value)) {
    throw new ConfigError(key, 'must be a table');
  }
  return value;
}

function str(t: Table, section: string, key: string): string | undefined {
  const value = t[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(`${section}.${key}`, 'must be a non-empty string');
  }
  return value.trim();
}

function bool(t: Table, section: string, key: string, fallback: boolean): boolean {
  const value = t[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') {
    throw new ConfigError(`${section}.${key}`, 'must be true or false');
  }
  return value;
}

function duration(t: Table, section: string, key: string, fallback: number): number {
  const value = str(t, section, key);
  if (value === undefined) return fallback;
  try {
    return parseDuration(value);
  } catch (e: unknown) {
    throw new ConfigError(`${section}.${key}`, errorMessage(e));
  }
}

function target(t: Table, section: string): TargetConfig {
  const config: TargetConfig = {};
  const server = str(t, section, 'server');
  if (server !== undefined) config.server = server;
  const username = str(t, section, 'username');
  if (username !== undefined) config.username = username;
  return config;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Parse a TOML configuration string into a `Config`.
 *
 * Missing fields are filled with defaults. Relative paths
 * (`credentials.dir`, `terraform.working_dir`) resolve against `configDir`.
 *
 * @throws ConfigError on a value of the wrong type.
 */
export function parseConfig(tomlStr: string, configDir: string): Config {
  let raw: unknown;
  try {
    // toml.parse throws on invalid TOML; an empty string yields an empty object.
    raw = tomlStr.trim().length === 0 ? {} : toml.parse(tomlStr);
  } catch (e: unknown) {
    throw new ConfigError('(file)', `invalid TOML: ${errorMessage(e)}`);
  }
  if (!isTable(raw)) {
    throw new ConfigError('(file)', 'must be a table');
  }

  const http = table(raw, 'http');
  const vcloud = table(raw, 'vcloud');
  const terraform = table(raw, 'terraform');

  const vcloudConfig: VCloudConfig = {
    ...target(vcloud, 'vcloud'),
    api_version: str(vcloud, 'vcloud', 'api_version') ?? DEFAULT_VCLOUD_CONFIG.api_version,
    poll_interval: duration(vcloud, 'vcloud', 'poll_interval', DEFAULT_VCLOUD_CONFIG.poll_interval),
    task_timeout: duration(vcloud, 'vcloud', 'task_timeout', DEFAULT_VCLOUD_CONFIG.task_timeout),
  };
  const org = str(vcloud, 'vcloud', 'org');
  if (org !== undefined) vcloudConfig.org = org;

  const terraformConfig: TerraformConfig = {
    binary: str(terraform, 'terraform', 'binary') ?? DEFAULT_TERRAFORM_CONFIG.binary,
  };
  const workingDir = str(terraform, 'terraform', 'working_dir');
  if (workingDir !== undefined) terraformConfig.working_dir = path.resolve(configDir, workingDir);

  return {
    credentials: parseCredentialConfigValue(raw['credentials'], configDir),
    http: {
      timeout: duration(http, 'http', 'timeout', DEFAULT_HTTP_CONFIG.timeout),
      skip_certificate_check: bool(
        http,
        'http',
        'skip_certificate_check',
        DEFAULT_HTTP_CONFIG.skip_certificate_check,
      ),
    },
    vcenter: target(table(raw, 'vcenter'), 'vcenter'),
    nsx: target(table(raw, 'nsx'), 'nsx'),
    vcloud: vcloudConfig,
    terraform: terraformConfig,
  };
}
