/**
 * Credential backend configuration, read from the `[credentials]` table.
 *
 * A discriminated union tagged on `backend`.
 */
import * as os from 'node:os';
import * as path from 'node:path';

import { ConfigError } from '../errors.js';
import type { CredentialStore } from './credential-store.js';
import { FileCredentialStore } from './file-store.js';
import { PassCredentialStore } from './pass.js';
import { DEFAULT_KEY_ENV, envSecretKey } from './secret-codec.js';

/** Encrypted JSON files in a directory. */
export interface FileBackendConfig {
  backend: 'file';
  /** Directory holding `{name}.json` files. */
  dir: string;
  /** Environment variable with the base64url 32-byte encryption key. */
  key_env: string;
}

/** Entries in password-store under a common prefix. */
export interface PassBackendConfig {
  backend: 'pass';
  /** Folder in the password store (e.g. "vmkit"). */
  prefix: string;
  /** Environment variable with the key used to decode pre-encoded passwords. */
  key_env: string;
}

export type CredentialConfig = FileBackendConfig | PassBackendConfig;

export function defaultCredentialDir(): string {
  const xdg = process.env.XDG_CONFIG_HOME;
  const base = xdg && xdg.trim() !== '' ? xdg : path.join(os.homedir(), '.config');
  return path.join(base, 'vmkit', 'credentials');
}

export function defaultCredentialConfig(): CredentialConfig {
  return { backend: 'file', dir: defaultCredentialDir(), key_env: DEFAULT_KEY_ENV };
}

function optionalString(raw: Record<string, unknown>, key: string): string | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(`credentials.${key}`, 'must be a non-empty string');
  }
  return value;
}

/**
 * Parse the `[credentials]` table.
 *
 * A relative `dir` is resolved against `configDir`. Missing keys take their
 * defaults; an unknown backend is rejected.
 */
export function parseCredentialConfigValue(input: unknown, configDir: string): CredentialConfig {
  if (input === undefined) {
    return defaultCredentialConfig();
  }
  if (input === null || typeof input !== 'object' || Array.isArray(input)) {
    throw new ConfigError('credentials', 'must be a table');
  }

  const raw: Record<string, unknown> = Object.fromEntries(Object.entries(input));
  const backend = optionalString(raw, 'backend') ?? 'file';
  const keyEnv = optionalString(raw, 'key_env') ?? DEFAULT_KEY_ENV;

  if (backend === 'file') {
    const dir = optionalString(raw, 'dir');
    return {
      backend: 'file',
      dir: dir === undefined ? defaultCredentialDir() : path.resolve(configDir, dir),
      key_env: keyEnv,
    };
  }

  if (backend === 'pass') {
    return { backend: 'pass', prefix: optionalString(raw, 'prefix') ?? 'vmkit', key_env: keyEnv };
  }

  throw new ConfigError('credentials.backend', `unsupported backend "${backend}"`);
}

/** Build the store a credential config describes. */
export function createCredentialStore(config: CredentialConfig): CredentialStore {
  switch (config.backend) {
    case 'file':
      return new FileCredentialStore(config.dir, envSecretKey(config.key_env));
    case 'pass':
      return new PassCredentialStore(config.prefix);
  }
}
