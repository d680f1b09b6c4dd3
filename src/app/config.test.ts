import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import crypto from 'node:crypto';

import { defaultConfigPath, loadConfig, configOutput } from './config.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeTmpDir(): string {
  const dir = path.join(os.tmpdir(), `vmkit-test-${crypto.randomUUID()}`);
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

function restoreEnv(name: string, value: string | undefined): void {
  if (value === undefined) {
    delete process.env[name];
  } else {
    process.env[name] = value;
  }
}

// ---------------------------------------------------------------------------
// defaultConfigPath
// ---------------------------------------------------------------------------

describe('defaultConfigPath', () => {
  const originalCwd = process.cwd();
  const originalXdgConfigHome = process.env.XDG_CONFIG_HOME;
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = makeTmpDir();
  });

  afterEach(() => {
    process.chdir(originalCwd);
    restoreEnv('XDG_CONFIG_HOME', originalXdgConfigHome);
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('prefers vmkit.toml in the working directory', () => {
    fs.writeFileSync(path.join(tmpDir, 'vmkit.toml'), '');
    process.chdir(tmpDir);
    expect(defaultConfigPath()).toBe(path.join(process.cwd(), 'vmkit.toml'));
  });

  it('falls back to the XDG config directory', () => {
    process.chdir(tmpDir);
    process.env.XDG_CONFIG_HOME = path.join(tmpDir, 'xdg');
    expect(defaultConfigPath()).toBe(path.join(tmpDir, 'xdg', 'vmkit', 'vmkit.toml'));
  });
});

// ---------------------------------------------------------------------------
// loadConfig
// ---------------------------------------------------------------------------

describe('loadConfig', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = makeTmpDir();
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('returns defaults when the file does not exist', async () => {
    const configPath = path.join(tmpDir, 'missing.toml');
    const loaded = await loadConfig(configPath);
    expect(loaded.configPath).toBe(configPath);
    expect(loaded.exists).toBe(false);
    expect(loaded.config.http.timeout).toBe(30_000);
    expect(loaded.config.vcenter).toEqual({});
  });

  it('parses the file and resolves paths against its directory', async () => {
    const configPath = path.join(tmpDir, 'vmkit.toml');
    fs.writeFileSync(
      configPath,
      '[credentials]\ndir = "creds"\n\n[vcenter]\nserver = "vc.example.test"\n',
    );

    const loaded = await loadConfig(configPath);
    expect(loaded.exists).toBe(true);
    expect(loaded.config.vcenter.server).toBe('vc.example.test');
    expect(loaded.config.credentials).toEqual({
      backend: 'file',
      dir: path.join(tmpDir, 'creds'),
      key_env: 'VMKIT_SECRET_KEY',
    });
  });

  it('propagates config errors', async () => {
    const configPath = path.join(tmpDir, 'vmkit.toml');
    fs.writeFileSync(configPath, '[credentials]\nbackend = "vault"\n');
    await expect(loadConfig(configPath)).rejects.toThrow(
      'Invalid config value for "credentials.backend": unsupported backend "vault"',
    );
  });
});

// ---------------------------------------------------------------------------
// configOutput
// ---------------------------------------------------------------------------

describe('configOutput', () => {
  it('renders durations as strings', async () => {
    const tmpDir = makeTmpDir();
    try {
      const configPath = path.join(tmpDir, 'vmkit.toml');
      fs.writeFileSync(configPath, '[vcloud]\norg = "tenant"\npoll_interval = "1500ms"\n');
      const output = configOutput(await loadConfig(configPath));

      expect(output).toMatchObject({
        config_file: configPath,
        config_file_exists: true,
        http: { timeout: '30s', skip_certificate_check: false },
        vcloud: {
          org: 'tenant',
          api_version: '36.0',
          poll_interval: '1500ms',
          task_timeout: '10m',
        },
        terraform: { binary: 'terraform' },
      });
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });
});
