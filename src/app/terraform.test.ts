import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { defaultConfig } from '../config.js';
import { collectVars, terraformCommand } from './terraform.js';

// Fake terraform: prints its args one per line and the working directory on stderr.
const FAKE_TERRAFORM = ['#!/usr/bin/env bash', 'printf "%s\\n" "$@"', 'pwd >&2', ''].join('\n');

describe('collectVars', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'vmkit-tfvars-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('merges the vars file with inline vars, inline winning', async () => {
    const varsFile = path.join(tmpDir, 'vars.json');
    await fs.writeFile(varsFile, JSON.stringify({ name: 'web01', cpus: 2 }));

    expect(await collectVars({ varsFile, vars: '{"cpus": 4}' })).toEqual({ name: 'web01', cpus: 4 });
  });

  it('rejects inline vars that are not an object', async () => {
    await expect(collectVars({ vars: '[1, 2]' })).rejects.toThrow('Terraform variables must be a JSON object');
  });
});

describe('terraformCommand', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'vmkit-tf-')));
    await fs.writeFile(path.join(tmpDir, 'terraform'), FAKE_TERRAFORM, { mode: 0o755 });
    await fs.mkdir(path.join(tmpDir, 'infra'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('runs the configured binary in the configured working directory', async () => {
    const config = defaultConfig();
    config.terraform = { binary: path.join(tmpDir, 'terraform'), working_dir: path.join(tmpDir, 'infra') };

    const run = await terraformCommand(config, 'plan', { vars: '{"name":"web01"}' });

    expect(run.args).toEqual(['plan', '-input=false', '-no-color', '-var', 'name=web01']);
    expect(run.stdout).toBe('plan\n-input=false\n-no-color\n-var\nname=web01\n');
    expect(run.stderr.trim()).toBe(path.join(tmpDir, 'infra'));
  });

  it('lets --dir override the configured working directory', async () => {
    const config = defaultConfig();
    config.terraform = { binary: path.join(tmpDir, 'terraform'), working_dir: path.join(tmpDir, 'infra') };

    const run = await terraformCommand(config, 'init', { dir: tmpDir });
    expect(run.stderr.trim()).toBe(tmpDir);
  });

  it('rejects unsupported commands before running anything', async () => {
    await expect(terraformCommand(defaultConfig(), 'import')).rejects.toThrow(
      "Unsupported terraform command 'import' (expected one of: init, plan, apply, destroy, output)",
    );
  });
});
