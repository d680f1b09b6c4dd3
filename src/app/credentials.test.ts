import { describe, it, expect } from 'vitest';

import { defaultConfig } from '../config.js';
import type { Prompter } from '../credentials/prompt.js';
import { MemoryCredentialStore } from '../credentials/memory-store.js';
import { createAppEnv } from './env.js';
import { exportCredential, showCredential } from './credentials.js';

class ScriptedPrompter implements Prompter {
  readonly asked: string[] = [];

  constructor(private readonly answers: { username?: string; secret?: string }) {}

  async username(message: string): Promise<string> {
    this.asked.push(message);
    return this.answers.username ?? '';
  }

  async secret(message: string): Promise<string> {
    this.asked.push(message);
    return this.answers.secret ?? '';
  }

  async confirm(message: string): Promise<boolean> {
    this.asked.push(message);
    return true;
  }
}

describe('exportCredential', () => {
  it('saves a given password under the server-qualified name', async () => {
    const store = new MemoryCredentialStore();
    const env = createAppEnv(defaultConfig(), { interactive: false }, { store });

    const result = await exportCredential(env, {
      server: 'https://vc01.example.test/',
      username: 'admin',
      password: 'test-secret',
    });

    expect(result).toEqual({
      name: 'vc01.example.test-admin',
      username: 'admin',
      location: 'memory:vc01.example.test-admin',
    });
    expect(await store.load('vc01.example.test-admin')).toEqual({ username: 'admin', secret: 'test-secret' });
  });

  it('prompts for what is missing', async () => {
    const store = new MemoryCredentialStore();
    const prompter = new ScriptedPrompter({ username: ' ops ', secret: 'test-secret' });
    const env = createAppEnv(defaultConfig(), { interactive: true }, { store, prompter });

    const result = await exportCredential(env, { server: 'vc01.example.test' });

    expect(result.name).toBe('vc01.example.test-ops');
    expect(prompter.asked).toEqual(['Username for vc01.example.test:', 'Password for ops@vc01.example.test:']);
  });

  it('needs a password when prompting is disabled', async () => {
    const env = createAppEnv(defaultConfig(), { interactive: false }, { store: new MemoryCredentialStore() });
    await expect(exportCredential(env, { server: 'vc01', username: 'admin' })).rejects.toThrow(
      'A username and password are required when prompting is disabled',
    );
  });

  it('refuses a read-only store', async () => {
    const env = createAppEnv(
      defaultConfig(),
      { interactive: false },
      { store: new MemoryCredentialStore({}, { writable: false }) },
    );
    await expect(
      exportCredential(env, { server: 'vc01', username: 'admin', password: 'test-secret' }),
    ).rejects.toThrow('The configured credential store cannot save credentials');
  });
});

describe('showCredential', () => {
  it('reports the source and location without the secret', async () => {
    const store = new MemoryCredentialStore({
      'vc01.example.test-admin': { username: 'admin', secret: 'test-secret' },
    });
    const env = createAppEnv(defaultConfig(), { interactive: false }, { store });

    const shown = await showCredential(env, { server: 'vc01.example.test', username: 'admin' });

    expect(shown).toEqual({
      server: 'vc01.example.test',
      username: 'admin',
      source: 'server-file',
      location: 'memory:vc01.example.test-admin',
    });
    expect(JSON.stringify(shown)).not.toContain('test-secret');
  });

  it('falls back to the user-level credential', async () => {
    const store = new MemoryCredentialStore({ admin: { username: 'admin', secret: 'test-secret' } });
    const env = createAppEnv(defaultConfig(), { interactive: false }, { store });

    const shown = await showCredential(env, { server: 'vc02.example.test', username: 'admin' });
    expect(shown.source).toBe('user-file');
    expect(shown.location).toBe('memory:admin');
  });
});
