import { execFile, spawn } from 'node:child_process';
import { promisify } from 'node:util';

import { CredentialFileError } from '../errors.js';
import type { Credential } from './credential.js';
import { isSafeName, CredentialNameError } from './credential.js';
import type { CredentialStore } from './credential-store.js';

const execFileAsync = promisify(execFile);

type PassEntry = {
  password: string | null;
  fields: Map<string, string>;
};

function parsePassEntry(content: string): PassEntry {
  const lines = content.split(/\r?\n/);
  const password = lines.length > 0 && lines[0] !== '' ? lines[0] : null;
  const fields = new Map<string, string>();

  for (let i = 1; i < lines.length; i++) {
    const line = lines[i];
    const idx = line.indexOf(': ');
    if (idx === -1) continue;
    fields.set(line.slice(0, idx), line.slice(idx + 2).replace(/\\n/g, '\n'));
  }

  return { password, fields };
}

function serializePassEntry(entry: PassEntry): string {
  const lines: string[] = [entry.password ?? ''];

  const keys = Array.from(entry.fields.keys());
  keys.sort((a, b) => a.localeCompare(b));
  for (const key of keys) {
    const value = entry.fields.get(key);
    if (value === undefined) continue;
    lines.push(`${key}: ${value.replace(/\n/g, '\\n')}`);
  }

  return lines.join('\n') + '\n';
}

function stderrOf(e: Error): string {
  return 'stderr' in e && typeof e.stderr === 'string' ? e.stderr : '';
}

function isMissingEntry(e: unknown): boolean {
  return e instanceof Error && stderrOf(e).includes('is not in the password store');
}

/** `pass` ran and exited non-zero (as opposed to not being found at all). */
function isPassFailure(e: unknown): e is Error {
  return e instanceof Error && 'code' in e && typeof e.code === 'number';
}

/**
 * Credential store backed by password-store (pass).
 *
 * - `pass show <prefix>/<name>` reads the entry.
 * - The first line is the secret; a `username: <value>` line holds the username.
 * - Other `field: value` lines are preserved on write, with `\\n` escaped.
 */
export class PassCredentialStore implements CredentialStore {
  private readonly prefix: string;

  constructor(prefix: string) {
    this.prefix = prefix.replace(/\/+$/g, '');
  }

  private entryPath(name: string): string {
    if (!isSafeName(name)) throw new CredentialNameError(name);
    return this.prefix === '' ? name : `${this.prefix}/${name}`;
  }

  describe(name: string): string {
    return `pass:${this.entryPath(name)}`;
  }

  private async readEntry(entryPath: string): Promise<PassEntry | null> {
    try {
      const { stdout } = await execFileAsync('pass', ['show', entryPath], {
        encoding: 'utf8',
        maxBuffer: 1024 * 1024,
      });
      return parsePassEntry(stdout);
    } catch (e: unknown) {
      if (isMissingEntry(e)) return null;
      if (isPassFailure(e)) {
        const detail = stderrOf(e).trim();
        throw new CredentialFileError(`pass:${entryPath}`, detail === '' ? e.message : detail);
      }
      throw e;
    }
  }

  private async writeEntry(entryPath: string, entry: PassEntry): Promise<void> {
    const content = serializePassEntry(entry);
    await new Promise<void>((resolve, reject) => {
      const child = spawn('pass', ['insert', '--multiline', '--force', entryPath], {
        stdio: ['pipe', 'ignore', 'pipe'],
      });

      let stderr = '';
      child.stderr.setEncoding('utf8');
      child.stderr.on('data', (chunk: string) => {
        stderr += chunk;
      });

      child.on('error', (err) => reject(err));
      child.on('close', (code) => {
        if (code === 0) resolve();
        else reject(new Error(`pass insert failed (code ${code}): ${stderr.trim()}`));
      });

      child.stdin.setDefaultEncoding('utf8');
      child.stdin.write(content);
      child.stdin.end();
    });
  }

  async load(name: string): Promise<Credential | null> {
    const entryPath = this.entryPath(name);
    const entry = await this.readEntry(entryPath);
    if (entry === null) return null;

    const location = `pass:${entryPath}`;
    if (entry.password === null) {
      throw new CredentialFileError(location, 'entry has an empty first line');
    }
    const username = entry.fields.get('username');
    if (username === undefined || username === '') {
      throw new CredentialFileError(location, 'entry has no "username:" line');
    }
    return { username, secret: entry.password };
  }

  async save(name: string, credential: Credential): Promise<void> {
    const entryPath = this.entryPath(name);
    const entry = (await this.readEntry(entryPath)) ?? {
      password: null,
      fields: new Map<string, string>(),
    };

    entry.password = credential.secret;
    entry.fields.set('username', credential.username);

    await this.writeEntry(entryPath, entry);
  }

  supportsWrite(): boolean {
    return true;
  }
}
