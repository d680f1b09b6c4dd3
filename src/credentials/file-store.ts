import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { CredentialFileError, errorMessage } from '../errors.js';
import type { Credential } from './credential.js';
import { isSafeName, CredentialNameError } from './credential.js';
import type { CredentialStore } from './credential-store.js';
import { decodeSecret, encodeSecret, type SecretKeyProvider, toSecretKeyProvider } from './secret-codec.js';

/** On-disk shape of `{dir}/{name}.json`. */
interface CredentialFileJSON {
  username: string;
  secret: string;
}

function parseCredentialFile(content: string, location: string): CredentialFileJSON {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (e: unknown) {
    throw new CredentialFileError(location, `not valid JSON (${errorMessage(e)})`);
  }

  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new CredentialFileError(location, 'expected a JSON object');
  }

  const obj: Record<string, unknown> = Object.fromEntries(Object.entries(raw));
  const username = obj['username'];
  if (typeof username !== 'string' || username === '') {
    throw new CredentialFileError(location, 'missing or invalid "username"');
  }
  const secret = obj['secret'];
  if (typeof secret !== 'string') {
    throw new CredentialFileError(location, 'missing or invalid "secret"');
  }

  return { username, secret };
}

function isNotFound(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

/**
 * Credentials stored as JSON files with an AES-256-GCM encrypted secret.
 *
 * Layout: `{dir}/{name}.json` = `{ "username": ..., "secret": "v1:..." }`.
 * Without a key the store can neither read nor write secrets. The key is
 * parsed on the first load or save that needs it.
 */
export class FileCredentialStore implements CredentialStore {
  private readonly dir: string;
  private readonly key: SecretKeyProvider;

  constructor(dir: string, key: Buffer | null | SecretKeyProvider) {
    this.dir = dir;
    this.key = toSecretKeyProvider(key);
  }

  private file(name: string): string {
    if (!isSafeName(name)) throw new CredentialNameError(name);
    return path.join(this.dir, `${name}.json`);
  }

  describe(name: string): string {
    return this.file(name);
  }

  async load(name: string): Promise<Credential | null> {
    const file = this.file(name);

    let content: string;
    try {
      content = await fs.readFile(file, 'utf8');
    } catch (e: unknown) {
      if (isNotFound(e)) return null;
      throw new CredentialFileError(file, errorMessage(e));
    }

    const parsed = parseCredentialFile(content, file);
    let key: Buffer | null;
    try {
      key = this.key.get();
    } catch (e: unknown) {
      throw new CredentialFileError(file, errorMessage(e));
    }
    if (key === null) {
      throw new CredentialFileError(file, 'no secret key configured to decrypt it');
    }

    try {
      return { username: parsed.username, secret: decodeSecret(parsed.secret, key) };
    } catch (e: unknown) {
      throw new CredentialFileError(file, `cannot decrypt secret (${errorMessage(e)})`);
    }
  }

  async save(name: string, credential: Credential): Promise<void> {
    const key = this.key.get();
    if (key === null) {
      throw new Error('Cannot save credential: no secret key configured');
    }
    const file = this.file(name);
    const body: CredentialFileJSON = {
      username: credential.username,
      secret: encodeSecret(credential.secret, key),
    };
    await fs.mkdir(this.dir, { recursive: true, mode: 0o700 });
    await fs.writeFile(file, JSON.stringify(body, null, 2) + '\n', { encoding: 'utf8', mode: 0o600 });
  }

  supportsWrite(): boolean {
    return this.key.isSet();
  }
}
