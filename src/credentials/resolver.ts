import { CredentialFileError, CredentialNotFoundError } from '../errors.js';
import { debugLog, warn } from '../log.js';
import type { SessionContext } from '../session/context.js';
import type { Credential } from './credential.js';
import { serverCredentialName, userCredentialName } from './credential.js';
import type { CredentialStore } from './credential-store.js';
import type { Prompter } from './prompt.js';
import { decodeSecret, isEncodedSecret, type SecretKeyProvider, toSecretKeyProvider } from './secret-codec.js';

export interface CredentialRequest {
  server: string;
  username?: string;
  password?: string;
  interactive: boolean;
}

export interface ResolverDeps {
  store: CredentialStore;
  /** Caches the result per `(server, username)` for the rest of the invocation. */
  context?: SessionContext;
  /** Required when `interactive` is set. */
  prompter?: Prompter;
  /** Key used to decode pre-encoded passwords. */
  secretKey?: Buffer | null | SecretKeyProvider;
}

export type CredentialSource = 'explicit' | 'server-file' | 'prompt' | 'user-file' | 'session';

export interface ResolvedCredential {
  credential: Credential;
  source: CredentialSource;
}

function cacheKey(server: string, username: string): string {
  return `${server}-${username}`;
}

/**
 * Decode `password` if it is an encoded secret this key opens; otherwise
 * treat it as plaintext.
 */
export function decodePassword(password: string, keySource: Buffer | null | SecretKeyProvider | undefined): string {
  if (keySource === undefined || !isEncodedSecret(password)) {
    return password;
  }
  // a malformed key surfaces here, not for plaintext passwords
  const key = toSecretKeyProvider(keySource).get();
  if (key === null) return password;
  try {
    return decodeSecret(password, key);
  } catch {
    debugLog('credentials', 'password looks encoded but does not decrypt; using it as plaintext');
    return password;
  }
}

async function tryLoad(store: CredentialStore, name: string): Promise<Credential | null> {
  try {
    return await store.load(name);
  } catch (e: unknown) {
    if (e instanceof CredentialFileError) {
      warn('credentials', `${e.message}; trying next source`);
      return null;
    }
    throw e;
  }
}

/**
 * Resolve the credential for `request.server`.
 *
 * Sources, first hit wins:
 * 1. explicit username + password
 * 2. stored credential `{server}-{username}`
 * 3. interactive prompt (optionally saved as `{server}-{username}`)
 * 4. stored credential `{username}`
 *
 * With a session context, a credential resolved earlier for the same
 * `(server, username)` is reused unless a password is given explicitly.
 *
 * @throws CredentialNotFoundError naming every location tried.
 */
export async function resolveCredential(
  request: CredentialRequest,
  deps: ResolverDeps,
): Promise<ResolvedCredential> {
  const { server, password, interactive } = request;
  const username = request.username?.trim() || undefined;
  const cache = deps.context?.scope('credentials');

  const remember = (credential: Credential, source: CredentialSource): ResolvedCredential => {
    cache?.set(cacheKey(server, credential.username), credential);
    if (username !== undefined && username !== credential.username) {
      cache?.set(cacheKey(server, username), credential);
    }
    debugLog('credentials', 'resolved credential', { server, username: credential.username, source });
    return { credential, source };
  };

  if (username !== undefined && password !== undefined && password !== '') {
    return remember({ username, secret: decodePassword(password, deps.secretKey) }, 'explicit');
  }

  if (username !== undefined) {
    const cached = cache?.get<Credential>(cacheKey(server, username));
    if (cached !== undefined) {
      return { credential: cached, source: 'session' };
    }
  }

  const attempted: string[] = [];

  if (username !== undefined) {
    const name = serverCredentialName(server, username);
    attempted.push(deps.store.describe(name));
    const stored = await tryLoad(deps.store, name);
    if (stored !== null) return remember(stored, 'server-file');
  }

  if (interactive) {
    if (deps.prompter === undefined) {
      throw new Error('Interactive credential prompt requested but no prompter is available');
    }
    const prompted = await promptForCredential(server, username, deps.prompter, deps.store);
    return remember(prompted, 'prompt');
  }

  if (username !== undefined) {
    const name = userCredentialName(username);
    attempted.push(deps.store.describe(name));
    const stored = await tryLoad(deps.store, name);
    if (stored !== null) return remember(stored, 'user-file');
  }

  throw new CredentialNotFoundError(attempted);
}

async function promptForCredential(
  server: string,
  username: string | undefined,
  prompter: Prompter,
  store: CredentialStore,
): Promise<Credential> {
  const user = username ?? (await prompter.username(`Username for ${server}:`)).trim();
  const secret = await prompter.secret(`Password for ${user}@${server}:`);
  const credential: Credential = { username: user, secret };

  if (store.supportsWrite()) {
    const name = serverCredentialName(server, user);
    const save = await prompter.confirm(`Save credential to ${store.describe(name)}?`);
    if (save) {
      await store.save(name, credential);
    }
  }

  return credential;
}
