/**
 * `credential` commands: save a credential for a server, and show which
 * credential a connection would use.
 */

import { serverCredentialName, userCredentialName } from '../credentials/credential.js';
import { type CredentialSource, resolveCredential } from '../credentials/resolver.js';
import { credentialServerName } from './connect.js';
import type { AppEnv } from './env.js';

export interface CredentialCommandOptions {
  server: string;
  username?: string;
  /** Secret to store; prompted for when absent. */
  password?: string;
}

export interface CredentialExportOutput {
  name: string;
  username: string;
  location: string;
}

export interface CredentialShowOutput {
  server: string;
  username: string;
  source: CredentialSource;
  location: string | null;
}

/** Save a credential under `{server}-{username}` in the configured store. */
export async function exportCredential(
  env: AppEnv,
  options: CredentialCommandOptions,
): Promise<CredentialExportOutput> {
  if (!env.store.supportsWrite()) {
    throw new Error('The configured credential store cannot save credentials');
  }
  const server = credentialServerName(options.server);

  let username = options.username?.trim();
  let secret = options.password;
  if (username === undefined || username === '' || secret === undefined || secret === '') {
    if (!env.interactive || env.prompter === undefined) {
      throw new Error('A username and password are required when prompting is disabled');
    }
    if (username === undefined || username === '') {
      username = (await env.prompter.username(`Username for ${server}:`)).trim();
    }
    if (secret === undefined || secret === '') {
      secret = await env.prompter.secret(`Password for ${username}@${server}:`);
    }
  }

  const name = serverCredentialName(server, username);
  await env.store.save(name, { username, secret });
  return { name, username, location: env.store.describe(name) };
}

/** Resolve a credential without prompting and report where it came from. The secret is never returned. */
export async function showCredential(
  env: AppEnv,
  options: Omit<CredentialCommandOptions, 'password'>,
): Promise<CredentialShowOutput> {
  const server = credentialServerName(options.server);
  const { credential, source } = await resolveCredential(
    { server, username: options.username, interactive: false },
    { store: env.store, context: env.context, secretKey: env.secretKey },
  );

  let location: string | null = null;
  if (source === 'server-file') location = env.store.describe(serverCredentialName(server, credential.username));
  if (source === 'user-file') location = env.store.describe(userCredentialName(credential.username));

  return { server, username: credential.username, source, location };
}

