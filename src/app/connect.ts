/**
 * Resolve a credential and connect a target client.
 *
 * Server and username come from the command line, then the target's config
 * section, then the session context.
 */

import type { TargetConfig } from '../config.js';
import { resolveCredential, type ResolvedCredential } from '../credentials/resolver.js';
import { normalizeBaseUrl } from '../http/invoker.js';
import { SessionValueMissingError, errorMessage } from '../errors.js';
import { warn } from '../log.js';
import type { Namespace } from '../session/context.js';
import { NsxClient, NSX_NAMESPACE } from '../targets/nsx.js';
import { SERVER_KEY } from '../targets/target.js';
import { VCenterClient, VCENTER_NAMESPACE } from '../targets/vcenter.js';
import { VCloudClient, VCLOUD_NAMESPACE } from '../targets/vcloud.js';
import type { AppEnv } from './env.js';

export interface ConnectionOptions {
  server?: string;
  username?: string;
  password?: string;
}

export interface VCloudConnectionOptions extends ConnectionOptions {
  org?: string;
  apiVersion?: string;
}

/** Pick the server and resolve the credential for it. */
export async function resolveTarget(
  env: AppEnv,
  namespace: Namespace,
  defaults: TargetConfig,
  options: ConnectionOptions,
): Promise<{ server: string; resolved: ResolvedCredential }> {
  const given = options.server ?? defaults.server ?? env.context.scope(namespace).get<string>(SERVER_KEY);
  if (given === undefined || given.trim() === '') {
    throw new SessionValueMissingError(`${namespace}:${SERVER_KEY}`);
  }
  const server = normalizeBaseUrl(given.trim());
  const resolved = await resolveCredential(
    {
      server: credentialServerName(server),
      username: options.username ?? defaults.username,
      password: options.password,
      interactive: env.interactive,
    },
    { store: env.store, context: env.context, prompter: env.prompter, secretKey: env.secretKey },
  );
  return { server, resolved };
}

/** Host (and port) part of a server URL, as used in credential names. */
export function credentialServerName(server: string): string {
  return new URL(normalizeBaseUrl(server)).host;
}

export async function connectVCenter(env: AppEnv, options: ConnectionOptions): Promise<VCenterClient> {
  const { server, resolved } = await resolveTarget(env, VCENTER_NAMESPACE, env.config.vcenter, options);
  const client = new VCenterClient(env.context, env.transport);
  await client.connect(server, resolved.credential);
  return client;
}

export async function connectNsx(env: AppEnv, options: ConnectionOptions): Promise<NsxClient> {
  const { server, resolved } = await resolveTarget(env, NSX_NAMESPACE, env.config.nsx, options);
  const client = new NsxClient(env.context, env.transport);
  await client.connect(server, resolved.credential);
  return client;
}

export async function connectVCloud(env: AppEnv, options: VCloudConnectionOptions): Promise<VCloudClient> {
  const defaults = env.config.vcloud;
  const org = options.org ?? defaults.org ?? env.context.scope(VCLOUD_NAMESPACE).get<string>('org');
  if (org === undefined || org === '') {
    throw new SessionValueMissingError(`${VCLOUD_NAMESPACE}:org`);
  }
  const { server, resolved } = await resolveTarget(env, VCLOUD_NAMESPACE, defaults, options);
  const client = new VCloudClient(env.context, env.transport);
  await client.connect(server, resolved.credential, {
    org,
    apiVersion: options.apiVersion ?? defaults.api_version,
  });
  return client;
}

/**
 * Run `fn` against a connected client and close its session afterwards.
 * A failed logout is reported as a warning; the result of `fn` stands.
 */
export async function withSession<C extends { disconnect(): Promise<void> }, T>(
  client: C,
  fn: (client: C) => Promise<T>,
): Promise<T> {
  try {
    return await fn(client);
  } finally {
    try {
      await client.disconnect();
    } catch (e: unknown) {
      warn('session', `logout failed: ${errorMessage(e)}`);
    }
  }
}
