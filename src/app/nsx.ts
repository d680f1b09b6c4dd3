/**
 * NSX Manager commands. NSX authenticates every call, so there is no
 * session to close.
 */

import type { Segment } from '../targets/nsx.js';
import { type ConnectionOptions, connectNsx } from './connect.js';
import type { AppEnv } from './env.js';
import { type RequestCommandOptions, runRequest } from './request.js';

export async function nsxSegments(env: AppEnv, connection: ConnectionOptions): Promise<Segment[]> {
  const client = await connectNsx(env, connection);
  return client.listSegments();
}

export async function nsxSegment(env: AppEnv, connection: ConnectionOptions, segmentId: string): Promise<Segment> {
  const client = await connectNsx(env, connection);
  return client.getSegment(segmentId);
}

export async function nsxRequest(
  env: AppEnv,
  connection: ConnectionOptions,
  endpoint: string,
  options: RequestCommandOptions,
): Promise<unknown> {
  const client = await connectNsx(env, connection);
  return runRequest(client, endpoint, options);
}
