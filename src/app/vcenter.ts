/**
 * vCenter commands. Each opens an API session, runs one call and logs out.
 */

import type { VmFilter, VmInfo, VmSummary } from '../targets/vcenter.js';
import { type ConnectionOptions, connectVCenter, withSession } from './connect.js';
import type { AppEnv } from './env.js';
import { type RequestCommandOptions, runRequest } from './request.js';

export async function vcenterVms(
  env: AppEnv,
  connection: ConnectionOptions,
  filter: VmFilter = {},
): Promise<VmSummary[]> {
  return withSession(await connectVCenter(env, connection), (client) => client.listVms(filter));
}

export async function vcenterVm(env: AppEnv, connection: ConnectionOptions, vmId: string): Promise<VmInfo> {
  return withSession(await connectVCenter(env, connection), (client) => client.getVm(vmId));
}

export async function vcenterRequest(
  env: AppEnv,
  connection: ConnectionOptions,
  endpoint: string,
  options: RequestCommandOptions,
): Promise<unknown> {
  return withSession(await connectVCenter(env, connection), (client) => runRequest(client, endpoint, options));
}
