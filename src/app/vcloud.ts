/**
 * vCloud Director commands.
 */

import type { PollOptions, PollResult } from '../tasks/poll.js';
import type { PowerAction, VCloudTask, VCloudVmRecord } from '../targets/vcloud.js';
import { type VCloudConnectionOptions, connectVCloud, withSession } from './connect.js';
import type { AppEnv } from './env.js';
import { type RequestCommandOptions, runRequest } from './request.js';

export const POWER_ACTIONS: readonly PowerAction[] = ['powerOn', 'powerOff', 'reset', 'suspend', 'shutdown'];

export function parsePowerAction(value: string): PowerAction {
  const action = POWER_ACTIONS.find((a) => a.toLowerCase() === value.toLowerCase());
  if (action === undefined) {
    throw new Error(`Invalid power action '${value}': expected one of ${POWER_ACTIONS.join(', ')}`);
  }
  return action;
}

export interface TaskCommandOptions {
  /** Poll until the task reaches a terminal status. */
  wait?: boolean;
}

/** A task, plus the number of polls when waited on. */
export type TaskOutput = VCloudTask & { polls?: number };

function taskOutput(result: PollResult<VCloudTask>): TaskOutput {
  return { ...result.task, polls: result.polls };
}

function pollOptions(env: AppEnv): PollOptions {
  return {
    intervalMs: env.config.vcloud.poll_interval,
    timeoutMs: env.config.vcloud.task_timeout,
    clock: env.clock,
  };
}

export async function vcloudVms(env: AppEnv, connection: VCloudConnectionOptions): Promise<VCloudVmRecord[]> {
  return withSession(await connectVCloud(env, connection), (client) => client.queryVms());
}

export async function vcloudTask(
  env: AppEnv,
  connection: VCloudConnectionOptions,
  href: string,
  options: TaskCommandOptions = {},
): Promise<TaskOutput> {
  return withSession(await connectVCloud(env, connection), async (client) => {
    if (!options.wait) return client.getTask(href);
    return taskOutput(await client.waitForTask(href, pollOptions(env)));
  });
}

export async function vcloudPower(
  env: AppEnv,
  connection: VCloudConnectionOptions,
  href: string,
  action: PowerAction,
  options: TaskCommandOptions = {},
): Promise<TaskOutput> {
  return withSession(await connectVCloud(env, connection), async (client) => {
    const task = await client.power(href, action);
    if (!options.wait) return task;
    return taskOutput(await client.waitForTask(task.href, pollOptions(env)));
  });
}

export async function vcloudRequest(
  env: AppEnv,
  connection: VCloudConnectionOptions,
  endpoint: string,
  options: RequestCommandOptions,
): Promise<unknown> {
  return withSession(await connectVCloud(env, connection), (client) => runRequest(client, endpoint, options));
}
