/**
 * vCloud Director client for the XML API (`/api`).
 */
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';

import type { Credential } from '../credentials/credential.js';
import { basicAuth, invokeApi, normalizeBaseUrl } from '../http/invoker.js';
import { ParseError } from '../errors.js';
import { debugLog } from '../log.js';
import { decodeResult, parseXml } from '../result/shape.js';
import type { SessionContext } from '../session/context.js';
import { type PollOptions, type PollResult, waitForTask } from '../tasks/poll.js';
import { SERVER_KEY, TOKEN_KEY, TargetClient, type TransportOptions } from './target.js';

export const VCLOUD_NAMESPACE = 'vcloud';
export const DEFAULT_API_VERSION = '36.0';

const TOKEN_HEADER = 'x-vcloud-authorization';
const REQUEST_ID_HEADER = 'x-vmware-vcloud-client-request-id';
const ORG_KEY = 'org';
const API_VERSION_KEY = 'apiVersion';
const QUERY_PAGE_SIZE = 128;

const TaskXmlSchema = z.object({
  Task: z.object({
    '@_href': z.string(),
    '@_status': z.string(),
    '@_operation': z.string().optional(),
    '@_operationName': z.string().optional(),
    Error: z
      .object({
        '@_message': z.string(),
        '@_majorErrorCode': z.string().optional(),
      })
      .optional(),
  }),
});

const VmRecordXmlSchema = z.object({
  '@_href': z.string(),
  '@_name': z.string(),
  '@_status': z.string(),
  '@_containerName': z.string().optional(),
  '@_guestOs': z.string().optional(),
  '@_numberOfCpus': z.string().optional(),
  '@_memoryMB': z.string().optional(),
  '@_isVAppTemplate': z.string().optional(),
});

const QueryResultXmlSchema = z.object({
  QueryResultRecords: z.object({
    '@_total': z.string(),
    '@_page': z.string().optional(),
    VMRecord: z.union([VmRecordXmlSchema, z.array(VmRecordXmlSchema)]).optional(),
  }),
});

export interface VCloudTask {
  href: string;
  status: string;
  operation: string | null;
  operationName: string | null;
  error: { message: string; majorErrorCode: string | null } | null;
}

export interface VCloudVmRecord {
  href: string;
  name: string;
  status: string;
  vapp: string | null;
  guestOs: string | null;
  cpuCount: number | null;
  memoryMB: number | null;
  isTemplate: boolean;
}

export type PowerAction = 'powerOn' | 'powerOff' | 'reset' | 'suspend' | 'shutdown';

export interface VCloudConnectOptions {
  /** Falls back to the org cached in the session. */
  org?: string;
  apiVersion?: string;
}

function toInt(value: string | undefined): number | null {
  if (value === undefined) return null;
  const n = Number.parseInt(value, 10);
  return Number.isNaN(n) ? null : n;
}

export function parseTask(xml: string): VCloudTask {
  const { Task: task } = decodeResult(TaskXmlSchema, parseXml(xml), 'vcloud task');
  return {
    href: task['@_href'],
    status: task['@_status'],
    operation: task['@_operation'] ?? null,
    operationName: task['@_operationName'] ?? null,
    error:
      task.Error === undefined
        ? null
        : { message: task.Error['@_message'], majorErrorCode: task.Error['@_majorErrorCode'] ?? null },
  };
}

export function parseVmRecords(xml: string): { total: number; records: VCloudVmRecord[] } {
  const { QueryResultRecords: result } = decodeResult(QueryResultXmlSchema, parseXml(xml), 'vm query');
  const total = toInt(result['@_total']);
  if (total === null) {
    throw new ParseError(`Unexpected vm query response shape: total is not a number`);
  }
  const raw = result.VMRecord === undefined ? [] : Array.isArray(result.VMRecord) ? result.VMRecord : [result.VMRecord];

  return {
    total,
    records: raw.map((r) => ({
      href: r['@_href'],
      name: r['@_name'],
      status: r['@_status'],
      vapp: r['@_containerName'] ?? null,
      guestOs: r['@_guestOs'] ?? null,
      cpuCount: toInt(r['@_numberOfCpus']),
      memoryMB: toInt(r['@_memoryMB']),
      isTemplate: r['@_isVAppTemplate'] === 'true',
    })),
  };
}

export class VCloudClient extends TargetClient {
  constructor(context: SessionContext, transport: TransportOptions = {}) {
    super(context.scope(VCLOUD_NAMESPACE), transport);
  }

  private apiVersion(): string {
    return this.scope.get<string>(API_VERSION_KEY) ?? DEFAULT_API_VERSION;
  }

  protected defaultHeaders(): Record<string, string> {
    return { accept: `application/*+xml;version=${this.apiVersion()}` };
  }

  protected defaultContentType(): string {
    return 'application/xml';
  }

  protected authHeaders(): Record<string, string> {
    return {
      [TOKEN_HEADER]: this.scope.sync<string>(TOKEN_KEY, undefined, true),
      [REQUEST_ID_HEADER]: uuidv4(),
    };
  }

  /** Log in as `username@org` and remember server, org and token. */
  async connect(
    server: string | undefined,
    credential: Credential,
    options: VCloudConnectOptions,
  ): Promise<string> {
    const baseUrl = normalizeBaseUrl(this.scope.sync<string>(SERVER_KEY, server, true));
    const org = this.scope.sync<string>(ORG_KEY, options.org, true);
    const apiVersion = this.scope.sync<string>(API_VERSION_KEY, options.apiVersion) ?? DEFAULT_API_VERSION;

    const response = await invokeApi({
      baseUrl,
      endpoint: '/api/sessions',
      method: 'POST',
      headers: {
        authorization: basicAuth(`${credential.username}@${org}`, credential.secret),
        accept: `application/*+xml;version=${apiVersion}`,
      },
      skipCertificateCheck: this.transport.skipCertificateCheck,
      timeoutMs: this.transport.timeoutMs,
    });

    const token = response.headers[TOKEN_HEADER];
    if (token === undefined || token === '') {
      throw new ParseError(`vCloud login response has no ${TOKEN_HEADER} header`);
    }
    this.scope.set(SERVER_KEY, baseUrl);
    this.scope.set(TOKEN_KEY, token);
    debugLog('vcloud', 'connected', { server: baseUrl, org, apiVersion });
    return token;
  }

  async disconnect(): Promise<void> {
    if (!this.scope.has(TOKEN_KEY)) return;
    await this.send('/api/session', { method: 'DELETE' });
    this.scope.delete(TOKEN_KEY);
  }

  /** Fetch a task by href or id. */
  async getTask(hrefOrId: string): Promise<VCloudTask> {
    const endpoint = /^https?:\/\//i.test(hrefOrId) ? hrefOrId : `/api/task/${encodeURIComponent(hrefOrId)}`;
    const response = await this.send(endpoint);
    return parseTask(response.body);
  }

  async waitForTask(hrefOrId: string, options: PollOptions): Promise<PollResult<VCloudTask>> {
    return waitForTask(() => this.getTask(hrefOrId), (task) => task.status, options);
  }

  /** All VMs visible to the user (query service, records format). */
  async queryVms(): Promise<VCloudVmRecord[]> {
    const records: VCloudVmRecord[] = [];
    for (let page = 1; ; page++) {
      const response = await this.send(
        `/api/query?type=vm&format=records&page=${page}&pageSize=${QUERY_PAGE_SIZE}`,
      );
      const result = parseVmRecords(response.body);
      records.push(...result.records);
      if (result.records.length === 0 || records.length >= result.total) {
        return records;
      }
    }
  }

  /** Start a power operation on a VM or vApp; returns the task it spawned. */
  async power(href: string, action: PowerAction): Promise<VCloudTask> {
    const base = href.replace(/\/+$/, '');
    const response = await this.send(`${base}/power/action/${action}`, { method: 'POST' });
    return parseTask(response.body);
  }
}
