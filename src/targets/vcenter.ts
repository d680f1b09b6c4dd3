/**
 * vSphere Automation API client (vCenter 7.0U2+ `/api` endpoints).
 */
import { z } from 'zod';

import type { Credential } from '../credentials/credential.js';
import { basicAuth, invokeApi, normalizeBaseUrl } from '../http/invoker.js';
import { debugLog } from '../log.js';
import { decodeResult, parseJson } from '../result/shape.js';
import type { SessionContext } from '../session/context.js';
import { SERVER_KEY, TOKEN_KEY, TargetClient, type TransportOptions } from './target.js';

export const VCENTER_NAMESPACE = 'vcenter';

const SESSION_HEADER = 'vmware-api-session-id';

export const VmSummarySchema = z.object({
  vm: z.string(),
  name: z.string(),
  power_state: z.string(),
  cpu_count: z.number().optional(),
  memory_size_MiB: z.number().optional(),
});

export const VmInfoSchema = z.object({
  name: z.string(),
  power_state: z.string(),
  guest_OS: z.string().optional(),
  cpu: z.object({ count: z.number() }).optional(),
  memory: z.object({ size_MiB: z.number() }).optional(),
});

export type VmSummary = z.infer<typeof VmSummarySchema>;
export type VmInfo = z.infer<typeof VmInfoSchema>;

export interface VmFilter {
  names?: string[];
  powerStates?: string[];
}

export class VCenterClient extends TargetClient {
  constructor(context: SessionContext, transport: TransportOptions = {}) {
    super(context.scope(VCENTER_NAMESPACE), transport);
  }

  protected authHeaders(): Record<string, string> {
    return { [SESSION_HEADER]: this.scope.sync<string>(TOKEN_KEY, undefined, true) };
  }

  /**
   * Create an API session and remember server and session id.
   *
   * Reuses the cached session when already connected to the same server.
   */
  async connect(server: string | undefined, credential: Credential): Promise<string> {
    const previous = this.scope.get<string>(SERVER_KEY);
    const baseUrl = normalizeBaseUrl(this.scope.sync<string>(SERVER_KEY, server, true));
    const cachedToken = this.scope.get<string>(TOKEN_KEY);
    if (cachedToken !== undefined && previous !== undefined && normalizeBaseUrl(previous) === baseUrl) {
      return cachedToken;
    }

    const response = await invokeApi({
      baseUrl,
      endpoint: '/api/session',
      method: 'POST',
      headers: { authorization: basicAuth(credential.username, credential.secret), accept: 'application/json' },
      skipCertificateCheck: this.transport.skipCertificateCheck,
      timeoutMs: this.transport.timeoutMs,
    });

    const token = decodeResult(z.string().min(1), parseJson(response.body), 'vcenter session');
    this.scope.set(SERVER_KEY, baseUrl);
    this.scope.set(TOKEN_KEY, token);
    debugLog('vcenter', 'connected', { server: baseUrl, username: credential.username });
    return token;
  }

  async disconnect(): Promise<void> {
    if (!this.scope.has(TOKEN_KEY)) return;
    await this.send('/api/session', { method: 'DELETE' });
    this.scope.delete(TOKEN_KEY);
  }

  async listVms(filter: VmFilter = {}): Promise<VmSummary[]> {
    const params = new URLSearchParams();
    for (const name of filter.names ?? []) params.append('names', name);
    for (const state of filter.powerStates ?? []) params.append('power_states', state);
    const query = params.toString();

    const response = await this.send(`/api/vcenter/vm${query === '' ? '' : `?${query}`}`);
    return decodeResult(z.array(VmSummarySchema), parseJson(response.body), 'vm list');
  }

  async getVm(vmId: string): Promise<VmInfo> {
    const response = await this.send(`/api/vcenter/vm/${encodeURIComponent(vmId)}`);
    return decodeResult(VmInfoSchema, parseJson(response.body), 'vm');
  }
}
