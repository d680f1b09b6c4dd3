/**
 * NSX-T Manager client (Policy API). Every call carries Basic auth.
 */
import { z } from 'zod';

import type { Credential } from '../credentials/credential.js';
import { basicAuth, invokeApi, normalizeBaseUrl } from '../http/invoker.js';
import { SessionValueMissingError } from '../errors.js';
import { debugLog } from '../log.js';
import { decodeResult, parseJson } from '../result/shape.js';
import type { SessionContext } from '../session/context.js';
import { SERVER_KEY, TargetClient, type TransportOptions } from './target.js';

export const NSX_NAMESPACE = 'nsx';

const CREDENTIAL_KEY = 'credential';
const SEGMENTS_PATH = '/policy/api/v1/infra/segments';

export const NodeInfoSchema = z.object({
  node_version: z.string(),
  product_version: z.string().optional(),
  hostname: z.string().optional(),
});

export const SegmentSchema = z.object({
  id: z.string(),
  display_name: z.string(),
  path: z.string(),
  type: z.string().optional(),
  transport_zone_path: z.string().optional(),
  subnets: z
    .array(z.object({ gateway_address: z.string(), network: z.string().optional() }))
    .optional(),
});

const SegmentPageSchema = z.object({
  results: z.array(SegmentSchema),
  result_count: z.number().optional(),
  cursor: z.string().optional(),
});

export type NodeInfo = z.infer<typeof NodeInfoSchema>;
export type Segment = z.infer<typeof SegmentSchema>;

export class NsxClient extends TargetClient {
  constructor(context: SessionContext, transport: TransportOptions = {}) {
    super(context.scope(NSX_NAMESPACE), transport);
  }

  protected authHeaders(): Record<string, string> {
    const credential = this.scope.get<Credential>(CREDENTIAL_KEY);
    if (credential === undefined) {
      throw new SessionValueMissingError(`${NSX_NAMESPACE}:${CREDENTIAL_KEY}`);
    }
    return { authorization: basicAuth(credential.username, credential.secret) };
  }

  /**
   * Check the credential against the manager and remember server and
   * credential for later calls.
   */
  async connect(server: string | undefined, credential: Credential): Promise<NodeInfo> {
    const baseUrl = normalizeBaseUrl(this.scope.sync<string>(SERVER_KEY, server, true));
    const response = await invokeApi({
      baseUrl,
      endpoint: '/api/v1/node',
      headers: { authorization: basicAuth(credential.username, credential.secret), accept: 'application/json' },
      skipCertificateCheck: this.transport.skipCertificateCheck,
      timeoutMs: this.transport.timeoutMs,
    });
    const node = decodeResult(NodeInfoSchema, parseJson(response.body), 'nsx node');

    this.scope.set(SERVER_KEY, baseUrl);
    this.scope.set(CREDENTIAL_KEY, credential);
    debugLog('nsx', 'connected', { server: baseUrl, version: node.node_version });
    return node;
  }

  /** All segments, following result cursors. */
  async listSegments(): Promise<Segment[]> {
    const segments: Segment[] = [];
    let cursor: string | undefined;

    do {
      const endpoint =
        cursor === undefined ? SEGMENTS_PATH : `${SEGMENTS_PATH}?cursor=${encodeURIComponent(cursor)}`;
      const response = await this.send(endpoint);
      const page = decodeResult(SegmentPageSchema, parseJson(response.body), 'segment list');
      segments.push(...page.results);
      // a repeated cursor would request the same page forever
      const next = page.cursor !== undefined && page.cursor !== '' ? page.cursor : undefined;
      cursor = next === cursor ? undefined : next;
    } while (cursor !== undefined);

    return segments;
  }

  async getSegment(segmentId: string): Promise<Segment> {
    const response = await this.send(`${SEGMENTS_PATH}/${encodeURIComponent(segmentId)}`);
    return decodeResult(SegmentSchema, parseJson(response.body), 'segment');
  }
}
