import { describe, it, expect, afterEach } from 'vitest';

import { NsxClient } from './nsx.js';
import { SessionContext } from '../session/context.js';
import { SessionValueMissingError } from '../errors.js';
import { startServer, type TestServer } from '../testing/http-server.js';

const CREDENTIAL = { username: 'admin', secret: 'test-secret' };
const EXPECTED_AUTH = `Basic ${Buffer.from('admin:test-secret').toString('base64')}`;

const SEG_A = { id: 'seg-a', display_name: 'web', path: '/infra/segments/seg-a', subnets: [{ gateway_address: '10.0.1.1/24' }] };
const SEG_B = { id: 'seg-b', display_name: 'db', path: '/infra/segments/seg-b' };

describe('NsxClient', () => {
  let server: TestServer;

  afterEach(async () => {
    await server.close();
  });

  async function start() {
    server = await startServer((req, res) => {
      res.setHeader('Content-Type', 'application/json');
      if (req.headers.authorization !== EXPECTED_AUTH) {
        res.statusCode = 403;
        res.end('{"error_message":"forbidden"}');
        return;
      }
      const url = req.url ?? '';
      if (url === '/api/v1/node') {
        res.end(JSON.stringify({ node_version: '4.1.0.0.0', hostname: 'nsx01' }));
        return;
      }
      if (url === '/policy/api/v1/infra/segments') {
        res.end(JSON.stringify({ results: [SEG_A], result_count: 2, cursor: 'page-2' }));
        return;
      }
      if (url === '/policy/api/v1/infra/segments?cursor=page-2') {
        res.end(JSON.stringify({ results: [SEG_B], result_count: 2 }));
        return;
      }
      if (url === '/policy/api/v1/infra/segments/seg-a') {
        res.end(JSON.stringify(SEG_A));
        return;
      }
      res.statusCode = 404;
      res.end('{"error_message":"not found"}');
    });
  }

  it('verifies the credential on connect and caches it', async () => {
    await start();
    const context = new SessionContext();
    const node = await new NsxClient(context).connect(server.baseUrl, CREDENTIAL);

    expect(node.node_version).toBe('4.1.0.0.0');
    expect(context.scope('nsx').get('credential')).toBe(CREDENTIAL);
  });

  it('follows cursors when listing segments', async () => {
    await start();
    const client = new NsxClient(new SessionContext());
    await client.connect(server.baseUrl, CREDENTIAL);

    const segments = await client.listSegments();
    expect(segments.map((s) => s.id)).toEqual(['seg-a', 'seg-b']);
    expect(segments[0].subnets).toEqual([{ gateway_address: '10.0.1.1/24' }]);
  });

  it('stops when the server hands back the cursor it was given', async () => {
    server = await startServer((req, res) => {
      res.setHeader('Content-Type', 'application/json');
      switch (req.url) {
        case '/api/v1/node':
          res.end(JSON.stringify({ node_version: '4.1.0.0.0' }));
          return;
        case '/policy/api/v1/infra/segments':
          res.end(JSON.stringify({ results: [SEG_A], cursor: 'stuck' }));
          return;
        default:
          res.end(JSON.stringify({ results: [SEG_B], cursor: 'stuck' }));
      }
    });
    const client = new NsxClient(new SessionContext());
    await client.connect(server.baseUrl, CREDENTIAL);

    const segments = await client.listSegments();
    expect(segments.map((s) => s.id)).toEqual(['seg-a', 'seg-b']);
    expect(server.requests.map((r) => r.url)).toEqual([
      '/api/v1/node',
      '/policy/api/v1/infra/segments',
      '/policy/api/v1/infra/segments?cursor=stuck',
    ]);
  });

  it('sends basic auth on every call', async () => {
    await start();
    const client = new NsxClient(new SessionContext());
    await client.connect(server.baseUrl, CREDENTIAL);
    await client.getSegment('seg-a');

    expect(server.requests.map((r) => r.headers.authorization)).toEqual([EXPECTED_AUTH, EXPECTED_AUTH]);
  });

  it('shares the connection through the context', async () => {
    await start();
    const context = new SessionContext();
    await new NsxClient(context).connect(server.baseUrl, CREDENTIAL);
    const segment = await new NsxClient(context).getSegment('seg-a');
    expect(segment.display_name).toBe('web');
  });

  it('fails without a connection', async () => {
    await start();
    const context = new SessionContext();
    context.scope('nsx').set('server', server.baseUrl);
    await expect(new NsxClient(context).listSegments()).rejects.toBeInstanceOf(SessionValueMissingError);
  });
});
