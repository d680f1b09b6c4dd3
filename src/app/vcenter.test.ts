import { describe, it, expect, afterEach, vi } from 'vitest';

import { defaultConfig } from '../config.js';
import { MemoryCredentialStore } from '../credentials/memory-store.js';
import { CredentialNotFoundError } from '../errors.js';
import { startServer, type TestServer } from '../testing/http-server.js';
import { createAppEnv } from './env.js';
import { vcenterRequest, vcenterVm, vcenterVms } from './vcenter.js';

const EXPECTED_AUTH = `Basic ${Buffer.from('admin:test-secret').toString('base64')}`;

function vcenterHandler(options: { failLogout?: boolean } = {}): Parameters<typeof startServer>[0] {
  return (req, res) => {
    const url = req.url ?? '';
    res.setHeader('Content-Type', 'application/json');

    if (req.method === 'POST' && url === '/api/session') {
      res.statusCode = req.headers.authorization === EXPECTED_AUTH ? 201 : 401;
      res.end(res.statusCode === 201 ? '"session-abc"' : '{"error_type":"UNAUTHENTICATED"}');
      return;
    }
    if (req.method === 'DELETE' && url === '/api/session') {
      res.statusCode = options.failLogout ? 500 : 204;
      res.end(options.failLogout ? 'boom' : '');
      return;
    }
    if (req.method === 'GET' && url === '/api/vcenter/vm') {
      res.end(JSON.stringify([{ vm: 'vm-7', name: 'app01', power_state: 'POWERED_ON' }]));
      return;
    }
    if (req.method === 'GET' && url === '/api/vcenter/vm/vm-7') {
      res.end(JSON.stringify({ name: 'app01', power_state: 'POWERED_ON', guest_OS: 'UBUNTU_64' }));
      return;
    }
    if (req.method === 'GET' && url === '/api/appliance/system/version') {
      res.end(JSON.stringify({ version: '8.0.2' }));
      return;
    }
    res.statusCode = 404;
    res.end('{}');
  };
}

function makeEnv(store = new MemoryCredentialStore()) {
  return createAppEnv(defaultConfig(), { interactive: false }, { store });
}

function hostOf(baseUrl: string): string {
  return new URL(baseUrl).host;
}

describe('vcenter commands', () => {
  let server: TestServer | undefined;

  afterEach(async () => {
    await server?.close();
    server = undefined;
    vi.restoreAllMocks();
  });

  it('lists vms with a stored server credential and logs out', async () => {
    server = await startServer(vcenterHandler());
    const store = new MemoryCredentialStore({
      [`${hostOf(server.baseUrl)}-admin`]: { username: 'admin', secret: 'test-secret' },
    });

    const vms = await vcenterVms(makeEnv(store), { server: server.baseUrl, username: 'admin' });

    expect(vms).toEqual([{ vm: 'vm-7', name: 'app01', power_state: 'POWERED_ON' }]);
    expect(server.requests.map((r) => `${r.method} ${r.url}`)).toEqual([
      'POST /api/session',
      'GET /api/vcenter/vm',
      'DELETE /api/session',
    ]);
  });

  it('takes the server from config and an explicit password', async () => {
    server = await startServer(vcenterHandler());
    const env = makeEnv();
    env.config.vcenter.server = server.baseUrl;

    const vm = await vcenterVm(env, { username: 'admin', password: 'test-secret' }, 'vm-7');
    expect(vm).toEqual({ name: 'app01', power_state: 'POWERED_ON', guest_OS: 'UBUNTU_64' });
  });

  it('fails when no server is known', async () => {
    await expect(vcenterVms(makeEnv(), { username: 'admin', password: 'test-secret' })).rejects.toThrow(
      "No value given for 'vcenter:server' and none cached in this session",
    );
  });

  it('names every location tried when no credential exists', async () => {
    server = await startServer(vcenterHandler());
    const host = hostOf(server.baseUrl);

    const err = await vcenterVms(makeEnv(), { server: server.baseUrl, username: 'admin' }).catch(
      (e: unknown) => e,
    );
    expect(err).toBeInstanceOf(CredentialNotFoundError);
    expect(err).toHaveProperty('attempted', [`memory:${host}-admin`, 'memory:admin']);
    expect(server.requests).toHaveLength(0);
  });

  it('returns request bodies parsed or raw', async () => {
    server = await startServer(vcenterHandler());
    const connection = { server: server.baseUrl, username: 'admin', password: 'test-secret' };

    expect(await vcenterRequest(makeEnv(), connection, '/api/appliance/system/version', {})).toEqual({
      version: '8.0.2',
    });
    expect(
      await vcenterRequest(makeEnv(), connection, '/api/appliance/system/version', { raw: true }),
    ).toBe('{"version":"8.0.2"}');
  });

  it('keeps the result when logout fails', async () => {
    server = await startServer(vcenterHandler({ failLogout: true }));
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const vms = await vcenterVms(makeEnv(), { server: server.baseUrl, username: 'admin', password: 'test-secret' });

    expect(vms).toHaveLength(1);
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(String(warnSpy.mock.calls[0]?.[0])).toMatch(/^\[session\] warning: logout failed: .*status 500: boom$/);
  });
});
