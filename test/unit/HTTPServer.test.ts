import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import { HTTPServer } from '../../src/server/HTTPServer';
import { createSetService } from '../../src/factory/ServiceFactory';
import { DEFAULT_CONFIG } from '../../src/common/Config';
import { ISetService } from '../../src/interfaces/OrderedSet';

describe('HTTPServer', () => {
  let server: HTTPServer;
  let baseUrl: string;

  const call = (method: string, path: string): Promise<Response> =>
    fetch(`${baseUrl}${path}`, { method });

  beforeAll(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    server = new HTTPServer(createSetService(DEFAULT_CONFIG), 0);
    await server.start();
    baseUrl = `http://127.0.0.1:${server.listeningPort}`;
  });

  afterAll(async () => {
    await server.stop();
    vi.restoreAllMocks();
  });

  it('binds an ephemeral port', () => {
    expect(server.listeningPort).toBeGreaterThan(0);
  });

  it('answers health checks', async () => {
    const res = await call('GET', '/health');
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok' });
  });

  it('inserts with 201 and reports a duplicate with 200', async () => {
    const first = await call('PUT', '/keys/5');
    expect(first.status).toBe(201);
    expect(await first.json()).toEqual({ key: '5', inserted: true });

    const second = await call('PUT', '/keys/5');
    expect(second.status).toBe(200);
    expect(await second.json()).toEqual({ key: '5', inserted: false });
  });

  it('finds present keys and 404s absent ones', async () => {
    const present = await call('GET', '/keys/5');
    expect(present.status).toBe(200);
    expect(await present.json()).toEqual({ key: '5', present: true });

    const absent = await call('GET', '/keys/6');
    expect(absent.status).toBe(404);
    expect(await absent.json()).toEqual({ error: 'Key not found', key: '6' });
  });

  it('rejects keys that do not parse with 400', async () => {
    const res = await call('PUT', '/keys/abc');
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Invalid key "abc": expected an integer' });
  });

  it('rejects an undecodable key with 400', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const res = await call('GET', '/keys/%ZZ');

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Failed to decode param '%ZZ'" });
    expect(error).not.toHaveBeenCalled();
    error.mockRestore();
  });

  it('removes with 200 and 404s a second removal', async () => {
    const first = await call('DELETE', '/keys/5');
    expect(first.status).toBe(200);
    expect(await first.json()).toEqual({ key: '5', removed: true });

    const second = await call('DELETE', '/keys/5');
    expect(second.status).toBe(404);
    expect(await second.json()).toEqual({ error: 'Key not found', key: '5' });
  });

  it('reports verification and stats', async () => {
    for (const key of ['1', '2', '3']) await call('PUT', `/keys/${key}`);

    const verify = await call('GET', '/verify');
    expect(verify.status).toBe(200);
    expect(await verify.json()).toEqual({ valid: true });

    const stats = await call('GET', '/stats');
    expect(stats.status).toBe(200);
    expect(await stats.json()).toMatchObject({ size: 3, maxSize: 3, alpha: 0.7 });
  });

  it('clears every key and dumps the empty tree as text', async () => {
    const cleared = await call('DELETE', '/keys');
    expect(cleared.status).toBe(200);
    expect(await cleared.json()).toEqual({ success: true });

    expect((await call('GET', '/keys/1')).status).toBe(404);

    const debug = await call('GET', '/debug');
    expect(debug.status).toBe(200);
    expect(debug.headers.get('content-type')).toMatch(/^text\/plain/);
    expect(await debug.text()).toBe('null\n');
  });
});

describe('HTTPServer failures', () => {
  it('answers 500 when the service fails unexpectedly', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const failing: ISetService = {
      search: () => {
        throw new Error('disk on fire');
      },
      insert: () => ({ key: '', inserted: false }),
      remove: () => ({ key: '', removed: false }),
      verify: () => true,
      stats: () => ({ size: 0, maxSize: 0, alpha: 0.7, height: 0, rebuildCount: 0, nodeCapacity: 0 }),
      debugDump: () => '',
      clear: () => undefined,
    };
    const server = new HTTPServer(failing, 0);
    await server.start();

    try {
      const res = await fetch(`http://127.0.0.1:${server.listeningPort}/keys/1`);
      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({ error: 'Internal server error' });
      expect(error).toHaveBeenCalledTimes(1);
    } finally {
      await server.stop();
      vi.restoreAllMocks();
    }
  });
});
