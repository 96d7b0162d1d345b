import { once } from 'events';
import { Server } from 'http';
import { InferenceRouter } from '../load-balancer/inference-router';
import { FakeBackend, routerConfig } from '../test-utils/fakes';
import { RouterConfig } from '../types';
import { AppOptions, createApp } from './app';

const A = 'http://a:11434';
const B = 'http://b:11434';
const ADMIN_KEY = 'test-secret-key-123456';

describe('HTTP API', () => {
  const servers: Server[] = [];

  afterEach(async () => {
    await Promise.all(servers.splice(0).map(server => new Promise(resolve => server.close(resolve))));
  });

  async function start(options: AppOptions = {}, overrides: Partial<RouterConfig> = {}) {
    const backend = new FakeBackend();
    const router = new InferenceRouter(routerConfig({ hosts: [A, B], ...overrides }), { backend });
    const server = createApp(router, options).listen(0);
    servers.push(server);
    await once(server, 'listening');

    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('Server did not bind a TCP port');
    }
    const baseUrl = `http://127.0.0.1:${address.port}`;
    const request = (path: string, init: RequestInit = {}) => fetch(`${baseUrl}${path}`, init);
    const sendJson = (method: string, path: string, body: unknown, headers: Record<string, string> = {}) =>
      request(path, {
        method,
        headers: { 'Content-Type': 'application/json', ...headers },
        body: JSON.stringify(body)
      });

    return { backend, router, request, sendJson };
  }

  it('should answer the liveness check with a request id', async () => {
    const { request } = await start();

    const res = await request('/health', { headers: { 'X-Request-ID': 'req-1' } });

    expect(res.status).toBe(200);
    expect(res.headers.get('x-request-id')).toBe('req-1');
    expect(await res.json()).toEqual({ status: 'ok' });
  });

  it('should report host status after a refresh', async () => {
    const { backend, request } = await start();
    backend.failProbe(B);

    const res = await request('/hosts');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      strategy: 'round_robin',
      total: 2,
      healthy: 1,
      hosts: [
        { address: A, status: 'healthy', consecutiveFailures: 0 },
        { address: B, status: 'unhealthy', consecutiveFailures: 1 }
      ]
    });
  });

  describe('host management', () => {
    it('should require the admin key when one is configured', async () => {
      const { sendJson } = await start({ adminApiKey: ADMIN_KEY });

      const res = await sendJson('POST', '/hosts', { address: 'http://x:11434' });

      expect(res.status).toBe(401);
      expect(await res.json()).toMatchObject({ error: 'Unauthorized' });
    });

    it('should add a host once', async () => {
      const { sendJson } = await start({ adminApiKey: ADMIN_KEY });
      const auth = { Authorization: `Bearer ${ADMIN_KEY}` };

      const first = await sendJson('POST', '/hosts', { address: ' http://x:11434 ' }, auth);
      const second = await sendJson('POST', '/hosts', { address: 'http://x:11434' }, { 'X-API-Key': ADMIN_KEY });

      expect(first.status).toBe(201);
      expect(await first.json()).toEqual({ message: 'Host added', address: 'http://x:11434', added: true });
      expect(second.status).toBe(200);
      expect(await second.json()).toEqual({
        message: 'Host already registered',
        address: 'http://x:11434',
        added: false
      });
    });

    it('should reject an invalid address', async () => {
      const { sendJson } = await start();

      const res = await sendJson('POST', '/hosts', { address: 'not a url' });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: 'Validation Error', message: 'Invalid host URL format' });
    });

    it('should remove a registered host and 404 on an unknown one', async () => {
      const { request } = await start();

      const missing = await request(`/hosts?address=${encodeURIComponent('http://nope:11434')}`, { method: 'DELETE' });
      const removed = await request(`/hosts?address=${encodeURIComponent(A)}`, { method: 'DELETE' });

      expect(missing.status).toBe(404);
      expect(await missing.json()).toEqual({
        error: 'Not Found',
        message: 'Host http://nope:11434 is not registered'
      });
      expect(removed.status).toBe(200);
      expect(await removed.json()).toEqual({ message: 'Host removed', address: A, removed: 1 });
    });
  });

  describe('POST /generate', () => {
    it('should return the backend response', async () => {
      const { backend, sendJson } = await start();

      const res = await sendJson('POST', '/generate', { prompt: 'hello', params: { temperature: 0 } });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ model: 'gemma3:4b', response: `reply from ${A}`, done: true });
      expect(backend.generateCalls[0].params).toEqual({ temperature: 0 });
    });

    it('should reject an empty prompt', async () => {
      const { sendJson } = await start();

      const res = await sendJson('POST', '/generate', { prompt: '' });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: 'Validation Error', message: 'Prompt is required' });
    });

    it('should answer 503 when no host is healthy', async () => {
      const { backend, sendJson } = await start();
      backend.failProbe(A, B);

      const res = await sendJson('POST', '/generate', { prompt: 'hello' }, { 'X-Request-ID': 'req-2' });

      expect(res.status).toBe(503);
      expect(await res.json()).toEqual({
        error: 'Service Unavailable',
        message: 'No healthy hosts available (2 configured)',
        code: 'NO_HEALTHY_HOST',
        totalHosts: 2,
        requestId: 'req-2'
      });
    });

    it('should answer 502 with the failing host when the call fails', async () => {
      const { backend, sendJson } = await start({}, { maxRetries: 1 });
      backend.failGenerate(A, B);

      const res = await sendJson('POST', '/generate', { prompt: 'hello' });

      expect(res.status).toBe(502);
      expect(await res.json()).toMatchObject({
        error: 'Bad Gateway',
        code: 'BACKEND_CALL_FAILED',
        host: A,
        attempt: 1,
        message: `Backend call to ${A} failed on attempt 1: connect ECONNREFUSED ${A}`
      });
    });
  });

  it('should cache the model list', async () => {
    const { backend, request } = await start();

    const first = await request('/models');
    const second = await request('/models');

    expect(await first.json()).toEqual({ models: [{ name: 'gemma3:4b' }] });
    expect(await second.json()).toEqual({ models: [{ name: 'gemma3:4b' }] });
    // two refresh probes plus one listing
    expect(backend.probeCalls).toHaveLength(3);
  });

  it('should expose prometheus metrics', async () => {
    const { request } = await start();

    const res = await request('/metrics');

    expect(res.status).toBe(200);
    expect(await res.text()).toContain('# TYPE backend_requests_total counter');
  });

  it('should answer unknown routes with 404', async () => {
    const { request } = await start();

    const res = await request('/nope');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not Found', message: 'No route for GET /nope' });
  });
});
