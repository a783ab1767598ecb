import { describe, it, expect, beforeEach, vi } from 'vitest';
import { jsonResponse, textResponse } from './helpers';

const { fetchWithTimeoutMock } = vi.hoisted(() => ({ fetchWithTimeoutMock: vi.fn() }));

vi.mock('../src/http/fetch', () => ({
  fetchWithTimeout: fetchWithTimeoutMock,
}));

import { loadConfig } from '../src/config';
import { createRuntime } from '../src/runtime';

const AUTH = { Authorization: 'Bearer test-token' };

function setup() {
  return createRuntime(loadConfig({ SERVICE_RADAR_TOKEN: 'test-token' }));
}

interface SendInit {
  method: string;
  headers: Record<string, string>;
  body?: string;
}

function send(method: string, body?: unknown, headers: Record<string, string> = AUTH): SendInit {
  const init: SendInit = { method, headers: { 'content-type': 'application/json', ...headers } };
  if (body !== undefined) init.body = JSON.stringify(body);
  return init;
}

describe('status API', () => {
  beforeEach(() => {
    fetchWithTimeoutMock.mockReset();
  });

  describe('open routes', () => {
    it('answers the health check', async () => {
      const { app } = setup();

      const res = await app.request('/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: 'ok', timestamp: expect.any(Number) });
    });

    it('allows cross-origin reads', async () => {
      const { app } = setup();

      const res = await app.request('/health', { headers: { Origin: 'http://dashboard.home.test' } });

      expect(res.headers.get('access-control-allow-origin')).toBe('*');
    });

    it('describes itself', async () => {
      const { app } = setup();

      const res = await app.request('/');

      expect(await res.json()).toMatchObject({ name: 'service-radar', version: '1.0.0' });
    });

    it('lists targets without a token', async () => {
      const { app, store } = setup();
      store.create({ name: 'web', url: 'https://web.local' });

      const res = await app.request('/targets');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ total: 1, up: 0, down: 0, api: 0 });
    });
  });

  describe('authorization', () => {
    it('rejects mutating requests without the bearer token', async () => {
      const { app, store } = setup();

      const res = await app.request('/targets', send('POST', { name: 'web', url: 'https://web.local' }, {}));

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ error: 'Unauthorized' });
      expect(store.has('web')).toBe(false);
    });

    it('rejects a wrong token', async () => {
      const { app } = setup();

      const res = await app.request('/refresh', send('POST', undefined, { Authorization: 'Bearer wrong' }));

      expect(res.status).toBe(401);
    });

    it('leaves every route open when no token is configured', async () => {
      const { app } = createRuntime(loadConfig({}));

      const res = await app.request('/targets', send('POST', { name: 'web', url: 'https://web.local' }, {}));

      expect(res.status).toBe(201);
    });
  });

  describe('target management', () => {
    it('creates a target and never echoes its secrets', async () => {
      const { app, vault } = setup();

      const res = await app.request(
        '/targets',
        send('POST', {
          name: 'qbit',
          url: 'https://qbit.local',
          tags: ['media'],
          username: 'admin',
          password: 'test-secret',
          apiUrl: 'qbit.local/',
        }),
      );

      expect(res.status).toBe(201);
      const body: unknown = await res.json();
      expect(body).toEqual({
        name: 'qbit',
        url: 'https://qbit.local',
        provider: 'manual',
        routerName: null,
        description: '',
        tags: ['media'],
        status: 'unknown',
        responseTime: null,
        lastChecked: null,
        statusChangedAt: null,
        api: {
          url: 'https://qbit.local',
          type: '',
          detected: false,
          endpoint: '',
          lastDetected: null,
          detectionAttempts: 0,
          nextCheck: null,
        },
        hasCredentials: true,
      });
      expect(vault.get('qbit')).toEqual({ username: 'admin', password: 'test-secret' });
    });

    it('validates the request body', async () => {
      const { app } = setup();

      const badUrl = await app.request('/targets', send('POST', { name: 'web', url: 'not a url' }));
      const noName = await app.request('/targets', send('POST', { url: 'https://web.local' }));
      const badJson = await app.request('/targets', { method: 'POST', headers: AUTH, body: '{' });

      expect(badUrl.status).toBe(400);
      expect(await badUrl.json()).toEqual({ error: 'url: url must be a valid URL' });
      expect(await noName.json()).toEqual({ error: 'name: Required' });
      expect(await badJson.json()).toEqual({ error: 'Invalid JSON body' });
    });

    it('rejects a duplicate name', async () => {
      const { app } = setup();
      await app.request('/targets', send('POST', { name: 'web', url: 'https://web.local' }));

      const res = await app.request('/targets', send('POST', { name: 'web', url: 'https://other.local' }));

      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({ error: 'Target "web" already exists' });
    });

    it('answers 404 for unknown targets', async () => {
      const { app } = setup();

      const get = await app.request('/targets/ghost');
      const remove = await app.request('/targets/ghost', send('DELETE'));
      const check = await app.request('/targets/ghost/check', send('POST'));

      expect(get.status).toBe(404);
      expect(await get.json()).toEqual({ error: 'Target "ghost" not found' });
      expect(remove.status).toBe(404);
      expect(check.status).toBe(404);
    });

    it('updates a target', async () => {
      const { app, store } = setup();
      store.create({ name: 'web', url: 'https://web.local', tags: ['old'] });

      const res = await app.request('/targets/web', send('PATCH', { description: 'Front page', url: 'https://www.local' }));

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ description: 'Front page', url: 'https://www.local', tags: ['old'] });
    });

    it('deletes a target with its credentials', async () => {
      const { app, store, vault } = setup();
      store.create({ name: 'web', url: 'https://web.local' });
      vault.set('web', { apiKey: 'test-api-key' });

      const res = await app.request('/targets/web', send('DELETE'));

      expect(await res.json()).toEqual({ success: true, name: 'web' });
      expect(store.has('web')).toBe(false);
      expect(vault.hasAnyCredentials('web')).toBe(false);
    });

    it('stores credentials and API settings', async () => {
      const { app, store, vault } = setup();
      store.create({ name: 'media', url: 'https://media.local' });

      const res = await app.request(
        '/targets/media/credentials',
        send('PUT', { apiKey: 'test-api-key', apiType: 'jellyfin', apiUrl: 'https://api.media.local/' }),
      );

      expect(await res.json()).toEqual({ success: true, message: 'Credentials updated successfully' });
      expect(vault.get('media')).toEqual({ apiKey: 'test-api-key' });
      expect(store.get('media')?.api).toMatchObject({ type: 'jellyfin', url: 'https://api.media.local' });
    });
  });

  describe('probing and detection', () => {
    it('checks a target on demand', async () => {
      const { app } = setup();
      await app.request('/targets', send('POST', { name: 'web', url: 'https://web.local' }));
      fetchWithTimeoutMock.mockResolvedValueOnce(textResponse('ok'));

      const res = await app.request('/targets/web/check', send('POST'));

      expect(await res.json()).toEqual({
        name: 'web',
        status: 'up',
        responseTime: expect.any(Number),
        lastChecked: expect.any(String),
        url: 'https://web.local',
      });
    });

    it('shows the check history', async () => {
      const { app } = setup();
      await app.request('/targets', send('POST', { name: 'web', url: 'https://web.local' }));
      fetchWithTimeoutMock.mockResolvedValueOnce(textResponse('gone', 410));
      await app.request('/targets/web/check', send('POST'));

      const res = await app.request('/targets/web/history');

      expect(await res.json()).toEqual({
        name: 'web',
        checks: [{ status: 'down', responseTime: expect.any(Number), checkedAt: expect.any(String), error: 'HTTP 410' }],
      });
    });

    it('runs a forced detection', async () => {
      const { app, store } = setup();
      store.create({ name: 'sonarr', url: 'https://sonarr.local' });
      fetchWithTimeoutMock.mockResolvedValueOnce(jsonResponse({ version: '4' }));

      const res = await app.request('/targets/sonarr/detect?force=true', send('POST'));

      expect(await res.json()).toMatchObject({
        outcome: { kind: 'detected', via: 'scan' },
        target: { api: { detected: true, type: 'sonarr', endpoint: '/api', url: 'https://sonarr.local' } },
      });
      expect(fetchWithTimeoutMock.mock.calls[0]?.[0]).toBe('https://sonarr.local/api');
    });

    it('requires credentials before authenticating', async () => {
      const { app, store } = setup();
      store.create({ name: 'web', url: 'https://web.local' });

      const res = await app.request('/targets/web/authenticate', send('POST'));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'API credentials not configured' });
    });

    it('reports the discovered login method', async () => {
      const { app, store, vault } = setup();
      store.create({ name: 'qbit', url: 'https://qbit.local' });
      vault.set('qbit', { username: 'admin', password: 'test-secret' });
      fetchWithTimeoutMock.mockResolvedValueOnce(jsonResponse({ token: 'test-token' }));

      const res = await app.request('/targets/qbit/authenticate', send('POST'));

      expect(await res.json()).toEqual({
        success: true,
        method: { kind: 'bearer', endpoint: '/api/v2/auth/login', encoding: 'json' },
      });
    });

    it('answers 502 when no login works', async () => {
      const { app, store, vault } = setup();
      store.create({ name: 'qbit', url: 'https://qbit.local' });
      vault.set('qbit', { username: 'admin', password: 'test-secret' });
      fetchWithTimeoutMock.mockImplementation(async () => textResponse('missing', 404));

      const res = await app.request('/targets/qbit/authenticate', send('POST'));

      expect(res.status).toBe(502);
      expect(await res.json()).toEqual({ error: 'No working authentication method found', kind: 'authentication' });
    });

    it('runs a full refresh in manual mode', async () => {
      const { app, store } = createRuntime(loadConfig({ SERVICE_RADAR_TOKEN: 'test-token', DETECT_ON_TICK: 'false' }));
      store.create({ name: 'web', url: 'https://web.local' });
      fetchWithTimeoutMock.mockResolvedValueOnce(textResponse('ok'));

      const res = await app.request('/refresh', send('POST'));

      expect(await res.json()).toEqual({
        success: true,
        synced: 0,
        probed: 1,
        skipped: 0,
        detected: 0,
        failed: 0,
        discoveryConfigured: false,
        info: 'Using manual target management',
        timestamp: expect.any(String),
      });
      expect(store.get('web')?.status).toBe('up');
    });
  });
});
