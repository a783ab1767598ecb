import { describe, it, expect, beforeEach, vi } from 'vitest';
import { jsonResponse } from '../helpers';

const { fetchWithTimeoutMock } = vi.hoisted(() => ({ fetchWithTimeoutMock: vi.fn() }));

vi.mock('../../src/http/fetch', () => ({
  fetchWithTimeout: fetchWithTimeoutMock,
}));

import { ApiClients } from '../../src/api-client';
import { CredentialVault, MemorySecretStore } from '../../src/store/secrets';
import { TargetStore } from '../../src/store/targets';

function setup() {
  const store = new TargetStore();
  const vault = new CredentialVault(new MemorySecretStore());
  return { store, vault, clients: new ApiClients(store, vault) };
}

describe('ApiClients', () => {
  beforeEach(() => {
    fetchWithTimeoutMock.mockReset();
  });

  it('fails for an unknown target', async () => {
    const { clients } = setup();

    expect(await clients.authenticate('ghost')).toEqual({
      ok: false,
      error: { kind: 'unexpected', message: 'Target "ghost" not found' },
    });
  });

  it('fails when no credentials are stored', async () => {
    const { store, clients } = setup();
    store.create({ name: 'web', url: 'https://web.local' });

    expect(await clients.request('web', 'GET', '/api')).toEqual({
      ok: false,
      error: { kind: 'authentication', message: 'API credentials not configured' },
    });
  });

  it('authenticates with an API key', async () => {
    const { store, vault, clients } = setup();
    store.create({ name: 'grafana', url: 'https://grafana.local' });
    vault.set('grafana', { apiKey: 'test-api-key' });

    expect(await clients.authenticate('grafana')).toEqual({ ok: true, value: { kind: 'api-key' } });
    expect(fetchWithTimeoutMock).not.toHaveBeenCalled();
  });

  it('prefers a username and password over an API key', async () => {
    const { store, vault, clients } = setup();
    store.create({ name: 'qbit', url: 'https://qbit.local' });
    vault.set('qbit', { username: 'admin', password: 'test-secret', apiKey: 'test-api-key' });
    fetchWithTimeoutMock.mockResolvedValueOnce(jsonResponse({ token: 'test-token' }));

    const result = await clients.authenticate('qbit');

    expect(result).toEqual({ ok: true, value: { kind: 'bearer', endpoint: '/api/v2/auth/login', encoding: 'json' } });
    expect(fetchWithTimeoutMock).toHaveBeenCalledTimes(1);
  });

  it('sends requests to the API URL when one is set', async () => {
    const { store, vault, clients } = setup();
    store.create({ name: 'media', url: 'https://media.local', apiUrl: 'https://api.media.local' });
    vault.set('media', { apiKey: 'test-api-key' });
    fetchWithTimeoutMock.mockResolvedValueOnce(jsonResponse({ items: [] }));

    const result = await clients.request('media', 'GET', '/Items');

    expect(result).toEqual({ ok: true, value: { status: 200, data: { items: [] } } });
    expect(fetchWithTimeoutMock.mock.calls[0]?.[0]).toBe('https://api.media.local/Items');
  });

  it('rebuilds the client after invalidation', async () => {
    const { store, vault, clients } = setup();
    store.create({ name: 'grafana', url: 'https://grafana.local' });
    vault.set('grafana', { apiKey: 'test-api-key' });
    fetchWithTimeoutMock.mockImplementation(async () => jsonResponse({}));

    await clients.request('grafana', 'GET', '/api/health');
    vault.set('grafana', { apiKey: 'rotated-key' });
    await clients.request('grafana', 'GET', '/api/health');
    clients.invalidate('grafana');
    await clients.request('grafana', 'GET', '/api/health');

    const keys = fetchWithTimeoutMock.mock.calls.map((call) => call[1].headers['x-api-key']);
    expect(keys).toEqual(['test-api-key', 'test-api-key', 'rotated-key']);
  });
});
