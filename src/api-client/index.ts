import { createLogger } from '../log';
import type { CredentialVault } from '../store/secrets';
import type { TargetStore } from '../store/targets';
import type { Result } from '../types';
import { failure, success } from '../utils';
import { ApiClient, type ApiResponse, type AuthMethod, type RequestOptions } from './client';

export { ApiClient } from './client';
export type { ApiClientOptions, ApiResponse, AuthMethod, RequestOptions } from './client';

const log = createLogger('ApiClients');

/**
 * One ApiClient per target, so a discovered login scheme is reused across calls
 */
export class ApiClients {
  private readonly clients = new Map<string, ApiClient>();

  constructor(
    private readonly store: TargetStore,
    private readonly vault: CredentialVault,
  ) {}

  private clientFor(name: string): Result<ApiClient> {
    const cached = this.clients.get(name);
    if (cached) return success(cached);

    const target = this.store.get(name);
    if (!target) {
      return failure('unexpected', `Target "${name}" not found`);
    }
    if (!this.vault.hasAnyCredentials(name)) {
      return failure('authentication', 'API credentials not configured');
    }

    const { username, password, apiKey } = this.vault.get(name);
    const client = new ApiClient({
      baseUrl: target.api.url ?? target.url,
      // An explicit username/password pair wins over an API key
      username,
      password,
      apiKey: username && password ? undefined : apiKey,
    });
    this.clients.set(name, client);
    return success(client);
  }

  /** Drop the cached client after credentials or URLs change */
  invalidate(name: string): void {
    if (this.clients.delete(name)) {
      log.debug('Dropped cached client', { name });
    }
  }

  async authenticate(name: string): Promise<Result<AuthMethod>> {
    const client = this.clientFor(name);
    if (!client.ok) return client;

    if (!(await client.value.authenticate()) || !client.value.authMethod) {
      return failure('authentication', 'No working authentication method found');
    }
    return success(client.value.authMethod);
  }

  async request(name: string, method: string, path: string, options?: RequestOptions): Promise<Result<ApiResponse>> {
    const client = this.clientFor(name);
    if (!client.ok) return client;
    return client.value.request(method, path, options);
  }
}
