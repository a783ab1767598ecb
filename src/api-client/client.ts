import type { Response } from 'undici';
import { contentTypeOf, discardBody, readText, sendRequest } from '../http/client';
import type { FetchOptions } from '../http/fetch';
import { createLogger } from '../log';
import type { Result } from '../types';
import { AUTH_TIMEOUT, failure, joinUrl, normalizeBaseUrl, REQUEST_TIMEOUT, success, truncate } from '../utils';
import { extractLoginEvidence } from './extractors';
import { authHint } from './hints';

const log = createLogger('ApiClient');

/** Login paths ordered by how often self-hosted services use them */
export const AUTH_ENDPOINTS = [
  '/api/v2/auth/login',
  '/api/auth',
  '/api/login',
  '/auth/login',
  '/login',
  '/api/v1/auth',
  '/api/v1/login',
  '/auth',
] as const;

export const AUTH_ENCODINGS = ['json', 'form', 'basic'] as const;

export type AuthEncoding = (typeof AUTH_ENCODINGS)[number];

export type AuthMethod =
  | { kind: 'api-key' }
  | { kind: 'bearer'; endpoint: string; encoding: AuthEncoding }
  | { kind: 'cookie-session'; endpoint: string; encoding: AuthEncoding };

export interface ApiClientOptions {
  baseUrl: string;
  username?: string | undefined;
  password?: string | undefined;
  apiKey?: string | undefined;
  /** Login path to use instead of the well-known list */
  authEndpoint?: string | undefined;
}

export interface RequestOptions {
  body?: unknown;
  query?: Record<string, string> | undefined;
}

export interface ApiResponse {
  status: number;
  data: unknown;
}

const ENCODING_NAMES: Record<AuthEncoding, string> = {
  json: 'JSON body',
  form: 'Form data (application/x-www-form-urlencoded)',
  basic: 'HTTP Basic authentication',
};

function basicAuthorization(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;
}

/** `name=value` pairs from Set-Cookie headers */
function parseSetCookies(response: Response): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];
  for (const header of response.headers.getSetCookie()) {
    const [pair = ''] = header.split(';');
    const separator = pair.indexOf('=');
    if (separator <= 0) continue;
    pairs.push([pair.slice(0, separator).trim(), pair.slice(separator + 1).trim()]);
  }
  return pairs;
}

function parseBody(text: string): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * Client for a service API whose authentication scheme is discovered at runtime.
 *
 * An API key is trusted as-is. Otherwise each login path is tried with a JSON body, a form body
 * and HTTP Basic until one yields a token or a session cookie; that pair is remembered and tried
 * first when the session has to be renewed.
 */
export class ApiClient {
  readonly baseUrl: string;
  private readonly username: string | undefined;
  private readonly password: string | undefined;
  private readonly apiKey: string | undefined;
  private readonly authEndpoint: string | undefined;

  private token: string | null = null;
  private readonly cookies = new Map<string, string>();
  private method: AuthMethod | null = null;

  constructor(options: ApiClientOptions) {
    this.baseUrl = normalizeBaseUrl(options.baseUrl);
    this.username = options.username;
    this.password = options.password;
    this.apiKey = options.apiKey;
    this.authEndpoint = options.authEndpoint;
    log.info('Initialized', {
      baseUrl: this.baseUrl,
      auth: this.apiKey ? 'api-key' : this.username ? 'credentials' : 'none',
    });
  }

  get authMethod(): AuthMethod | null {
    return this.method;
  }

  isAuthenticated(): boolean {
    return this.method !== null;
  }

  async authenticate(): Promise<boolean> {
    if (this.apiKey) {
      this.method = { kind: 'api-key' };
      log.info('Using API key for authentication');
      return true;
    }

    if (!this.username || !this.password) {
      log.error('No credentials provided for authentication');
      return false;
    }

    this.token = null;
    this.cookies.clear();

    for (const [endpoint, encoding] of this.loginCandidates()) {
      if (await this.tryLogin(endpoint, encoding, this.username, this.password)) {
        log.info('Authenticated', { endpoint, encoding: ENCODING_NAMES[encoding] });
        return true;
      }
    }

    this.method = null;
    log.error('All authentication attempts failed', { baseUrl: this.baseUrl });
    return false;
  }

  private loginCandidates(): Array<[string, AuthEncoding]> {
    const endpoints: readonly string[] = this.authEndpoint ? [this.authEndpoint] : AUTH_ENDPOINTS;
    const candidates: Array<[string, AuthEncoding]> = [];

    const cached = this.method;
    if (cached && cached.kind !== 'api-key') {
      candidates.push([cached.endpoint, cached.encoding]);
    }
    for (const endpoint of endpoints) {
      for (const encoding of AUTH_ENCODINGS) {
        if (cached && cached.kind !== 'api-key' && cached.endpoint === endpoint && cached.encoding === encoding) {
          continue;
        }
        candidates.push([endpoint, encoding]);
      }
    }
    return candidates;
  }

  private async tryLogin(
    endpoint: string,
    encoding: AuthEncoding,
    username: string,
    password: string,
  ): Promise<boolean> {
    const url = joinUrl(this.baseUrl, endpoint);
    const options: FetchOptions = { method: 'POST', timeout: AUTH_TIMEOUT, insecure: true };

    switch (encoding) {
      case 'json':
        options.headers = { 'content-type': 'application/json' };
        options.body = JSON.stringify({ username, password });
        break;
      case 'form':
        options.body = new URLSearchParams({ username, password });
        break;
      case 'basic':
        options.headers = { authorization: basicAuthorization(username, password) };
        break;
    }

    log.debug('Trying login', { url, encoding: ENCODING_NAMES[encoding] });
    const result = await sendRequest(url, options);
    if (!result.ok) {
      log.debug('Login attempt failed', { url, kind: result.error.kind, error: result.error.message });
      return false;
    }

    const response = result.value;
    if (response.status !== 200) {
      const hint = response.status === 404 || response.status === 405 ? null : await authHint(response);
      await discardBody(response);
      log.debug('Login rejected', { url, status: response.status, hint });
      return false;
    }

    const cookies = parseSetCookies(response);
    const evidence = extractLoginEvidence({
      contentType: contentTypeOf(response),
      body: await readText(response),
      cookies: cookies.map(([name]) => name),
    });

    switch (evidence.kind) {
      case 'token':
        this.token = evidence.token;
        for (const [name, value] of cookies) this.cookies.set(name, value);
        this.method = { kind: 'bearer', endpoint, encoding };
        return true;
      case 'cookie-session':
        for (const [name, value] of cookies) this.cookies.set(name, value);
        this.method = { kind: 'cookie-session', endpoint, encoding };
        return true;
      case 'inconclusive':
        log.debug('200 response but no token or cookies found', { url });
        return false;
    }
  }

  private authHeaders(): Record<string, string> {
    const headers: Record<string, string> = {};
    if (this.method?.kind === 'api-key' && this.apiKey) {
      headers['x-api-key'] = this.apiKey;
    }
    if (this.token) {
      headers['authorization'] = `Bearer ${this.token}`;
    }
    if (this.cookies.size > 0) {
      headers['cookie'] = [...this.cookies].map(([name, value]) => `${name}=${value}`).join('; ');
    }
    return headers;
  }

  private async send(method: string, url: string, body: unknown): Promise<Result<Response>> {
    const headers = this.authHeaders();
    const options: FetchOptions = { method, headers, timeout: REQUEST_TIMEOUT, insecure: true };

    if (typeof body === 'string') {
      options.body = body;
    } else if (body !== undefined && body !== null) {
      headers['content-type'] = 'application/json';
      options.body = JSON.stringify(body);
    }

    const result = await sendRequest(url, options);
    if (result.ok) {
      for (const [name, value] of parseSetCookies(result.value)) this.cookies.set(name, value);
    }
    return result;
  }

  /**
   * Authenticated call. A 401 triggers one re-authentication and one retry; a second 401 is final.
   */
  async request(method: string, path: string, options: RequestOptions = {}): Promise<Result<ApiResponse>> {
    if (!this.isAuthenticated()) {
      log.debug('Not authenticated, attempting authentication');
      if (!(await this.authenticate())) {
        return failure('authentication', 'Failed to authenticate before making request');
      }
    }

    const query = options.query && Object.keys(options.query).length > 0
      ? `?${new URLSearchParams(options.query).toString()}`
      : '';
    const url = `${joinUrl(this.baseUrl, path)}${query}`;
    log.info('Request', { method, url });

    let result = await this.send(method, url, options.body);
    if (!result.ok) {
      log.error('Request failed', { method, url, kind: result.error.kind, error: result.error.message });
      return result;
    }

    if (result.value.status === 401) {
      await discardBody(result.value);
      log.warn('Got 401, attempting re-authentication', { url });
      if (!(await this.authenticate())) {
        return failure('authentication', 'Re-authentication failed', { status: 401 });
      }

      result = await this.send(method, url, options.body);
      if (!result.ok) {
        log.error('Retry failed', { method, url, kind: result.error.kind, error: result.error.message });
        return result;
      }
      if (result.value.status === 401) {
        const body = truncate(await readText(result.value), 300);
        log.error('Still unauthorized after re-authentication', { url });
        return failure('authentication', 'Unauthorized after re-authentication', { status: 401, body });
      }
    }

    const response = result.value;
    const text = await readText(response);
    log.info('Response', { method, url, status: response.status });

    if (response.status < 200 || response.status > 299) {
      const body = truncate(text, 300);
      log.error('HTTP error', { url, status: response.status, body });
      return failure('http-status', `HTTP error ${response.status}: ${body}`, { status: response.status, body });
    }

    return success({ status: response.status, data: parseBody(text) });
  }

  get(path: string, options?: RequestOptions): Promise<Result<ApiResponse>> {
    return this.request('GET', path, options);
  }

  post(path: string, options?: RequestOptions): Promise<Result<ApiResponse>> {
    return this.request('POST', path, options);
  }

  put(path: string, options?: RequestOptions): Promise<Result<ApiResponse>> {
    return this.request('PUT', path, options);
  }

  delete(path: string, options?: RequestOptions): Promise<Result<ApiResponse>> {
    return this.request('DELETE', path, options);
  }
}
