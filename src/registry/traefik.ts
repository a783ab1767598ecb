import { z } from 'zod';
import { readText, sendRequest } from '../http/client';
import { createLogger } from '../log';
import type { Result } from '../types';
import { DISCOVERY_TIMEOUT, failure, joinUrl, PROBE_TIMEOUT, success } from '../utils';

const log = createLogger('Traefik');

/** Default value shipped in example configs; treated as "not configured" */
export const PLACEHOLDER_API_URL = 'http://traefik:8080/api';

export interface DiscoveredTarget {
  name: string;
  url: string;
  routerName: string;
  tags: string[];
}

/**
 * A registry the sync loop can pull targets from
 */
export interface TargetSource {
  readonly name: string;
  isConfigured(): boolean;
  isAvailable(): Promise<boolean>;
  discover(): Promise<Result<DiscoveredTarget[]>>;
}

export interface TraefikConfig {
  apiUrl?: string | undefined;
  username?: string | undefined;
  password?: string | undefined;
}

const RouterSchema = z.object({
  name: z.string().default(''),
  rule: z.string().default(''),
  service: z.string().default(''),
  provider: z.string().default(''),
  tls: z.unknown().optional(),
});

type Router = z.infer<typeof RouterSchema>;

export function isTraefikConfigured(apiUrl: string | undefined): boolean {
  return Boolean(apiUrl) && apiUrl !== PLACEHOLDER_API_URL;
}

/**
 * First Host(...) of a router rule, plus its PathPrefix(...) when present
 */
export function urlFromRule(rule: string, hasTls: boolean): string | null {
  const host = /Host\([`"]([^`"]+)[`"]\)/.exec(rule)?.[1];
  if (!host) return null;
  const path = /PathPrefix\([`"]([^`"]+)[`"]\)/.exec(rule)?.[1] ?? '';
  return `${hasTls ? 'https' : 'http'}://${host}${path}`;
}

/** `my-app_web@docker` → `My App Web` */
export function cleanRouterName(name: string): string {
  const [base = ''] = name.split('@');
  return base
    .replace(/[-_]/g, ' ')
    .split(/\s+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

function routerTags(router: Router): string[] {
  const tags: string[] = [];
  if (router.provider) tags.push(router.provider);
  if (router.name.toLowerCase().includes('docker') && !tags.includes('docker')) tags.push('docker');
  return tags;
}

export class TraefikSource implements TargetSource {
  readonly name = 'traefik';

  constructor(private readonly config: TraefikConfig) {}

  isConfigured(): boolean {
    return isTraefikConfigured(this.config.apiUrl);
  }

  private headers(): Record<string, string> {
    const { username, password } = this.config;
    if (!username || !password) return {};
    return { authorization: `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}` };
  }

  private async getJson(path: string, timeout: number): Promise<Result<unknown>> {
    const apiUrl = this.config.apiUrl ?? '';
    const result = await sendRequest(joinUrl(apiUrl, path), { method: 'GET', headers: this.headers(), timeout });
    if (!result.ok) return result;

    const response = result.value;
    const text = await readText(response);
    if (response.status < 200 || response.status > 299) {
      return failure('http-status', `HTTP ${response.status}`, { status: response.status });
    }
    try {
      const data: unknown = JSON.parse(text);
      return success(data);
    } catch {
      return failure('malformed-response', `Invalid JSON from ${path}`);
    }
  }

  async isAvailable(): Promise<boolean> {
    if (!this.isConfigured()) {
      log.debug('Not configured, skipping availability check');
      return false;
    }
    const result = await this.getJson('/version', PROBE_TIMEOUT);
    if (!result.ok) {
      log.info('Traefik API is not available', { error: result.error.message });
      return false;
    }
    log.info('Traefik API is available');
    return true;
  }

  async discover(): Promise<Result<DiscoveredTarget[]>> {
    const result = await this.getJson('/http/routers', DISCOVERY_TIMEOUT);
    if (!result.ok) return result;

    const routers = z.array(z.unknown()).safeParse(result.value);
    if (!routers.success) {
      return failure('malformed-response', 'Router list is not an array');
    }

    const discovered: DiscoveredTarget[] = [];
    for (const raw of routers.data) {
      const parsed = RouterSchema.safeParse(raw);
      if (!parsed.success) {
        log.warn('Skipping malformed router', { error: parsed.error.issues[0]?.message });
        continue;
      }
      const router = parsed.data;
      if (router.name.includes('@internal') || router.service.includes('@internal')) continue;

      const url = urlFromRule(router.rule, router.tls !== undefined && router.tls !== null);
      if (!url) continue;

      discovered.push({
        name: cleanRouterName(router.name),
        url,
        routerName: router.name,
        tags: routerTags(router),
      });
    }

    log.info('Discovered routers', { count: discovered.length });
    return success(discovered);
  }
}
