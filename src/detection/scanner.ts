import { contentTypeOf, discardBody, sendRequest } from '../http/client';
import { createLogger } from '../log';
import type { ScanResult } from '../types';
import { joinUrl, SCAN_TIMEOUT } from '../utils';

const log = createLogger('Scanner');

/** Probe order: generic API roots first, then well-known service paths */
export const CANDIDATE_ENDPOINTS = [
  '/api',
  '/api/v1',
  '/api/v2',
  '/api/v3',
  '/api/v1/system/status',
  '/api/v2/app/version',
  '/api/v2/auth/login',
  '/api/v3/system/status',
  '/api/system/status',
  '/api/version',
  '/api/status',
  '/api/health',
  '/health',
  '/healthz',
  '/System/Info/Public',
  '/identity',
  '/docs',
  '/swagger',
  '/api-docs',
] as const;

const DOC_ENDPOINTS = new Set<string>(['/docs', '/swagger', '/api-docs']);

const INDICATOR_CODES = new Set([200, 401, 403]);

export function isApiIndicator(endpoint: string, status: number, contentType: string): boolean {
  if (!INDICATOR_CODES.has(status)) return false;
  // Auth-gated APIs often answer 401 with an HTML or empty body
  if (contentType.includes('application/json') || status === 401) return true;
  return DOC_ENDPOINTS.has(endpoint) && status === 200 && contentType.includes('text/html');
}

/**
 * Walk the candidate list against a base URL; the first path that looks like an API wins
 */
export async function scanEndpoints(
  baseUrl: string,
  candidates: readonly string[] = CANDIDATE_ENDPOINTS,
): Promise<ScanResult> {
  log.info('Probing API endpoints', { baseUrl });

  for (const endpoint of candidates) {
    const url = joinUrl(baseUrl, endpoint);
    const result = await sendRequest(url, {
      method: 'GET',
      redirect: 'manual',
      timeout: SCAN_TIMEOUT,
      insecure: true,
    });

    if (!result.ok) {
      log.debug('Candidate unreachable', { url, kind: result.error.kind, error: result.error.message });
      continue;
    }

    const response = result.value;
    const contentType = contentTypeOf(response);
    await discardBody(response);
    log.debug('Candidate response', { url, status: response.status, contentType });

    if (isApiIndicator(endpoint, response.status, contentType)) {
      log.info('API endpoint found', { url, status: response.status });
      return { found: true, endpoint };
    }
  }

  log.info('No API endpoints found', { baseUrl });
  return { found: false, endpoint: null };
}
