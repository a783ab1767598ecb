import { discardBody, sendRequest } from '../http/client';
import { createLogger } from '../log';
import type { Failure, ProbeOutcome, Result } from '../types';
import { PROBE_TIMEOUT, USER_AGENT } from '../utils';
import { classifyStatus } from './liveness';

const log = createLogger('HTTP');

interface Exchange {
  status: number;
  latency: number;
}

async function exchange(url: string, insecure: boolean): Promise<Result<Exchange>> {
  const startTime = performance.now();
  const result = await sendRequest(url, {
    method: 'GET',
    redirect: 'follow',
    headers: { 'user-agent': USER_AGENT },
    timeout: PROBE_TIMEOUT,
    insecure,
  });

  if (!result.ok) return result;

  const latency = Math.round(performance.now() - startTime);
  await discardBody(result.value);
  return { ok: true, value: { status: result.value.status, latency } };
}

function down(url: string, error: Failure): ProbeOutcome {
  return { status: 'down', responseTime: null, url, error };
}

function verdict(url: string, { status, latency }: Exchange): ProbeOutcome {
  const outcome: ProbeOutcome = { status: classifyStatus(status), responseTime: latency, url };
  if (outcome.status === 'down') {
    outcome.error = { kind: 'http-status', message: `HTTP ${status}`, status };
  }
  return outcome;
}

/**
 * Probe one URL for liveness.
 *
 * A certificate failure is retried once without verification. A connection failure on an
 * https URL is retried over plain http; when that answers up, the returned `url` is the
 * http form and the caller persists it. Timeouts are final.
 */
export async function probeUrl(name: string, url: string): Promise<ProbeOutcome> {
  let result = await exchange(url, false);

  if (result.ok) {
    const outcome = verdict(url, result.value);
    log.info('Response', { name, status: outcome.status, code: result.value.status, latency: result.value.latency });
    return outcome;
  }

  if (result.error.kind === 'timeout') {
    log.warn('Timeout', { name, url, timeout: PROBE_TIMEOUT });
    return down(url, result.error);
  }

  if (result.error.kind === 'tls') {
    log.warn('Certificate error, retrying without verification', { name, error: result.error.message });
    result = await exchange(url, true);
    if (result.ok) {
      const outcome = verdict(url, result.value);
      log.info('Response without certificate verification', { name, status: outcome.status });
      return outcome;
    }
  }

  if (result.error.kind === 'connection' && url.startsWith('https://')) {
    const httpUrl = url.replace('https://', 'http://');
    log.info('Trying plain http fallback', { name, url: httpUrl });

    const fallback = await exchange(httpUrl, true);
    if (!fallback.ok) {
      log.warn('Plain http fallback failed', { name, error: fallback.error.message });
      return down(url, fallback.error);
    }

    const outcome = verdict(httpUrl, fallback.value);
    if (outcome.status === 'up') {
      log.info('Up via plain http fallback', { name, latency: fallback.value.latency });
      return outcome;
    }

    log.warn('Down on both https and http', { name, code: fallback.value.status });
    return down(url, { kind: 'http-status', message: `HTTP ${fallback.value.status}`, status: fallback.value.status });
  }

  log.warn('Error', { name, kind: result.error.kind, error: result.error.message });
  return down(url, result.error);
}
