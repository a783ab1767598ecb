import { Response } from 'undici';
import type { ApiState } from '../src/types';

function coded(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

/** Shape of the error undici's fetch throws when the socket cannot connect */
export function connectionRefused(): TypeError {
  return new TypeError('fetch failed', { cause: coded('connect ECONNREFUSED 127.0.0.1:443', 'ECONNREFUSED') });
}

export function certificateError(): TypeError {
  return new TypeError('fetch failed', { cause: coded('self-signed certificate', 'DEPTH_ZERO_SELF_SIGNED_CERT') });
}

/** Same name and message as the error `AbortSignal.timeout` aborts with */
export function timeoutError(): Error {
  return Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers },
  });
}

export function textResponse(body: string, status = 200, contentType = 'text/plain'): Response {
  return new Response(body, { status, headers: { 'content-type': contentType } });
}

export function apiState(overrides: Partial<ApiState> = {}): ApiState {
  return {
    url: null,
    type: '',
    detected: false,
    endpoint: '',
    lastDetected: null,
    detectionAttempts: 0,
    nextCheck: null,
    ...overrides,
  };
}
