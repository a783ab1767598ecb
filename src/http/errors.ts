import type { Failure, FailureKind } from '../types';
import { getErrorMessage } from '../utils';

const TIMEOUT_CODES = new Set([
  'ETIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

const TLS_CODES = new Set([
  'CERT_HAS_EXPIRED',
  'CERT_NOT_YET_VALID',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'UNABLE_TO_GET_ISSUER_CERT',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'EPROTO',
]);

const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CLOSED',
]);

function readString(value: unknown, key: string): string | undefined {
  if (typeof value !== 'object' || value === null || !(key in value)) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'string' ? field : undefined;
}

/** Error codes along the `cause` chain, outermost first */
function collectCodes(error: unknown): string[] {
  const codes: string[] = [];
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current; depth++) {
    const code = readString(current, 'code');
    if (code) codes.push(code);
    current = current instanceof Error ? current.cause : undefined;
  }
  return codes;
}

function deepestMessage(error: unknown): string {
  let message = getErrorMessage(error);
  let current: unknown = error instanceof Error ? error.cause : undefined;
  while (current instanceof Error) {
    message = current.message;
    current = current.cause;
  }
  return message;
}

function kindOf(error: unknown): FailureKind {
  const name = readString(error, 'name');
  if (name === 'TimeoutError' || name === 'AbortError') return 'timeout';

  const codes = collectCodes(error);
  if (codes.some((code) => TIMEOUT_CODES.has(code))) return 'timeout';
  if (codes.some((code) => TLS_CODES.has(code) || code.startsWith('ERR_TLS_') || code.startsWith('ERR_SSL_'))) {
    return 'tls';
  }
  if (codes.some((code) => CONNECTION_CODES.has(code))) return 'connection';

  // undici wraps every network-level failure in TypeError('fetch failed')
  if (error instanceof TypeError && error.message === 'fetch failed') return 'connection';
  return 'unexpected';
}

/**
 * Map an exception thrown by fetch onto the failure taxonomy
 */
export function classifyFetchError(error: unknown): Failure {
  return { kind: kindOf(error), message: deepestMessage(error) };
}
