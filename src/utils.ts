import type { Failure, FailureKind, Result } from './types';

export const PROBE_TIMEOUT = 5000;
export const SCAN_TIMEOUT = 3000;
export const AUTH_TIMEOUT = 5000;
export const REQUEST_TIMEOUT = 10000;
export const DISCOVERY_TIMEOUT = 10000;

export const USER_AGENT = 'ServiceRadar/1.0';

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function success<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function failure<T = never>(
  kind: FailureKind,
  message: string,
  extra: { status?: number; body?: string } = {},
): Result<T> {
  const error: Failure = { kind, message };
  if (extra.status !== undefined) error.status = extra.status;
  if (extra.body !== undefined) error.body = extra.body;
  return { ok: false, error };
}

export function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) : text;
}

/**
 * Adds https:// to a bare host and strips trailing slashes
 */
export function normalizeBaseUrl(url: string): string {
  const trimmed = url.trim();
  if (!trimmed) {
    throw new Error('base URL cannot be empty');
  }
  const withProtocol = /^https?:\/\//.test(trimmed) ? trimmed : `https://${trimmed}`;
  return withProtocol.replace(/\/+$/, '');
}

export function joinUrl(base: string, path: string): string {
  const normalizedPath = path.startsWith('/') ? path : `/${path}`;
  return `${base.replace(/\/+$/, '')}${normalizedPath}`;
}

export function inferApiType(targetName: string): string {
  const compact = targetName.toLowerCase().replace(/ /g, '');
  return compact.length > 2 ? compact : 'custom';
}
