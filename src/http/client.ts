import type { Response } from 'undici';
import type { Result } from '../types';
import { failure, success } from '../utils';
import { classifyFetchError } from './errors';
import { fetchWithTimeout, type FetchOptions } from './fetch';

/**
 * Single failure boundary for outbound calls: never throws
 */
export async function sendRequest(url: string, options: FetchOptions = {}): Promise<Result<Response>> {
  try {
    return success(await fetchWithTimeout(url, options));
  } catch (error) {
    const classified = classifyFetchError(error);
    return failure(classified.kind, classified.message);
  }
}

/** Read a body without letting a broken stream escape */
export async function readText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch {
    return '';
  }
}

export async function discardBody(response: Response): Promise<void> {
  try {
    await response.body?.cancel();
  } catch {
    // Ignore cancellation errors
  }
}

export function contentTypeOf(response: Response): string {
  return (response.headers.get('content-type') ?? '').toLowerCase();
}
