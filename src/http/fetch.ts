import { Agent, fetch, type RequestInit, type Response } from 'undici';
import { REQUEST_TIMEOUT } from '../utils';

export interface FetchOptions extends Omit<RequestInit, 'signal' | 'dispatcher'> {
  timeout?: number;
  /** Skip certificate verification (self-signed targets) */
  insecure?: boolean;
}

let insecureAgent: Agent | null = null;

function getInsecureAgent(): Agent {
  insecureAgent ??= new Agent({ connect: { rejectUnauthorized: false } });
  return insecureAgent;
}

export async function fetchWithTimeout(url: string, options: FetchOptions = {}): Promise<Response> {
  const { timeout = REQUEST_TIMEOUT, insecure = false, ...rest } = options;
  const requestInit: RequestInit = { ...rest, signal: AbortSignal.timeout(timeout) };

  if (insecure) {
    requestInit.dispatcher = getInsecureAgent();
  }

  return fetch(url, requestInit);
}
