import { contentTypeOf, readText } from '../http/client';
import type { Response } from 'undici';

function errorText(body: string): string {
  try {
    const data: unknown = JSON.parse(body);
    if (typeof data !== 'object' || data === null) return '';
    const error: unknown = Reflect.get(data, 'error');
    const message: unknown = Reflect.get(data, 'message');
    return String(error ?? message ?? '').toLowerCase();
  } catch {
    return '';
  }
}

/**
 * Guess which authentication encoding a rejected login expected
 */
export async function authHint(response: Response): Promise<string | null> {
  const hints: string[] = [];

  const wwwAuth = response.headers.get('www-authenticate') ?? '';
  if (wwwAuth) {
    const lower = wwwAuth.toLowerCase();
    if (lower.includes('bearer')) return 'Expected Bearer token authentication';
    if (lower.includes('basic')) return 'Expected HTTP Basic authentication';
    hints.push(`WWW-Authenticate header suggests: ${wwwAuth}`);
  }

  if (contentTypeOf(response).includes('application/json')) {
    const message = errorText(await readText(response));
    if (message.includes('form') || message.includes('application/x-www-form-urlencoded')) {
      hints.push('Response suggests form data (application/x-www-form-urlencoded)');
    } else if (message.includes('json')) {
      hints.push('Response suggests JSON body');
    } else if (message.includes('bearer') || message.includes('token')) {
      hints.push('Response suggests Bearer token');
    } else if (message.includes('api key') || message.includes('api_key')) {
      hints.push('Response suggests API key authentication');
    }
  }

  return hints.length > 0 ? hints.join('; ') : null;
}
