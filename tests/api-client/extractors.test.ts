import { describe, it, expect } from 'vitest';
import { Response } from 'undici';
import { extractLoginEvidence, jsonToken, plainTextMarker, sessionCookies, type LoginReply } from '../../src/api-client/extractors';
import { authHint } from '../../src/api-client/hints';
import { jsonResponse } from '../helpers';

function reply(overrides: Partial<LoginReply>): LoginReply {
  return { contentType: 'application/json', body: '', cookies: [], ...overrides };
}

describe('login extractors', () => {
  it('finds a token under any known field', () => {
    expect(jsonToken(reply({ body: '{"jwt":"a"}' }))).toEqual({ kind: 'token', token: 'a' });
    expect(jsonToken(reply({ body: '{"access_token":"b"}' }))).toEqual({ kind: 'token', token: 'b' });
    expect(jsonToken(reply({ body: '{"auth_token":"c"}' }))).toEqual({ kind: 'token', token: 'c' });
  });

  it('prefers fields in their listed order', () => {
    expect(jsonToken(reply({ body: '{"token":"second","jwt":"first"}' }))).toEqual({ kind: 'token', token: 'first' });
  });

  it('ignores empty tokens, arrays and invalid JSON', () => {
    expect(jsonToken(reply({ body: '{"token":""}' })).kind).toBe('inconclusive');
    expect(jsonToken(reply({ body: '["token"]' })).kind).toBe('inconclusive');
    expect(jsonToken(reply({ body: 'not json' })).kind).toBe('inconclusive');
  });

  it('accepts a plain "Ok." body as a cookie session', () => {
    const evidence = plainTextMarker(reply({ contentType: 'text/plain; charset=UTF-8', body: ' Ok. ', cookies: ['SID'] }));
    expect(evidence).toEqual({ kind: 'cookie-session', cookies: ['SID'] });
  });

  it('only reads the plain marker from text replies', () => {
    expect(plainTextMarker(reply({ body: '"ok"' })).kind).toBe('inconclusive');
  });

  it('treats any session cookie as a login', () => {
    expect(sessionCookies(reply({ cookies: ['session'] }))).toEqual({ kind: 'cookie-session', cookies: ['session'] });
    expect(sessionCookies(reply({})).kind).toBe('inconclusive');
  });

  it('keeps the first conclusive answer', () => {
    const evidence = extractLoginEvidence(reply({ body: '{"token":"test-token"}', cookies: ['session'] }));
    expect(evidence).toEqual({ kind: 'token', token: 'test-token' });
  });

  it('runs a custom extractor list', () => {
    const evidence = extractLoginEvidence(reply({ body: '{"token":"test-token"}', cookies: ['session'] }), [sessionCookies]);
    expect(evidence.kind).toBe('cookie-session');
  });
});

describe('authHint', () => {
  it('reads the WWW-Authenticate scheme', async () => {
    const bearer = new Response('', { status: 401, headers: { 'www-authenticate': 'Bearer realm="api"' } });
    const basic = new Response('', { status: 401, headers: { 'www-authenticate': 'Basic realm="nas"' } });
    const digest = new Response('', { status: 401, headers: { 'www-authenticate': 'Digest realm="x"' } });

    expect(await authHint(bearer)).toBe('Expected Bearer token authentication');
    expect(await authHint(basic)).toBe('Expected HTTP Basic authentication');
    expect(await authHint(digest)).toBe('WWW-Authenticate header suggests: Digest realm="x"');
  });

  it('reads hints from a JSON error message', async () => {
    expect(await authHint(jsonResponse({ error: 'Expected form data' }, 400))).toBe(
      'Response suggests form data (application/x-www-form-urlencoded)',
    );
    expect(await authHint(jsonResponse({ message: 'Body must be JSON' }, 400))).toBe('Response suggests JSON body');
    expect(await authHint(jsonResponse({ message: 'Missing token' }, 401))).toBe('Response suggests Bearer token');
    expect(await authHint(jsonResponse({ error: 'Invalid API key' }, 403))).toBe(
      'Response suggests API key authentication',
    );
  });

  it('returns null when nothing hints at a scheme', async () => {
    expect(await authHint(jsonResponse({ error: 'Wrong password' }, 400))).toBeNull();
    expect(await authHint(new Response('Bad request', { status: 400 }))).toBeNull();
  });
});
