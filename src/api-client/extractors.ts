/** Field names that carry a session token in login responses */
export const TOKEN_FIELDS = ['jwt', 'token', 'access_token', 'auth_token'] as const;

export type LoginEvidence =
  | { kind: 'token'; token: string }
  | { kind: 'cookie-session'; cookies: string[] }
  | { kind: 'inconclusive' };

export interface LoginReply {
  contentType: string;
  body: string;
  /** Cookie names set by the reply */
  cookies: string[];
}

export type Extractor = (reply: LoginReply) => LoginEvidence;

const INCONCLUSIVE: LoginEvidence = { kind: 'inconclusive' };

/** Plain "Ok." style bodies; the session lives in cookies */
export const plainTextMarker: Extractor = (reply) => {
  const isText = reply.contentType.includes('text/plain') || reply.contentType.includes('text/html');
  if (isText && reply.body.trim().toLowerCase().includes('ok')) {
    return { kind: 'cookie-session', cookies: reply.cookies };
  }
  return INCONCLUSIVE;
};

export const jsonToken: Extractor = (reply) => {
  let data: unknown;
  try {
    data = JSON.parse(reply.body);
  } catch {
    return INCONCLUSIVE;
  }
  if (typeof data !== 'object' || data === null || Array.isArray(data)) return INCONCLUSIVE;

  for (const field of TOKEN_FIELDS) {
    const value: unknown = Reflect.get(data, field);
    if (typeof value === 'string' && value) {
      return { kind: 'token', token: value };
    }
  }
  return INCONCLUSIVE;
};

export const sessionCookies: Extractor = (reply) =>
  reply.cookies.length > 0 ? { kind: 'cookie-session', cookies: reply.cookies } : INCONCLUSIVE;

export const LOGIN_EXTRACTORS: readonly Extractor[] = [plainTextMarker, jsonToken, sessionCookies];

/**
 * Run the extractors in order and keep the first conclusive answer
 */
export function extractLoginEvidence(
  reply: LoginReply,
  extractors: readonly Extractor[] = LOGIN_EXTRACTORS,
): LoginEvidence {
  for (const extract of extractors) {
    const evidence = extract(reply);
    if (evidence.kind !== 'inconclusive') return evidence;
  }
  return INCONCLUSIVE;
}
