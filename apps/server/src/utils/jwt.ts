/**
 * HereSphere auth-token signing and verification
 *
 * Tokens carry only the session id and never expire: a session ends when
 * Jellyfin rejects its access token or the user logs in again.
 */

import jwt from 'jsonwebtoken';

const ISSUER = 'spherebridge';
const AUDIENCE = 'heresphere';

export interface TokenVerifyResult {
  valid: true;
  sessionId: string;
}

export interface TokenVerifyError {
  valid: false;
  error: string;
}

export type TokenVerifyResponse = TokenVerifyResult | TokenVerifyError;

export function signSessionToken(sessionId: string, secret: string): string {
  return jwt.sign({}, secret, {
    algorithm: 'HS256',
    subject: sessionId,
    issuer: ISSUER,
    audience: AUDIENCE,
  });
}

/**
 * Verify a token and extract the session id
 * @returns Verification result with the session id or error
 */
export function verifySessionToken(token: string, secret: string): TokenVerifyResponse {
  try {
    const payload = jwt.verify(token, secret, {
      algorithms: ['HS256'],
      issuer: ISSUER,
      audience: AUDIENCE,
    });

    if (typeof payload === 'string' || !payload.sub) {
      return { valid: false, error: 'Invalid token payload' };
    }

    return { valid: true, sessionId: payload.sub };
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Invalid token';
    return { valid: false, error: message };
  }
}
