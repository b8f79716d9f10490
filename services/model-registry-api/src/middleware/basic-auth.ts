import { createHash, timingSafeEqual } from 'node:crypto';
import { Request, Response, NextFunction } from 'express';
import { UnauthorizedError } from '../errors/http-errors.js';

export interface BasicCredentials {
  username: string;
  password: string;
}

/**
 * Decode an `Authorization: Basic ...` header. Returns null for any other
 * scheme or a payload without a colon.
 */
export function parseBasicAuthHeader(header: string | undefined): BasicCredentials | null {
  if (!header) {
    return null;
  }
  const match = /^Basic\s+([A-Za-z0-9+/=]+)\s*$/i.exec(header);
  if (!match) {
    return null;
  }
  const decoded = Buffer.from(match[1], 'base64').toString('utf8');
  const separator = decoded.indexOf(':');
  if (separator === -1) {
    return null;
  }
  return {
    username: decoded.slice(0, separator),
    password: decoded.slice(separator + 1),
  };
}

/**
 * Constant-time string comparison. Hashing first gives both sides the same
 * length, which timingSafeEqual requires.
 */
export function safeCompare(actual: string, expected: string): boolean {
  const a = createHash('sha256').update(actual).digest();
  const b = createHash('sha256').update(expected).digest();
  return timingSafeEqual(a, b);
}

/**
 * HTTP Basic authentication against the service's MongoDB credentials.
 * On success the username is available as `res.locals.username`.
 */
export function basicAuth(expected: BasicCredentials) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const credentials = parseBasicAuthHeader(req.get('Authorization'));

    // Evaluate both comparisons so timing doesn't reveal which one failed
    const usernameOk = safeCompare(credentials?.username ?? '', expected.username);
    const passwordOk = safeCompare(credentials?.password ?? '', expected.password);

    if (!credentials || !usernameOk || !passwordOk) {
      console.warn(`Failed authentication attempt for user: ${credentials?.username ?? '<none>'}`);
      next(new UnauthorizedError());
      return;
    }

    res.locals.username = credentials.username;
    next();
  };
}
