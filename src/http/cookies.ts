/**
 * Cookie helpers.
 *
 * Uses the 'cookie' package for parsing and serialization. The only cookie
 * the API reads is the player's `revealTargets` preference.
 */

import { parse, serialize, type CookieSerializeOptions } from 'cookie';

export const REVEAL_TARGETS_COOKIE = 'revealTargets';

const ONE_YEAR_SECONDS = 60 * 60 * 24 * 365;

/**
 * Gets a cookie value by name from the Cookie header, or returns null if not found.
 */
export function getCookie(cookieHeader: string | null, name: string): string | null {
  if (!cookieHeader) {
    return null;
  }

  const cookies = parse(cookieHeader);
  return cookies[name] ?? null;
}

export interface SetCookieOptions {
  /** Maximum age in seconds */
  maxAge?: number;
  /** Cookie path (default: '/') */
  path?: string;
  sameSite?: 'strict' | 'lax' | 'none';
  /** HTTPS only */
  secure?: boolean;
  /** Default: true */
  httpOnly?: boolean;
}

/**
 * Returns a copy of `headers` with one more Set-Cookie line.
 */
export function setCookie(
  headers: Headers,
  name: string,
  value: string,
  options?: SetCookieOptions
): Headers {
  const newHeaders = new Headers(headers);

  const cookieOptions: CookieSerializeOptions = {
    path: options?.path ?? '/',
    maxAge: options?.maxAge,
    sameSite: options?.sameSite ?? 'lax',
    secure: options?.secure ?? false,
    httpOnly: options?.httpOnly ?? true,
  };

  newHeaders.append('Set-Cookie', serialize(name, value, cookieOptions));
  return newHeaders;
}

/**
 * True only when the request carries `revealTargets=1`.
 */
export function readRevealTargets(request: Request): boolean {
  return getCookie(request.headers.get('Cookie'), REVEAL_TARGETS_COOKIE) === '1';
}

/**
 * Set-Cookie for the reveal preference. Turning it off expires the cookie.
 */
export function revealTargetsCookie(headers: Headers, reveal: boolean, secure: boolean): Headers {
  return setCookie(headers, REVEAL_TARGETS_COOKIE, reveal ? '1' : '', {
    maxAge: reveal ? ONE_YEAR_SECONDS : 0,
    secure,
  });
}
