/**
 * backend/src/shared/http/access-token.ts
 *
 * WHY:
 * - The access token travels as `Authorization: Bearer <token>`; browsers that
 *   went through /api/auth/login also hold it in an HttpOnly `token` cookie.
 * - AuthGuard and the logout controller must read it the same way.
 *
 * RULES:
 * - The header wins over the cookie.
 * - Pure parsing, never throws.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

export const TOKEN_COOKIE_NAME = 'token';

const BEARER_PATTERN = /^Bearer\s+(\S+)\s*$/i;

export function parseBearerToken(header: unknown): string | null {
  if (typeof header !== 'string') return null;
  const match = BEARER_PATTERN.exec(header.trim());
  return match?.[1] ?? null;
}

/**
 * Parses a raw Cookie header into key-value pairs.
 * Handles the standard format: "key1=value1; key2=value2"
 */
export function parseCookies(raw: string | undefined): Record<string, string> {
  if (!raw) return {};

  const cookies: Record<string, string> = {};
  for (const pair of raw.split(';')) {
    const eqIdx = pair.indexOf('=');
    if (eqIdx === -1) continue;

    const key = pair.substring(0, eqIdx).trim();
    const value = pair.substring(eqIdx + 1).trim();
    if (key) cookies[key] = value;
  }
  return cookies;
}

export function extractAccessToken(req: FastifyRequest): string | null {
  const fromHeader = parseBearerToken(req.headers.authorization);
  if (fromHeader) return fromHeader;

  const fromCookie = parseCookies(req.headers.cookie)[TOKEN_COOKIE_NAME];
  return fromCookie ? fromCookie : null;
}

export function setTokenCookie(
  reply: FastifyReply,
  token: string,
  maxAgeSeconds: number,
  isProduction: boolean,
): void {
  const parts = [
    `${TOKEN_COOKIE_NAME}=${token}`,
    'Path=/',
    'HttpOnly',
    'SameSite=Strict',
    `Max-Age=${maxAgeSeconds}`,
  ];

  if (isProduction) {
    parts.push('Secure');
  }

  reply.header('Set-Cookie', parts.join('; '));
}

export function clearTokenCookie(reply: FastifyReply, isProduction: boolean): void {
  // Max-Age=0 instructs the browser to delete the cookie immediately.
  const parts = [`${TOKEN_COOKIE_NAME}=`, 'Path=/', 'HttpOnly', 'SameSite=Strict', 'Max-Age=0'];

  if (isProduction) {
    parts.push('Secure');
  }

  reply.header('Set-Cookie', parts.join('; '));
}
