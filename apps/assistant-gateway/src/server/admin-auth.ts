import { timingSafeEqual } from 'node:crypto';

const BEARER_PATTERN = /^Bearer\s+(\S+)$/i;

/** Extract the token from an `Authorization: Bearer <token>` header. */
export function parseBearerToken(header: string | undefined): string | undefined {
  if (!header) {
    return undefined;
  }
  return BEARER_PATTERN.exec(header.trim())?.[1];
}

/** Compare the presented bearer token with the configured one in constant time. */
export function verifyAdminToken(expectedToken: string, authorizationHeader: string | undefined): boolean {
  const token = parseBearerToken(authorizationHeader);
  if (!token) {
    return false;
  }

  const expected = Buffer.from(expectedToken, 'utf8');
  const provided = Buffer.from(token, 'utf8');

  if (expected.length !== provided.length) {
    return false;
  }

  return timingSafeEqual(expected, provided);
}
