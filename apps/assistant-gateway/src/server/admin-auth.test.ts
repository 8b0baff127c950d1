import { describe, expect, it } from 'vitest';

import { parseBearerToken, verifyAdminToken } from './admin-auth';

describe('parseBearerToken', () => {
  it('extracts the token regardless of scheme casing', () => {
    expect(parseBearerToken('Bearer test-secret')).toBe('test-secret');
    expect(parseBearerToken('bearer   test-secret ')).toBe('test-secret');
  });

  it('ignores other schemes and empty headers', () => {
    expect(parseBearerToken('Basic dGVzdA==')).toBeUndefined();
    expect(parseBearerToken(undefined)).toBeUndefined();
    expect(parseBearerToken('Bearer')).toBeUndefined();
  });
});

describe('verifyAdminToken', () => {
  it('accepts only the exact configured token', () => {
    expect(verifyAdminToken('test-secret', 'Bearer test-secret')).toBe(true);
    expect(verifyAdminToken('test-secret', 'Bearer test-secreT')).toBe(false);
    expect(verifyAdminToken('test-secret', 'Bearer test')).toBe(false);
    expect(verifyAdminToken('test-secret', undefined)).toBe(false);
  });
});
