import { hashPassword, hmacSha256Hex, randomSessionToken, verifyPassword } from './auth.utils';

describe('auth utils', () => {
  it('verifies a password against its own hash only', async () => {
    const stored = await hashPassword('correct horse');
    expect(stored.startsWith('scrypt$')).toBe(true);
    await expect(verifyPassword('correct horse', stored)).resolves.toBe(true);
    await expect(verifyPassword('wrong horse', stored)).resolves.toBe(false);
  });

  it('salts each hash', async () => {
    const a = await hashPassword('same');
    const b = await hashPassword('same');
    expect(a).not.toBe(b);
  });

  it('rejects malformed stored hashes', async () => {
    await expect(verifyPassword('x', 'plain')).resolves.toBe(false);
    await expect(verifyPassword('x', 'scrypt$00$00')).resolves.toBe(false);
  });

  it('hmac is deterministic per secret', () => {
    expect(hmacSha256Hex('test-secret', 'token')).toBe(hmacSha256Hex('test-secret', 'token'));
    expect(hmacSha256Hex('test-secret', 'token')).not.toBe(hmacSha256Hex('other-secret', 'token'));
    expect(hmacSha256Hex('test-secret', 'token')).toMatch(/^[0-9a-f]{64}$/);
  });

  it('session tokens are url-safe and unique', () => {
    const a = randomSessionToken();
    expect(a).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(randomSessionToken()).not.toBe(a);
  });
});
