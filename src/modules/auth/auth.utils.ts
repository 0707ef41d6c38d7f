import * as crypto from 'node:crypto';

const SCRYPT_KEY_LENGTH = 64;

export function hmacSha256Hex(secret: string, value: string) {
  return crypto.createHmac('sha256', secret).update(value).digest('hex');
}

export function randomSessionToken() {
  return crypto.randomBytes(32).toString('base64url');
}

function scryptKey(password: string, salt: Buffer): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    crypto.scrypt(password, salt, SCRYPT_KEY_LENGTH, (err, key) => (err ? reject(err) : resolve(key)));
  });
}

/** Stored as `scrypt$<salt hex>$<key hex>`. */
export async function hashPassword(password: string): Promise<string> {
  const salt = crypto.randomBytes(16);
  const key = await scryptKey(password, salt);
  return `scrypt$${salt.toString('hex')}$${key.toString('hex')}`;
}

export async function verifyPassword(password: string, stored: string): Promise<boolean> {
  const [scheme, saltHex, keyHex] = stored.split('$');
  if (scheme !== 'scrypt' || !saltHex || !keyHex) return false;
  const expected = Buffer.from(keyHex, 'hex');
  if (expected.length !== SCRYPT_KEY_LENGTH) return false;
  const actual = await scryptKey(password, Buffer.from(saltHex, 'hex'));
  return crypto.timingSafeEqual(actual, expected);
}
