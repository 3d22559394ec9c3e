import { createHash, timingSafeEqual, randomBytes, scrypt as scryptCallback } from 'node:crypto';

const SCRYPT_N = 16384; // CPU/memory cost
const SCRYPT_R = 8; // Block size
const SCRYPT_P = 1; // Parallelization
const SCRYPT_KEY_LENGTH = 64;

/**
 * Promisified scrypt function
 */
function scryptAsync(
  password: string,
  salt: Buffer,
  keyLength: number,
  options: { N: number; r: number; p: number }
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scryptCallback(password, salt, keyLength, options, (err, derivedKey) => {
      if (err) reject(err);
      else resolve(derivedKey);
    });
  });
}

/**
 * Hash a value using SHA-256 (for tokens, codes)
 */
export function sha256(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('hex');
}

/**
 * MD5 hex digest, only for building gravatar URLs
 */
export function md5(value: string): string {
  return createHash('md5').update(value, 'utf8').digest('hex');
}

/**
 * Hash a password or client secret using scrypt
 * Returns format: $scrypt$N$r$p$salt$hash
 */
export async function hashSecret(secret: string): Promise<string> {
  const salt = randomBytes(16);
  const hash = await scryptAsync(secret, salt, SCRYPT_KEY_LENGTH, {
    N: SCRYPT_N,
    r: SCRYPT_R,
    p: SCRYPT_P,
  });

  return `$scrypt$${SCRYPT_N}$${SCRYPT_R}$${SCRYPT_P}$${salt.toString('base64')}$${hash.toString('base64')}`;
}

/**
 * Verify a password or client secret against its scrypt digest
 */
export async function verifySecret(secret: string, digest: string): Promise<boolean> {
  // Expected format: $scrypt$N$r$p$salt$hash
  const [empty, algorithm, n, r, p, salt, hash, ...rest] = digest.split('$');
  if (
    empty !== '' ||
    algorithm !== 'scrypt' ||
    n === undefined ||
    r === undefined ||
    p === undefined ||
    salt === undefined ||
    hash === undefined ||
    rest.length > 0
  ) {
    return false;
  }

  const storedHash = Buffer.from(hash, 'base64');
  const derivedHash = await scryptAsync(secret, Buffer.from(salt, 'base64'), storedHash.length, {
    N: parseInt(n, 10),
    r: parseInt(r, 10),
    p: parseInt(p, 10),
  });

  return timingSafeEqual(storedHash, derivedHash);
}

/**
 * Lookup key for an opaque token or code; only the digest is stored
 */
export function hashToken(token: string): string {
  return sha256(token);
}
