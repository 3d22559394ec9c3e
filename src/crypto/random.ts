import { randomBytes, randomInt } from 'node:crypto';

export const LOWERCASE_CHARSET = 'abcdefghijklmnopqrstuvwxyz';

/**
 * Generate cryptographically secure random bytes as base64url string
 */
export function generateRandomBase64Url(length: number): string {
  return randomBytes(length).toString('base64url');
}

/**
 * Random string of exactly `length` characters drawn from `charset`
 */
export function randomString(length: number, charset: string = LOWERCASE_CHARSET): string {
  let value = '';
  for (let i = 0; i < length; i++) {
    value += charset.charAt(randomInt(charset.length));
  }
  return value;
}

/**
 * Pick one element uniformly at random
 */
export function pickRandom<T>(items: readonly T[]): T {
  const item = items[randomInt(items.length)];
  if (item === undefined) {
    throw new RangeError('Cannot pick from an empty list');
  }
  return item;
}

/**
 * Generate a unique ID for database records
 */
export function generateId(): string {
  return generateRandomBase64Url(16);
}
