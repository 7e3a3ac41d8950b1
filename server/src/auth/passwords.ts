import { createHash, timingSafeEqual } from 'node:crypto';
import bcrypt from 'bcryptjs';

const SALT_ROUNDS = 10;

/** Unsalted SHA-256 hex digests written by the flat-file version of the app. */
const LEGACY_SHA256 = /^[0-9a-f]{64}$/;

export function hashPassword(password: string): string {
  return bcrypt.hashSync(password, bcrypt.genSaltSync(SALT_ROUNDS));
}

/** Checks a password against a stored hash, accepting legacy SHA-256 digests. */
export function verifyPassword(password: string, stored: string): boolean {
  if (LEGACY_SHA256.test(stored)) {
    const digest = createHash('sha256').update(password).digest();
    return timingSafeEqual(digest, Buffer.from(stored, 'hex'));
  }

  if (!stored.startsWith('$2')) {
    return false;
  }
  return bcrypt.compareSync(password, stored);
}
