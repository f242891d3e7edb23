/**
 * Credential utilities for locally issued passwords and identifiers
 *
 * Local passwords are stored as bcrypt hashes.
 */

import bcrypt from 'bcryptjs';
import { randomBytes, randomInt, randomUUID } from 'node:crypto';
import { LOCAL_PASSWORD_LENGTH } from '@spherebridge/shared';

const SALT_ROUNDS = 10;
const BCRYPT_HASH = /^\$2[aby]\$\d{2}\$[./A-Za-z0-9]{53}$/;
const PASSWORD_ALPHABET = 'abcdefghijklmnopqrstuvwxyz';

/**
 * Generate the short password handed to the VR client.
 * Lowercase letters only so it can be typed on a headset keyboard.
 */
export function generateLocalPassword(length: number = LOCAL_PASSWORD_LENGTH): string {
  let password = '';
  for (let i = 0; i < length; i++) {
    password += PASSWORD_ALPHABET.charAt(randomInt(PASSWORD_ALPHABET.length));
  }
  return password;
}

export async function hashPassword(password: string): Promise<string> {
  return bcrypt.hash(password, SALT_ROUNDS);
}

/**
 * Verify a password against a stored hash. Malformed hashes never verify.
 */
export async function verifyPassword(password: string, stored: string): Promise<boolean> {
  if (!BCRYPT_HASH.test(stored)) return false;
  return bcrypt.compare(password, stored);
}

/**
 * Opaque identifier for sessions
 */
export function generateId(): string {
  return randomUUID().replace(/-/g, '');
}

/**
 * Random secret for signing cookies and tokens (hex, 32 bytes)
 */
export function generateSecret(): string {
  return randomBytes(32).toString('hex');
}
