/**
 * PIN hashing and verification utilities
 * Uses Node's built-in scrypt so only a salted hash is ever stored
 */
import { randomBytes, scryptSync, timingSafeEqual } from 'node:crypto';
import {
  PIN_HASH_SCHEME,
  PIN_KEY_LENGTH,
  PIN_LENGTH,
  PIN_PATTERN,
  PIN_SALT_BYTES,
} from './constants.js';

export class InvalidPinFormatError extends Error {
  constructor() {
    super(`PIN must be exactly ${PIN_LENGTH} digits (numbers only).`);
    this.name = 'InvalidPinFormatError';
  }
}

export function isValidPinFormat(pin: unknown): pin is string {
  return typeof pin === 'string' && PIN_PATTERN.test(pin);
}

export function assertPinFormat(pin: unknown): asserts pin is string {
  if (!isValidPinFormat(pin)) {
    throw new InvalidPinFormatError();
  }
}

/**
 * Hash a PIN using scrypt with a random salt
 * @returns `scrypt$<salt>$<key>`, both parts base64
 */
export function hashPin(pin: string): string {
  assertPinFormat(pin);
  const salt = randomBytes(PIN_SALT_BYTES);
  const derivedKey = scryptSync(pin, salt, PIN_KEY_LENGTH);
  return `${PIN_HASH_SCHEME}$${salt.toString('base64')}$${derivedKey.toString('base64')}`;
}

/**
 * Verify a PIN against a stored hash
 * Uses constant-time comparison; a malformed PIN or hash never matches
 */
export function verifyPin(pin: string, pinHash: string): boolean {
  if (!isValidPinFormat(pin)) {
    return false;
  }

  const parts = pinHash.split('$');
  if (parts.length !== 3 || parts[0] !== PIN_HASH_SCHEME) {
    return false;
  }

  const [, saltB64, keyB64] = parts;
  if (!saltB64 || !keyB64) {
    return false;
  }

  const salt = Buffer.from(saltB64, 'base64');
  const storedKey = Buffer.from(keyB64, 'base64');
  if (storedKey.length === 0) {
    return false;
  }

  const derivedKey = scryptSync(pin, salt, storedKey.length);
  return timingSafeEqual(storedKey, derivedKey);
}
