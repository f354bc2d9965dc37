/**
 * PIN constants
 * Single source of truth for PIN handling
 */

export const PIN_LENGTH = 4;
export const PIN_PATTERN = /^\d{4}$/;

// scrypt parameters for PIN hashes
export const PIN_HASH_SCHEME = 'scrypt';
export const PIN_SALT_BYTES = 16;
export const PIN_KEY_LENGTH = 32;
