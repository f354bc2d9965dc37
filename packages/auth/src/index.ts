/**
 * @pinbank/auth
 *
 * PIN primitives for the banking simulator
 * - PIN format validation
 * - PIN hashing/verification
 */

export {
  hashPin,
  verifyPin,
  isValidPinFormat,
  assertPinFormat,
  InvalidPinFormatError,
} from './pin.js';

export {
  PIN_LENGTH,
  PIN_PATTERN,
  PIN_HASH_SCHEME,
  PIN_SALT_BYTES,
  PIN_KEY_LENGTH,
} from './constants.js';
