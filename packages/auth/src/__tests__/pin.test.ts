import { describe, it, expect } from 'vitest';
import {
  assertPinFormat,
  hashPin,
  InvalidPinFormatError,
  isValidPinFormat,
  verifyPin,
} from '../pin.js';

describe('PIN format', () => {
  it('accepts exactly four digits', () => {
    expect(isValidPinFormat('0000')).toBe(true);
    expect(isValidPinFormat('1234')).toBe(true);
  });

  it('rejects other shapes', () => {
    expect(isValidPinFormat('123')).toBe(false);
    expect(isValidPinFormat('12345')).toBe(false);
    expect(isValidPinFormat('12a4')).toBe(false);
    expect(isValidPinFormat(' 1234')).toBe(false);
    expect(isValidPinFormat('')).toBe(false);
    expect(isValidPinFormat(1234)).toBe(false);
    expect(isValidPinFormat(undefined)).toBe(false);
  });

  it('throws InvalidPinFormatError from assertPinFormat', () => {
    expect(() => assertPinFormat('12')).toThrow(InvalidPinFormatError);
    expect(() => assertPinFormat('12')).toThrow('PIN must be exactly 4 digits (numbers only).');
    expect(() => assertPinFormat('9876')).not.toThrow();
  });
});

describe('hashPin', () => {
  it('never stores the raw PIN', () => {
    const hash = hashPin('1234');
    expect(hash).not.toContain('1234');
    expect(hash.startsWith('scrypt$')).toBe(true);
    expect(hash.split('$')).toHaveLength(3);
  });

  it('salts every hash', () => {
    expect(hashPin('1234')).not.toBe(hashPin('1234'));
  });

  it('refuses a malformed PIN', () => {
    expect(() => hashPin('abcd')).toThrow(InvalidPinFormatError);
  });
});

describe('verifyPin', () => {
  const stored = hashPin('4321');

  it('matches the original PIN', () => {
    expect(verifyPin('4321', stored)).toBe(true);
  });

  it('rejects a different PIN', () => {
    expect(verifyPin('1234', stored)).toBe(false);
  });

  it('rejects a malformed PIN without hashing it', () => {
    expect(verifyPin('43210', stored)).toBe(false);
  });

  it('rejects malformed hashes', () => {
    expect(verifyPin('4321', '')).toBe(false);
    expect(verifyPin('4321', 'bcrypt$abc$def')).toBe(false);
    expect(verifyPin('4321', 'scrypt$onlysalt')).toBe(false);
    expect(verifyPin('4321', 'scrypt$$')).toBe(false);
  });
});
