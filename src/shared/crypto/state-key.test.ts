import { describe, it, expect } from 'vitest';
import {
  STATE_KEY_LENGTH,
  STATE_NONCE_LENGTH,
  generateStateKey,
  openState,
  parseStateKey,
  sealState,
} from './state-key.js';

describe('generateStateKey', () => {
  it('should generate 32 random bytes', () => {
    const key = generateStateKey();
    expect(key).toHaveLength(STATE_KEY_LENGTH);
    expect(key.equals(generateStateKey())).toBe(false);
  });
});

describe('parseStateKey', () => {
  it('should parse 64 hex characters', () => {
    const hex = 'ab'.repeat(32);
    expect(parseStateKey(hex).equals(Buffer.alloc(32, 0xab))).toBe(true);
  });

  it('should accept uppercase hex', () => {
    expect(parseStateKey('AB'.repeat(32))).toHaveLength(32);
  });

  it('should reject the wrong length', () => {
    expect(() => parseStateKey('ab'.repeat(31))).toThrow('State key must be 64 hex characters');
  });

  it('should reject non-hex characters', () => {
    expect(() => parseStateKey('zz'.repeat(32))).toThrow('State key must be 64 hex characters');
  });
});

describe('sealState / openState', () => {
  it('should open what it sealed', () => {
    const key = generateStateKey();
    const sealed = sealState(key, Buffer.from('{"a":1}'));
    expect(sealed.nonce).toHaveLength(STATE_NONCE_LENGTH);
    expect(sealed.ciphertext).toHaveLength(7 + 16);
    expect(openState(key, sealed.ciphertext, sealed.nonce)?.toString('utf-8')).toBe('{"a":1}');
  });

  it('should return null under a different key', () => {
    const sealed = sealState(generateStateKey(), Buffer.from('state'));
    expect(openState(generateStateKey(), sealed.ciphertext, sealed.nonce)).toBeNull();
  });

  it('should return null for a tampered ciphertext', () => {
    const key = generateStateKey();
    const sealed = sealState(key, Buffer.from('state'));
    sealed.ciphertext[0] ^= 0xff;
    expect(openState(key, sealed.ciphertext, sealed.nonce)).toBeNull();
  });

  it('should return null for a different nonce', () => {
    const key = generateStateKey();
    const sealed = sealState(key, Buffer.from('state'));
    expect(openState(key, sealed.ciphertext, Buffer.alloc(STATE_NONCE_LENGTH))).toBeNull();
  });

  it('should return null for a nonce of the wrong length', () => {
    const key = generateStateKey();
    const sealed = sealState(key, Buffer.from('state'));
    expect(openState(key, sealed.ciphertext, sealed.nonce.subarray(0, 11))).toBeNull();
  });

  it('should return null for a ciphertext shorter than the tag', () => {
    const key = generateStateKey();
    expect(openState(key, Buffer.alloc(15), Buffer.alloc(STATE_NONCE_LENGTH))).toBeNull();
  });
});
