/**
 * Server-side sealing of challenge state.
 *
 * The key server hands the client its own challenge state encrypted under a
 * key only the server knows, and gets it back with the response. The GCM
 * tag is appended to the ciphertext; the IV travels separately as `nonce`.
 */

import crypto from 'node:crypto';

export const STATE_KEY_LENGTH = 32;
export const STATE_NONCE_LENGTH = 12;
const AUTH_TAG_LENGTH = 16;

export interface SealedState {
  ciphertext: Buffer;
  nonce: Buffer;
}

export function generateStateKey(): Buffer {
  return crypto.randomBytes(STATE_KEY_LENGTH);
}

/**
 * Parse a hex-encoded state key.
 *
 * @throws Error unless the input decodes to exactly 32 bytes
 */
export function parseStateKey(hex: string): Buffer {
  if (!/^[0-9a-fA-F]*$/.test(hex) || hex.length !== STATE_KEY_LENGTH * 2) {
    throw new Error(`State key must be ${STATE_KEY_LENGTH * 2} hex characters`);
  }
  return Buffer.from(hex, 'hex');
}

export function sealState(stateKey: Buffer, plaintext: Buffer): SealedState {
  const nonce = crypto.randomBytes(STATE_NONCE_LENGTH);
  const cipher = crypto.createCipheriv('aes-256-gcm', stateKey, nonce);
  const encrypted = Buffer.concat([cipher.update(plaintext), cipher.final()]);
  return { ciphertext: Buffer.concat([encrypted, cipher.getAuthTag()]), nonce };
}

/**
 * Open sealed state. Returns null for a malformed nonce, a truncated
 * ciphertext, or an authentication failure.
 */
export function openState(stateKey: Buffer, ciphertext: Buffer, nonce: Buffer): Buffer | null {
  if (nonce.length !== STATE_NONCE_LENGTH || ciphertext.length < AUTH_TAG_LENGTH) {
    return null;
  }

  const body = ciphertext.subarray(0, ciphertext.length - AUTH_TAG_LENGTH);
  const authTag = ciphertext.subarray(ciphertext.length - AUTH_TAG_LENGTH);

  const decipher = crypto.createDecipheriv('aes-256-gcm', stateKey, nonce);
  decipher.setAuthTag(authTag);

  try {
    return Buffer.concat([decipher.update(body), decipher.final()]);
  } catch {
    return null;
  }
}
