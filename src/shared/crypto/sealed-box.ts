/**
 * Anonymous public-key encryption to an X25519 identity.
 *
 * The sender generates an ephemeral X25519 keypair, runs ECDH against the
 * recipient's public key and derives an AES-256-GCM key with HKDF-SHA256.
 * Both public keys go into the HKDF salt so the key is bound to this pair.
 *
 * Wire format: ephemeralPub (32) || IV (12) || authTag (16) || ciphertext
 */

import crypto from 'node:crypto';

import { PUBLIC_KEY_LENGTH, exportPublicKey, importPublicKey, type Identity } from './keys.js';

const IV_LENGTH = 12;
const AUTH_TAG_LENGTH = 16;
const HKDF_INFO = 'ember-keyserver/sealed-box/v1';

export const SEALED_OVERHEAD = PUBLIC_KEY_LENGTH + IV_LENGTH + AUTH_TAG_LENGTH;

function deriveBoxKey(sharedSecret: Buffer, ephemeralPub: Buffer, recipientPub: Buffer): Buffer {
  const salt = Buffer.concat([ephemeralPub, recipientPub]);
  return Buffer.from(crypto.hkdfSync('sha256', sharedSecret, salt, HKDF_INFO, 32));
}

/**
 * Encrypt `plaintext` so that only the holder of `recipient`'s private key can read it.
 */
export function sealTo(recipient: crypto.KeyObject, plaintext: Buffer): Buffer {
  const ephemeral = crypto.generateKeyPairSync('x25519');
  const ephemeralPub = exportPublicKey(ephemeral.publicKey);
  const recipientPub = exportPublicKey(recipient);

  const sharedSecret = crypto.diffieHellman({
    privateKey: ephemeral.privateKey,
    publicKey: recipient,
  });
  const key = deriveBoxKey(sharedSecret, ephemeralPub, recipientPub);

  const iv = crypto.randomBytes(IV_LENGTH);
  const cipher = crypto.createCipheriv('aes-256-gcm', key, iv);
  const encrypted = Buffer.concat([cipher.update(plaintext), cipher.final()]);
  const authTag = cipher.getAuthTag();

  return Buffer.concat([ephemeralPub, iv, authTag, encrypted]);
}

/**
 * Open a sealed box with the recipient's identity.
 *
 * @throws Error if the box is truncated or fails authentication
 */
export function openSealed(identity: Identity, sealed: Buffer): Buffer {
  if (sealed.length < SEALED_OVERHEAD) {
    throw new Error('Sealed box too short');
  }

  const ephemeralPub = sealed.subarray(0, PUBLIC_KEY_LENGTH);
  const iv = sealed.subarray(PUBLIC_KEY_LENGTH, PUBLIC_KEY_LENGTH + IV_LENGTH);
  const authTag = sealed.subarray(PUBLIC_KEY_LENGTH + IV_LENGTH, SEALED_OVERHEAD);
  const ciphertext = sealed.subarray(SEALED_OVERHEAD);

  const sharedSecret = crypto.diffieHellman({
    privateKey: identity.privateKey,
    publicKey: importPublicKey(Buffer.from(ephemeralPub)),
  });
  const key = deriveBoxKey(
    sharedSecret,
    Buffer.from(ephemeralPub),
    exportPublicKey(identity.publicKey),
  );

  const decipher = crypto.createDecipheriv('aes-256-gcm', key, iv);
  decipher.setAuthTag(authTag);

  try {
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  } catch {
    throw new Error('Sealed box authentication failed (tampered or wrong key)');
  }
}
