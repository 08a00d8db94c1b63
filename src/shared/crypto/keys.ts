/**
 * Identity key management.
 *
 * An identity is a single X25519 keypair. The public half is what the key
 * server stores under a name; the private half opens challenges sealed to it.
 *
 * Keys are PEM on disk and 32 raw bytes (hex-encoded) on the wire.
 */

import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';

export const PUBLIC_KEY_LENGTH = 32;

export const PUBLIC_KEY_FILE = 'identity.pub.pem';
export const PRIVATE_KEY_FILE = 'identity.key.pem';

/** A full X25519 identity keypair */
export interface Identity {
  publicKey: crypto.KeyObject;
  privateKey: crypto.KeyObject;
}

/** Serialized identity for storage */
export interface SerializedIdentity {
  publicKey: string; // PEM
  privateKey: string; // PEM
}

export function generateIdentity(): Identity {
  return crypto.generateKeyPairSync('x25519');
}

/**
 * Export an X25519 public key as its 32 raw bytes.
 */
export function exportPublicKey(key: crypto.KeyObject): Buffer {
  const jwk = key.export({ format: 'jwk' });
  if (jwk.crv !== 'X25519' || typeof jwk.x !== 'string') {
    throw new Error('Not an X25519 public key');
  }
  return Buffer.from(jwk.x, 'base64url');
}

/**
 * Import 32 raw bytes as an X25519 public key.
 *
 * @throws Error if the input is not exactly 32 bytes
 */
export function importPublicKey(raw: Buffer): crypto.KeyObject {
  if (raw.length !== PUBLIC_KEY_LENGTH) {
    throw new Error(`Invalid public key length: expected ${PUBLIC_KEY_LENGTH}, got ${raw.length}`);
  }
  return crypto.createPublicKey({
    key: { kty: 'OKP', crv: 'X25519', x: raw.toString('base64url') },
    format: 'jwk',
  });
}

export function publicKeyToHex(key: crypto.KeyObject): string {
  return exportPublicKey(key).toString('hex');
}

export function publicKeyFromHex(hex: string): crypto.KeyObject {
  return importPublicKey(Buffer.from(hex, 'hex'));
}

export function serializeIdentity(identity: Identity): SerializedIdentity {
  return {
    publicKey: identity.publicKey.export({ type: 'spki', format: 'pem' }).toString(),
    privateKey: identity.privateKey.export({ type: 'pkcs8', format: 'pem' }).toString(),
  };
}

export function deserializeIdentity(data: SerializedIdentity): Identity {
  return {
    publicKey: crypto.createPublicKey(data.publicKey),
    privateKey: crypto.createPrivateKey(data.privateKey),
  };
}

/**
 * Save an identity to a directory with proper file permissions.
 * Creates:
 *   <dir>/identity.pub.pem   (0644)
 *   <dir>/identity.key.pem   (0600)
 */
export function saveIdentity(identity: Identity, dir: string): void {
  fs.mkdirSync(dir, { recursive: true, mode: 0o700 });

  const serialized = serializeIdentity(identity);

  fs.writeFileSync(path.join(dir, PUBLIC_KEY_FILE), serialized.publicKey, { mode: 0o644 });
  fs.writeFileSync(path.join(dir, PRIVATE_KEY_FILE), serialized.privateKey, { mode: 0o600 });
}

export function identityExists(dir: string): boolean {
  return fs.existsSync(path.join(dir, PRIVATE_KEY_FILE));
}

export function loadIdentity(dir: string): Identity {
  return deserializeIdentity({
    publicKey: fs.readFileSync(path.join(dir, PUBLIC_KEY_FILE), 'utf-8'),
    privateKey: fs.readFileSync(path.join(dir, PRIVATE_KEY_FILE), 'utf-8'),
  });
}

export function loadPublicKey(dir: string): crypto.KeyObject {
  return crypto.createPublicKey(fs.readFileSync(path.join(dir, PUBLIC_KEY_FILE), 'utf-8'));
}

/**
 * Compute a fingerprint of a public key for display/verification.
 * Returns a hex string like "a3:f2:1b:..."
 */
export function fingerprint(pub: crypto.KeyObject): string {
  const hash = crypto.createHash('sha256').update(exportPublicKey(pub)).digest();
  // First 16 bytes only
  return Array.from(hash.subarray(0, 16))
    .map((b) => b.toString(16).padStart(2, '0'))
    .join(':');
}
