/**
 * Wire messages for the registration challenge.
 *
 * All byte fields are hex strings. Schemas are used by the server to validate
 * request bodies and by the client to validate replies.
 */

import { z } from 'zod';

export const MAX_NAME_LENGTH = 255;

const hex = z.string().regex(/^(?:[0-9a-fA-F]{2})*$/, 'expected even-length hex');

/** 32-byte X25519 public key */
const publicKeyHex = z.string().regex(/^[0-9a-fA-F]{64}$/, 'expected 64 hex characters');

export const ChallengeRequestSchema = z.object({
  pubkey: publicKeyHex,
});
export type ChallengeRequest = z.infer<typeof ChallengeRequestSchema>;

export const ChallengeSchema = z.object({
  /** Challenge nonce sealed to the requesting public key */
  challenge: hex,
  /** Server-sealed challenge state (ciphertext || tag) */
  state: hex,
  /** GCM IV for `state` */
  nonce: hex,
});
export type Challenge = z.infer<typeof ChallengeSchema>;

export const ChallengeResponseSchema = z.object({
  /** The opened challenge nonce */
  response: hex,
  state: hex,
  nonce: hex,
  /** Name to register the key under */
  name: z.string().min(1).max(MAX_NAME_LENGTH),
});
export type ChallengeResponse = z.infer<typeof ChallengeResponseSchema>;

/** Plaintext of the sealed state. Never sent unencrypted. */
export const ChallengeStateSchema = z.object({
  challengeNonce: hex,
  pubkey: publicKeyHex,
  issuedAt: z.number().int().nonnegative(),
});
export type ChallengeState = z.infer<typeof ChallengeStateSchema>;

export const KeyLookupSchema = z.object({
  pubkey: publicKeyHex,
});
export type KeyLookup = z.infer<typeof KeyLookupSchema>;

export const ErrorBodySchema = z.object({
  error: z.string(),
});
export type ErrorBody = z.infer<typeof ErrorBodySchema>;
