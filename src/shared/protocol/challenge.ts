/**
 * Proof-of-possession challenge for key registration.
 *
 * Protocol flow:
 *
 *   Client                                   Key server
 *   ──────                                   ──────────
 *   POST /challenge { pubkey }   ──────────►
 *                                            nonce ← 32 random bytes
 *                                            challenge ← sealTo(pubkey, nonce)
 *                                            state ← seal(stateKey, { nonce, pubkey, issuedAt })
 *                                ◄────────── { challenge, state, nonce }
 *   response ← open(challenge)
 *   POST /response { response, state, nonce, name } ──►
 *                                            open state, check age,
 *                                            response == nonce → pubkey
 *
 * The server keeps nothing between the two calls: everything it needs to
 * check the response comes back inside the sealed state.
 */

import crypto from 'node:crypto';

import {
  openSealed,
  openState,
  publicKeyToHex,
  sealState,
  sealTo,
  type Identity,
} from '../crypto/index.js';
import {
  ChallengeStateSchema,
  type Challenge,
  type ChallengeResponse,
  type ChallengeState,
} from './messages.js';

export const CHALLENGE_NONCE_LENGTH = 32;

export interface VerifyOptions {
  /** Maximum age of the challenge in ms. 0 disables the check. */
  maxAgeMs?: number;
  now?: number;
}

/**
 * Issue a challenge for `pubkey`, sealing the expected answer into the state.
 */
export function issueChallenge(
  stateKey: Buffer,
  pubkey: crypto.KeyObject,
  now: number = Date.now(),
): Challenge {
  const challengeNonce = crypto.randomBytes(CHALLENGE_NONCE_LENGTH);

  const state: ChallengeState = {
    challengeNonce: challengeNonce.toString('hex'),
    pubkey: publicKeyToHex(pubkey),
    issuedAt: now,
  };
  const sealed = sealState(stateKey, Buffer.from(JSON.stringify(state), 'utf-8'));

  return {
    challenge: sealTo(pubkey, challengeNonce).toString('hex'),
    state: sealed.ciphertext.toString('hex'),
    nonce: sealed.nonce.toString('hex'),
  };
}

function parseState(plaintext: Buffer): ChallengeState | null {
  let raw: unknown;
  try {
    raw = JSON.parse(plaintext.toString('utf-8'));
  } catch {
    return null;
  }
  const parsed = ChallengeStateSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/**
 * Check a challenge response.
 *
 * @returns The hex public key bound into the state, or null if the state is
 *   invalid, expired, or the response does not match
 */
export function verifyResponse(
  stateKey: Buffer,
  response: Pick<ChallengeResponse, 'response' | 'state' | 'nonce'>,
  options: VerifyOptions = {},
): string | null {
  const plaintext = openState(
    stateKey,
    Buffer.from(response.state, 'hex'),
    Buffer.from(response.nonce, 'hex'),
  );
  if (!plaintext) return null;

  const state = parseState(plaintext);
  if (!state) return null;

  const maxAgeMs = options.maxAgeMs ?? 0;
  const now = options.now ?? Date.now();
  if (maxAgeMs > 0 && now - state.issuedAt > maxAgeMs) {
    return null;
  }

  const expected = Buffer.from(state.challengeNonce, 'hex');
  const actual = Buffer.from(response.response, 'hex');
  if (expected.length !== actual.length || !crypto.timingSafeEqual(expected, actual)) {
    return null;
  }

  return state.pubkey;
}

/**
 * Client side: open the sealed challenge and build the registration response.
 *
 * @throws Error if the challenge was not sealed to this identity
 */
export function answerChallenge(
  identity: Identity,
  challenge: Challenge,
  name: string,
): ChallengeResponse {
  const opened = openSealed(identity, Buffer.from(challenge.challenge, 'hex'));
  return {
    response: opened.toString('hex'),
    state: challenge.state,
    nonce: challenge.nonce,
    name,
  };
}
