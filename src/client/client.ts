/**
 * HTTP client for the key server.
 *
 * Registration runs the full challenge round trip: request a challenge for
 * our public key, open it with our private key, and send the answer back
 * together with the name to claim.
 */

import type crypto from 'node:crypto';

import { publicKeyFromHex, publicKeyToHex, type Identity } from '../shared/crypto/index.js';
import { createLogger } from '../shared/logger.js';
import {
  ChallengeSchema,
  ErrorBodySchema,
  KeyLookupSchema,
  answerChallenge,
  type Challenge,
  type ChallengeRequest,
} from '../shared/protocol/index.js';

const log = createLogger('client');

export type RegisterOutcome = 'registered' | 'name_taken' | 'failed_challenge';

export interface KeyServerClientOptions {
  /** Key server base URL, e.g. http://127.0.0.1:3030 */
  serverUrl: string;
  /** Per-request timeout (ms) */
  requestTimeout?: number;
}

async function errorMessage(resp: Response): Promise<string> {
  const text = await resp.text();
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return text;
  }
  const parsed = ErrorBodySchema.safeParse(raw);
  return parsed.success ? parsed.data.error : text;
}

export class KeyServerClient {
  private readonly serverUrl: string;
  private readonly requestTimeout: number;

  constructor(options: KeyServerClientOptions) {
    this.serverUrl = options.serverUrl.replace(/\/+$/, '');
    this.requestTimeout = options.requestTimeout ?? 10_000;
  }

  private post(route: string, body: unknown): Promise<Response> {
    return fetch(`${this.serverUrl}${route}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.requestTimeout),
    });
  }

  async requestChallenge(pubkey: crypto.KeyObject): Promise<Challenge> {
    const request: ChallengeRequest = { pubkey: publicKeyToHex(pubkey) };
    const resp = await this.post('/challenge', request);
    if (!resp.ok) {
      throw new Error(`Challenge request failed: ${resp.status} ${await errorMessage(resp)}`);
    }
    return ChallengeSchema.parse(await resp.json());
  }

  /**
   * Claim `name` for the identity's public key.
   *
   * @throws Error for any status other than 201, 400 (failed challenge) or 409
   */
  async register(name: string, identity: Identity): Promise<RegisterOutcome> {
    const challenge = await this.requestChallenge(identity.publicKey);
    const answer = answerChallenge(identity, challenge, name);

    const resp = await this.post('/response', answer);
    if (resp.status === 201) {
      log.info(`Registered ${name}`);
      return 'registered';
    }

    const message = await errorMessage(resp);
    if (resp.status === 409) return 'name_taken';
    if (resp.status === 400 && message === 'failed challenge') return 'failed_challenge';
    throw new Error(`Registration failed: ${resp.status} ${message}`);
  }

  /**
   * Look up the public key registered under `name`. Returns null if unknown.
   */
  async lookup(name: string): Promise<crypto.KeyObject | null> {
    const resp = await fetch(`${this.serverUrl}/key/${encodeURIComponent(name)}`, {
      signal: AbortSignal.timeout(this.requestTimeout),
    });
    if (resp.status === 404) {
      log.debug(`No key registered for ${name}`);
      return null;
    }
    if (!resp.ok) {
      throw new Error(`Lookup failed: ${resp.status} ${await errorMessage(resp)}`);
    }
    const body = KeyLookupSchema.parse(await resp.json());
    return publicKeyFromHex(body.pubkey);
  }
}
