/**
 * End-to-end tests for the key server.
 *
 * Boots the Express app on a random loopback port with an in-memory store,
 * then drives it over HTTP both by hand and through KeyServerClient.
 */
import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';

import { createApp, resolveStateKey } from './server.js';
import { openKeyStore, type KeyStore } from './store.js';
import { KeyServerClient } from '../client/client.js';
import {
  generateIdentity,
  generateStateKey,
  publicKeyToHex,
  type Identity,
} from '../shared/crypto/index.js';
import { answerChallenge, ChallengeSchema, type Challenge } from '../shared/protocol/index.js';

// ── Test fixtures ─────────────────────────────────────────────────────────

let server: Server;
let baseUrl: string;
let store: KeyStore;
let clock = 1_000_000;

const CHALLENGE_TTL_MS = 60_000;

beforeAll(async () => {
  store = openKeyStore(':memory:');
  const app = createApp({
    store,
    stateKey: generateStateKey(),
    challengeTtlMs: CHALLENGE_TTL_MS,
    now: () => clock,
  });

  await new Promise<void>((resolve) => {
    server = app.listen(0, '127.0.0.1', () => {
      const { port } = server.address() as AddressInfo;
      baseUrl = `http://127.0.0.1:${port}`;
      resolve();
    });
  });
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => {
    server.close((err) => {
      if (err) reject(err);
      else resolve();
    });
  });
  store.close();
});

beforeEach(() => {
  clock = 1_000_000;
});

// ── Helpers ───────────────────────────────────────────────────────────────

let nameCounter = 0;
function uniqueName(prefix: string): string {
  nameCounter++;
  return `${prefix}-${nameCounter}`;
}

function postJson(route: string, body: unknown): Promise<Response> {
  return fetch(`${baseUrl}${route}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

async function requestChallenge(identity: Identity): Promise<Challenge> {
  const resp = await postJson('/challenge', { pubkey: publicKeyToHex(identity.publicKey) });
  expect(resp.status).toBe(200);
  return ChallengeSchema.parse(await resp.json());
}

// ── POST /challenge ───────────────────────────────────────────────────────

describe('POST /challenge', () => {
  it('should return a challenge for a valid public key', async () => {
    const challenge = await requestChallenge(generateIdentity());
    expect(challenge.challenge).toHaveLength((32 + 12 + 16 + 32) * 2);
    expect(challenge.nonce).toHaveLength(24);
  });

  it('should reject a missing public key', async () => {
    const resp = await postJson('/challenge', {});
    expect(resp.status).toBe(400);
    expect(await resp.json()).toEqual({ error: 'invalid request' });
  });

  it('should reject a public key of the wrong length', async () => {
    const resp = await postJson('/challenge', { pubkey: 'ab'.repeat(31) });
    expect(resp.status).toBe(400);
    expect(await resp.json()).toEqual({ error: 'invalid request' });
  });

  it('should reject a low-order public key', async () => {
    const resp = await postJson('/challenge', { pubkey: '00'.repeat(32) });
    expect(resp.status).toBe(400);
    expect(await resp.json()).toEqual({ error: 'invalid request' });
  });

  it('should reject malformed JSON', async () => {
    const resp = await fetch(`${baseUrl}/challenge`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"pubkey":',
    });
    expect(resp.status).toBe(400);
    expect(await resp.json()).toEqual({ error: 'invalid request' });
  });
});

// ── POST /response ────────────────────────────────────────────────────────

describe('POST /response', () => {
  it('should register a key for a correct answer', async () => {
    const identity = generateIdentity();
    const name = uniqueName('alice');
    const challenge = await requestChallenge(identity);

    const resp = await postJson('/response', answerChallenge(identity, challenge, name));
    expect(resp.status).toBe(201);
    expect(await resp.json()).toBeNull();

    expect(store.lookupKey(name)?.toString('hex')).toBe(publicKeyToHex(identity.publicKey));
  });

  it('should refuse a name that is already taken', async () => {
    const name = uniqueName('bob');
    const first = generateIdentity();
    const second = generateIdentity();

    const r1 = await postJson('/response', answerChallenge(first, await requestChallenge(first), name));
    expect(r1.status).toBe(201);

    const r2 = await postJson(
      '/response',
      answerChallenge(second, await requestChallenge(second), name),
    );
    expect(r2.status).toBe(409);
    expect(await r2.json()).toEqual({ error: 'name taken' });

    expect(store.lookupKey(name)?.toString('hex')).toBe(publicKeyToHex(first.publicKey));
  });

  it('should fail the challenge for a wrong response', async () => {
    const identity = generateIdentity();
    const name = uniqueName('carol');
    const challenge = await requestChallenge(identity);
    const answer = answerChallenge(identity, challenge, name);

    const resp = await postJson('/response', { ...answer, response: '11'.repeat(32) });
    expect(resp.status).toBe(400);
    expect(await resp.json()).toEqual({ error: 'failed challenge' });
    expect(store.lookupKey(name)).toBeNull();
  });

  it('should fail the challenge when state is tampered with', async () => {
    const identity = generateIdentity();
    const challenge = await requestChallenge(identity);
    const answer = answerChallenge(identity, challenge, uniqueName('dave'));
    const state = Buffer.from(answer.state, 'hex');
    state[state.length - 1] ^= 0x01;

    const resp = await postJson('/response', { ...answer, state: state.toString('hex') });
    expect(resp.status).toBe(400);
    expect(await resp.json()).toEqual({ error: 'failed challenge' });
  });

  it('should fail the challenge when the nonce is the wrong size', async () => {
    const identity = generateIdentity();
    const answer = answerChallenge(identity, await requestChallenge(identity), uniqueName('erin'));

    const resp = await postJson('/response', { ...answer, nonce: '00'.repeat(8) });
    expect(resp.status).toBe(400);
    expect(await resp.json()).toEqual({ error: 'failed challenge' });
  });

  it('should fail an expired challenge', async () => {
    const identity = generateIdentity();
    const challenge = await requestChallenge(identity);
    clock += CHALLENGE_TTL_MS + 1;

    const resp = await postJson('/response', answerChallenge(identity, challenge, uniqueName('frank')));
    expect(resp.status).toBe(400);
    expect(await resp.json()).toEqual({ error: 'failed challenge' });
  });

  it('should accept a challenge answered right at its TTL', async () => {
    const identity = generateIdentity();
    const challenge = await requestChallenge(identity);
    clock += CHALLENGE_TTL_MS;

    const resp = await postJson('/response', answerChallenge(identity, challenge, uniqueName('gina')));
    expect(resp.status).toBe(201);
  });

  it('should reject a body without a name', async () => {
    const identity = generateIdentity();
    const answer = answerChallenge(identity, await requestChallenge(identity), 'unused');
    const resp = await postJson('/response', {
      response: answer.response,
      state: answer.state,
      nonce: answer.nonce,
    });
    expect(resp.status).toBe(400);
    expect(await resp.json()).toEqual({ error: 'invalid request' });
  });

  it('should reject an empty name', async () => {
    const identity = generateIdentity();
    const answer = answerChallenge(identity, await requestChallenge(identity), '');
    const resp = await postJson('/response', answer);
    expect(resp.status).toBe(400);
    expect(await resp.json()).toEqual({ error: 'invalid request' });
  });
});

// ── GET /key/:name ────────────────────────────────────────────────────────

describe('GET /key/:name', () => {
  it('should return the registered key as hex', async () => {
    const identity = generateIdentity();
    const name = uniqueName('henry');
    await postJson('/response', answerChallenge(identity, await requestChallenge(identity), name));

    const resp = await fetch(`${baseUrl}/key/${name}`);
    expect(resp.status).toBe(200);
    expect(await resp.json()).toEqual({ pubkey: publicKeyToHex(identity.publicKey) });
  });

  it('should return 404 for an unknown name', async () => {
    const resp = await fetch(`${baseUrl}/key/nobody-here`);
    expect(resp.status).toBe(404);
    expect(await resp.json()).toEqual({ error: 'not found' });
  });

  it('should decode percent-encoded names', async () => {
    const identity = generateIdentity();
    const name = uniqueName('ivy smith');
    await postJson('/response', answerChallenge(identity, await requestChallenge(identity), name));

    const resp = await fetch(`${baseUrl}/key/${encodeURIComponent(name)}`);
    expect(resp.status).toBe(200);
    expect(await resp.json()).toEqual({ pubkey: publicKeyToHex(identity.publicKey) });
  });
});

// ── Misc ──────────────────────────────────────────────────────────────────

describe('other routes', () => {
  it('should report health with the key count', async () => {
    const resp = await fetch(`${baseUrl}/health`);
    expect(resp.status).toBe(200);
    const body = (await resp.json()) as { status: string; keys: number; uptime: number };
    expect(body.status).toBe('ok');
    expect(body.keys).toBe(store.countKeys());
    expect(typeof body.uptime).toBe('number');
  });

  it('should return a JSON 404 for unknown routes', async () => {
    const resp = await fetch(`${baseUrl}/nowhere`);
    expect(resp.status).toBe(404);
    expect(await resp.json()).toEqual({ error: 'not found' });
  });
});

// ── KeyServerClient ───────────────────────────────────────────────────────

describe('KeyServerClient', () => {
  it('should register and look up through the client', async () => {
    const client = new KeyServerClient({ serverUrl: `${baseUrl}/` });
    const identity = generateIdentity();
    const name = uniqueName('julia');

    expect(await client.register(name, identity)).toBe('registered');

    const key = await client.lookup(name);
    expect(key?.equals(identity.publicKey)).toBe(true);
  });

  it('should report a taken name', async () => {
    const client = new KeyServerClient({ serverUrl: baseUrl });
    const name = uniqueName('kim');
    expect(await client.register(name, generateIdentity())).toBe('registered');
    expect(await client.register(name, generateIdentity())).toBe('name_taken');
  });

  it('should hand out challenges that expire', async () => {
    const client = new KeyServerClient({ serverUrl: baseUrl });
    const identity = generateIdentity();
    const challenge = await client.requestChallenge(identity.publicKey);
    clock += CHALLENGE_TTL_MS + 1;

    const resp = await postJson('/response', answerChallenge(identity, challenge, uniqueName('lee')));
    expect(resp.status).toBe(400);
    expect(await resp.json()).toEqual({ error: 'failed challenge' });
  });

  it('should return null when looking up an unknown name', async () => {
    const client = new KeyServerClient({ serverUrl: baseUrl });
    expect(await client.lookup('no-such-person')).toBeNull();
  });

  it('should throw on an unexpected status', async () => {
    const client = new KeyServerClient({ serverUrl: baseUrl });
    await expect(client.register('', generateIdentity())).rejects.toThrow(
      'Registration failed: 400 invalid request',
    );
  });
});

// ── State key resolution ──────────────────────────────────────────────────

describe('resolveStateKey', () => {
  const base = {
    host: '127.0.0.1',
    port: 0,
    dbPath: ':memory:',
    challengeTtlMs: 0,
  };

  it('should use a configured hex key', () => {
    const key = resolveStateKey({ ...base, stateKey: 'cd'.repeat(32) });
    expect(key.equals(Buffer.alloc(32, 0xcd))).toBe(true);
  });

  it('should read the key from an environment reference', () => {
    process.env.KEYSERVER_E2E_STATE_KEY = 'ef'.repeat(32);
    try {
      const key = resolveStateKey({ ...base, stateKey: '${KEYSERVER_E2E_STATE_KEY}' });
      expect(key.equals(Buffer.alloc(32, 0xef))).toBe(true);
    } finally {
      delete process.env.KEYSERVER_E2E_STATE_KEY;
    }
  });

  it('should generate a random key when none is configured', () => {
    const a = resolveStateKey(base);
    const b = resolveStateKey(base);
    expect(a).toHaveLength(32);
    expect(a.equals(b)).toBe(false);
  });

  it('should throw when the key references an unset environment variable', () => {
    delete process.env.KEYSERVER_E2E_MISSING_KEY;
    expect(() => resolveStateKey({ ...base, stateKey: '${KEYSERVER_E2E_MISSING_KEY}' })).toThrow(
      'State key references an unset environment variable: ${KEYSERVER_E2E_MISSING_KEY}',
    );
  });

  it('should throw for a malformed configured key', () => {
    expect(() => resolveStateKey({ ...base, stateKey: 'short' })).toThrow(
      'State key must be 64 hex characters',
    );
  });
});

// ── Store failures ────────────────────────────────────────────────────────

describe('POST /response with a failing store', () => {
  let failingServer: Server;
  let failingUrl: string;
  let failingStore: KeyStore;

  beforeAll(async () => {
    failingStore = openKeyStore(':memory:');
    const app = createApp({ store: failingStore, stateKey: generateStateKey() });
    await new Promise<void>((resolve) => {
      failingServer = app.listen(0, '127.0.0.1', () => {
        const { port } = failingServer.address() as AddressInfo;
        failingUrl = `http://127.0.0.1:${port}`;
        resolve();
      });
    });
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
      failingServer.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  });

  it('should return 500 when the insert fails for a reason other than a taken name', async () => {
    const identity = generateIdentity();
    const challengeResp = await fetch(`${failingUrl}/challenge`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ pubkey: publicKeyToHex(identity.publicKey) }),
    });
    expect(challengeResp.status).toBe(200);
    const challenge = ChallengeSchema.parse(await challengeResp.json());

    failingStore.close();

    const resp = await fetch(`${failingUrl}/response`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(answerChallenge(identity, challenge, 'mia')),
    });
    expect(resp.status).toBe(500);
    expect(await resp.json()).toEqual({ error: 'could not insert' });
  });
});
