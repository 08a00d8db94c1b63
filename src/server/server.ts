/**
 * Key server: the public key directory EmberTalk clients register with.
 *
 * Endpoints:
 *   POST /challenge      { pubkey }                        → { challenge, state, nonce }
 *   POST /response       { response, state, nonce, name }  → 201 | 400 | 409 | 500
 *   GET  /key/:name                                        → { pubkey } | 404
 *   GET  /health
 *
 * A name can only be bound to a key whose private half the registrant holds:
 * the challenge nonce is sealed to the submitted key and must come back in
 * the clear. Challenge state is sealed to the server itself, so nothing is
 * kept between the two calls.
 */

import 'dotenv/config';
import express, { type ErrorRequestHandler } from 'express';

import { loadConfig, resolveSecret, type ServerConfig } from '../shared/config.js';
import { generateStateKey, parseStateKey, publicKeyFromHex } from '../shared/crypto/index.js';
import { createLogger } from '../shared/logger.js';
import {
  ChallengeRequestSchema,
  ChallengeResponseSchema,
  issueChallenge,
  verifyResponse,
  type KeyLookup,
} from '../shared/protocol/index.js';
import { openKeyStore, type KeyStore } from './store.js';

const log = createLogger('server');

export const ERRORS = {
  invalidRequest: { error: 'invalid request' },
  failedChallenge: { error: 'failed challenge' },
  nameTaken: { error: 'name taken' },
  couldNotInsert: { error: 'could not insert' },
  notFound: { error: 'not found' },
} as const;

/** Options for creating the app — allows dependency injection for tests */
export interface CreateAppOptions {
  store: KeyStore;
  /** 32-byte AES key used to seal challenge state */
  stateKey: Buffer;
  /** Maximum challenge age in ms. 0 disables expiry. */
  challengeTtlMs?: number;
  /** Clock override for tests */
  now?: () => number;
}

export function createApp(options: CreateAppOptions): express.Express {
  const { store, stateKey } = options;
  const challengeTtlMs = options.challengeTtlMs ?? 0;
  const now = options.now ?? Date.now;

  const app = express();
  app.use(express.json({ limit: '64kb' }));

  // ── Challenge ──────────────────────────────────────────────────────────

  app.post('/challenge', (req, res) => {
    const parsed = ChallengeRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      log.debug('Rejected challenge request:', parsed.error.issues[0]?.message);
      res.status(400).json(ERRORS.invalidRequest);
      return;
    }

    try {
      const pubkey = publicKeyFromHex(parsed.data.pubkey);
      const challenge = issueChallenge(stateKey, pubkey, now());
      log.debug(`Issued challenge for ${parsed.data.pubkey.substring(0, 16)}...`);
      res.json(challenge);
    } catch (err) {
      // Low-order points fail ECDH
      const message = err instanceof Error ? err.message : String(err);
      log.debug('Could not issue challenge:', message);
      res.status(400).json(ERRORS.invalidRequest);
    }
  });

  // ── Response / registration ────────────────────────────────────────────

  app.post('/response', (req, res) => {
    const parsed = ChallengeResponseSchema.safeParse(req.body);
    if (!parsed.success) {
      log.debug('Rejected challenge response:', parsed.error.issues[0]?.message);
      res.status(400).json(ERRORS.invalidRequest);
      return;
    }
    const response = parsed.data;

    const pubkey = verifyResponse(stateKey, response, { maxAgeMs: challengeTtlMs, now: now() });
    if (pubkey === null) {
      log.warn(`Failed challenge for ${response.name}`);
      res.status(400).json(ERRORS.failedChallenge);
      return;
    }

    try {
      const result = store.registerKey(response.name, Buffer.from(pubkey, 'hex'));
      if (!result.ok) {
        log.error(`Error inserting key for ${response.name}: name taken`);
        res.status(409).json(ERRORS.nameTaken);
        return;
      }
      log.info(`Inserted key for ${response.name}`);
      res.status(201).json(null);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.error(`Error inserting key for ${response.name}: ${message}`);
      res.status(500).json(ERRORS.couldNotInsert);
    }
  });

  // ── Lookup ─────────────────────────────────────────────────────────────

  app.get('/key/:name', (req, res) => {
    const { name } = req.params;
    const pubkey = store.lookupKey(name);
    if (!pubkey) {
      log.info(`Failed to retrieve ${name}: no such name`);
      res.status(404).json(ERRORS.notFound);
      return;
    }
    const body: KeyLookup = { pubkey: pubkey.toString('hex') };
    res.json(body);
  });

  // ── Health check ───────────────────────────────────────────────────────

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      keys: store.countKeys(),
      uptime: process.uptime(),
    });
  });

  app.use((_req, res) => {
    res.status(404).json(ERRORS.notFound);
  });

  // Body-parser failures (malformed JSON, oversized body) land here
  const onError: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
    const status =
      err instanceof Error && 'status' in err && typeof err.status === 'number' ? err.status : 500;
    if (status >= 400 && status < 500) {
      res.status(400).json(ERRORS.invalidRequest);
      return;
    }
    const message = err instanceof Error ? err.message : String(err);
    log.error('Unhandled error:', message);
    res.status(500).json({ error: 'internal error' });
  };
  app.use(onError);

  return app;
}

/**
 * Pick the state key: the configured one if present, otherwise a fresh
 * random key (outstanding challenges then die with the process).
 *
 * @throws Error if a key is configured but malformed, or references an unset env var
 */
export function resolveStateKey(config: ServerConfig): Buffer {
  if (config.stateKey !== undefined) {
    const value = resolveSecret(config.stateKey);
    if (value === undefined) {
      throw new Error(`State key references an unset environment variable: ${config.stateKey}`);
    }
    return parseStateKey(value);
  }
  log.info('No state key configured; generated an ephemeral one');
  return generateStateKey();
}

// ── Start ──────────────────────────────────────────────────────────────────

function main(): void {
  const config = loadConfig().server;
  const store = openKeyStore(config.dbPath);
  const app = createApp({
    store,
    stateKey: resolveStateKey(config),
    challengeTtlMs: config.challengeTtlMs,
  });

  log.info('Starting server...');
  const server = app.listen(config.port, config.host, () => {
    log.info(`Key server listening on ${config.host}:${config.port}`);
  });

  const shutdown = () => {
    log.info('Shutting down');
    server.close(() => {
      store.close();
      process.exit(0);
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

// Only run when executed directly (not when imported by tests)
const isDirectRun =
  process.argv[1]?.endsWith('server/server.ts') || process.argv[1]?.endsWith('server/server.js');

if (isDirectRun) {
  try {
    main();
  } catch (err: unknown) {
    log.error('Fatal error:', err);
    process.exit(1);
  }
}
